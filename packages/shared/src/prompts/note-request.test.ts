import { describe, expect, it } from 'vitest';
import {
  EMERGENCY_ROOM_CODE,
  SCRIBE_SYSTEM_PROMPT,
  buildNoteRequest,
  describePatient,
  selectNoteKind,
} from './note-request';

describe('selectNoteKind', () => {
  it('uses the ED template for emergency room admissions', () => {
    expect(selectNoteKind({
      resourceType: 'Encounter',
      type: [{ coding: [{ system: 'http://snomed.info/sct', code: EMERGENCY_ROOM_CODE }] }],
    })).toBe('emergency');
    expect(selectNoteKind({ resourceType: 'Encounter', class: { code: 'EMER' } })).toBe('emergency');
  });

  it('uses the problem template when the encounter has a reason', () => {
    expect(selectNoteKind({
      resourceType: 'Encounter',
      class: { code: 'AMB' },
      reasonCode: [{ coding: [{ display: 'Acute bronchitis (disorder)' }] }],
    })).toBe('problem');
  });

  it('falls back to a general summary', () => {
    expect(selectNoteKind({ resourceType: 'Encounter', class: { code: 'AMB' } })).toBe('general');
    expect(selectNoteKind({ resourceType: 'Encounter', reasonCode: [{}] })).toBe('general');
  });
});

describe('describePatient', () => {
  it('joins the known demographics', () => {
    expect(describePatient({
      name: 'Jane Doe',
      age: 54,
      gender: 'female',
      race: 'white',
      ethnicity: 'hispanic or latino',
    })).toBe('Patient: Jane Doe, 54-year-old female; race: white; ethnicity: hispanic or latino');
  });

  it('keeps partial profiles readable', () => {
    expect(describePatient({ gender: 'male' })).toBe('Patient: male');
    expect(describePatient({ name: 'Sam Roe', age: 0 })).toBe('Patient: Sam Roe, 0-year-old');
  });

  it('returns nothing for an empty summary', () => {
    expect(describePatient({ id: 'p1' })).toBeUndefined();
  });
});

describe('buildNoteRequest', () => {
  it('puts the patient line, the encounter and the instructions in order', () => {
    const request = buildNoteRequest({
      encounter: { resourceType: 'Encounter', class: { code: 'AMB' } },
      encounterText: 'Encounter: ambulatory',
      patient: { name: 'Jane Doe', gender: 'female' },
    });

    expect(request.kind).toBe('general');
    expect(request.system).toBe(SCRIBE_SYSTEM_PROMPT);
    const sections = request.prompt.split('\n\n');
    expect(sections[0]).toBe('Patient: Jane Doe, female');
    expect(sections[1]).toBe('Encounter: ambulatory');
    expect(sections[2]).toMatch(/^Write a brief clinical note/);
  });

  it('leaves the patient line out when nothing is known', () => {
    const request = buildNoteRequest({
      encounter: { resourceType: 'Encounter', class: { code: 'EMER' } },
      encounterText: 'Encounter: Emergency room admission',
      patient: {},
    });

    expect(request.kind).toBe('emergency');
    expect(request.prompt.startsWith('Encounter: Emergency room admission\n\nWrite the emergency department note')).toBe(true);
    expect(request.prompt).toContain('## Disposition');
  });
});
