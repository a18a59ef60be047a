import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadSampleBundle } from '../__fixtures__';
import type { NoteGenerator } from '../claude/note-generator';
import { MalformedInputError, ServiceError } from '../errors';
import { buildEncounterPrompts, generateEncounterNotes } from './pipeline';

describe('buildEncounterPrompts', () => {
  it('builds one request per encounter in bundle order', () => {
    const prompts = buildEncounterPrompts(loadSampleBundle());

    expect(prompts.map(p => [p.encounterId, p.date, p.request.kind])).toEqual([
      ['enc-wellness', '2020-03-02', 'general'],
      ['enc-er', '2021-07-10', 'emergency'],
    ]);
  });

  it('ages the patient as of each encounter', () => {
    const [wellness, er] = buildEncounterPrompts(loadSampleBundle());

    expect(wellness.request.prompt.split('\n\n')[0]).toBe(
      'Patient: Alex Tester, 49-year-old female; race: white; ethnicity: not hispanic or latino',
    );
    expect(er.request.prompt.split('\n\n')[0]).toBe(
      'Patient: Alex Tester, 51-year-old female; race: white; ethnicity: not hispanic or latino',
    );
    expect(er.request.prompt.split('\n\n')[1]).toBe(er.text);
  });

  it('can keep only documented encounters', () => {
    const prompts = buildEncounterPrompts(loadSampleBundle(), { selection: 'documented' });
    expect(prompts.map(p => p.encounterId)).toEqual(['enc-er']);
  });

  it('passes the context ceiling to the renderer', () => {
    const [wellness] = buildEncounterPrompts(loadSampleBundle(), { contextTokens: 20 });
    expect(wellness.text).toBe(
      'Encounter: General examination of patient; date: 2020-03-02\n(4 more related resources omitted)',
    );
  });
});

describe('generateEncounterNotes', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('records a service failure against its encounter and carries on', async () => {
    const prompts = buildEncounterPrompts(loadSampleBundle());
    const generate = vi.fn<NoteGenerator>(async request => {
      if (request.kind === 'general') throw new ServiceError('Note generation failed (529): Overloaded', 529);
      return 'ED note';
    });

    const result = await generateEncounterNotes(prompts, generate);

    expect(generate).toHaveBeenCalledTimes(2);
    expect(result.failed).toBe(1);
    expect(result.notes).toEqual([
      {
        encounterId: 'enc-wellness',
        date: '2020-03-02',
        kind: 'general',
        error: 'Note generation failed (529): Overloaded',
      },
      { encounterId: 'enc-er', date: '2021-07-10', kind: 'emergency', note: 'ED note' },
    ]);
    expect(console.error).toHaveBeenCalledWith('[notes] enc-wellness: Note generation failed (529): Overloaded');
  });

  it('aborts on anything other than a service failure', async () => {
    const prompts = buildEncounterPrompts(loadSampleBundle());
    const generate = vi.fn<NoteGenerator>(async () => {
      throw new MalformedInputError('bad input');
    });

    await expect(generateEncounterNotes(prompts, generate)).rejects.toThrow(MalformedInputError);
    expect(generate).toHaveBeenCalledTimes(1);
  });
});
