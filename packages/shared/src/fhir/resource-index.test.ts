import { describe, expect, it } from 'vitest';
import { MalformedInputError } from '../errors';
import { loadSampleBundle } from '../__fixtures__';
import type { Entry } from './bundle';
import { buildResourceIndex, entryId, parseReference, resolveReference } from './resource-index';

describe('parseReference', () => {
  it('reads urn:uuid full URLs', () => {
    expect(parseReference('urn:uuid:0b7a2f6e-1c1d-4a51-9a52-6f0f0e1b2c3d')).toEqual({
      id: '0b7a2f6e-1c1d-4a51-9a52-6f0f0e1b2c3d',
    });
  });

  it('reads relative, absolute and versioned Type/id references', () => {
    expect(parseReference('Encounter/e1')).toEqual({ resourceType: 'Encounter', id: 'e1' });
    expect(parseReference('https://fhir.example.org/r4/Encounter/e1')).toEqual({ resourceType: 'Encounter', id: 'e1' });
    expect(parseReference('Encounter/e1/_history/3')).toEqual({ resourceType: 'Encounter', id: 'e1' });
  });

  it('keeps ids the index accepts', () => {
    expect(parseReference('E1')).toEqual({ id: 'E1' });
    expect(parseReference(' enc_1 ')).toEqual({ id: 'enc_1' });
    expect(parseReference('Encounter/enc_1')).toEqual({ resourceType: 'Encounter', id: 'enc_1' });
    expect(parseReference('Encounter/visit:2020-03-02')).toEqual({ resourceType: 'Encounter', id: 'visit:2020-03-02' });
  });

  it('gives up on contained, conditional and malformed references', () => {
    expect(parseReference('#med1')).toBeUndefined();
    expect(parseReference('Practitioner?identifier=http://hl7.org/fhir/sid/us-npi|123')).toBeUndefined();
    expect(parseReference('urn:uuid:')).toBeUndefined();
    expect(parseReference('http://example.org/fhir')).toBeUndefined();
    expect(parseReference('   ')).toBeUndefined();
  });
});

describe('entryId', () => {
  it('prefers resource.id and falls back to fullUrl', () => {
    expect(entryId({ fullUrl: 'urn:uuid:other', resource: { resourceType: 'Condition', id: 'c1' } })).toBe('c1');
    expect(entryId({ fullUrl: 'urn:uuid:c2', resource: { resourceType: 'Condition' } })).toBe('c2');
    expect(entryId({ fullUrl: 'http://example.org/fhir/Condition/c3', resource: { resourceType: 'Condition' } })).toBe('c3');
  });

  it('throws when no identifier can be found', () => {
    expect(() => entryId({ resource: { resourceType: 'Condition', id: '  ' } })).toThrow(MalformedInputError);
    expect(() => entryId({ fullUrl: 'not a url', resource: { resourceType: 'Condition' } }))
      .toThrow('Condition entry has no usable identifier');
  });
});

describe('buildResourceIndex', () => {
  it('keys every identifier exactly once', () => {
    const { entries } = loadSampleBundle();
    const index = buildResourceIndex(entries);

    expect(index.size).toBe(14);
    for (const entry of entries) {
      expect(index.get(entryId(entry))).toBe(entry);
    }
  });

  it('keeps the later entry when identifiers repeat', () => {
    const first: Entry = { resource: { resourceType: 'Condition', id: 'X', code: { text: 'Asthma' } } };
    const second: Entry = { resource: { resourceType: 'Condition', id: 'X', code: { text: 'Migraine' } } };

    const index = buildResourceIndex([first, second]);

    expect(index.size).toBe(1);
    expect(index.get('X')).toBe(second);
    expect(index.get('X')?.resource.code).toEqual({ text: 'Migraine' });
  });
});

describe('resolveReference', () => {
  const index = buildResourceIndex(loadSampleBundle().entries);

  it('follows urn and typed references', () => {
    expect(resolveReference(index, 'urn:uuid:enc-er')?.resource.id).toBe('enc-er');
    expect(resolveReference(index, 'Encounter/enc-er')?.resource.id).toBe('enc-er');
  });

  it('looks bare identifiers up directly', () => {
    expect(resolveReference(index, 'enc-er')?.resource.id).toBe('enc-er');
    expect(resolveReference(index, 'enc-missing')).toBeUndefined();
  });

  it('rejects a typed reference whose target has another type', () => {
    expect(resolveReference(index, 'Patient/enc-er')).toBeUndefined();
  });

  it('returns undefined for dangling or absent references', () => {
    expect(resolveReference(index, 'urn:uuid:enc-missing')).toBeUndefined();
    expect(resolveReference(index, undefined)).toBeUndefined();
  });
});
