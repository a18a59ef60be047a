import { ReferenceSchema, readPath, type Entry, type Resource } from './bundle';
import { entryId, resolveReference, type ResourceIndex } from './resource-index';

export interface EncounterGroup {
  encounter: Entry;
  /** Entries pointing at `encounter`, in bundle order. */
  related: Entry[];
}

function referenceString(value: unknown): string | undefined {
  const parsed = ReferenceSchema.safeParse(value);
  return parsed.success ? parsed.data.reference : undefined;
}

/**
 * The reference strings through which a resource names its encounter.
 * Most resources carry a single `encounter` Reference; DocumentReference
 * lists them under `context.encounter`.
 */
export function encounterReferencesOf(resource: Resource): string[] {
  const refs: string[] = [];

  const direct = referenceString(resource.encounter);
  if (direct) refs.push(direct);

  const contextual = readPath(resource, 'context.encounter');
  if (Array.isArray(contextual)) {
    for (const item of contextual) {
      const ref = referenceString(item);
      if (ref) refs.push(ref);
    }
  }

  return refs;
}

/**
 * Resolve a resource's encounter-reference to the encounter entry, or
 * `undefined` when it has none or every candidate is dangling.
 */
export function encounterReferenceOf(resource: Resource, index: ResourceIndex): Entry | undefined {
  for (const ref of encounterReferencesOf(resource)) {
    const target = resolveReference(index, ref);
    if (target && target.resource.resourceType === 'Encounter') return target;
  }
  return undefined;
}

export function isEncounter(entry: Entry): boolean {
  return entry.resource.resourceType === 'Encounter';
}

/**
 * Yield one group per Encounter entry, in bundle order. Each encounter gets
 * a full pass over `entries`; an entry joins the group when its
 * encounter-reference resolves to that encounter's identifier.
 *
 * The generator holds no state between calls, so invoking it again replays
 * the same groups.
 */
export function* aggregateEncounters(
  entries: readonly Entry[],
  index: ResourceIndex,
): Generator<EncounterGroup, void, undefined> {
  for (const candidate of entries) {
    if (!isEncounter(candidate)) continue;
    const encounterId = entryId(candidate);

    const related: Entry[] = [];
    for (const entry of entries) {
      if (entry === candidate || isEncounter(entry)) continue;
      const owner = encounterReferenceOf(entry.resource, index);
      if (owner && entryId(owner) === encounterId) {
        related.push(entry);
      }
    }

    yield { encounter: candidate, related };
  }
}

/**
 * Identifiers of encounters that a DocumentReference points at, in the
 * order the documents appear. Used to restrict note generation to
 * encounters that were documented in the source record.
 */
export function documentedEncounterIds(entries: readonly Entry[], index: ResourceIndex): string[] {
  const ids: string[] = [];
  for (const entry of entries) {
    if (entry.resource.resourceType !== 'DocumentReference') continue;
    const owner = encounterReferenceOf(entry.resource, index);
    if (!owner) continue;
    const id = entryId(owner);
    if (!ids.includes(id)) ids.push(id);
  }
  return ids;
}
