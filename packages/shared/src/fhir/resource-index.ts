import { MalformedInputError } from '../errors';
import type { Entry } from './bundle';

export type ResourceIndex = ReadonlyMap<string, Entry>;

export interface ParsedReference {
  resourceType?: string;
  id: string;
}

const URN_PREFIXES = ['urn:uuid:', 'urn:oid:'];

/** `[base/]Type/id[/_history/vid]` */
const RELATIVE_REFERENCE = /(?:^|\/)([A-Z][A-Za-z]+)\/([^/?#]+)(?:\/_history\/[^/]+)?$/;

/** A bare identifier: no path, scheme or whitespace. */
const BARE_IDENTIFIER = /^[^\s/:?#]+$/;

/**
 * Parse a FHIR reference string into the identifier it points at.
 *
 * Handles `urn:uuid:` / `urn:oid:` full URLs, relative or absolute
 * `Type/id` references and bare identifiers. Contained (`#id`) and conditional
 * (`Type?param=value`) references cannot be resolved inside a bundle and
 * yield `undefined`.
 */
export function parseReference(reference: string): ParsedReference | undefined {
  const ref = reference.trim();
  if (!ref || ref.startsWith('#') || ref.includes('?')) return undefined;

  for (const prefix of URN_PREFIXES) {
    if (ref.startsWith(prefix)) {
      const id = ref.slice(prefix.length);
      return id ? { id } : undefined;
    }
  }

  const match = ref.match(RELATIVE_REFERENCE);
  if (match) return { resourceType: match[1], id: match[2] };
  return BARE_IDENTIFIER.test(ref) ? { id: ref } : undefined;
}

/**
 * The identifier an entry is indexed under: `resource.id`, or failing that
 * the id carried by its `fullUrl`.
 */
export function entryId(entry: Entry): string {
  const id = entry.resource.id?.trim();
  if (id) return id;

  if (entry.fullUrl) {
    const parsed = parseReference(entry.fullUrl);
    if (parsed) return parsed.id;
  }

  throw new MalformedInputError(
    `${entry.resource.resourceType} entry has no usable identifier`,
    entry.resource.resourceType,
  );
}

/**
 * Build the id -> entry lookup for one bundle. A later entry with the same
 * identifier replaces the earlier one.
 */
export function buildResourceIndex(entries: readonly Entry[]): ResourceIndex {
  const index = new Map<string, Entry>();
  for (const entry of entries) {
    index.set(entryId(entry), entry);
  }
  return index;
}

/**
 * Follow a reference string through the index. Returns `undefined` for
 * anything that does not land on an indexed entry, including a typed
 * reference whose target has a different resourceType.
 */
export function resolveReference(index: ResourceIndex, reference: string | undefined): Entry | undefined {
  if (!reference) return undefined;
  const parsed = parseReference(reference);
  if (!parsed) return undefined;

  const entry = index.get(parsed.id);
  if (!entry) return undefined;
  if (parsed.resourceType && entry.resource.resourceType !== parsed.resourceType) return undefined;
  return entry;
}
