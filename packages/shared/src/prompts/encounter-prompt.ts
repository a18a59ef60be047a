import { TOKEN_BUDGET, estimateTokens } from '../context/token-budget';
import { MalformedInputError } from '../errors';
import { ReferenceSchema, readPath, type Resource } from '../fhir/bundle';
import {
  cleanDisplay,
  formatCoding,
  formatConcept,
  formatDate,
  formatPeriod,
  formatQuantity,
  formatText,
} from '../fhir/display';
import type { EncounterGroup } from '../fhir/encounter-aggregator';
import { resolveReference, type ResourceIndex } from '../fhir/resource-index';
import {
  CHOICE_SUFFIXES,
  ENCOUNTER_LAYOUT,
  FALLBACK_FIELDS,
  layoutFor,
  type FieldSpec,
  type ResourceLayout,
} from './field-table';

const FIELD_SEPARATOR = '; ';

export interface RenderOptions {
  /** Resolves references such as `medicationReference`; without it only their `display` is used. */
  index?: ResourceIndex;
  /** Ceiling on the estimated prompt size. Defaults to TOKEN_BUDGET.encounter_context. */
  maxTokens?: number;
}

function formatReference(value: unknown, index: ResourceIndex | undefined): string | undefined {
  const parsed = ReferenceSchema.safeParse(value);
  if (!parsed.success) return undefined;

  const target = index ? resolveReference(index, parsed.data.reference) : undefined;
  if (target) {
    const text = formatConcept(target.resource.code) ?? formatConcept(target.resource.type);
    if (text) return text;
  }

  const display = parsed.data.display?.trim();
  return display ? cleanDisplay(display) : undefined;
}

function formatChoice(source: object, prefix: string, index: ResourceIndex | undefined): string | undefined {
  for (const suffix of CHOICE_SUFFIXES) {
    const value: unknown = Reflect.get(source, `${prefix}${suffix}`);
    if (value === undefined) continue;

    switch (suffix) {
      case 'Quantity':
      case 'Age':
        return formatQuantity(value);
      case 'CodeableConcept':
        return formatConcept(value);
      case 'Reference':
        return formatReference(value, index);
      case 'Boolean':
        return typeof value === 'boolean' ? (value ? 'yes' : 'no') : undefined;
      case 'DateTime':
        return formatDate(value);
      case 'Period':
        return formatPeriod(value);
      default:
        return formatText(value);
    }
  }
  return undefined;
}

function formatComponents(value: unknown, index: ResourceIndex | undefined): string | undefined {
  if (!Array.isArray(value)) return undefined;
  const parts: string[] = [];
  for (const component of value) {
    if (component === null || typeof component !== 'object') continue;
    const name = formatConcept(Reflect.get(component, 'code'));
    const reading = formatChoice(component, 'value', index);
    const part = [name, reading].filter(Boolean).join(' ');
    if (part) parts.push(part);
  }
  return parts.length > 0 ? parts.join(', ') : undefined;
}

function formatField(resource: Resource, field: FieldSpec, index: ResourceIndex | undefined): string | undefined {
  if (field.format === 'choice') return formatChoice(resource, field.path, index);

  const value = readPath(resource, field.path);
  if (value === undefined || value === null) return undefined;

  switch (field.format) {
    case 'concept':
      return formatConcept(value);
    case 'coding':
      return formatCoding(value);
    case 'text':
      return formatText(value);
    case 'date':
      return formatDate(value);
    case 'period':
      return formatPeriod(value);
    case 'quantity':
      return formatQuantity(value);
    case 'components':
      return formatComponents(value, index);
    case 'reference':
      return formatReference(value, index);
  }
}

function renderLine(resource: Resource, layout: ResourceLayout, index: ResourceIndex | undefined): string {
  const parts: string[] = [];
  for (const field of layout.fields) {
    const text = formatField(resource, field, index);
    if (!text) continue;
    parts.push(field.label ? `${field.label}: ${text}` : text);
  }
  return parts.length > 0 ? `${layout.label}: ${parts.join(FIELD_SEPARATOR)}` : layout.label;
}

/**
 * One line for a related resource: `<type label>: <field>; <label>: <field>`.
 * Types without a table entry keep their resourceType as the label and
 * show the first available display text.
 */
export function renderResourceLine(resource: Resource, index?: ResourceIndex): string {
  const layout = layoutFor(resource.resourceType);
  if (layout) return renderLine(resource, layout, index);

  for (const field of FALLBACK_FIELDS) {
    const text = formatField(resource, field, index);
    if (text) return `${resource.resourceType}: ${text}`;
  }
  return resource.resourceType;
}

export function renderEncounterHeader(encounter: Resource, index?: ResourceIndex): string {
  return renderLine(encounter, ENCOUNTER_LAYOUT, index);
}

/**
 * Render an encounter group as plain text: the encounter header followed
 * by one line per related resource in group order. Lines that would push
 * the text past `maxTokens` are replaced by a single count of what was left
 * out.
 */
export function renderEncounterPrompt(group: EncounterGroup, options: RenderOptions = {}): string {
  const encounter = group.encounter.resource;
  if (encounter.resourceType !== 'Encounter') {
    throw new MalformedInputError(
      `Expected an Encounter, got ${encounter.resourceType}`,
      encounter.resourceType,
      encounter.id,
    );
  }

  const budget = options.maxTokens ?? TOKEN_BUDGET.encounter_context;
  const header = renderEncounterHeader(encounter, options.index);
  const lines = [header];
  let used = estimateTokens(header);

  for (let i = 0; i < group.related.length; i++) {
    const line = renderResourceLine(group.related[i].resource, options.index);
    const cost = estimateTokens(line) + 1;
    if (used + cost > budget) {
      const omitted = group.related.length - i;
      lines.push(`(${omitted} more related ${omitted === 1 ? 'resource' : 'resources'} omitted)`);
      break;
    }
    lines.push(line);
    used += cost;
  }

  return lines.join('\n');
}
