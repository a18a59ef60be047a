import {
  CodeableConceptSchema,
  CodingSchema,
  PeriodSchema,
  QuantitySchema,
  type CodeableConcept,
  type Coding,
} from './bundle';

/** SNOMED CT semantic tags Synthea leaves on display strings. */
const SEMANTIC_TAG = /\s*\((?:disorder|finding|situation|procedure|environment|regime\/therapy|observable entity|morphologic abnormality|qualifier value|substance|product|person|event|record artifact|body structure)\)\s*$/i;

export function cleanDisplay(display: string): string {
  return display.replace(SEMANTIC_TAG, '').trim();
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function codingText(coding: Coding): string | undefined {
  const display = nonEmpty(coding.display);
  if (display) return cleanDisplay(display);
  return nonEmpty(coding.code);
}

/** `text`, else the first coding display, else the first coding code. */
export function conceptText(concept: CodeableConcept): string | undefined {
  const text = nonEmpty(concept.text);
  if (text) return cleanDisplay(text);
  for (const coding of concept.coding ?? []) {
    const display = nonEmpty(coding.display);
    if (display) return cleanDisplay(display);
  }
  for (const coding of concept.coding ?? []) {
    const code = nonEmpty(coding.code);
    if (code) return code;
  }
  return undefined;
}

/**
 * Render a CodeableConcept or a list of them. Lists are joined with ", "
 * after dropping empty and repeated values.
 */
export function formatConcept(value: unknown): string | undefined {
  const items = Array.isArray(value) ? value : [value];
  const texts: string[] = [];
  for (const item of items) {
    const parsed = CodeableConceptSchema.safeParse(item);
    if (!parsed.success) continue;
    const text = conceptText(parsed.data);
    if (text && !texts.includes(text)) texts.push(text);
  }
  return texts.length > 0 ? texts.join(', ') : undefined;
}

export function formatCoding(value: unknown): string | undefined {
  const parsed = CodingSchema.safeParse(value);
  return parsed.success ? codingText(parsed.data) : undefined;
}

export function formatQuantity(value: unknown): string | undefined {
  const parsed = QuantitySchema.safeParse(value);
  if (!parsed.success || parsed.data.value === undefined) return undefined;
  const unit = nonEmpty(parsed.data.unit) ?? nonEmpty(parsed.data.code);
  const amount = Number.isInteger(parsed.data.value)
    ? String(parsed.data.value)
    : String(Math.round(parsed.data.value * 100) / 100);
  return unit ? `${amount} ${unit}` : amount;
}

/**
 * Keep the calendar date of a FHIR date/dateTime. Values that do not start
 * with a `YYYY[-MM[-DD]]` prefix are dropped.
 */
export function formatDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const match = value.trim().match(/^\d{4}(?:-\d{2}(?:-\d{2})?)?/);
  return match ? match[0] : undefined;
}

export function formatPeriod(value: unknown): string | undefined {
  const parsed = PeriodSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const start = formatDate(parsed.data.start);
  const end = formatDate(parsed.data.end);
  if (start && end) return start === end ? start : `${start} to ${end}`;
  if (start) return `from ${start}`;
  if (end) return `until ${end}`;
  return undefined;
}

export function formatText(value: unknown): string | undefined {
  if (typeof value === 'string') return nonEmpty(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}
