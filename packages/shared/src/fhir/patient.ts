import { z } from 'zod';
import { ExtensionSchema, HumanNameSchema, type Entry, type ExtensionValue, type Resource } from './bundle';
import { formatDate } from './display';

export const US_CORE_RACE = 'http://hl7.org/fhir/us/core/StructureDefinition/us-core-race';
export const US_CORE_ETHNICITY = 'http://hl7.org/fhir/us/core/StructureDefinition/us-core-ethnicity';

const PatientFieldsSchema = z.object({
  name: z.array(HumanNameSchema).optional(),
  gender: z.string().optional(),
  birthDate: z.string().optional(),
  extension: z.array(z.unknown()).optional(),
});

export interface PatientSummary {
  id?: string;
  name?: string;
  gender?: string;
  birthDate?: string;
  /** Whole years between birth date and the reference date. */
  age?: number;
  race?: string;
  ethnicity?: string;
}

export function extractPatient(entries: readonly Entry[]): Resource | undefined {
  return entries.find(e => e.resource.resourceType === 'Patient')?.resource;
}

function officialName(names: z.infer<typeof HumanNameSchema>[]): string | undefined {
  const name = names.find(n => n.use === 'official') ?? names[0];
  if (!name) return undefined;
  if (name.text?.trim()) return name.text.trim();
  // Synthea appends digits to generated names ("Jane123")
  const parts = [...(name.given ?? []), name.family ?? '']
    .map(p => p.replace(/\d+$/, '').trim())
    .filter(Boolean);
  return parts.length > 0 ? parts.join(' ') : undefined;
}

/**
 * Read a US Core race/ethnicity extension: the `text` sub-extension when
 * present, otherwise the first `ombCategory` display.
 */
function coreCategory(extensions: unknown[], url: string): string | undefined {
  const parsed: ExtensionValue[] = [];
  for (const ext of extensions) {
    const result = ExtensionSchema.safeParse(ext);
    if (result.success) parsed.push(result.data);
  }

  const root = parsed.find(e => e.url === url);
  if (!root) return undefined;

  const children = root.extension ?? [];
  const text = children.find(c => c.url === 'text')?.valueString?.trim();
  if (text) return text.toLowerCase();

  const category = children.find(c => c.url === 'ombCategory')?.valueCoding?.display?.trim();
  return category ? category.toLowerCase() : undefined;
}

/** Whole years from `birthDate` to `asOf` (both `YYYY-MM-DD`). */
export function ageOn(birthDate: string, asOf: string): number | undefined {
  const birth = formatDate(birthDate);
  const at = formatDate(asOf);
  if (!birth || !at || birth.length < 10 || at.length < 10) return undefined;

  const [by, bm, bd] = birth.split('-').map(Number);
  const [ay, am, ad] = at.split('-').map(Number);
  let age = ay - by;
  if (am < bm || (am === bm && ad < bd)) age--;
  return age >= 0 ? age : undefined;
}

export function summarizePatient(patient: Resource | undefined, asOf?: string): PatientSummary {
  if (!patient) return {};
  const parsed = PatientFieldsSchema.safeParse(patient);
  if (!parsed.success) return { id: patient.id };

  const fields = parsed.data;
  const summary: PatientSummary = { id: patient.id };

  const name = officialName(fields.name ?? []);
  if (name) summary.name = name;
  if (fields.gender?.trim()) summary.gender = fields.gender.trim();

  const birthDate = formatDate(fields.birthDate);
  if (birthDate) {
    summary.birthDate = birthDate;
    if (asOf) {
      const age = ageOn(birthDate, asOf);
      if (age !== undefined) summary.age = age;
    }
  }

  const extensions = fields.extension ?? [];
  const race = coreCategory(extensions, US_CORE_RACE);
  if (race) summary.race = race;
  const ethnicity = coreCategory(extensions, US_CORE_ETHNICITY);
  if (ethnicity) summary.ethnicity = ethnicity;

  return summary;
}
