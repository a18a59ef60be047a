import { CodeableConceptSchema, CodingSchema, readPath, type Resource } from '../fhir/bundle';
import { formatConcept } from '../fhir/display';
import type { PatientSummary } from '../fhir/patient';

export const SCRIBE_SYSTEM_PROMPT = `You are a medical scribe.

You write the clinical note a clinician would file for the encounter described by the user. The encounter is given as a header line followed by one line per clinical resource recorded during the visit.

## Rules
- Use ONLY the facts listed in the encounter description; do NOT fabricate vitals, findings, history or plans
- Use professional medical terminology
- Write in the third person and past tense
- If information for a section is not available, omit the section rather than inventing it
- Output the note only, no preamble`;

/** SNOMED CT "Emergency room admission" */
export const EMERGENCY_ROOM_CODE = '50849002';

export type NoteKind = 'emergency' | 'problem' | 'general';

const NOTE_INSTRUCTIONS: Record<NoteKind, string> = {
  emergency: `Write the emergency department note for this visit with these sections:
## Chief Complaint
## History of Present Illness
## ED Course (procedures, medications and results during the visit)
## Assessment
## Disposition`,
  problem: `Write a SOAP note for this encounter for the reason given above:
## Subjective
## Objective
## Assessment
## Plan`,
  general: `Write a brief clinical note summarizing this encounter: the purpose of the visit, what was assessed or performed, and any follow-up.`,
};

export interface NoteRequest {
  kind: NoteKind;
  system: string;
  prompt: string;
}

function encounterCodings(encounter: Resource): string[] {
  const codes: string[] = [];
  const types = encounter.type;
  for (const item of Array.isArray(types) ? types : []) {
    const concept = CodeableConceptSchema.safeParse(item);
    if (!concept.success) continue;
    for (const coding of concept.data.coding ?? []) {
      if (coding.code) codes.push(coding.code);
    }
  }
  return codes;
}

/**
 * Emergency-room admissions (by type code or `EMER` class) get the ED
 * template; encounters with a reason get the problem-oriented template;
 * everything else gets the general summary.
 */
export function selectNoteKind(encounter: Resource): NoteKind {
  const encounterClass = CodingSchema.safeParse(encounter.class);
  if (
    encounterCodings(encounter).includes(EMERGENCY_ROOM_CODE) ||
    (encounterClass.success && encounterClass.data.code === 'EMER')
  ) {
    return 'emergency';
  }
  if (formatConcept(readPath(encounter, 'reasonCode'))) {
    return 'problem';
  }
  return 'general';
}

/** `Patient: Jane Doe, 54-year-old female; race: white; ethnicity: hispanic or latino` */
export function describePatient(patient: PatientSummary): string | undefined {
  const who: string[] = [];
  if (patient.name) who.push(patient.name);

  const profile = [
    patient.age !== undefined ? `${patient.age}-year-old` : undefined,
    patient.gender,
  ].filter(Boolean).join(' ');
  if (profile) who.push(profile);

  const parts: string[] = [];
  if (who.length > 0) parts.push(who.join(', '));
  if (patient.race) parts.push(`race: ${patient.race}`);
  if (patient.ethnicity) parts.push(`ethnicity: ${patient.ethnicity}`);

  return parts.length > 0 ? `Patient: ${parts.join('; ')}` : undefined;
}

export interface NoteRequestParams {
  encounter: Resource;
  encounterText: string;
  patient?: PatientSummary;
}

export function buildNoteRequest(params: NoteRequestParams): NoteRequest {
  const kind = selectNoteKind(params.encounter);
  const sections: string[] = [];

  const patientLine = params.patient ? describePatient(params.patient) : undefined;
  if (patientLine) sections.push(patientLine);
  sections.push(params.encounterText);
  sections.push(NOTE_INSTRUCTIONS[kind]);

  return {
    kind,
    system: SCRIBE_SYSTEM_PROMPT,
    prompt: sections.join('\n\n'),
  };
}
