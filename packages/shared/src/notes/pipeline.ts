import type { NoteGenerator } from '../claude/note-generator';
import { ServiceError } from '../errors';
import { readPath, type Bundle } from '../fhir/bundle';
import { formatDate } from '../fhir/display';
import { aggregateEncounters, documentedEncounterIds } from '../fhir/encounter-aggregator';
import { extractPatient, summarizePatient } from '../fhir/patient';
import { buildResourceIndex, entryId } from '../fhir/resource-index';
import { renderEncounterPrompt } from '../prompts/encounter-prompt';
import { buildNoteRequest, type NoteKind, type NoteRequest } from '../prompts/note-request';

/** `documented`: only encounters a DocumentReference points at. */
export type EncounterSelection = 'all' | 'documented';

export interface PromptBuildOptions {
  selection?: EncounterSelection;
  /** Token ceiling for each rendered encounter. */
  contextTokens?: number;
}

export interface EncounterPrompt {
  encounterId: string;
  /** Calendar date the encounter started, when recorded. */
  date?: string;
  /** Rendered encounter text, without patient line or instructions. */
  text: string;
  request: NoteRequest;
}

export interface EncounterNote {
  encounterId: string;
  date?: string;
  kind: NoteKind;
  note?: string;
  error?: string;
}

export interface NoteRunResult {
  notes: EncounterNote[];
  failed: number;
}

export function buildEncounterPrompts(bundle: Bundle, options: PromptBuildOptions = {}): EncounterPrompt[] {
  const index = buildResourceIndex(bundle.entries);
  const patient = extractPatient(bundle.entries);
  const documented = options.selection === 'documented'
    ? new Set(documentedEncounterIds(bundle.entries, index))
    : undefined;

  const prompts: EncounterPrompt[] = [];
  for (const group of aggregateEncounters(bundle.entries, index)) {
    const encounterId = entryId(group.encounter);
    if (documented && !documented.has(encounterId)) continue;

    const encounter = group.encounter.resource;
    const date = formatDate(readPath(encounter, 'period.start'));
    const text = renderEncounterPrompt(group, { index, maxTokens: options.contextTokens });
    const request = buildNoteRequest({
      encounter,
      encounterText: text,
      patient: summarizePatient(patient, date),
    });

    prompts.push(date ? { encounterId, date, text, request } : { encounterId, text, request });
  }
  return prompts;
}

/**
 * Generate one note per prompt, one request at a time. A ServiceError
 * fails only its own encounter; anything else aborts the run.
 */
export async function generateEncounterNotes(
  prompts: readonly EncounterPrompt[],
  generate: NoteGenerator,
): Promise<NoteRunResult> {
  const notes: EncounterNote[] = [];
  let failed = 0;

  for (const prompt of prompts) {
    const base = { encounterId: prompt.encounterId, date: prompt.date, kind: prompt.request.kind };
    try {
      const note = await generate(prompt.request);
      notes.push({ ...base, note });
      console.log(`[notes] ${prompt.encounterId}: ${prompt.request.kind} note generated`);
    } catch (error) {
      if (!(error instanceof ServiceError)) throw error;
      failed++;
      notes.push({ ...base, error: error.message });
      console.error(`[notes] ${prompt.encounterId}: ${error.message}`);
    }
  }

  return { notes, failed };
}
