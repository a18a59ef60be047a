export type {
  Bundle,
  Entry,
  Resource,
  Coding,
  CodeableConcept,
  Quantity,
  Period,
  Reference,
  HumanName,
} from '../fhir/bundle';
export type { ResourceIndex, ParsedReference } from '../fhir/resource-index';
export type { EncounterGroup } from '../fhir/encounter-aggregator';
export type { PatientSummary } from '../fhir/patient';
export type { FieldFormat, FieldSpec, ResourceLayout } from '../prompts/field-table';
export type { RenderOptions } from '../prompts/encounter-prompt';
export type { NoteKind, NoteRequest, NoteRequestParams } from '../prompts/note-request';
export type { NotesConfig } from '../config/notes-config';
export type {
  EncounterSelection,
  PromptBuildOptions,
  EncounterPrompt,
  EncounterNote,
  NoteRunResult,
} from '../notes/pipeline';
