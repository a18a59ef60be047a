// Errors
export { MalformedInputError, ServiceError } from './errors';

// FHIR bundle
export {
  parseBundle,
  readPath,
  BundleSchema,
  ResourceSchema,
  CodeableConceptSchema,
  CodingSchema,
  QuantitySchema,
  PeriodSchema,
  ReferenceSchema,
} from './fhir/bundle';
export { buildResourceIndex, resolveReference, parseReference, entryId } from './fhir/resource-index';
export {
  aggregateEncounters,
  encounterReferenceOf,
  encounterReferencesOf,
  documentedEncounterIds,
  isEncounter,
} from './fhir/encounter-aggregator';
export { cleanDisplay, conceptText, formatConcept, formatDate, formatPeriod, formatQuantity } from './fhir/display';
export { extractPatient, summarizePatient, ageOn, US_CORE_RACE, US_CORE_ETHNICITY } from './fhir/patient';

// Prompts
export { FIELD_TABLE, ENCOUNTER_LAYOUT, FALLBACK_FIELDS, layoutFor } from './prompts/field-table';
export { renderEncounterPrompt, renderEncounterHeader, renderResourceLine } from './prompts/encounter-prompt';
export {
  SCRIBE_SYSTEM_PROMPT,
  EMERGENCY_ROOM_CODE,
  buildNoteRequest,
  describePatient,
  selectNoteKind,
} from './prompts/note-request';

// Claude
export { createAnthropicClient } from './claude/client';
export type { AnthropicClientOptions } from './claude/client';
export { createNoteGenerator } from './claude/note-generator';
export type { MessagesClient, NoteGenerator, NoteGeneratorOptions } from './claude/note-generator';
export { MODELS, selectNoteModel } from './claude/model-router';
export type { ModelTier } from './claude/model-router';

// Context Management
export { TOKEN_BUDGET, estimateTokens } from './context/token-budget';

// Config
export { loadNotesConfig, requireApiKey } from './config/notes-config';

// Pipeline
export { buildEncounterPrompts, generateEncounterNotes } from './notes/pipeline';

// Types
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
  ResourceIndex,
  ParsedReference,
  EncounterGroup,
  PatientSummary,
  FieldFormat,
  FieldSpec,
  ResourceLayout,
  RenderOptions,
  NoteKind,
  NoteRequest,
  NoteRequestParams,
  NotesConfig,
  EncounterSelection,
  PromptBuildOptions,
  EncounterPrompt,
  EncounterNote,
  NoteRunResult,
} from './types/index';
