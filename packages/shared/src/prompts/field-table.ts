/**
 * Which fields of each resource type carry clinical meaning, in the order
 * they are rendered. Types missing from the table go through
 * FALLBACK_FIELDS.
 */

export type FieldFormat =
  /** CodeableConcept or a list of them */
  | 'concept'
  /** Single Coding, e.g. `Encounter.class` */
  | 'coding'
  /** string, number or boolean primitive */
  | 'text'
  /** date or dateTime, reduced to the calendar date */
  | 'date'
  | 'period'
  | 'quantity'
  /** FHIR choice element `<path>[x]` (valueQuantity, onsetDateTime, medicationReference, ...) */
  | 'choice'
  /** Observation.component: code + value pairs */
  | 'components'
  /** Reference: the resolved target's code or type, else its display */
  | 'reference';

export interface FieldSpec {
  path: string;
  label?: string;
  format: FieldFormat;
}

export interface ResourceLayout {
  label: string;
  fields: readonly FieldSpec[];
}

export const ENCOUNTER_LAYOUT: ResourceLayout = {
  label: 'Encounter',
  fields: [
    { path: 'type', format: 'concept' },
    { path: 'reasonCode', label: 'reason', format: 'concept' },
    { path: 'period', label: 'date', format: 'period' },
  ],
};

export const FIELD_TABLE: ReadonlyMap<string, ResourceLayout> = new Map<string, ResourceLayout>([
  ['Condition', {
    label: 'Condition',
    fields: [
      { path: 'code', format: 'concept' },
      { path: 'clinicalStatus', label: 'status', format: 'concept' },
      { path: 'onset', label: 'onset', format: 'choice' },
      { path: 'abatement', label: 'resolved', format: 'choice' },
    ],
  }],
  ['Observation', {
    label: 'Observation',
    fields: [
      { path: 'code', format: 'concept' },
      { path: 'value', format: 'choice' },
      { path: 'component', format: 'components' },
      { path: 'interpretation', label: 'interpretation', format: 'concept' },
      { path: 'effective', label: 'date', format: 'choice' },
    ],
  }],
  ['Procedure', {
    label: 'Procedure',
    fields: [
      { path: 'code', format: 'concept' },
      { path: 'status', label: 'status', format: 'text' },
      { path: 'reasonCode', label: 'reason', format: 'concept' },
      { path: 'performed', label: 'date', format: 'choice' },
    ],
  }],
  ['MedicationRequest', {
    label: 'Medication',
    fields: [
      { path: 'medication', format: 'choice' },
      { path: 'status', label: 'status', format: 'text' },
      { path: 'dosageInstruction.0.text', label: 'dosage', format: 'text' },
      { path: 'reasonCode', label: 'reason', format: 'concept' },
      { path: 'authoredOn', label: 'date', format: 'date' },
    ],
  }],
  ['MedicationAdministration', {
    label: 'Medication administered',
    fields: [
      { path: 'medication', format: 'choice' },
      { path: 'status', label: 'status', format: 'text' },
      { path: 'effective', label: 'date', format: 'choice' },
    ],
  }],
  ['Immunization', {
    label: 'Immunization',
    fields: [
      { path: 'vaccineCode', format: 'concept' },
      { path: 'status', label: 'status', format: 'text' },
      { path: 'occurrence', label: 'date', format: 'choice' },
    ],
  }],
  ['AllergyIntolerance', {
    label: 'Allergy',
    fields: [
      { path: 'code', format: 'concept' },
      { path: 'criticality', label: 'criticality', format: 'text' },
      { path: 'reaction.0.manifestation', label: 'reaction', format: 'concept' },
    ],
  }],
  ['DiagnosticReport', {
    label: 'Diagnostic report',
    fields: [
      { path: 'code', format: 'concept' },
      { path: 'conclusion', label: 'conclusion', format: 'text' },
      { path: 'effective', label: 'date', format: 'choice' },
    ],
  }],
  ['CarePlan', {
    label: 'Care plan',
    fields: [
      { path: 'category', format: 'concept' },
      { path: 'status', label: 'status', format: 'text' },
      { path: 'period', label: 'period', format: 'period' },
    ],
  }],
  ['CareTeam', {
    label: 'Care team',
    fields: [
      { path: 'reasonCode', label: 'reason', format: 'concept' },
      { path: 'status', label: 'status', format: 'text' },
    ],
  }],
  ['ImagingStudy', {
    label: 'Imaging study',
    fields: [
      { path: 'procedureCode', format: 'concept' },
      { path: 'series.0.modality', label: 'modality', format: 'coding' },
      { path: 'started', label: 'date', format: 'date' },
    ],
  }],
  ['DocumentReference', {
    label: 'Document',
    fields: [
      { path: 'type', format: 'concept' },
      { path: 'date', label: 'date', format: 'date' },
    ],
  }],
  ['Device', {
    label: 'Device',
    fields: [
      { path: 'type', format: 'concept' },
      { path: 'status', label: 'status', format: 'text' },
    ],
  }],
]);

/** Unknown types: the first of these that yields text. */
export const FALLBACK_FIELDS: readonly FieldSpec[] = [
  { path: 'code', format: 'concept' },
  { path: 'type', format: 'concept' },
  { path: 'category', format: 'concept' },
];

/**
 * Suffixes tried for a `choice` field, in order. `[x]` elements carry at
 * most one of these in valid data.
 */
export const CHOICE_SUFFIXES = [
  'Quantity',
  'CodeableConcept',
  'Reference',
  'String',
  'Boolean',
  'Integer',
  'DateTime',
  'Period',
  'Age',
] as const;

export function layoutFor(resourceType: string): ResourceLayout | undefined {
  if (resourceType === 'Encounter') return ENCOUNTER_LAYOUT;
  return FIELD_TABLE.get(resourceType);
}
