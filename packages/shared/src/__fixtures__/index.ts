import { parseBundle, type Bundle } from '../fhir/bundle';
import sampleBundle from './sample-bundle.json';

/**
 * Two encounters for one patient: a wellness visit (vitals, a condition, an
 * immunization) and an emergency room visit (procedure, medication by
 * reference, care team, document). Also carries an observation with no
 * encounter, one with a dangling encounter reference, and a resource-less
 * entry.
 */
export function loadSampleBundle(): Bundle {
  return parseBundle(sampleBundle);
}
