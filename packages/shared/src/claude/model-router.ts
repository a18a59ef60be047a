import type { NoteKind } from '../prompts/note-request';

export const MODELS = {
  fast: 'claude-haiku-4-5-20251001',      // routine visit summaries
  standard: 'claude-sonnet-4-5-20250929', // problem-oriented and ED notes
} as const;

export type ModelTier = keyof typeof MODELS;

/**
 * Pick a model for a note. General visit summaries are short and formulaic,
 * so they go to the fast tier; notes that must reason over a presenting
 * problem use the standard tier. An explicit model always wins.
 */
export function selectNoteModel(kind: NoteKind, override?: string): string {
  if (override) return override;
  return kind === 'general' ? MODELS.fast : MODELS.standard;
}
