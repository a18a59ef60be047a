/**
 * Token budget for a single note request.
 * The encounter context is the only segment that grows with the bundle;
 * the renderer trims it to stay inside its ceiling.
 */
export const TOKEN_BUDGET = {
  /** Scribe persona + note instructions */
  system_prompt: 1_000,
  /** Patient line + rendered encounter */
  encounter_context: 6_000,
  /** Reserved for the generated note */
  response: 2_048,
} as const;

/**
 * Fast heuristic: ~4 characters per token (works for English medical text).
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
