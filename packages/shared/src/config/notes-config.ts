import { z } from 'zod';
import { TOKEN_BUDGET } from '../context/token-budget';

const NotesEnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  NOTES_MODEL: z.string().min(1).optional(),
  NOTES_MAX_TOKENS: z.coerce.number().int().positive().default(TOKEN_BUDGET.response),
  NOTES_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  NOTES_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  NOTES_CONTEXT_TOKENS: z.coerce.number().int().positive().default(TOKEN_BUDGET.encounter_context),
  NOTES_OUTPUT_DIR: z.string().min(1).default('output'),
});

export interface NotesConfig {
  apiKey?: string;
  /** Forces one model for every note instead of the per-kind choice. */
  model?: string;
  maxTokens: number;
  maxRetries: number;
  timeoutMs: number;
  /** Token ceiling for the rendered encounter text. */
  contextTokens: number;
  outputDir: string;
}

/**
 * Build the run configuration from an environment map. Blank variables
 * count as unset. Nothing in the library reads `process.env` itself; the
 * CLI passes it in.
 */
export function loadNotesConfig(env: Record<string, string | undefined>): NotesConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value.trim();
  }

  const result = NotesEnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = result.data;
  return {
    apiKey: vars.ANTHROPIC_API_KEY,
    model: vars.NOTES_MODEL,
    maxTokens: vars.NOTES_MAX_TOKENS,
    maxRetries: vars.NOTES_MAX_RETRIES,
    timeoutMs: vars.NOTES_TIMEOUT_MS,
    contextTokens: vars.NOTES_CONTEXT_TOKENS,
    outputDir: vars.NOTES_OUTPUT_DIR,
  };
}

export function requireApiKey(config: NotesConfig): string {
  if (!config.apiKey) {
    throw new Error('ANTHROPIC_API_KEY is not set. Add it to .env.local or use --dry-run.');
  }
  return config.apiKey;
}
