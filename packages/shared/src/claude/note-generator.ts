import Anthropic from '@anthropic-ai/sdk';
import { TOKEN_BUDGET } from '../context/token-budget';
import { ServiceError } from '../errors';
import type { NoteRequest } from '../prompts/note-request';
import { selectNoteModel } from './model-router';

interface NoteResponse {
  content: Array<{ type: string; text?: string }>;
}

/** The slice of the Anthropic client the generator calls; `Anthropic` satisfies it. */
export interface MessagesClient {
  messages: {
    create(params: {
      model: string;
      max_tokens: number;
      system: string;
      messages: Array<{ role: 'user'; content: string }>;
    }): PromiseLike<NoteResponse>;
  };
}

export type NoteGenerator = (request: NoteRequest) => Promise<string>;

export interface NoteGeneratorOptions {
  /** Overrides the per-kind model choice. */
  model?: string;
  maxTokens?: number;
}

function toServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error;
  if (error instanceof Anthropic.APIError) {
    return new ServiceError(
      `Note generation failed (${error.status ?? 'no status'}): ${error.message}`,
      error.status,
      { cause: error },
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ServiceError(`Note generation failed: ${message}`, undefined, { cause: error });
}

export function createNoteGenerator(client: MessagesClient, options: NoteGeneratorOptions = {}): NoteGenerator {
  return async (request) => {
    let response: NoteResponse;
    try {
      response = await client.messages.create({
        model: selectNoteModel(request.kind, options.model),
        max_tokens: options.maxTokens ?? TOKEN_BUDGET.response,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });
    } catch (error) {
      throw toServiceError(error);
    }

    const textBlock = response.content.find(c => c.type === 'text');
    const note = textBlock?.text?.trim();
    if (!note) {
      throw new ServiceError('No text response from Claude');
    }
    return note;
  };
}
