// ---------------------------------------------------------------------------
// Chat collaborator: Type definitions
// ---------------------------------------------------------------------------

import type { ExternalServiceError } from '../errors/index.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
	readonly role: ChatRole;
	readonly content: string;
}

export interface ChatCompletionOptions {
	readonly model: string;
	readonly maxTokens: number;
	readonly temperature: number;
}

/**
 * Anything that turns a message list into assistant text. Implementations
 * reject with `ExternalServiceError`s.
 */
export interface ChatProvider {
	readonly complete: (
		messages: readonly ChatMessage[],
		options: ChatCompletionOptions,
	) => Promise<string>;
}

/** A catalogue movie the assistant recommended, revalidated by exact title. */
export interface DatabaseMovie {
	readonly title: string;
	readonly movieId: number;
	readonly reason: string;
}

/** A movie from the assistant's general knowledge, not in the catalogue. */
export interface ExternalMovie {
	readonly title: string;
	readonly year?: number;
	readonly reason: string;
}

export interface ChatReply {
	readonly message: string;
	readonly databaseMovies: readonly DatabaseMovie[];
	readonly externalMovies: readonly ExternalMovie[];
	/** `false` when the provider answered in free text. */
	readonly structured: boolean;
}

export type ChatOutcome =
	| { readonly ok: true; readonly reply: ChatReply }
	| {
			readonly ok: false;
			readonly error: ExternalServiceError;
			/** User-facing explanation; lists are empty. */
			readonly reply: ChatReply;
	  };
