// ---------------------------------------------------------------------------
// OpenAI-compatible chat completion provider
// ---------------------------------------------------------------------------

import { z } from 'zod';
import { createExternalInvalidResponseError } from '../errors/index.js';
import { type FetchLike, requestJson } from '../utils/http.js';
import type {
	ChatCompletionOptions,
	ChatMessage,
	ChatProvider,
} from './types.js';

const completionSchema = z.object({
	choices: z
		.array(
			z.object({
				message: z.object({ content: z.string().nullable() }),
			}),
		)
		.min(1),
});

export interface HttpChatProviderOptions {
	readonly baseUrl: string;
	readonly apiKey: string;
	readonly timeoutMs: number;
	readonly fetch?: FetchLike;
}

export function createHttpChatProvider(
	options: HttpChatProviderOptions,
): ChatProvider {
	const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
	const url = `${options.baseUrl.replace(/\/+$/, '')}/chat/completions`;

	return Object.freeze({
		async complete(
			messages: readonly ChatMessage[],
			completion: ChatCompletionOptions,
		) {
			const body = await requestJson(
				'chat',
				fetchImpl,
				url,
				{
					method: 'POST',
					headers: {
						'Content-Type': 'application/json',
						Accept: 'application/json',
						Authorization: `Bearer ${options.apiKey}`,
					},
					body: JSON.stringify({
						model: completion.model,
						messages,
						max_tokens: completion.maxTokens,
						temperature: completion.temperature,
					}),
				},
				options.timeoutMs,
			);

			const parsed = completionSchema.safeParse(body);
			if (!parsed.success) {
				throw createExternalInvalidResponseError(
					'chat',
					'chat completion response did not match the expected shape',
					{ cause: parsed.error },
				);
			}
			return parsed.data.choices[0].message.content ?? '';
		},
	});
}
