// ---------------------------------------------------------------------------
// Chat Assistant: catalogue-grounded recommendations over a chat provider
// ---------------------------------------------------------------------------

import type { Catalogue } from '../catalogue/index.js';
import type { ChatConfig } from '../config/settings.js';
import {
	createExternalServiceError,
	type ExternalServiceError,
	isExternalAuthError,
	isExternalRateLimitError,
	isExternalServiceError,
	toError,
} from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import type { MetadataClient } from '../metadata/index.js';
import { buildCatalogueContext } from './context.js';
import { CHAT_SYSTEM_PROMPT } from './prompts.js';
import { freeTextReply, parseChatResponse } from './response.js';
import type { ChatMessage, ChatOutcome, ChatProvider } from './types.js';

export interface ChatAssistant {
	readonly respond: (
		message: string,
		history?: readonly ChatMessage[],
	) => Promise<ChatOutcome>;
}

export interface ChatAssistantOptions {
	readonly provider: ChatProvider;
	readonly catalogue: Catalogue;
	readonly config: Pick<
		ChatConfig,
		'model' | 'maxTokens' | 'temperature' | 'historyLimit' | 'contextLimit'
	>;
	readonly metadata?: MetadataClient;
	readonly logger?: Logger;
}

export function describeChatFailure(error: ExternalServiceError): string {
	if (isExternalAuthError(error)) return 'Invalid API key.';
	if (isExternalRateLimitError(error))
		return 'Rate limit reached. Try again later.';
	return `Error: ${error.message}`;
}

export function createChatAssistant(
	options: ChatAssistantOptions,
): ChatAssistant {
	const { provider, catalogue, config } = options;
	const logger = (options.logger ?? getDefaultLogger()).child('chat');

	const respond = async (
		message: string,
		history: readonly ChatMessage[] = [],
	): Promise<ChatOutcome> => {
		const context = await buildCatalogueContext(message, catalogue, {
			limit: config.contextLimit,
			metadata: options.metadata,
		});
		const recent =
			config.historyLimit > 0 ? history.slice(-config.historyLimit) : [];

		const messages: ChatMessage[] = [
			{ role: 'system', content: CHAT_SYSTEM_PROMPT },
			{ role: 'system', content: context },
			...recent,
			{ role: 'user', content: message },
		];

		try {
			const text = await provider.complete(messages, {
				model: config.model,
				maxTokens: config.maxTokens,
				temperature: config.temperature,
			});
			const reply = parseChatResponse(text, catalogue);
			logger.debug('Chat reply parsed', {
				structured: reply.structured,
				databaseMovies: reply.databaseMovies.length,
				externalMovies: reply.externalMovies.length,
			});
			return { ok: true, reply };
		} catch (error) {
			const wrapped = isExternalServiceError(error)
				? error
				: createExternalServiceError(
						'chat',
						`chat request failed: ${toError(error).message}`,
						{ cause: error },
					);
			logger.warn('Chat provider failed', {
				code: wrapped.code,
				error: wrapped.message,
			});
			return {
				ok: false,
				error: wrapped,
				reply: freeTextReply(describeChatFailure(wrapped)),
			};
		}
	};

	return Object.freeze({ respond });
}
