export {
	type ChatAssistant,
	type ChatAssistantOptions,
	createChatAssistant,
	describeChatFailure,
} from './assistant.js';
export {
	buildCatalogueContext,
	type CatalogueContextOptions,
	detectGenres,
} from './context.js';
export {
	createHttpChatProvider,
	type HttpChatProviderOptions,
} from './http-provider.js';
export { CHAT_SYSTEM_PROMPT, GENRE_KEYWORDS } from './prompts.js';
export { freeTextReply, parseChatResponse } from './response.js';
export type {
	ChatCompletionOptions,
	ChatMessage,
	ChatOutcome,
	ChatProvider,
	ChatReply,
	ChatRole,
	DatabaseMovie,
	ExternalMovie,
} from './types.js';
