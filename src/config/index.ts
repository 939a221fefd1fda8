export {
	type AppConfigInput,
	formatValidationIssues,
	LOG_LEVELS,
	validateAppConfig,
	type ValidationIssue,
} from './schema.js';
export {
	type AppConfig,
	type CatalogueConfig,
	type ChatConfig,
	DEFAULT_CHAT_BASE_URL,
	DEFAULT_CHAT_MODEL,
	DEFAULT_IMAGE_BASE_URL,
	DEFAULT_METADATA_BASE_URL,
	DEFAULT_PLACEHOLDER_POSTER_URL,
	type DefineConfigOptions,
	defineConfig,
	loadConfigFile,
	type MetadataConfig,
	type RecommendConfig,
	type ServerConfig,
	type VectorizerConfig,
} from './settings.js';
