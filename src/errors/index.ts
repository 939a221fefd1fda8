// ---------------------------------------------------------------------------
// Error barrel: re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	createReelmatchError,
	isReelmatchError,
	type ReelmatchError,
	type ReelmatchErrorOptions,
	toError,
	withFields,
	wrapError,
} from './base.js';
export {
	type CatalogueLoadError,
	type CatalogueLoadReason,
	createCatalogueLoadError,
	isCatalogueLoadError,
} from './catalogue.js';
export {
	type ConfigIssue,
	createConfigError,
	createConfigNotFoundError,
	createConfigParseError,
	createConfigValidationError,
	isConfigError,
	isConfigNotFoundError,
	isConfigParseError,
	isConfigValidationError,
} from './config.js';
export {
	createEmptyCorpusError,
	createEngineNotReadyError,
	createRowOutOfRangeError,
	createTitleNotFoundError,
	isEmptyCorpusError,
	isEngineError,
	isEngineNotReadyError,
	isRowOutOfRangeError,
	isTitleNotFoundError,
	type TitleNotFoundError,
} from './engine.js';
export {
	createExternalAuthError,
	createExternalHTTPError,
	createExternalInvalidResponseError,
	createExternalRateLimitError,
	createExternalServiceError,
	createExternalTimeoutError,
	type ExternalService,
	type ExternalServiceError,
	isExternalAuthError,
	isExternalHTTPError,
	isExternalInvalidResponseError,
	isExternalRateLimitError,
	isExternalServiceError,
	isExternalTimeoutError,
} from './external.js';
