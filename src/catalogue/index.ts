export {
	type CatalogueOptions,
	catalogueRecordSchema,
	createCatalogue,
	DEFAULT_PAGE_SIZE,
	DEFAULT_SEARCH_LIMIT,
	loadCatalogue,
} from './catalogue.js';
export type {
	Catalogue,
	CatalogueEntry,
	CataloguePage,
	CatalogueRecord,
} from './types.js';
