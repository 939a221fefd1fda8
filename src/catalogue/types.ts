// ---------------------------------------------------------------------------
// Catalogue: Type definitions
// ---------------------------------------------------------------------------

/**
 * One movie in the catalogue. Immutable after load; `row` is its position
 * in load order and doubles as its row in the fitted vector space.
 */
export interface CatalogueEntry {
	readonly movieId: number;
	readonly title: string;
	/** Concatenated genre / keyword / overview tokens. Vectorizer input only. */
	readonly tags: string;
	readonly row: number;
}

/** A persisted catalogue record, as it appears in the source file. */
export interface CatalogueRecord {
	readonly movie_id: number;
	readonly title: string;
	readonly tags: string;
}

export interface CataloguePage {
	readonly entries: readonly CatalogueEntry[];
	/** 1-based page number. */
	readonly page: number;
	readonly pageSize: number;
	/** Number of entries matching the filter across all pages. */
	readonly total: number;
	readonly hasMore: boolean;
}

/**
 * Read-only view over the loaded movie set. The catalogue is the sole
 * owner of its entries; everything else refers to them by row or id.
 */
export interface Catalogue {
	/** Where the catalogue was loaded from (a path, or `"memory"`). */
	readonly source: string;
	readonly size: number;
	readonly entries: readonly CatalogueEntry[];
	readonly entryAt: (row: number) => CatalogueEntry | undefined;
	readonly rowOf: (movieId: number) => number | undefined;
	readonly lookupById: (movieId: number) => CatalogueEntry | undefined;
	/** Case-insensitive; the first entry in row order wins on duplicates. */
	readonly lookupByTitleExact: (title: string) => CatalogueEntry | undefined;
	/** Every row carrying this exact (case-insensitive) title, ascending. */
	readonly rowsByTitle: (title: string) => readonly number[];
	/**
	 * Case-insensitive substring search: title hits first, then tag hits,
	 * each group in row order, de-duplicated by movie id.
	 */
	readonly search: (query: string, limit?: number) => readonly CatalogueEntry[];
	/** Entries whose tags contain `term` (case-insensitive). */
	readonly filterByTag: (term: string) => readonly CatalogueEntry[];
	readonly pageByTag: (
		term: string,
		page?: number,
		pageSize?: number,
	) => CataloguePage;
}
