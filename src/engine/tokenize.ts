// ---------------------------------------------------------------------------
// Tokenisation and stop words
// ---------------------------------------------------------------------------

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { StopWordsOption } from './types.js';

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Lowercase `text` and split it into runs of two or more word characters.
 * Punctuation and single characters are dropped.
 */
export function tokenize(text: string): string[] {
	return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

const stopWordListSchema = z.array(z.string());

let englishStopWords: ReadonlySet<string> | undefined;

function loadEnglishStopWords(): ReadonlySet<string> {
	if (!englishStopWords) {
		const file = new URL('../../data/stop-words.json', import.meta.url);
		const words = stopWordListSchema.parse(
			JSON.parse(readFileSync(file, 'utf-8')),
		);
		englishStopWords = new Set(words);
	}
	return englishStopWords;
}

const NO_STOP_WORDS: ReadonlySet<string> = new Set();

export function resolveStopWords(option: StopWordsOption): ReadonlySet<string> {
	return option === 'english' ? loadEnglishStopWords() : NO_STOP_WORDS;
}
