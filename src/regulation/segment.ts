import type { ClauseSegment } from '../types';

export const MAX_SNIPPET = 450;

const HEADING_SOURCE = String.raw`(Article\s+\d+[A-Za-z]?\b|ART\.\s*\d+|§\s*\d[\dA-Za-z\.\(\)]*|^\([A-Za-z]\)\s+|^•)`;

/**
 * Walks one page of regulation text and yields every passage that follows an
 * article-style heading (`Article 9`, `ART. 4`, `§ 164.514`, a lettered
 * sub-paragraph or a bullet). Text before the first heading is not a clause.
 */
export function* segmentClauses(pageText: string, maxSnippet = MAX_SNIPPET): Generator<ClauseSegment> {
	// A fresh regex per call keeps the generator restartable.
	const heading = new RegExp(HEADING_SOURCE, 'im');
	const parts = pageText.split(heading);
	let ref: string | null = null;
	for (let index = 0; index < parts.length; index++) {
		const part = parts[index] ?? '';
		// split() interleaves captured headings at odd indexes
		if (index % 2 === 1) {
			ref = flatten(part);
			continue;
		}
		const snippet = flatten(part);
		if (ref && snippet) {
			yield { ref, snippet: truncate(snippet, maxSnippet) };
		}
	}
}

/** Regulation texts arrive pre-extracted, one page per form-feed-separated chunk. */
export function splitPages(text: string): string[] {
	return text.split('\f');
}

function flatten(value: string): string {
	return value.trim().replace(/\n/g, ' ');
}

function truncate(value: string, max: number): string {
	const chars = Array.from(value);
	return chars.length > max ? chars.slice(0, max).join('') : value;
}
