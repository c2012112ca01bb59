import { isJsonMap } from '../utils/json';

const MAX_POSITION = 100_000;

/**
 * Rebuilds a plain-text abstract from an inverted index (token -> positions),
 * the form OpenAlex ships abstracts in.
 *
 * Positions no token claims stay empty, so gaps show up as repeated spaces
 * inside the string. When two tokens claim one position the later one in
 * property order wins; integer-like tokens such as `2020` come first in that
 * order, so a word token beats them. Positions past `MAX_POSITION` are ignored.
 */
export function reconstructAbstract(index: unknown): string {
	if (!isJsonMap(index)) return '';

	const entries: Array<[string, number[]]> = [];
	let maxPos = -1;
	for (const [word, raw] of Object.entries(index)) {
		const positions = Array.isArray(raw) ? raw.filter(isPosition) : [];
		for (const pos of positions) {
			if (pos > maxPos) maxPos = pos;
		}
		entries.push([word, positions]);
	}

	const tokens: string[] = new Array<string>(maxPos + 1).fill('');
	for (const [word, positions] of entries) {
		for (const pos of positions) {
			tokens[pos] = word;
		}
	}
	return tokens.join(' ').trim();
}

function isPosition(value: unknown): value is number {
	return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= MAX_POSITION;
}
