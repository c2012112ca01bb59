import nlp from 'compromise';

import synonymConfig from '../../config/synonyms.json';
import { toSnakeKey } from '../utils/text';

export type SynonymVocabulary = Readonly<Record<string, string>>;

export const DEFAULT_VOCABULARY: SynonymVocabulary = synonymConfig.variants;

/**
 * Canonical feature label: alphanumerics and spaces only, each word singular,
 * first word capitalized and the rest lower-cased.
 * `"Credit Scores"` becomes `"Credit score"`.
 */
export function sanitizeFeatureName(raw: string): string {
	const words = raw
		.replace(/[^A-Za-z0-9 ]+/g, '')
		.split(/\s+/)
		.filter(Boolean)
		.map(singularize);
	if (words.length === 0) return '';
	const [head, ...rest] = words;
	return [capitalize(head), ...rest.map((w) => w.toLowerCase())].join(' ');
}

/** Singular form of a plural noun, or the word unchanged when none is known. */
export function singularize(word: string): string {
	// A leading determiner pins the word as a noun for the tagger.
	const doc = nlp(`the ${word.toLowerCase()}`);
	const plurals = doc.nouns().isPlural();
	if (!plurals.found) return word;
	const singular = plurals.toSingular().text().replace(/^the\s+/i, '').trim();
	return singular || word;
}

export function lookupSynonym(label: string, vocabulary: SynonymVocabulary = DEFAULT_VOCABULARY): string | undefined {
	const key = toSnakeKey(label);
	if (key && Object.prototype.hasOwnProperty.call(vocabulary, key)) return vocabulary[key];
	const spaced = label.toLowerCase().trim();
	if (spaced && Object.prototype.hasOwnProperty.call(vocabulary, spaced)) return vocabulary[spaced];
	return undefined;
}

function capitalize(word: string): string {
	if (!word) return word;
	return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
