import type { ClassifiedPaper, FeatureContext } from '../types';
import { DEFAULT_VOCABULARY, lookupSynonym, sanitizeFeatureName, type SynonymVocabulary } from './sanitize';

export interface FeatureCandidate extends FeatureContext {
	synonym_hint?: string;
}

/** Splits the `;`-joined feature list the extraction stage stores, dropping labels that sanitize to nothing. */
export function splitFeatureList(list: string | null | undefined): string[] {
	if (!list) return [];
	return list
		.split(';')
		.filter((part) => part.trim())
		.map(sanitizeFeatureName)
		.filter(Boolean);
}

/**
 * One row per sanitized feature of every paper whose feature list validated,
 * carrying the paper's provenance. Repeated (feature, paper) contexts keep
 * their first occurrence.
 */
export function expandFeatureRows(
	papers: ClassifiedPaper[],
	vocabulary: SynonymVocabulary = DEFAULT_VOCABULARY
): FeatureCandidate[] {
	const seen = new Set<string>();
	const rows: FeatureCandidate[] = [];
	for (const paper of papers) {
		if (paper.feature_validation !== 'Valid') continue;
		for (const feature of splitFeatureList(paper.features)) {
			const context: FeatureContext = {
				feature_clean: feature,
				title: paper.title,
				abstract: paper.abstract,
				doi: paper.doi,
				domain_validated: paper.domain_validated ?? '',
			};
			const key = contextKey(context);
			if (seen.has(key)) continue;
			seen.add(key);
			const hint = lookupSynonym(feature, vocabulary);
			rows.push(hint === undefined ? context : { ...context, synonym_hint: hint });
		}
	}
	return rows;
}

function contextKey(row: FeatureContext): string {
	return JSON.stringify([row.feature_clean, row.title, row.abstract, row.doi, row.domain_validated]);
}
