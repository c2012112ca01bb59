import path from 'node:path';
import { z } from 'zod';

import type { ClauseRow, CorpusRecord, FeatureRegulationPair, FeatureRow, Logger } from './types';
import { ArtifactError, readJsonFile } from './utils/json';

export const ARTIFACTS = {
	corpus: 'merged_corpus.json',
	classifiedPapers: 'classified_papers.json',
	attributeClasses: 'attribute_classes.json',
	clauses: 'reg_sections_clauses.json',
	crosswalk: 'reg_sections_crosswalk.json',
	pairs: 'feature_regulation_pairs.json',
	validated: 'validated_feature_regulation.json',
} as const;

const DEFAULT_LOGGER: Logger = () => {};

export type ArtifactName = keyof typeof ARTIFACTS;

export function artifactPath(processedDir: string, name: ArtifactName): string {
	return path.join(processedDir, ARTIFACTS[name]);
}

const nullableText = z.string().nullable();

const corpusRecordSchema = z.object({
	title: z.string(),
	author: nullableText,
	year: z.number().int().nullable(),
	venue: nullableText,
	doi: nullableText,
	source: z.enum(['crossref', 'openalex']),
	domain: z.string(),
	abstract: nullableText,
	publisher: nullableText,
	language: nullableText,
	type: nullableText,
	url: nullableText,
	cited_by: z.number().int().nullable(),
});

const featureRowSchema = z.object({
	feature_clean: z.string(),
	title: z.string(),
	abstract: nullableText,
	doi: nullableText,
	domain_validated: z.string(),
	attribute_class: z.string(),
	notes: z.string(),
	synonym_hint: z.string().optional(),
});

const clauseRowSchema = z.object({
	reg_id: z.string(),
	article_ref: z.string(),
	quoted_text: z.string(),
	attribute_class: z.string(),
	rationale: z.string().optional(),
	regulated: z.boolean().optional(),
});

const pairSchema = featureRowSchema.extend({
	reg_id: z.string(),
	article_ref: z.string(),
	quoted_text: z.record(z.array(z.string())),
});

export interface ArtifactRows<T> {
	rows: T[];
	rejected: number;
}

export function readCorpus(file: string, logger?: Logger): Promise<ArtifactRows<CorpusRecord>> {
	return readArtifact(file, corpusRecordSchema, logger);
}

export function readFeatureRows(file: string, logger?: Logger): Promise<ArtifactRows<FeatureRow>> {
	return readArtifact(file, featureRowSchema, logger);
}

export function readClauses(file: string, logger?: Logger): Promise<ArtifactRows<ClauseRow>> {
	return readArtifact(file, clauseRowSchema, logger);
}

export function readPairs(file: string, logger?: Logger): Promise<ArtifactRows<FeatureRegulationPair>> {
	return readArtifact(file, pairSchema, logger);
}

/**
 * Reads a stage artifact that must be a JSON array. Rows that do not match
 * `schema` are logged and dropped; a file that is not an array fails the read.
 */
async function readArtifact<T>(
	file: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	logger: Logger = DEFAULT_LOGGER
): Promise<ArtifactRows<T>> {
	const data = await readJsonFile(file);
	if (!Array.isArray(data)) {
		throw new ArtifactError(`Expected a top-level JSON array in ${file}`, file);
	}
	const rows: T[] = [];
	let rejected = 0;
	data.forEach((row: unknown, index) => {
		const parsed = schema.safeParse(row);
		if (parsed.success) {
			rows.push(parsed.data);
			return;
		}
		rejected += 1;
		const issue = parsed.error.issues[0];
		logger('artifact_row_rejected', {
			file: path.basename(file),
			index,
			issue: issue ? `${issue.path.join('.') || '(row)'}: ${issue.message}` : 'unknown issue',
		});
	});
	return { rows, rejected };
}
