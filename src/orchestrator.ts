import path from 'node:path';
import { promises as fs } from 'node:fs';

import type {
	ClassifiedPaper,
	ClauseRow,
	CorpusRecord,
	FeatureRow,
	Logger,
	MergeStats,
	SourceProvider,
	ValidatedPair,
} from './types';
import { ConfigError, type PipelineConfig } from './config/pipeline';
import type { LLMClient } from './providers/llm';
import { artifactPath, readClauses, readCorpus, readFeatureRows, readPairs } from './artifacts';
import { expandFeatureRows } from './features/rows';
import { harvestQueries } from './ingest/harvest';
import { mergeCorpus } from './ingest/merge';
import { DEFAULT_QUERY_PLAN, queriesFor, type QueryPlan } from './ingest/queries';
import { loadRawBatches } from './ingest/store';
import { classifyDomain, classifyRelevance, extractFeatures, validateFeatures } from './oracle/papers';
import { classifyAttribute, tagClause, validatePair } from './oracle/regulation';
import { filterRegulated, regulatedOutputPath } from './regulation/filter';
import { buildFeatureRegulationPairs } from './regulation/join';
import { resolveRegulationId } from './regulation/registry';
import { segmentClauses, splitPages } from './regulation/segment';
import { ArtifactError, readJsonFile, writeJsonFile } from './utils/json';

const DEFAULT_LOGGER: Logger = () => {};

export interface StageContext {
	config: PipelineConfig;
	logger?: Logger;
}

export interface OracleStageContext extends StageContext {
	client: LLMClient;
}

export interface StageResult {
	output: string;
	counts: Record<string, number>;
	degraded?: Record<string, number>;
}

export interface CrosswalkRow {
	attribute_class: string;
	first_example: string;
}

/**
 * Harvests one raw batch for a domain. An explicit `query` runs alone;
 * otherwise every query the plan lists for the source runs under the
 * domain's record budget.
 */
export async function runHarvest(
	ctx: StageContext,
	source: SourceProvider,
	domain: string,
	query?: string,
	plan: QueryPlan = DEFAULT_QUERY_PLAN
): Promise<StageResult> {
	const { harvest: settings, paths } = ctx.config;
	const queries = query ? [{ search: query }] : queriesFor(plan, source, domain);
	if (queries.length === 0) {
		throw new ConfigError(`No ${source} queries configured for domain '${domain}'`);
	}
	const records = await harvestQueries(source, queries, plan[domain]?.maxRecords ?? settings.maxRecords, {
		mailto: settings.mailto,
		pageSize: settings.pageSize,
		delayMs: settings.delayMs,
		logger: ctx.logger,
	});
	const output = path.join(paths.rawDir, `${source}_${domain}.json`);
	await writeJsonFile(output, records);
	return { output, counts: { queries: queries.length, records: records.length } };
}

export async function runMerge(ctx: StageContext): Promise<StageResult & { stats: MergeStats }> {
	const logger = ctx.logger ?? DEFAULT_LOGGER;
	const batches = await loadRawBatches(ctx.config.paths.rawDir, logger);
	const { corpus, stats } = mergeCorpus(batches, logger);
	const output = artifactPath(ctx.config.paths.processedDir, 'corpus');
	await writeJsonFile(output, corpus);
	return {
		output,
		stats,
		counts: { input: stats.raw, unique: stats.unique },
		degraded: { parseErrors: stats.parseErrors, droppedUntitled: stats.droppedUntitled },
	};
}

/**
 * Screens the merged corpus and turns validated feature lists into
 * classified feature rows: relevance, then domain, then feature extraction
 * and validation for papers in their harvested domain, then one attribute
 * class per distinct (feature, paper) context.
 */
export async function runClassify(ctx: OracleStageContext): Promise<StageResult> {
	const logger = ctx.logger ?? DEFAULT_LOGGER;
	const { processedDir } = ctx.config.paths;
	const { rows: corpus, rejected } = await readCorpus(artifactPath(processedDir, 'corpus'), logger);
	const errors = { rejectedRows: rejected, relevance: 0, domain: 0, validation: 0, attribute: 0 };

	const papers: ClassifiedPaper[] = [];
	for (const record of corpus) {
		const paper = await screenPaper(ctx, record);
		if (paper.decision_trees_related === 'Error') errors.relevance += 1;
		if (paper.domain_validated === 'Error') errors.domain += 1;
		if (paper.feature_validation === 'Error') errors.validation += 1;
		papers.push(paper);
	}
	await writeJsonFile(artifactPath(processedDir, 'classifiedPapers'), papers);

	const candidates = expandFeatureRows(papers);
	logger('feature_rows_ready', { papers: papers.length, rows: candidates.length });

	const rows: FeatureRow[] = [];
	for (const candidate of candidates) {
		const assignment = await classifyAttribute(ctx.client, candidate.feature_clean, candidate.title, candidate.abstract);
		if (assignment.notes === 'API_error') errors.attribute += 1;
		if (candidate.synonym_hint && candidate.synonym_hint !== assignment.attribute_class) {
			logger('attribute_hint_mismatch', {
				feature: candidate.feature_clean,
				hint: candidate.synonym_hint,
				assigned: assignment.attribute_class,
			});
		}
		rows.push({ ...candidate, ...assignment });
	}

	const output = artifactPath(processedDir, 'attributeClasses');
	await writeJsonFile(output, rows);
	return {
		output,
		counts: {
			input: corpus.length,
			relevant: papers.filter((p) => p.decision_trees_related === 'Relevant').length,
			validated: papers.filter((p) => p.feature_validation === 'Valid').length,
			featureRows: rows.length,
		},
		degraded: errors,
	};
}

async function screenPaper(ctx: OracleStageContext, record: CorpusRecord): Promise<ClassifiedPaper> {
	const prompt = { title: record.title, abstract: record.abstract, venue: record.venue, domain: record.domain };
	const relevance = await classifyRelevance(ctx.client, prompt);
	const paper: ClassifiedPaper = { ...record, decision_trees_related: relevance };
	if (relevance !== 'Relevant') return paper;

	paper.domain_validated = await classifyDomain(ctx.client, prompt);
	if (ctx.config.requireDomainMatch && paper.domain_validated !== record.domain) return paper;

	const features = await extractFeatures(ctx.client, prompt);
	paper.features = features.map((f) => f.name).join('; ');
	paper.evidence = features.map((f) => f.evidence).join('; ');
	if (features.length === 0) return paper;

	paper.feature_validation = await validateFeatures(ctx.client, prompt, paper.features);
	return paper;
}

/**
 * Segments every regulation text under `regulationsDir` and keeps the
 * passages the oracle tags as regulating data, with the first passage seen
 * for each class as the crosswalk example.
 */
export async function runClauses(ctx: OracleStageContext): Promise<StageResult> {
	const logger = ctx.logger ?? DEFAULT_LOGGER;
	const { regulationsDir, processedDir } = ctx.config.paths;
	const files = await listRegulationTexts(regulationsDir);
	if (files.length === 0) {
		throw new ArtifactError('No regulation texts found', regulationsDir);
	}

	const clauses: ClauseRow[] = [];
	const seen = new Set<string>();
	const firstExample = new Map<string, string>();
	let segments = 0;
	let untagged = 0;

	for (const file of files) {
		const regId = resolveRegulationId(file);
		const text = await fs.readFile(path.join(regulationsDir, file), 'utf8');
		for (const page of splitPages(text)) {
			for (const segment of segmentClauses(page)) {
				segments += 1;
				const tag = await tagClause(ctx.client, segment);
				if (!tag.regulated) {
					untagged += 1;
					continue;
				}
				const clause: ClauseRow = {
					regulated: true,
					reg_id: regId,
					article_ref: segment.ref,
					quoted_text: segment.snippet,
					attribute_class: tag.classes.join(';'),
					rationale: tag.rationale,
				};
				const key = JSON.stringify(clause);
				if (seen.has(key)) continue;
				seen.add(key);
				clauses.push(clause);
				for (const cls of tag.classes) {
					if (!firstExample.has(cls)) firstExample.set(cls, segment.snippet);
				}
			}
		}
		logger('regulation_segmented', { file, reg_id: regId, clauses: clauses.length });
	}

	const crosswalk: CrosswalkRow[] = Array.from(firstExample, ([attribute_class, first_example]) => ({
		attribute_class,
		first_example,
	}));
	const output = artifactPath(processedDir, 'clauses');
	await writeJsonFile(output, clauses);
	await writeJsonFile(artifactPath(processedDir, 'crosswalk'), crosswalk);
	return {
		output,
		counts: { files: files.length, input: segments, clauses: clauses.length, classes: crosswalk.length },
		degraded: { notRegulated: untagged },
	};
}

async function listRegulationTexts(dir: string): Promise<string[]> {
	let names: string[];
	try {
		names = await fs.readdir(dir);
	} catch (err) {
		throw new ArtifactError(`Regulation directory unreadable: ${String(err)}`, dir);
	}
	return names.filter((name) => name.toLowerCase().endsWith('.txt')).sort();
}

export async function runJoin(ctx: StageContext): Promise<StageResult> {
	const logger = ctx.logger ?? DEFAULT_LOGGER;
	const { processedDir } = ctx.config.paths;
	const features = await readFeatureRows(artifactPath(processedDir, 'attributeClasses'), logger);
	const clauses = await readClauses(artifactPath(processedDir, 'clauses'), logger);
	const { pairs, counts } = buildFeatureRegulationPairs(features.rows, clauses.rows, ctx.config.priorityRegulations, logger);
	const output = artifactPath(processedDir, 'pairs');
	await writeJsonFile(output, pairs);
	return {
		output,
		counts: { ...counts, input: counts.features },
		degraded: { rejectedFeatures: features.rejected, rejectedClauses: clauses.rejected },
	};
}

export async function runValidate(ctx: OracleStageContext): Promise<StageResult> {
	const logger = ctx.logger ?? DEFAULT_LOGGER;
	const { processedDir } = ctx.config.paths;
	const { rows: pairs, rejected } = await readPairs(artifactPath(processedDir, 'pairs'), logger);

	const validated: ValidatedPair[] = [];
	const statusCounts: Record<string, number> = {};
	for (const pair of pairs) {
		const verdict = await validatePair(ctx.client, pair);
		statusCounts[verdict.regulation_status] = (statusCounts[verdict.regulation_status] ?? 0) + 1;
		validated.push({ ...pair, ...verdict });
	}
	logger('pairs_validated', { total: validated.length, ...statusCounts });

	const output = artifactPath(processedDir, 'validated');
	await writeJsonFile(output, validated);
	return {
		output,
		counts: { input: pairs.length, regulated: statusCounts.Regulated ?? 0 },
		degraded: { rejectedRows: rejected, unclear: statusCounts['Not Clearly Regulated'] ?? 0 },
	};
}

/** Defaults to the validated pairs artifact; any JSON array of rows can be filtered. */
export async function runFilter(ctx: StageContext, inputPath?: string): Promise<StageResult> {
	const input = inputPath ?? artifactPath(ctx.config.paths.processedDir, 'validated');
	const data = await readJsonFile(input);
	if (!Array.isArray(data)) {
		throw new ArtifactError('Expected a top-level JSON array', input);
	}
	const { kept, total } = filterRegulated(data);
	const output = regulatedOutputPath(input);
	await writeJsonFile(output, kept);
	(ctx.logger ?? DEFAULT_LOGGER)('filter_complete', { kept: kept.length, total, output });
	return { output, counts: { input: total, kept: kept.length } };
}
