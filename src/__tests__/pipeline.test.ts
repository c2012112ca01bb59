import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigError, resolvePipelineConfig, type PipelineConfig } from '../config/pipeline';
import { parseQueryPlan } from '../ingest/queries';
import { loadRawBatches } from '../ingest/store';
import { runClassify, runClauses, runFilter, runHarvest, runJoin, runMerge, runValidate } from '../orchestrator';
import { LLMClient } from '../providers/llm';
import { buildAlerts, logRun, readHistory } from '../telemetry/runLog';
import { ArtifactError } from '../utils/json';

let workDir: string;
let config: PipelineConfig;

beforeEach(async () => {
	workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dt-scan-'));
	config = resolvePipelineConfig({ GEMINI_API_KEY: 'test-key', LLM_DELAY_MS: '0', LLM_MAX_RETRIES: '0' }, workDir);
});

afterEach(async () => {
	vi.unstubAllGlobals();
	await fs.rm(workDir, { recursive: true, force: true });
});

async function writeJson(file: string, data: unknown): Promise<void> {
	await fs.mkdir(path.dirname(file), { recursive: true });
	await fs.writeFile(file, JSON.stringify(data), 'utf8');
}

async function readJson(file: string): Promise<unknown> {
	return JSON.parse(await fs.readFile(file, 'utf8'));
}

function stubGemini(replies: string[]) {
	const fetchMock = vi.fn(async () => {
		const text = replies.shift() ?? 'unexpected call';
		return new Response(JSON.stringify({ candidates: [{ content: { parts: [{ text }] } }] }), { status: 200 });
	});
	vi.stubGlobal('fetch', fetchMock);
	return fetchMock;
}

describe('raw batch store', () => {
	it('loads json arrays in name order and skips the rest', async () => {
		const dir = config.paths.rawDir;
		await writeJson(path.join(dir, 'crossref_health.json'), [{ title: ['A'] }]);
		await writeJson(path.join(dir, 'notes.json'), { not: 'a list' });
		await fs.writeFile(path.join(dir, 'broken.json'), '{', 'utf8');
		await fs.writeFile(path.join(dir, 'readme.txt'), 'ignored', 'utf8');
		const logger = vi.fn();

		const batches = await loadRawBatches(dir, logger);

		expect(batches).toEqual([{ name: 'crossref_health.json', records: [{ title: ['A'] }] }]);
		expect(logger).toHaveBeenCalledWith('raw_batch_not_list', { file: 'notes.json' });
		expect(logger).toHaveBeenCalledWith('raw_batches_loaded', { files: 1, dir });
	});

	it('fails on a missing directory', async () => {
		await expect(loadRawBatches(path.join(workDir, 'absent'))).rejects.toBeInstanceOf(ArtifactError);
	});
});

describe('pipeline stages', () => {
	it('harvests a domain through its configured queries', async () => {
		const plan = parseQueryPlan({ domains: { insurance: { max_records: 2, crossref_queries: ['tree claims'] } } });
		vi.stubGlobal(
			'fetch',
			vi.fn(async () => new Response(JSON.stringify({ message: { items: [{ DOI: '10.9/x', title: ['X'] }] } }), { status: 200 }))
		);

		const result = await runHarvest({ config }, 'crossref', 'insurance', undefined, plan);

		expect(result.output).toBe(path.join(config.paths.rawDir, 'crossref_insurance.json'));
		expect(result.counts).toEqual({ queries: 1, records: 1 });
		expect(await readJson(result.output)).toEqual([{ DOI: '10.9/x', title: ['X'] }]);
	});

	it('refuses to harvest a domain with no queries', async () => {
		await expect(runHarvest({ config }, 'openalex', 'unknown_domain')).rejects.toBeInstanceOf(ConfigError);
	});

	it('merges raw batches into the corpus artifact', async () => {
		await writeJson(path.join(config.paths.rawDir, 'crossref_banking_finance.json'), [
			{ title: ['Forest credit'], DOI: '10.5/A', issued: { 'date-parts': [[2020]] } },
		]);
		await writeJson(path.join(config.paths.rawDir, 'openalex_banking_finance.json'), [
			{ display_name: 'Forest credit', doi: 'https://doi.org/10.5/a', publication_year: 2020 },
		]);

		const result = await runMerge({ config });

		expect(result.output).toBe(path.join(config.paths.processedDir, 'merged_corpus.json'));
		expect(result.stats.unique).toBe(1);
		const corpus = await readJson(result.output);
		expect(corpus).toEqual([
			{
				title: 'Forest credit',
				author: null,
				year: 2020,
				venue: null,
				doi: '10.5/a',
				source: 'crossref',
				domain: 'banking_finance',
				abstract: null,
				publisher: null,
				language: null,
				type: null,
				url: null,
				cited_by: null,
			},
		]);
	});

	it('classifies papers into attribute-class feature rows', async () => {
		await writeJson(path.join(config.paths.processedDir, 'merged_corpus.json'), [
			{
				title: 'Trees for lending',
				author: null,
				year: 2021,
				venue: 'Finance AI',
				doi: '10.7/x',
				source: 'crossref',
				domain: 'banking_finance',
				abstract: 'Credit scores feed a decision tree.',
				publisher: null,
				language: null,
				type: null,
				url: null,
				cited_by: null,
			},
		]);
		const fetchMock = stubGemini([
			'Relevant',
			'banking_finance',
			'{"features":[{"name":"Credit Scores","evidence":"Credit scores feed a decision tree."}]}',
			'Valid',
			'{"class":"Financial","rationale":"Money"}',
		]);

		const result = await runClassify({ config, client: new LLMClient(config.oracle) });

		expect(fetchMock).toHaveBeenCalledTimes(5);
		expect(await readJson(result.output)).toEqual([
			{
				feature_clean: 'Credit score',
				title: 'Trees for lending',
				abstract: 'Credit scores feed a decision tree.',
				doi: '10.7/x',
				domain_validated: 'banking_finance',
				synonym_hint: 'Financial',
				attribute_class: 'Financial',
				notes: 'Money',
			},
		]);
		expect(result.counts).toEqual({ input: 1, relevant: 1, validated: 1, featureRows: 1 });
	});

	it('stops screening a paper whose predicted domain differs', async () => {
		await writeJson(path.join(config.paths.processedDir, 'merged_corpus.json'), [
			{
				title: 'Trees for triage',
				author: null,
				year: 2021,
				venue: null,
				doi: null,
				source: 'openalex',
				domain: 'banking_finance',
				abstract: null,
				publisher: null,
				language: null,
				type: null,
				url: null,
				cited_by: null,
			},
		]);
		const fetchMock = stubGemini(['Relevant', 'healthcare_pharma']);

		const result = await runClassify({ config, client: new LLMClient(config.oracle) });

		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(await readJson(result.output)).toEqual([]);
	});

	it('extracts tagged clauses from regulation texts', async () => {
		await fs.mkdir(config.paths.regulationsDir, { recursive: true });
		await fs.writeFile(
			path.join(config.paths.regulationsDir, 'banking_and_finance_GLBA_§6809.txt'),
			'Preamble\nArticle 1 Account numbers.\fArticle 2 Weather data.',
			'utf8'
		);
		stubGemini([
			'{"regulated":true,"classes":["Financial","Other"],"rationale":"Account data"}',
			'{"regulated":false,"classes":[],"rationale":"No personal data"}',
		]);

		const result = await runClauses({ config, client: new LLMClient(config.oracle) });

		expect(await readJson(result.output)).toEqual([
			{
				regulated: true,
				reg_id: 'GLBA',
				article_ref: 'Article 1',
				quoted_text: 'Account numbers.',
				attribute_class: 'Financial;Other',
				rationale: 'Account data',
			},
		]);
		expect(await readJson(path.join(config.paths.processedDir, 'reg_sections_crosswalk.json'))).toEqual([
			{ attribute_class: 'Financial', first_example: 'Account numbers.' },
			{ attribute_class: 'Other', first_example: 'Account numbers.' },
		]);
		expect(result.counts).toEqual({ files: 1, input: 2, clauses: 1, classes: 2 });
		expect(result.degraded).toEqual({ notRegulated: 1 });
	});

	it('fails when there are no regulation texts', async () => {
		await fs.mkdir(config.paths.regulationsDir, { recursive: true });
		await expect(runClauses({ config, client: new LLMClient(config.oracle) })).rejects.toThrow('No regulation texts found');
	});

	it('joins features and clauses into priority pairs, then validates and filters them', async () => {
		const feature = {
			feature_clean: 'Income',
			title: 'T',
			abstract: null,
			doi: null,
			domain_validated: 'banking_finance',
			attribute_class: 'Financial',
			notes: 'Money',
		};
		await writeJson(path.join(config.paths.processedDir, 'attribute_classes.json'), [feature]);
		await writeJson(path.join(config.paths.processedDir, 'reg_sections_clauses.json'), [
			{ reg_id: 'GLBA', article_ref: '§ 6809', quoted_text: 'Nonpublic personal information', attribute_class: 'Financial' },
			{ reg_id: 'SOX', article_ref: 'Sec. 404', quoted_text: 'Internal controls', attribute_class: 'Financial' },
		]);

		const joined = await runJoin({ config });
		expect(await readJson(joined.output)).toEqual([
			{ ...feature, reg_id: 'GLBA', article_ref: '§ 6809', quoted_text: { '§ 6809': ['Nonpublic personal information'] } },
		]);

		stubGemini(['STATUS: Regulated\nCONFIDENCE: High\nRATIONALE: Covered.']);
		const validated = await runValidate({ config, client: new LLMClient(config.oracle) });
		expect(validated.counts).toEqual({ input: 1, regulated: 1 });

		const filtered = await runFilter({ config });
		expect(filtered.output).toBe(path.join(config.paths.processedDir, 'validated_feature_regulation_regulated.json'));
		expect(filtered.counts).toEqual({ input: 1, kept: 1 });
		expect(await readJson(filtered.output)).toEqual([
			{
				...feature,
				reg_id: 'GLBA',
				article_ref: '§ 6809',
				quoted_text: { '§ 6809': ['Nonpublic personal information'] },
				regulation_status: 'Regulated',
				confidence: 'High',
				validation_rationale: 'Covered.',
			},
		]);
	});

	it('drops malformed clause rows and still joins the rest', async () => {
		const feature = {
			feature_clean: 'Income',
			title: 'T',
			abstract: null,
			doi: null,
			domain_validated: 'banking_finance',
			attribute_class: 'Financial',
			notes: 'Money',
		};
		await writeJson(path.join(config.paths.processedDir, 'attribute_classes.json'), [feature]);
		await writeJson(path.join(config.paths.processedDir, 'reg_sections_clauses.json'), [
			{ reg_id: 'GLBA', article_ref: '§ 1', quoted_text: 'good', attribute_class: 'Financial' },
			{ reg_id: 'GLBA', article_ref: null, quoted_text: 'lost', attribute_class: 'Financial' },
		]);
		const logger = vi.fn();

		const result = await runJoin({ config, logger });

		expect(await readJson(result.output)).toEqual([
			{ ...feature, reg_id: 'GLBA', article_ref: '§ 1', quoted_text: { '§ 1': ['good'] } },
		]);
		expect(result.degraded).toEqual({ rejectedFeatures: 0, rejectedClauses: 1 });
		expect(logger).toHaveBeenCalledWith('artifact_row_rejected', {
			file: 'reg_sections_clauses.json',
			index: 1,
			issue: 'article_ref: Expected string, received null',
		});
	});

	it('rejects an artifact that is not an array', async () => {
		await writeJson(path.join(config.paths.processedDir, 'attribute_classes.json'), { rows: [] });
		await writeJson(path.join(config.paths.processedDir, 'reg_sections_clauses.json'), []);
		await expect(runJoin({ config })).rejects.toBeInstanceOf(ArtifactError);
	});

	it('filters any array file given on the command line', async () => {
		const input = path.join(workDir, 'custom.json');
		await writeJson(input, [{ regulation_status: 'Regulated', confidence: 'Low' }]);
		const result = await runFilter({ config }, input);
		expect(result.output).toBe(path.join(workDir, 'custom_regulated.json'));
		expect(await readJson(result.output)).toEqual([]);
	});

	it('refuses a filter input that is not an array', async () => {
		const input = path.join(workDir, 'object.json');
		await writeJson(input, { rows: [] });
		await expect(runFilter({ config }, input)).rejects.toThrow('Expected a top-level JSON array');
	});
});

describe('run log', () => {
	it('appends entries to the history file', async () => {
		const startedAt = new Date('2026-01-01T00:00:00.000Z');
		const now = new Date('2026-01-01T00:00:05.000Z');
		const first = await logRun({ command: 'merge', startedAt, counts: { input: 4 } }, config.paths.outputDir, now);
		await logRun({ command: 'join', startedAt, counts: { input: 1 } }, config.paths.outputDir, now);

		expect(first.durationMs).toBe(5000);
		expect(first.timestamp).toBe('2026-01-01T00:00:05.000Z');
		const history = await readHistory(path.join(config.paths.outputDir, 'run-history.json'));
		expect(history.runs.map((run) => run.command)).toEqual(['merge', 'join']);
	});

	it('alerts on heavy degradation and total oracle failure', () => {
		const llm = { calls: 3, failures: 3, promptTokens: 0, completionTokens: 0, costUsd: 0 };
		expect(buildAlerts({ input: 10 }, { relevance: 5, domain: 1 }, llm)).toEqual([
			'relevance at 50.0% of input',
			'all LLM calls failed',
		]);
	});
});
