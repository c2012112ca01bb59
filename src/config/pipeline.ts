import path from 'node:path';
import { z } from 'zod';

import type { OracleConfig } from '../providers/llm';
import { DEFAULT_GEMINI_MODELS } from '../providers/llm';
import { DEFAULT_PRIORITY_REGULATIONS } from '../regulation/registry';
import { clamp } from '../utils/retry';

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export interface PipelineEnv {
	DATA_DIR?: string;
	OUTPUT_DIR?: string;
	FEAT_GEMINI?: string;
	GEMINI_API_KEY?: string;
	GEMINI_MODEL_FORCE?: string;
	LLM_MAX_OUTPUT_TOKENS?: string;
	LLM_MAX_RETRIES?: string;
	RUN_LLM_LIMIT?: string;
	LLM_DELAY_MS?: string;
	PROMPT_PRICE_PER_1K?: string;
	COMPLETION_PRICE_PER_1K?: string;
	HARVEST_MAILTO?: string;
	HARVEST_MAX_RECORDS?: string;
	HARVEST_PAGE_SIZE?: string;
	HARVEST_DELAY_MS?: string;
	PIPELINE_OVERRIDES?: string;
}

export interface PipelinePaths {
	rawDir: string;
	processedDir: string;
	regulationsDir: string;
	outputDir: string;
}

export interface HarvestSettings {
	mailto?: string;
	maxRecords: number;
	pageSize: number;
	delayMs: number;
}

export interface PipelineConfig {
	paths: PipelinePaths;
	oracle: OracleConfig;
	harvest: HarvestSettings;
	priorityRegulations: string[];
	/** Papers go on to feature extraction only when the predicted domain matches the harvested one. */
	requireDomainMatch: boolean;
}

const overridesSchema = z
	.object({
		priorityRegulations: z.array(z.string().min(1)).min(1),
		requireDomainMatch: z.boolean(),
		models: z.array(z.string().min(1)).min(1),
		callCap: z.number().int().min(0),
		delayMs: z.number().int().min(0),
		maxRecords: z.number().int().positive(),
	})
	.partial()
	.strict();

export type PipelineOverrides = z.infer<typeof overridesSchema>;

export function resolvePipelineConfig(env: PipelineEnv, cwd: string = process.cwd()): PipelineConfig {
	const overrides = parsePipelineOverrides(env.PIPELINE_OVERRIDES) ?? {};
	const dataDir = path.resolve(cwd, env.DATA_DIR || 'data');
	const forcedModel = env.GEMINI_MODEL_FORCE?.trim();

	return {
		paths: {
			rawDir: path.join(dataDir, 'raw'),
			processedDir: path.join(dataDir, 'processed'),
			regulationsDir: path.join(dataDir, 'regulations'),
			outputDir: path.resolve(cwd, env.OUTPUT_DIR || 'output'),
		},
		oracle: {
			enabled: flagEnabled(env.FEAT_GEMINI, true),
			apiKey: env.GEMINI_API_KEY || undefined,
			models: overrides.models ?? (forcedModel ? [forcedModel] : [...DEFAULT_GEMINI_MODELS]),
			maxOutputTokens: clamp(intOr(env.LLM_MAX_OUTPUT_TOKENS, 512), 64, 2048),
			maxRetries: clamp(intOr(env.LLM_MAX_RETRIES, 2), 0, 6),
			callCap: overrides.callCap ?? clamp(intOr(env.RUN_LLM_LIMIT, 0), 0, 100000),
			delayMs: overrides.delayMs ?? clamp(intOr(env.LLM_DELAY_MS, 1000), 0, 60000),
			pricing: {
				promptPer1k: floatOr(env.PROMPT_PRICE_PER_1K, 0.00015),
				completionPer1k: floatOr(env.COMPLETION_PRICE_PER_1K, 0.0006),
			},
		},
		harvest: {
			mailto: env.HARVEST_MAILTO || undefined,
			maxRecords: overrides.maxRecords ?? clamp(intOr(env.HARVEST_MAX_RECORDS, 500), 1, 10000),
			pageSize: clamp(intOr(env.HARVEST_PAGE_SIZE, 100), 1, 1000),
			delayMs: clamp(intOr(env.HARVEST_DELAY_MS, 1000), 0, 60000),
		},
		priorityRegulations: overrides.priorityRegulations ?? [...DEFAULT_PRIORITY_REGULATIONS],
		requireDomainMatch: overrides.requireDomainMatch ?? true,
	};
}

/** Reads `PIPELINE_OVERRIDES`; a value that is not valid JSON or does not fit the schema is a `ConfigError`. */
export function parsePipelineOverrides(raw?: string | null): PipelineOverrides | undefined {
	if (!raw || !raw.trim()) return undefined;
	let decoded: unknown;
	try {
		decoded = JSON.parse(raw);
	} catch (err) {
		throw new ConfigError(`PIPELINE_OVERRIDES is not valid JSON: ${String(err)}`);
	}
	const parsed = overridesSchema.safeParse(decoded);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
		throw new ConfigError(`PIPELINE_OVERRIDES rejected: ${issues.join('; ')}`);
	}
	return parsed.data;
}

export function flagEnabled(value: string | undefined, fallback = false): boolean {
	if (value === undefined) return fallback;
	return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function intOr(value: string | undefined, fallback: number): number {
	return parseInt(value || String(fallback), 10);
}

function floatOr(value: string | undefined, fallback: number): number {
	const parsed = value ? parseFloat(value) : fallback;
	return Number.isFinite(parsed) ? parsed : fallback;
}
