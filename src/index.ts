#!/usr/bin/env node
import 'dotenv/config';

import type { SourceProvider } from './types';
import { ConfigError, resolvePipelineConfig, type PipelineConfig } from './config/pipeline';
import { LLMClient } from './providers/llm';
import {
	runClassify,
	runClauses,
	runFilter,
	runHarvest,
	runJoin,
	runMerge,
	runValidate,
	type StageResult,
} from './orchestrator';
import { logRun, type PipelineCommand } from './telemetry/runLog';

const USAGE = `Usage: dt-privacy-scan <command> [args]

Commands:
  harvest <crossref|openalex> <domain> [query]   fetch one raw batch (configured queries by default)
  merge                                          normalize and dedupe raw batches
  classify                                       screen papers and classify their features
  clauses                                        segment and tag regulation texts
  join                                           pair features with regulation clauses
  validate                                       ask for a verdict on every pair
  filter [input.json]                            keep Regulated/High rows`;

const COMMANDS: readonly PipelineCommand[] = ['harvest', 'merge', 'classify', 'clauses', 'join', 'validate', 'filter'];

export async function main(argv: string[]): Promise<number> {
	const [name, ...args] = argv;
	const command = COMMANDS.find((c) => c === name);
	if (!command) {
		console.error(USAGE);
		return name ? 2 : 0;
	}

	const startedAt = new Date();
	let config: PipelineConfig;
	try {
		config = resolvePipelineConfig(process.env);
	} catch (err) {
		logEvent('config_error', { error: errorMessage(err) });
		return 2;
	}

	const client = new LLMClient(config.oracle, logEvent);
	const ctx = { config, logger: logEvent, client };

	try {
		const result = await dispatch(command, args, ctx);
		const llm = client.totals();
		const entry = await logRun(
			{
				command,
				startedAt,
				counts: result.counts,
				degraded: result.degraded,
				llm: llm.calls > 0 ? llm : undefined,
				output: result.output,
			},
			config.paths.outputDir
		);
		logEvent('run_complete', { command, output: result.output, counts: result.counts, alerts: entry.alerts });
		return 0;
	} catch (err) {
		logEvent('run_failed', {
			command,
			error: errorMessage(err),
			kind: err instanceof Error ? err.name : typeof err,
		});
		return err instanceof ConfigError ? 2 : 1;
	}
}

async function dispatch(
	command: PipelineCommand,
	args: string[],
	ctx: Parameters<typeof runClassify>[0]
): Promise<StageResult> {
	switch (command) {
		case 'harvest': {
			const [source, domain, ...query] = args;
			if (!isSourceProvider(source) || !domain) {
				throw new ConfigError('harvest needs <crossref|openalex> <domain> [query]');
			}
			return runHarvest(ctx, source, domain, query.join(' ') || undefined);
		}
		case 'merge':
			return runMerge(ctx);
		case 'classify':
			return runClassify(ctx);
		case 'clauses':
			return runClauses(ctx);
		case 'join':
			return runJoin(ctx);
		case 'validate':
			return runValidate(ctx);
		case 'filter':
			return runFilter(ctx, args[0]);
	}
}

function isSourceProvider(value: string | undefined): value is SourceProvider {
	return value === 'crossref' || value === 'openalex';
}

export function logEvent(phase: string, payload: Record<string, unknown>): void {
	const base = typeof payload === 'object' && payload ? payload : {};
	const entry = {
		phase,
		ts: new Date().toISOString(),
		...base,
	};
	try {
		console.log(JSON.stringify(entry));
	} catch {
		console.log(`{"phase":"${phase}","error":"log stringify failed"}`);
	}
}

function errorMessage(err: unknown): string {
	if (err instanceof Error && typeof err.message === 'string') return err.message;
	if (typeof err === 'string') return err;
	try {
		return JSON.stringify(err);
	} catch {
		return String(err);
	}
}

if (require.main === module) {
	main(process.argv.slice(2)).then(
		(code) => {
			process.exitCode = code;
		},
		(err: unknown) => {
			logEvent('fatal', { error: errorMessage(err) });
			process.exitCode = 1;
		}
	);
}
