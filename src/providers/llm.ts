import type { Logger, ScoreTelemetry } from '../types';
import { isJsonMap } from '../utils/json';
import { backoffMs, safeSnippet, waitMs } from '../utils/retry';

export const DEFAULT_GEMINI_MODELS = ['gemini-2.0-flash-lite', 'gemini-1.5-flash'];
const GEMINI_API = 'https://generativelanguage.googleapis.com/v1beta/models';

export interface TokenPricing {
	promptPer1k: number;
	completionPer1k: number;
}

export interface OracleConfig {
	enabled: boolean;
	apiKey?: string;
	models: string[];
	maxOutputTokens: number;
	maxRetries: number;
	/** Calls allowed per run; 0 means unlimited. */
	callCap: number;
	delayMs: number;
	pricing: TokenPricing;
}

export interface LLMRequest {
	system?: string;
	prompt: string;
	maxOutputTokens?: number;
	json?: boolean;
}

export interface LLMResult {
	ok: boolean;
	text?: string;
	reason?: string;
	telemetry: ScoreTelemetry;
}

export interface UsageTotals {
	calls: number;
	failures: number;
	promptTokens: number;
	completionTokens: number;
}

const DEFAULT_LOGGER: Logger = () => {};

/**
 * Stateful front for one run's model calls: enforces the per-run call cap,
 * paces consecutive calls and keeps token totals for the cost report.
 */
export class LLMClient {
	private readonly usage: UsageTotals = { calls: 0, failures: 0, promptTokens: 0, completionTokens: 0 };
	private lastCallAt = 0;

	constructor(private readonly config: OracleConfig, private readonly logger: Logger = DEFAULT_LOGGER) {}

	async call(request: LLMRequest): Promise<LLMResult> {
		if (!this.config.enabled) {
			return {
				ok: false,
				reason: 'LLM disabled',
				telemetry: { model_used: 'disabled', retries: 0, status_code: 0, provider: 'none' },
			};
		}
		if (this.config.callCap > 0 && this.usage.calls >= this.config.callCap) {
			return {
				ok: false,
				reason: 'Run LLM limit reached',
				telemetry: { model_used: '', retries: 0, status_code: 0, provider: 'gemini' },
			};
		}

		await this.pace();
		this.usage.calls += 1;
		const result = await callLLM(this.config, request, this.logger);
		this.lastCallAt = Date.now();
		this.usage.promptTokens += result.telemetry.prompt_tokens ?? 0;
		this.usage.completionTokens += result.telemetry.completion_tokens ?? 0;
		if (!result.ok) this.usage.failures += 1;
		return result;
	}

	totals(): UsageTotals & { costUsd: number } {
		return { ...this.usage, costUsd: estimateCost(this.usage, this.config.pricing) };
	}

	private async pace(): Promise<void> {
		if (this.lastCallAt === 0) return;
		const elapsed = Date.now() - this.lastCallAt;
		await waitMs(this.config.delayMs - elapsed);
	}
}

export function estimateCost(usage: Pick<UsageTotals, 'promptTokens' | 'completionTokens'>, pricing: TokenPricing): number {
	return (usage.promptTokens / 1000) * pricing.promptPer1k + (usage.completionTokens / 1000) * pricing.completionPer1k;
}

export async function callLLM(config: OracleConfig, request: LLMRequest, logger: Logger = DEFAULT_LOGGER): Promise<LLMResult> {
	const key = config.apiKey;
	if (!key) {
		return {
			ok: false,
			reason: 'Missing GEMINI_API_KEY',
			telemetry: { model_used: 'gemini', retries: 0, status_code: 0, provider: 'gemini' },
		};
	}

	const telemetry: ScoreTelemetry = { model_used: '', retries: 0, status_code: 0, provider: 'gemini' };
	const models = config.models.length > 0 ? config.models : DEFAULT_GEMINI_MODELS;
	const maxOutput = request.maxOutputTokens ?? config.maxOutputTokens;

	let attempts = 0;
	let lastReason = 'unknown_error';

	for (const model of models) {
		telemetry.model_used = model;
		for (let retry = 0; retry <= config.maxRetries; retry++) {
			attempts++;
			try {
				const res = await fetch(`${GEMINI_API}/${model}:generateContent?key=${key}`, {
					method: 'POST',
					headers: { 'Content-Type': 'application/json' },
					body: JSON.stringify(buildBody(request, maxOutput)),
				});
				telemetry.status_code = res.status;
				telemetry.retries = attempts - 1;
				if (res.ok) {
					const data: unknown = await res.json();
					Object.assign(telemetry, extractUsage(data));
					const text = extractGeminiText(data);
					if (text) {
						return { ok: true, text, telemetry };
					}
					lastReason = 'empty_response';
					logger('llm_retry', { provider: 'gemini', model, retry, reason: lastReason });
				} else if (res.status === 429 || res.status === 503) {
					lastReason = `transient_${res.status}`;
					logger('llm_retry', { provider: 'gemini', model, retry, status: res.status });
					await waitMs(backoffMs(300, retry, 2800));
					continue;
				} else {
					lastReason = `gemini_${res.status}`;
					const body = await safeSnippet(res);
					logger('llm_error', { provider: 'gemini', model, status: res.status, body });
					return { ok: false, reason: lastReason, telemetry };
				}
			} catch (err) {
				lastReason = `gemini_exception_${err instanceof Error ? err.name : 'unknown'}`;
				logger('llm_retry_error', { provider: 'gemini', model, retry, error: String(err) });
				telemetry.status_code = 0;
				await waitMs(backoffMs(400, retry, 2200));
			}
		}
	}

	return {
		ok: false,
		reason: lastReason,
		telemetry,
	};
}

function buildBody(request: LLMRequest, maxOutputTokens: number): Record<string, unknown> {
	const body: Record<string, unknown> = {
		contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
		generationConfig: {
			temperature: 0,
			maxOutputTokens,
			...(request.json ? { responseMimeType: 'application/json' } : {}),
		},
	};
	if (request.system) {
		body.systemInstruction = { parts: [{ text: request.system }] };
	}
	return body;
}

export function extractGeminiText(data: unknown): string | undefined {
	if (!isJsonMap(data) || !Array.isArray(data.candidates)) return undefined;
	const first: unknown = data.candidates[0];
	const content = isJsonMap(first) ? first.content : undefined;
	const parts = isJsonMap(content) ? content.parts : undefined;
	if (!Array.isArray(parts)) return undefined;
	const combined = parts
		.map((part: unknown) => (isJsonMap(part) ? part.text : undefined))
		.filter((v: unknown): v is string => typeof v === 'string')
		.join('\n');
	return combined || undefined;
}

function extractUsage(data: unknown): Pick<ScoreTelemetry, 'prompt_tokens' | 'completion_tokens'> {
	const meta = isJsonMap(data) ? data.usageMetadata : undefined;
	if (!isJsonMap(meta)) return {};
	return {
		prompt_tokens: typeof meta.promptTokenCount === 'number' ? meta.promptTokenCount : 0,
		completion_tokens: typeof meta.candidatesTokenCount === 'number' ? meta.candidatesTokenCount : 0,
	};
}
