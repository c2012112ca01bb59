import type { JsonMap, Logger, SourceProvider } from '../types';
import { normalizeDoi } from '../utils/doi';
import { isJsonMap } from '../utils/json';
import { backoffMs, isTransientStatus, safeSnippet, waitMs } from '../utils/retry';
import { reconstructAbstract } from './abstract';
import type { HarvestQuery } from './queries';

const CROSSREF_API = 'https://api.crossref.org/works';
const OPENALEX_API = 'https://api.openalex.org/works';

const DEFAULT_FILTER = 'has-abstract:true';

const DEFAULT_LOGGER: Logger = () => {};

export interface HarvestOptions {
	mailto?: string;
	/** Replaces the default `has-abstract:true` filter. */
	filter?: string;
	pageSize?: number;
	delayMs?: number;
	maxRetries?: number;
	logger?: Logger;
}

interface Page {
	items: JsonMap[];
	nextCursor: string | null;
}

type PageFetcher = (cursor: string, rows: number) => Promise<Page>;

export async function harvestCrossref(query: string, max: number, options: HarvestOptions = {}): Promise<JsonMap[]> {
	const logger = options.logger ?? DEFAULT_LOGGER;
	const fetchPage: PageFetcher = async (cursor, rows) => {
		const url = new URL(CROSSREF_API);
		url.searchParams.set('query', query);
		url.searchParams.set('rows', String(rows));
		url.searchParams.set('cursor', cursor);
		url.searchParams.set('filter', options.filter ?? DEFAULT_FILTER);
		if (options.mailto) url.searchParams.set('mailto', options.mailto);
		const data = await getJson(url, 'crossref', options, logger);
		const message = isJsonMap(data) && isJsonMap(data.message) ? data.message : {};
		return {
			items: mapsOf(message.items),
			nextCursor: typeof message['next-cursor'] === 'string' ? message['next-cursor'] : null,
		};
	};
	const items = await paginate(fetchPage, max, Math.min(options.pageSize ?? 100, 1000), options.delayMs ?? 1000);
	logger('harvest_crossref_ok', { query, count: items.length });
	return items;
}

export async function harvestOpenalex(query: string, max: number, options: HarvestOptions = {}): Promise<JsonMap[]> {
	const logger = options.logger ?? DEFAULT_LOGGER;
	const fetchPage: PageFetcher = async (cursor, rows) => {
		const url = new URL(OPENALEX_API);
		url.searchParams.set('search', query);
		url.searchParams.set('per_page', String(rows));
		url.searchParams.set('cursor', cursor);
		url.searchParams.set('filter', options.filter ?? DEFAULT_FILTER);
		if (options.mailto) url.searchParams.set('mailto', options.mailto);
		const data = await getJson(url, 'openalex', options, logger);
		const meta = isJsonMap(data) && isJsonMap(data.meta) ? data.meta : {};
		return {
			items: isJsonMap(data) ? mapsOf(data.results) : [],
			nextCursor: typeof meta.next_cursor === 'string' ? meta.next_cursor : null,
		};
	};
	const items = await paginate(fetchPage, max, Math.min(options.pageSize ?? 200, 200), options.delayMs ?? 300);
	logger('harvest_openalex_ok', { query, count: items.length });
	return items.map(withPlainAbstract);
}

async function harvest(
	source: SourceProvider,
	query: string,
	max: number,
	options: HarvestOptions = {}
): Promise<JsonMap[]> {
	return source === 'crossref' ? harvestCrossref(query, max, options) : harvestOpenalex(query, max, options);
}

/**
 * Runs a domain's queries against one source under a shared record budget.
 * Each query asks for an even share of what is still missing; a record an
 * earlier query already returned (same OpenAlex `id`, same Crossref DOI) is
 * not kept twice.
 */
export async function harvestQueries(
	source: SourceProvider,
	queries: readonly HarvestQuery[],
	max: number,
	options: HarvestOptions = {}
): Promise<JsonMap[]> {
	const logger = options.logger ?? DEFAULT_LOGGER;
	const collected: JsonMap[] = [];
	const seen = new Set<string>();
	for (const [index, query] of queries.entries()) {
		const missing = max - collected.length;
		if (missing <= 0) break;
		const share = Math.ceil(missing / (queries.length - index));
		const items = await harvest(source, query.search, share, { ...options, filter: query.filter ?? options.filter });
		let duplicates = 0;
		for (const item of items) {
			const key = recordKey(source, item);
			if (key !== null) {
				if (seen.has(key)) {
					duplicates += 1;
					continue;
				}
				seen.add(key);
			}
			collected.push(item);
		}
		logger('harvest_query_done', { source, query: query.search, share, fetched: items.length, duplicates });
	}
	return collected.slice(0, max);
}

function recordKey(source: SourceProvider, item: JsonMap): string | null {
	if (source === 'crossref') return normalizeDoi(item.DOI);
	return typeof item.id === 'string' && item.id ? item.id : null;
}

/** Swaps OpenAlex's inverted-index abstract for plain text before the record is stored. */
export function withPlainAbstract(record: JsonMap): JsonMap {
	const { abstract_inverted_index: index, ...rest } = record;
	return { ...rest, abstract: reconstructAbstract(index) };
}

async function paginate(fetchPage: PageFetcher, max: number, pageSize: number, delayMs: number): Promise<JsonMap[]> {
	const collected: JsonMap[] = [];
	let cursor: string | null = '*';
	while (cursor && collected.length < max) {
		const page = await fetchPage(cursor, Math.min(pageSize, max - collected.length));
		collected.push(...page.items);
		if (page.items.length === 0) break;
		cursor = page.nextCursor;
		if (cursor) await waitMs(delayMs);
	}
	return collected.slice(0, max);
}

async function getJson(url: URL, source: SourceProvider, options: HarvestOptions, logger: Logger): Promise<unknown> {
	const maxRetries = options.maxRetries ?? 4;
	const headers = { 'User-Agent': `dt-privacy-scan/1.0${options.mailto ? ` (+mailto:${options.mailto})` : ''}` };
	let lastReason = 'unknown_error';

	for (let retry = 0; retry <= maxRetries; retry++) {
		try {
			const res = await fetch(url.toString(), { headers });
			if (res.ok) return await res.json();
			lastReason = `${source}_${res.status}`;
			if (!isTransientStatus(res.status)) {
				logger('harvest_error', { source, status: res.status, body: await safeSnippet(res) });
				break;
			}
			logger('harvest_retry', { source, retry, status: res.status });
		} catch (err) {
			lastReason = `${source}_exception`;
			logger('harvest_retry_error', { source, retry, error: String(err) });
		}
		if (retry < maxRetries) await waitMs(backoffMs(1500, retry, 30000));
	}
	throw new Error(`Harvest request failed: ${lastReason}`);
}

function mapsOf(value: unknown): JsonMap[] {
	return Array.isArray(value) ? value.filter(isJsonMap) : [];
}
