import type { CorpusRecord, Logger, MergeResult, NormalizedRecord, RawBatch, RawRecord, SourceProvider } from '../types';
import { isJsonMap } from '../utils/json';
import { normalizeRecord } from './normalize';

const DEFAULT_LOGGER: Logger = () => {};

const SOURCE_PREFIXES: readonly SourceProvider[] = ['crossref', 'openalex'];

export class NoDataError extends Error {
	constructor(message = 'No valid records found in any raw batch') {
		super(message);
		this.name = 'NoDataError';
	}
}

export interface BatchName {
	prefix: string;
	domain: string;
}

/** Splits `crossref_banking_finance` into prefix `crossref` and domain `banking_finance`. */
export function parseBatchName(name: string): BatchName {
	const stem = name.replace(/\.json$/i, '');
	const cut = stem.indexOf('_');
	if (cut < 0) return { prefix: stem, domain: '' };
	return { prefix: stem.slice(0, cut), domain: stem.slice(cut + 1) };
}

export function mergeCorpus(batches: RawBatch[], logger: Logger = DEFAULT_LOGGER): MergeResult {
	const records: CorpusRecord[] = [];
	let skippedBatches = 0;
	let droppedUntitled = 0;
	let parseErrors = 0;

	for (const batch of batches) {
		const { prefix, domain } = parseBatchName(batch.name);
		const source = toSourceProvider(prefix);
		if (!source) {
			skippedBatches += 1;
			logger('merge_unknown_prefix', { batch: batch.name, prefix });
			continue;
		}

		batch.records.forEach((entry, index) => {
			try {
				if (!isJsonMap(entry)) {
					throw new TypeError(`record is ${Array.isArray(entry) ? 'array' : typeof entry}, expected object`);
				}
				const raw: RawRecord = { source, domain, record: entry };
				const normalized = normalizeRecord(raw);
				if (hasTitle(normalized)) {
					records.push(normalized);
				} else {
					droppedUntitled += 1;
				}
			} catch (err) {
				parseErrors += 1;
				logger('merge_parse_error', { batch: batch.name, index, error: String(err) });
			}
		});
	}

	if (records.length === 0) {
		throw new NoDataError();
	}

	const { corpus, doiDuplicates, titleYearDuplicates } = dedupeCorpus(records);
	const stats = {
		raw: records.length,
		unique: corpus.length,
		skippedBatches,
		droppedUntitled,
		parseErrors,
		doiDuplicates,
		titleYearDuplicates,
	};
	logger('merge_complete', { ...stats });
	return { corpus, stats };
}

export interface DedupeResult {
	corpus: CorpusRecord[];
	doiDuplicates: number;
	titleYearDuplicates: number;
}

/**
 * Two passes, DOI first and then (title, year). Both keep the first record
 * after a stable sort on source name, so crossref wins ties over openalex
 * regardless of which record carries more metadata.
 */
export function dedupeCorpus(records: CorpusRecord[]): DedupeResult {
	const ordered = sortBySource(records);

	const seenDoi = new Set<string>();
	const afterDoi: CorpusRecord[] = [];
	for (const record of ordered) {
		if (record.doi !== null) {
			if (seenDoi.has(record.doi)) continue;
			seenDoi.add(record.doi);
		}
		afterDoi.push(record);
	}

	const seenTitleYear = new Set<string>();
	const corpus: CorpusRecord[] = [];
	for (const record of afterDoi) {
		const key = titleYearKey(record);
		if (seenTitleYear.has(key)) continue;
		seenTitleYear.add(key);
		corpus.push(record);
	}

	return {
		corpus,
		doiDuplicates: ordered.length - afterDoi.length,
		titleYearDuplicates: afterDoi.length - corpus.length,
	};
}

function titleYearKey(record: CorpusRecord): string {
	const title = record.title.toLowerCase().trim();
	if (record.year !== null) return `${title}\u0000${record.year}`;
	// Without a year, only records that agree on everything but their source collapse.
	return `${title}\u0000-\u0000${contentFingerprint(record)}`;
}

function contentFingerprint(record: NormalizedRecord): string {
	return JSON.stringify([
		record.title,
		record.author,
		record.venue,
		record.doi,
		record.domain,
		record.abstract,
		record.publisher,
		record.language,
		record.type,
		record.url,
		record.cited_by,
	]);
}

function sortBySource(records: CorpusRecord[]): CorpusRecord[] {
	return records
		.map((record, index) => ({ record, index }))
		.sort((a, b) => {
			if (a.record.source !== b.record.source) return a.record.source < b.record.source ? -1 : 1;
			return a.index - b.index;
		})
		.map(({ record }) => record);
}

function toSourceProvider(prefix: string): SourceProvider | null {
	return SOURCE_PREFIXES.find((source) => source === prefix) ?? null;
}

function hasTitle(record: NormalizedRecord): record is CorpusRecord {
	return record.title !== null;
}
