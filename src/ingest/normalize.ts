import type { JsonMap, NormalizedRecord, RawRecord } from '../types';
import { asText, stripTags } from '../utils/text';
import { findYearToken, normalizeDoi } from '../utils/doi';
import { isJsonMap } from '../utils/json';
import { reconstructAbstract } from './abstract';

const CROSSREF_DATE_FIELDS = ['published-print', 'published', 'issued', 'created'];

export function normalizeRecord(raw: RawRecord): NormalizedRecord {
	switch (raw.source) {
		case 'crossref':
			return fromCrossref(raw.record, raw.domain);
		case 'openalex':
			return fromOpenalex(raw.record, raw.domain);
	}
}

export function fromCrossref(rec: JsonMap, domain: string): NormalizedRecord {
	const rawAbstract = asText(rec.abstract);
	const abstract = rawAbstract === null ? null : stripTags(rawAbstract);
	const doi = normalizeDoi(rec.DOI);
	return {
		title: asText(firstOf(rec.title)),
		author: joinAuthors(crossrefAuthors(rec.author)),
		year: datePartsYear(rec, CROSSREF_DATE_FIELDS) ?? findYearToken(rec.DOI) ?? findYearToken(rawAbstract),
		venue: asText(firstOf(rec['container-title'])),
		doi,
		source: 'crossref',
		domain,
		abstract,
		publisher: asText(rec.publisher),
		language: asText(rec.language),
		type: asText(rec.type),
		url: asText(rec.URL),
		cited_by: asCount(rec['is-referenced-by-count']),
	};
}

export function fromOpenalex(rec: JsonMap, domain: string): NormalizedRecord {
	const primary = asMap(rec.primary_location);
	const source = asMap(primary?.source);
	const abstract = openalexAbstract(rec);
	return {
		title: asText(rec.display_name) ?? asText(rec.title),
		author: joinAuthors(openalexAuthors(rec.authorships)),
		year: asCount(rec.publication_year) ?? findYearToken(rec.doi) ?? findYearToken(abstract),
		venue: asText(source?.display_name) ?? asText(source?.id),
		doi: normalizeDoi(rec.doi),
		source: 'openalex',
		domain,
		abstract,
		publisher: asText(source?.display_name),
		language: asText(rec.language),
		type: asText(rec.type),
		url: asText(primary?.landing_page_url),
		cited_by: asCount(rec.cited_by_count),
	};
}

function openalexAbstract(rec: JsonMap): string | null {
	const plain = asText(rec.abstract);
	if (plain !== null) return plain.trim();
	if (rec.abstract_inverted_index !== undefined) {
		return reconstructAbstract(rec.abstract_inverted_index) || null;
	}
	return null;
}

function datePartsYear(rec: JsonMap, fields: string[]): number | null {
	for (const field of fields) {
		const parts = asMap(rec[field])?.['date-parts'];
		if (!Array.isArray(parts) || parts.length === 0) continue;
		const first: unknown = parts[0];
		if (!Array.isArray(first) || first.length === 0) continue;
		const year = asCount(first[0]);
		if (year !== null) return year;
	}
	return null;
}

function crossrefAuthors(value: unknown): string[] {
	if (!Array.isArray(value)) return [];
	const names: string[] = [];
	for (const entry of value) {
		const author = asMap(entry);
		if (!author) continue;
		const given = typeof author.given === 'string' ? author.given : '';
		const family = typeof author.family === 'string' ? author.family : '';
		const name = `${given} ${family}`.trim();
		if (name) names.push(name);
	}
	return names;
}

function openalexAuthors(value: unknown): string[] {
	if (!Array.isArray(value)) return [];
	const names: string[] = [];
	for (const entry of value) {
		const name = asText(asMap(asMap(entry)?.author)?.display_name);
		if (name !== null) names.push(name);
	}
	return names;
}

function joinAuthors(names: string[]): string | null {
	return names.length > 0 ? names.join('; ') : null;
}

function firstOf(value: unknown): unknown {
	if (Array.isArray(value)) return value.length > 0 ? value[0] : null;
	return value;
}

function asMap(value: unknown): JsonMap | null {
	return isJsonMap(value) ? value : null;
}

function asCount(value: unknown): number | null {
	if (typeof value === 'number' && Number.isInteger(value)) return value;
	if (typeof value === 'string' && /^\d+$/.test(value.trim())) return parseInt(value, 10);
	return null;
}
