import { z } from 'zod';

import queryConfig from '../../config/queries.json';
import { ConfigError } from '../config/pipeline';
import type { SourceProvider } from '../types';

export interface HarvestQuery {
	search: string;
	filter?: string;
}

export interface DomainQueries {
	maxRecords?: number;
	crossref: HarvestQuery[];
	openalex: HarvestQuery[];
}

export type QueryPlan = Readonly<Record<string, DomainQueries>>;

const querySchema = z.union([
	z
		.string()
		.min(1)
		.transform((search) => ({ search })),
	z.object({ search: z.string().min(1), filter: z.string().min(1).optional() }),
]);

const domainSchema = z.object({
	max_records: z.number().int().positive().optional(),
	query: z.string().min(1).optional(),
	crossref_queries: z.array(querySchema).default([]),
	openalex_queries: z.array(querySchema).default([]),
});

const planSchema = z.object({ domains: z.record(domainSchema) });

/**
 * Per-domain harvest queries. A domain without `crossref_queries` falls back
 * to its single `query` for Crossref.
 */
export function parseQueryPlan(data: unknown): QueryPlan {
	const parsed = planSchema.safeParse(data);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
		throw new ConfigError(`Invalid query plan (${where})`);
	}
	const plan: Record<string, DomainQueries> = {};
	for (const [domain, entry] of Object.entries(parsed.data.domains)) {
		const fallback = entry.query ? [{ search: entry.query }] : [];
		plan[domain] = {
			maxRecords: entry.max_records,
			crossref: entry.crossref_queries.length > 0 ? entry.crossref_queries : fallback,
			openalex: entry.openalex_queries,
		};
	}
	return plan;
}

export const DEFAULT_QUERY_PLAN: QueryPlan = parseQueryPlan(queryConfig);

export function queriesFor(plan: QueryPlan, source: SourceProvider, domain: string): HarvestQuery[] {
	const entry: DomainQueries | undefined = plan[domain];
	return entry ? entry[source] : [];
}
