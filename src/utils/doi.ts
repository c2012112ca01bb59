const DOI_URL_PREFIX = /^[a-z][a-z0-9+.-]*:\/\/[^/]+\//;
const DOI_SCHEME_PREFIX = /^doi:\s*/;
const YEAR_TOKEN = /\b(19|20)\d{2}\b/;

export function normalizeDoi(value: unknown): string | null {
	if (typeof value !== 'string') return null;
	const doi = value.trim().toLowerCase().replace(DOI_URL_PREFIX, '').replace(DOI_SCHEME_PREFIX, '').trim();
	return doi || null;
}

export function findYearToken(text: unknown): number | null {
	if (typeof text !== 'string') return null;
	const match = text.match(YEAR_TOKEN);
	return match ? parseInt(match[0], 10) : null;
}
