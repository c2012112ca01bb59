import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Decodes a model reply as JSON and validates it. Code fences are stripped
 * first; if the reply still is not JSON, the first `{...}` block is tried.
 * Returns null when nothing validates.
 */
export function parseJsonReply<T>(text: string | undefined, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
	if (!text) return null;
	const cleaned = text.replace(/```json|```/gi, '').trim();
	for (const candidate of [cleaned, cleaned.match(/\{[\s\S]*\}/)?.[0]]) {
		if (!candidate) continue;
		let decoded: unknown;
		try {
			decoded = JSON.parse(candidate);
		} catch {
			continue;
		}
		const parsed = schema.safeParse(decoded);
		if (parsed.success) return parsed.data;
	}
	return null;
}

/** First line of a label-style reply with wrapping quotes and trailing periods removed. */
export function firstLabel(text: string | undefined): string {
	if (!text) return '';
	const line = text.trim().split('\n')[0] ?? '';
	return line.trim().replace(/^["'`]+|["'`.]+$/g, '').trim();
}
