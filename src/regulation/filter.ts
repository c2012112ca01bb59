import path from 'node:path';

import type { JsonMap } from '../types';
import { isJsonMap } from '../utils/json';

export interface RegulatedFilterResult {
	kept: JsonMap[];
	total: number;
}

/**
 * Keeps rows whose `regulation_status` is exactly `Regulated` and whose
 * `confidence` is exactly `High`, after trimming. Matching is case-sensitive;
 * anything that is not an object is dropped.
 */
export function filterRegulated(rows: unknown[]): RegulatedFilterResult {
	const kept = rows.filter(isJsonMap).filter(
		(row) => trimmed(row.regulation_status) === 'Regulated' && trimmed(row.confidence) === 'High'
	);
	return { kept, total: rows.length };
}

/** `out/validated.json` becomes `out/validated_regulated.json`. */
export function regulatedOutputPath(inputPath: string): string {
	const { dir, name } = path.parse(inputPath);
	return path.join(dir, `${name}_regulated.json`);
}

function trimmed(value: unknown): unknown {
	return typeof value === 'string' ? value.trim() : value;
}
