import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { JsonMap } from '../types';

export class ArtifactError extends Error {
	constructor(message: string, readonly artifactPath: string) {
		super(message);
		this.name = 'ArtifactError';
	}
}

export function isJsonMap(value: unknown): value is JsonMap {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
	let raw: string;
	try {
		raw = await fs.readFile(filePath, 'utf8');
	} catch (err) {
		throw new ArtifactError(`Cannot read ${filePath}: ${String(err)}`, filePath);
	}
	try {
		return JSON.parse(raw);
	} catch (err) {
		throw new ArtifactError(`Invalid JSON in ${filePath}: ${String(err)}`, filePath);
	}
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf8');
	await fs.rename(tmpPath, filePath);
}
