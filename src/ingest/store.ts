import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { Logger, RawBatch } from '../types';
import { ArtifactError, readJsonFile } from '../utils/json';

const DEFAULT_LOGGER: Logger = () => {};

/**
 * Reads every `*.json` batch in `dir` in file-name order. A missing directory
 * is fatal; a single unreadable or non-array file is skipped.
 */
export async function loadRawBatches(dir: string, logger: Logger = DEFAULT_LOGGER): Promise<RawBatch[]> {
	let names: string[];
	try {
		names = await fs.readdir(dir);
	} catch (err) {
		throw new ArtifactError(`Raw directory unreadable: ${String(err)}`, dir);
	}

	const batches: RawBatch[] = [];
	for (const name of names.filter((n) => n.toLowerCase().endsWith('.json')).sort()) {
		try {
			const data = await readJsonFile(path.join(dir, name));
			if (!Array.isArray(data)) {
				logger('raw_batch_not_list', { file: name });
				continue;
			}
			batches.push({ name, records: data });
		} catch (err) {
			logger('raw_batch_unreadable', { file: name, error: String(err) });
		}
	}
	logger('raw_batches_loaded', { files: batches.length, dir });
	return batches;
}
