import regulationConfig from '../../config/regulations.json';

export type RegulationRegistry = Readonly<Record<string, string>>;

export const DEFAULT_REGISTRY: RegulationRegistry = regulationConfig.documents;

/** Regulations in scope for pair validation, most important first. */
export const DEFAULT_PRIORITY_REGULATIONS: readonly string[] = regulationConfig.priority;

/**
 * Short regulation id for a source document, e.g.
 * `banking_and_finance_GLBA_§6809.txt` resolves to `GLBA`. The first registry
 * key found inside the file name wins; otherwise the part before any `(` is
 * looked up, and used as the id when the registry does not know it.
 */
export function resolveRegulationId(fileName: string, registry: RegulationRegistry = DEFAULT_REGISTRY): string {
	const stem = fileName.replace(/\.(pdf|txt)$/i, '');
	for (const [key, id] of Object.entries(registry)) {
		if (stem.includes(key)) return id;
	}
	const base = stem.split('(')[0].trim();
	return Object.prototype.hasOwnProperty.call(registry, base) ? registry[base] : base;
}
