import type {
	ClauseRow,
	ConfidenceLevel,
	FeatureRegulationPair,
	FeatureRow,
	JoinedRow,
	Logger,
	QuotedTextMap,
	RegulationStatus,
	ValidationVerdict,
} from '../types';
import { RESIDUAL_CLASS } from '../types';
import { DEFAULT_PRIORITY_REGULATIONS } from './registry';

const DEFAULT_LOGGER: Logger = () => {};

/** One row per class a clause was tagged with; residual and empty classes carry no signal and are dropped. */
export function explodeClauses(clauses: ClauseRow[]): ClauseRow[] {
	const exploded: ClauseRow[] = [];
	for (const clause of clauses) {
		for (const token of clause.attribute_class.split(';')) {
			const cls = token.trim();
			if (!cls || cls === RESIDUAL_CLASS) continue;
			exploded.push({ ...clause, attribute_class: cls });
		}
	}
	return exploded;
}

export function joinFeaturesToClauses(features: FeatureRow[], exploded: ClauseRow[]): JoinedRow[] {
	const byClass = new Map<string, ClauseRow[]>();
	for (const clause of exploded) {
		const bucket = byClass.get(clause.attribute_class);
		if (bucket) bucket.push(clause);
		else byClass.set(clause.attribute_class, [clause]);
	}

	const joined: JoinedRow[] = [];
	for (const feature of features) {
		for (const clause of byClass.get(feature.attribute_class) ?? []) {
			joined.push({ feature, clause });
		}
	}
	return joined;
}

interface PairGroup {
	feature: FeatureRow;
	regId: string;
	refs: string[];
	quotes: QuotedTextMap;
}

/**
 * Collapses joined rows into one pair per (feature identity, regulation), in
 * first-occurrence order. References and the passages quoted under each keep
 * their first-seen order; a passage repeated under the same reference is kept
 * once.
 */
export function aggregatePairs(joined: JoinedRow[]): FeatureRegulationPair[] {
	const groups = new Map<string, PairGroup>();
	for (const { feature, clause } of joined) {
		const key = pairKey(feature, clause.reg_id);
		let group = groups.get(key);
		if (!group) {
			group = { feature, regId: clause.reg_id, refs: [], quotes: {} };
			groups.set(key, group);
		}
		const ref = clause.article_ref;
		if (!group.refs.includes(ref)) group.refs.push(ref);
		const passages = Object.prototype.hasOwnProperty.call(group.quotes, ref) ? group.quotes[ref] : [];
		group.quotes[ref] = passages;
		if (!passages.includes(clause.quoted_text)) passages.push(clause.quoted_text);
	}

	return Array.from(groups.values(), (group) => ({
		...group.feature,
		reg_id: group.regId,
		article_ref: group.refs.join(';'),
		quoted_text: group.quotes,
	}));
}

export function filterPriorityRegulations(
	pairs: FeatureRegulationPair[],
	allowList: readonly string[] = DEFAULT_PRIORITY_REGULATIONS
): FeatureRegulationPair[] {
	const allowed = new Set(allowList);
	return pairs.filter((pair) => Object.keys(pair.quoted_text).length > 0 && allowed.has(pair.reg_id));
}

export interface PairBuildResult {
	pairs: FeatureRegulationPair[];
	counts: {
		features: number;
		clauses: number;
		exploded: number;
		joined: number;
		aggregated: number;
		kept: number;
	};
}

export function buildFeatureRegulationPairs(
	features: FeatureRow[],
	clauses: ClauseRow[],
	allowList: readonly string[] = DEFAULT_PRIORITY_REGULATIONS,
	logger: Logger = DEFAULT_LOGGER
): PairBuildResult {
	const exploded = explodeClauses(clauses);
	const joined = joinFeaturesToClauses(features, exploded);
	const aggregated = aggregatePairs(joined);
	const pairs = filterPriorityRegulations(aggregated, allowList);
	const counts = {
		features: features.length,
		clauses: clauses.length,
		exploded: exploded.length,
		joined: joined.length,
		aggregated: aggregated.length,
		kept: pairs.length,
	};
	logger('pairs_built', counts);
	return { pairs, counts };
}

export const UNPARSED_VERDICT: ValidationVerdict = {
	regulation_status: 'Not Clearly Regulated',
	confidence: 'Low',
	validation_rationale: 'Unable to parse response',
};

const STATUSES: readonly RegulationStatus[] = ['Regulated', 'Not Regulated'];
const CONFIDENCES: readonly ConfidenceLevel[] = ['High', 'Medium', 'Low'];

/**
 * Reads the `STATUS:` / `CONFIDENCE:` / `RATIONALE:` lines of a validation
 * answer. Each field falls back to the unparsed verdict on its own when its
 * line is missing or carries a value outside the vocabulary.
 */
export function parseValidationVerdict(text: string): ValidationVerdict {
	const verdict: ValidationVerdict = { ...UNPARSED_VERDICT };
	for (const rawLine of text.split('\n')) {
		const line = rawLine.trim();
		if (line.startsWith('STATUS:')) {
			const status = STATUSES.find((s) => s === fieldValue(line, 'STATUS:'));
			if (status) verdict.regulation_status = status;
		} else if (line.startsWith('CONFIDENCE:')) {
			const confidence = CONFIDENCES.find((c) => c === fieldValue(line, 'CONFIDENCE:'));
			if (confidence) verdict.confidence = confidence;
		} else if (line.startsWith('RATIONALE:')) {
			const rationale = fieldValue(line, 'RATIONALE:');
			if (rationale) verdict.validation_rationale = rationale;
		}
	}
	return verdict;
}

function fieldValue(line: string, label: string): string {
	return line.slice(label.length).trim();
}

function pairKey(feature: FeatureRow, regId: string): string {
	return JSON.stringify([
		feature.feature_clean,
		feature.title,
		feature.abstract,
		feature.doi,
		feature.domain_validated,
		feature.attribute_class,
		feature.notes,
		regId,
	]);
}
