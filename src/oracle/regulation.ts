import { z } from 'zod';

import { ATTRIBUTE_CLASSES, RESIDUAL_CLASS } from '../types';
import type { AttributeClass, ClauseSegment, FeatureRegulationPair, ValidationVerdict } from '../types';
import type { LLMClient } from '../providers/llm';
import { parseValidationVerdict } from '../regulation/join';
import { parseJsonReply } from './parse';

export interface AttributeAssignment {
	attribute_class: AttributeClass;
	notes: string;
}

export interface ClauseTag {
	regulated: boolean;
	classes: AttributeClass[];
	rationale: string;
}

const CLASS_LIST = ATTRIBUTE_CLASSES.join(', ');

const ATTRIBUTE_SYSTEM = `You are a compliance analyst. Put the feature you are given into exactly one of these privacy classes and justify it in at most 15 words.
Classes: ${CLASS_LIST}.
Identifier_PII covers SSN or passport numbers; Contact_Info email or phone; Device_OnlineID device ids or IP addresses; Biometric fingerprints or face scans; Location_IoT GPS or addresses; Child_Data anything about minors; Demographic age or gender. Use Other when nothing fits.
Reply with JSON only: {"class":"<class>","rationale":"<reason>"}`;

const CLAUSE_SYSTEM = `You are a legal-compliance analyst. Decide whether the law fragment says that some kind of data element is regulated. If it does, list the privacy classes it covers (Other for anything that matches none).
Allowed classes: ${CLASS_LIST}.
Reply with JSON only: {"regulated": true|false, "classes": ["<class>"], "rationale": "<at most 15 words>"}`;

const PAIR_SYSTEM = `You are a legal expert deciding whether a machine-learning feature is regulated by a privacy or data-protection law, given quoted regulatory text.
"Regulated" means the text covers this feature or its whole attribute class. "Not Regulated" means it covers neither.
Also give a confidence of High, Medium or Low.
Answer in exactly this format:
STATUS: [Regulated|Not Regulated]
CONFIDENCE: [High|Medium|Low]
RATIONALE: [one or two sentences]`;

const attributeReplySchema = z.object({
	class: z.string(),
	rationale: z.string().default(''),
});

const clauseReplySchema = z.object({
	regulated: z.boolean(),
	classes: z.array(z.string()).default([]),
	rationale: z.string().default(''),
});

export const UNTAGGED_CLAUSE: ClauseTag = { regulated: false, classes: [], rationale: '' };

export function toAttributeClass(value: string): AttributeClass | undefined {
	const trimmed = value.trim();
	return ATTRIBUTE_CLASSES.find((cls) => cls === trimmed);
}

export async function classifyAttribute(
	client: LLMClient,
	feature: string,
	title: string,
	abstract: string | null
): Promise<AttributeAssignment> {
	const result = await client.call({
		system: ATTRIBUTE_SYSTEM,
		prompt: `Feature name: ${feature}\nTitle: ${title}\nAbstract: ${abstract ?? ''}`,
		maxOutputTokens: 80,
		json: true,
	});
	if (!result.ok) return { attribute_class: RESIDUAL_CLASS, notes: 'API_error' };
	const parsed = parseJsonReply(result.text, attributeReplySchema);
	if (!parsed) {
		return { attribute_class: RESIDUAL_CLASS, notes: `${(result.text ?? '').trim().slice(0, 15)}...` };
	}
	const cls = toAttributeClass(parsed.class);
	if (!cls) return { attribute_class: RESIDUAL_CLASS, notes: `Invalid class '${parsed.class.trim()}'` };
	return { attribute_class: cls, notes: parsed.rationale.trim() };
}

/** Tags one regulation passage. Any failure reads as "not regulated" so the passage is left out. */
export async function tagClause(client: LLMClient, segment: ClauseSegment): Promise<ClauseTag> {
	const result = await client.call({
		system: CLAUSE_SYSTEM,
		prompt: `REF: ${segment.ref}\nTEXT:\n${segment.snippet}`,
		maxOutputTokens: 120,
		json: true,
	});
	if (!result.ok) return UNTAGGED_CLAUSE;
	const parsed = parseJsonReply(result.text, clauseReplySchema);
	if (!parsed) return UNTAGGED_CLAUSE;
	const classes: AttributeClass[] = [];
	for (const name of parsed.classes) {
		const cls = toAttributeClass(name);
		if (cls && !classes.includes(cls)) classes.push(cls);
	}
	return { regulated: parsed.regulated, classes, rationale: parsed.rationale.trim() };
}

export async function validatePair(client: LLMClient, pair: FeatureRegulationPair): Promise<ValidationVerdict> {
	const result = await client.call({
		system: PAIR_SYSTEM,
		prompt: [
			`FEATURE TO VALIDATE: ${pair.feature_clean}`,
			`FEATURE ATTRIBUTE CLASS: ${pair.attribute_class}`,
			`Notes: ${pair.notes}`,
			'',
			`REGULATION: ${pair.reg_id}`,
			'REGULATORY TEXT:',
			JSON.stringify(pair.quoted_text),
			'',
			`QUESTION: Is the feature "${pair.feature_clean}", or its whole class ${pair.attribute_class}, regulated according to this text?`,
		].join('\n'),
		maxOutputTokens: 200,
	});
	if (!result.ok) {
		return {
			regulation_status: 'Not Clearly Regulated',
			confidence: 'Low',
			validation_rationale: `API error: ${result.reason ?? 'unknown'}`,
		};
	}
	return parseValidationVerdict(result.text ?? '');
}
