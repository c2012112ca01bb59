import { z } from 'zod';

import domainConfig from '../../config/domains.json';
import type { FeatureValidationLabel, RelevanceLabel } from '../types';
import type { LLMClient } from '../providers/llm';
import { firstLabel, parseJsonReply } from './parse';

export const DOMAIN_LABELS: readonly string[] = domainConfig.domains;

export interface PaperPrompt {
	title: string;
	abstract: string | null;
	venue?: string | null;
	domain?: string | null;
}

export interface ExtractedFeature {
	name: string;
	evidence: string;
}

const RELEVANCE_SYSTEM =
	'You screen research papers for a study of privacy in machine learning. ' +
	'From the title, venue and abstract, decide whether the paper builds or applies a decision-tree-based model ' +
	'(decision trees, random forests, gradient-boosted trees and similar). ' +
	"Answer with exactly 'Relevant' or 'Not relevant' and nothing else.";

const DOMAIN_SYSTEM = [
	'You assign research papers to an application domain.',
	'Read the title and abstract and pick exactly one of these domains:',
	...DOMAIN_LABELS.map((label, i) => `${i + 1}. ${label}`),
	'Answer with the domain string only.',
].join('\n');

const FEATURE_SYSTEM = `You build a feature table for decision-tree models.
For the paper you are given:
1. List every input feature (predictor or attribute) the abstract explicitly says the decision-tree model uses. Do not infer features the abstract does not name.
2. For each feature, quote the single sentence of the abstract that names it in the context of the model.
3. If the abstract names no features, return an empty list.
Reply with JSON only, shaped as {"features":[{"name":"<short label, e.g. Age>","evidence":"<the quoted sentence>"}]}.`;

const FEATURE_VALIDATION_SYSTEM =
	'You check features extracted from a paper. ' +
	"Answer 'Valid' if every listed feature is explicitly named in the abstract as a predictor of a decision-tree model, " +
	"otherwise answer 'Not valid'. Answer with one of those two strings only.";

const featureReplySchema = z.object({
	features: z.array(
		z.object({
			name: z.string(),
			evidence: z.string().default('No evidence provided'),
		})
	),
});

export async function classifyRelevance(client: LLMClient, paper: PaperPrompt): Promise<RelevanceLabel> {
	const result = await client.call({
		system: RELEVANCE_SYSTEM,
		prompt: `Title: ${paper.title}\n\nVenue: ${orNA(paper.venue)}\n\nAbstract: ${orNA(paper.abstract)}`,
		maxOutputTokens: 8,
	});
	if (!result.ok) return 'Error';
	const label = firstLabel(result.text).toLowerCase();
	if (label === 'relevant') return 'Relevant';
	if (label === 'not relevant') return 'Not relevant';
	return 'Error';
}

/** One of the configured domain labels, or `Error` when the reply names none of them. */
export async function classifyDomain(client: LLMClient, paper: PaperPrompt): Promise<string> {
	const result = await client.call({
		system: DOMAIN_SYSTEM,
		prompt: `Title: ${paper.title}\n\nAbstract: ${orNA(paper.abstract)}`,
		maxOutputTokens: 16,
	});
	if (!result.ok) return 'Error';
	const label = firstLabel(result.text).toLowerCase().replace(/^\d+\.\s*/, '');
	return DOMAIN_LABELS.find((domain) => domain === label) ?? 'Error';
}

export async function extractFeatures(client: LLMClient, paper: PaperPrompt): Promise<ExtractedFeature[]> {
	const result = await client.call({
		system: FEATURE_SYSTEM,
		prompt: [
			'Paper:',
			'<<<',
			`Title: ${paper.title}`,
			`Venue: ${orNA(paper.venue)}`,
			`Abstract: ${orNA(paper.abstract)}`,
			`Domain: ${orNA(paper.domain)}`,
			'>>>',
		].join('\n'),
		maxOutputTokens: 1500,
		json: true,
	});
	if (!result.ok) return [];
	const parsed = parseJsonReply(result.text, featureReplySchema);
	if (!parsed) return [];
	return parsed.features
		.map((feature) => ({ name: feature.name.trim(), evidence: feature.evidence.trim() }))
		.filter((feature) => feature.name);
}

export async function validateFeatures(
	client: LLMClient,
	paper: PaperPrompt,
	features: string
): Promise<FeatureValidationLabel> {
	const result = await client.call({
		system: FEATURE_VALIDATION_SYSTEM,
		prompt: `Paper:\n<<<\nTitle: ${paper.title}\nAbstract: ${orNA(paper.abstract)}\nFeatures: ${features || 'N/A'}\n>>>`,
		maxOutputTokens: 8,
	});
	if (!result.ok) return 'Error';
	const label = firstLabel(result.text).toLowerCase();
	if (label === 'valid') return 'Valid';
	if (label === 'not valid') return 'Not valid';
	return 'Error';
}

function orNA(value: string | null | undefined): string {
	return value && value.trim() ? value : 'N/A';
}
