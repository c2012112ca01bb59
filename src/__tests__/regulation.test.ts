import { describe, expect, it } from 'vitest';

import { filterRegulated, regulatedOutputPath } from '../regulation/filter';
import {
	aggregatePairs,
	buildFeatureRegulationPairs,
	explodeClauses,
	filterPriorityRegulations,
	joinFeaturesToClauses,
	parseValidationVerdict,
	UNPARSED_VERDICT,
} from '../regulation/join';
import { DEFAULT_PRIORITY_REGULATIONS, resolveRegulationId } from '../regulation/registry';
import { segmentClauses, splitPages } from '../regulation/segment';
import type { ClauseRow, FeatureRow } from '../types';

function makeFeature(overrides: Partial<FeatureRow> = {}): FeatureRow {
	return {
		feature_clean: 'Income',
		title: 'Boosted trees for loans',
		abstract: 'Income predicts default.',
		doi: '10.3/loan',
		domain_validated: 'banking_finance',
		attribute_class: 'Financial',
		notes: 'Money attribute',
		...overrides,
	};
}

function makeClause(overrides: Partial<ClauseRow> = {}): ClauseRow {
	return {
		reg_id: 'GDPR',
		article_ref: 'Art.5',
		quoted_text: 'T1',
		attribute_class: 'Financial',
		...overrides,
	};
}

describe('clause segmenter', () => {
	it('yields the passage under each article heading', () => {
		const page = 'Preamble text\nArticle 9 Processing of special categories\nof personal data.\nArticle 10 Criminal data';
		expect([...segmentClauses(page)]).toEqual([
			{ ref: 'Article 9', snippet: 'Processing of special categories of personal data.' },
			{ ref: 'Article 10', snippet: 'Criminal data' },
		]);
	});

	it('recognizes section signs and lettered paragraphs', () => {
		expect([...segmentClauses('§ 164.514(b) De-identified data')]).toEqual([
			{ ref: '§ 164.514(b)', snippet: 'De-identified data' },
		]);
		expect([...segmentClauses('(a) names\n(b) addresses')]).toEqual([
			{ ref: '(a)', snippet: 'names' },
			{ ref: '(b)', snippet: 'addresses' },
		]);
	});

	it('recognizes abbreviated articles and line-start bullets', () => {
		expect([...segmentClauses('ART. 4 Sensitive data\n• health data')]).toEqual([
			{ ref: 'ART. 4', snippet: 'Sensitive data' },
			{ ref: '•', snippet: 'health data' },
		]);
	});

	it('skips empty spans and truncates long ones', () => {
		expect([...segmentClauses('Article 1\nArticle 2 abcdefghijklmnop', 10)]).toEqual([
			{ ref: 'Article 2', snippet: 'abcdefghij' },
		]);
	});

	it('yields nothing for a page without headings', () => {
		expect([...segmentClauses('Just an introduction.')]).toEqual([]);
	});

	it('can be run again over the same page', () => {
		const page = 'Article 3 Scope';
		expect([...segmentClauses(page)]).toEqual([...segmentClauses(page)]);
	});

	it('splits pages on form feeds', () => {
		expect(splitPages('one\ftwo')).toEqual(['one', 'two']);
	});
});

describe('regulation registry', () => {
	it('resolves a file name through a contained registry key', () => {
		expect(resolveRegulationId('banking_and_finance_GLBA_§6809.txt')).toBe('GLBA');
		expect(resolveRegulationId('Healthcare_GDPR_Art9(1).txt')).toBe('GDPR');
	});

	it('falls back to the name before any parenthesis', () => {
		expect(resolveRegulationId('Brazil LGPD (Lei 13.709).pdf')).toBe('Brazil LGPD');
	});

	it('takes a custom registry', () => {
		expect(resolveRegulationId('Local Act (2020).txt', { 'Local Act': 'LA' })).toBe('LA');
	});

	it('ships the priority list in order', () => {
		expect(DEFAULT_PRIORITY_REGULATIONS[0]).toBe('GDPR');
		expect(DEFAULT_PRIORITY_REGULATIONS).toHaveLength(13);
		expect(DEFAULT_PRIORITY_REGULATIONS).toContain('ECPA');
	});
});

describe('feature to regulation join', () => {
	it('explodes classes and drops the residual class', () => {
		const exploded = explodeClauses([makeClause({ attribute_class: 'Financial; Other;' })]);
		expect(exploded).toEqual([
			{ ...makeClause(), attribute_class: 'Financial' },
		]);
	});

	it('joins on the exploded class and aggregates one pair', () => {
		const features = [makeFeature()];
		const clauses = [makeClause({ attribute_class: 'Financial;Other' })];
		const pairs = aggregatePairs(joinFeaturesToClauses(features, explodeClauses(clauses)));
		expect(pairs).toEqual([{ ...makeFeature(), reg_id: 'GDPR', article_ref: 'Art.5', quoted_text: { 'Art.5': ['T1'] } }]);
	});

	it('produces nothing for a feature whose class no clause carries', () => {
		const joined = joinFeaturesToClauses([makeFeature({ attribute_class: 'Biometric' })], explodeClauses([makeClause()]));
		expect(joined).toEqual([]);
	});

	it('collapses repeated passages and keeps reference order', () => {
		const pairs = aggregatePairs(
			joinFeaturesToClauses(
				[makeFeature()],
				explodeClauses([
					makeClause({ article_ref: 'Art.6', quoted_text: 'T2' }),
					makeClause(),
					makeClause(),
					makeClause({ article_ref: 'Art.6', quoted_text: 'T1' }),
				])
			)
		);
		expect(pairs).toHaveLength(1);
		expect(pairs[0].article_ref).toBe('Art.6;Art.5');
		expect(pairs[0].quoted_text).toEqual({ 'Art.6': ['T2', 'T1'], 'Art.5': ['T1'] });
	});

	it('groups per regulation', () => {
		const pairs = aggregatePairs(
			joinFeaturesToClauses([makeFeature()], explodeClauses([makeClause(), makeClause({ reg_id: 'GLBA' })]))
		);
		expect(pairs.map((p) => p.reg_id)).toEqual(['GDPR', 'GLBA']);
	});

	it('keeps only allow-listed regulations', () => {
		const pairs = aggregatePairs(
			joinFeaturesToClauses([makeFeature()], explodeClauses([makeClause({ reg_id: 'SOX' }), makeClause()]))
		);
		expect(filterPriorityRegulations(pairs).map((p) => p.reg_id)).toEqual(['GDPR']);
		expect(filterPriorityRegulations(pairs, ['SOX']).map((p) => p.reg_id)).toEqual(['SOX']);
	});

	it('reports counts for the whole build', () => {
		const { pairs, counts } = buildFeatureRegulationPairs(
			[makeFeature(), makeFeature({ feature_clean: 'Age', attribute_class: 'Demographic' })],
			[makeClause({ attribute_class: 'Financial;Demographic' }), makeClause({ reg_id: 'SOX' })]
		);
		expect(pairs.map((p) => p.feature_clean)).toEqual(['Income', 'Age']);
		expect(counts).toEqual({ features: 2, clauses: 2, exploded: 3, joined: 3, aggregated: 3, kept: 2 });
	});
});

describe('validation verdict parsing', () => {
	it('reads all three fields', () => {
		expect(parseValidationVerdict('STATUS: Regulated\nCONFIDENCE: High\nRATIONALE: Covers financial data.')).toEqual({
			regulation_status: 'Regulated',
			confidence: 'High',
			validation_rationale: 'Covers financial data.',
		});
	});

	it('falls back per field', () => {
		expect(parseValidationVerdict('STATUS: Maybe\nCONFIDENCE: Medium')).toEqual({
			...UNPARSED_VERDICT,
			confidence: 'Medium',
		});
	});

	it('returns the unparsed verdict for free text', () => {
		expect(parseValidationVerdict('I cannot tell.')).toEqual({
			regulation_status: 'Not Clearly Regulated',
			confidence: 'Low',
			validation_rationale: 'Unable to parse response',
		});
	});
});

describe('regulated filter', () => {
	it('keeps trimmed Regulated/High rows only', () => {
		const rows = [
			{ id: 1, regulation_status: ' Regulated ', confidence: 'High ' },
			{ id: 2, regulation_status: 'regulated', confidence: 'High' },
			'not a row',
			null,
			{ id: 3, regulation_status: 'Regulated', confidence: 'Medium' },
		];
		const { kept, total } = filterRegulated(rows);
		expect(kept).toEqual([{ id: 1, regulation_status: ' Regulated ', confidence: 'High ' }]);
		expect(total).toBe(5);
	});

	it('names the output after the input stem', () => {
		expect(regulatedOutputPath('out/validated_feature_regulation.json')).toBe(
			'out/validated_feature_regulation_regulated.json'
		);
	});
});
