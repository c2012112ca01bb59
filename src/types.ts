export type SourceProvider = 'crossref' | 'openalex';

export type Logger = (phase: string, details: Record<string, unknown>) => void;

export type JsonMap = Record<string, unknown>;

export type RawRecord =
  | { source: 'crossref'; domain: string; record: JsonMap }
  | { source: 'openalex'; domain: string; record: JsonMap };

export interface RawBatch {
  name: string;
  records: unknown[];
}

export interface NormalizedRecord {
  title: string | null;
  author: string | null;
  year: number | null;
  venue: string | null;
  doi: string | null;
  source: SourceProvider;
  domain: string;
  abstract: string | null;
  publisher: string | null;
  language: string | null;
  type: string | null;
  url: string | null;
  cited_by: number | null;
}

export interface CorpusRecord extends NormalizedRecord {
  title: string;
}

export interface MergeStats {
  raw: number;
  unique: number;
  skippedBatches: number;
  droppedUntitled: number;
  parseErrors: number;
  doiDuplicates: number;
  titleYearDuplicates: number;
}

export interface MergeResult {
  corpus: CorpusRecord[];
  stats: MergeStats;
}

export const ATTRIBUTE_CLASSES = [
  'Identifier_PII',
  'Contact_Info',
  'Device_OnlineID',
  'Biometric',
  'Location_IoT',
  'Health_Clinical',
  'Financial',
  'Child_Data',
  'Demographic',
  'Behavioural',
  'Environmental',
  'Operational_Business',
  'Other',
] as const;

export type AttributeClass = (typeof ATTRIBUTE_CLASSES)[number];

export const RESIDUAL_CLASS: AttributeClass = 'Other';

export type RelevanceLabel = 'Relevant' | 'Not relevant' | 'Error';
export type FeatureValidationLabel = 'Valid' | 'Not valid' | 'Error';

export interface ClassifiedPaper extends CorpusRecord {
  decision_trees_related: RelevanceLabel;
  domain_validated?: string;
  features?: string;
  evidence?: string;
  feature_validation?: FeatureValidationLabel;
}

export interface FeatureContext {
  feature_clean: string;
  title: string;
  abstract: string | null;
  doi: string | null;
  domain_validated: string;
}

export interface FeatureRow extends FeatureContext {
  attribute_class: string;
  notes: string;
  synonym_hint?: string;
}

export interface ClauseRow {
  reg_id: string;
  article_ref: string;
  quoted_text: string;
  attribute_class: string;
  rationale?: string;
  regulated?: boolean;
}

export interface JoinedRow {
  feature: FeatureRow;
  clause: ClauseRow;
}

export type QuotedTextMap = Record<string, string[]>;

export interface FeatureRegulationPair extends FeatureRow {
  reg_id: string;
  article_ref: string;
  quoted_text: QuotedTextMap;
}

export type RegulationStatus = 'Regulated' | 'Not Regulated' | 'Not Clearly Regulated';
export type ConfidenceLevel = 'High' | 'Medium' | 'Low';

export interface ValidationVerdict {
  regulation_status: RegulationStatus;
  confidence: ConfidenceLevel;
  validation_rationale: string;
}

export interface ValidatedPair extends FeatureRegulationPair, ValidationVerdict {}

export interface ClauseSegment {
  ref: string;
  snippet: string;
}

export interface ScoreTelemetry {
  model_used: string;
  retries: number;
  status_code: number;
  provider?: string;
  prompt_tokens?: number;
  completion_tokens?: number;
}
