export type Dimension = 'economic' | 'social';

export type Pole = 'left' | 'right';

export interface TopicPrompt {
  id: string;
  topicId: string;
  text: string;
}

export interface IdeologyQuestion extends TopicPrompt {
  score: number;
  citation?: string;
}

export interface IdeologyTopic {
  id: string;
  dimension: Dimension;
  title: string;
  keywords: string[];
  relevanceCheck: TopicPrompt;
  leftLadder: IdeologyQuestion[];
  rightLadder: IdeologyQuestion[];
  centrismCheck: IdeologyQuestion;
}

export type TopicOutcome =
  | 'rung'
  | 'centrist'
  | 'weak-default'
  | 'no-signal'
  | 'not-relevant'
  | 'oracle-failure'
  | 'timed-out';

export type NoMatchPolicy = 'weak-default' | 'exclude';

export interface StoppedRung {
  readonly pole: Pole;
  readonly index: number;
  readonly questionId: string;
  readonly citation?: string;
}

export interface TopicResult {
  readonly topicId: string;
  readonly dimension: Dimension;
  readonly score: number | null;
  readonly outcome: TopicOutcome;
  readonly pole: Pole | null;
  readonly stoppedAt: StoppedRung | null;
}

export interface DimensionScore {
  readonly dimension: Dimension;
  readonly score: number;
  readonly count: number;
  readonly noData: boolean;
}

export interface ScoreRange {
  min: number;
  max: number;
}

export interface WeightedComponent<K extends string = string> {
  readonly name: K;
  readonly value: number | null;
  readonly weight: number;
}

export interface ComponentBreakdown<K extends string = string> {
  readonly name: K;
  readonly value: number | null;
  readonly weight: number;
  readonly effectiveWeight: number;
  readonly contribution: number;
  readonly clamped: boolean;
}

export interface CompositeScore<K extends string = string> {
  readonly score: number | null;
  readonly insufficientData: boolean;
  readonly clamped: boolean;
  readonly components: ComponentBreakdown<K>[];
}

export type BiasComponentName =
  | 'economic'
  | 'social'
  | 'newsReportingBalance'
  | 'editorialBias';

export type FactualityComponentName =
  | 'factCheck'
  | 'sourcing'
  | 'transparency'
  | 'propaganda';

export interface CombinerConfig<K extends string> {
  name: string;
  range: ScoreRange;
  weights: Record<K, number>;
}

export type BiasLabel =
  | 'Extreme Left'
  | 'Left'
  | 'Left-Center'
  | 'Least Biased (Center)'
  | 'Right-Center'
  | 'Right'
  | 'Extreme Right';

export type FactualityLabel =
  | 'Very High'
  | 'High'
  | 'Mostly Factual'
  | 'Mixed'
  | 'Low'
  | 'Very Low';

export interface LabelBin<L extends string> {
  min: number;
  max: number;
  minInclusive: boolean;
  maxInclusive: boolean;
  label: L;
}

export interface LabelTable<L extends string> {
  name: string;
  range: ScoreRange;
  bins: LabelBin<L>[];
}

export type TrafficTier = 'High' | 'Medium' | 'Minimal';

export type FreedomTier =
  | 'Free'
  | 'Mostly Free'
  | 'Partly Free'
  | 'Limited Freedom'
  | 'Total Oppression';

export type CredibilityLevel =
  | 'High Credibility'
  | 'Medium Credibility'
  | 'Low Credibility';

export interface CredibilityInputs {
  factualityLabel: FactualityLabel;
  biasLabel: BiasLabel;
  trafficTier: TrafficTier;
  siteAgeYears: number | null;
  freedomTier: FreedomTier;
}

export interface CredibilityBreakdown {
  factuality: number;
  bias: number;
  traffic: number;
  longevity: number;
  freedom: number;
}

export interface CredibilityResult {
  points: number;
  level: CredibilityLevel;
  breakdown: CredibilityBreakdown;
}

export interface FactualitySignals {
  factCheck: number | null;
  sourcing: number | null;
  transparency: number | null;
  propaganda: number | null;
}

export interface EditorialSignals {
  newsReportingBalance: number | null;
  editorialBias: number | null;
}

export interface AuxiliarySignals {
  trafficTier: TrafficTier;
  siteAgeYears: number | null;
  freedomTier: FreedomTier;
}

export interface IdeologyEvaluation {
  topics: TopicResult[];
  economic: DimensionScore;
  social: DimensionScore;
}

export interface CredibilityReport {
  outlet: string;
  bias: {
    score: number | null;
    label: BiasLabel | null;
    composite: CompositeScore<BiasComponentName>;
  };
  factuality: {
    score: number | null;
    label: FactualityLabel | null;
    composite: CompositeScore<FactualityComponentName>;
  };
  credibility: CredibilityResult | null;
  dimensions: {
    economic: DimensionScore;
    social: DimensionScore;
  };
  topics: TopicResult[];
  insufficientData: string[];
}

export interface StoredReport {
  domain: string;
  savedAt: string;
  report: CredibilityReport;
}

export interface ArticleSample {
  title: string;
  text: string;
  url?: string;
}

export interface EvaluationEntry {
  name: string;
  predicted: { bias: string | null; factuality: string | null };
  reference: { bias: string; factuality: string };
}

export interface EvaluationRow {
  name: string;
  referenceBiasOrdinal: number;
  referenceFactualityOrdinal: number;
  predictedBiasOrdinal: number | null;
  predictedFactualityOrdinal: number | null;
  biasError: number | null;
  factualityError: number | null;
}

export interface EvaluationSummary {
  total: number;
  evaluated: number;
  biasMae: number | null;
  factualityMae: number | null;
  biasExactMatch: number | null;
  factualityExactMatch: number | null;
  rows: EvaluationRow[];
}
