import path from 'node:path';
import {
  BiasComponentName,
  BiasLabel,
  CombinerConfig,
  CredibilityLevel,
  FactualityComponentName,
  FactualityLabel,
  FreedomTier,
  LabelTable,
  NoMatchPolicy,
  TrafficTier,
} from '../types/credibility.types';

export const SERVICE_NAME = 'media-credibility-engine';
export const SERVICE_VERSION = '1.0.0';

export const BIAS_RANGE = { min: -10, max: 10 };
export const FACTUALITY_RANGE = { min: 0, max: 10 };

export const BIAS_WEIGHTS: Record<BiasComponentName, number> = {
  economic: 0.35,
  social: 0.35,
  newsReportingBalance: 0.15,
  editorialBias: 0.15,
};

export const FACTUALITY_WEIGHTS: Record<FactualityComponentName, number> = {
  factCheck: 0.4,
  sourcing: 0.25,
  transparency: 0.25,
  propaganda: 0.1,
};

export const BIAS_COMBINER_CONFIG: CombinerConfig<BiasComponentName> = {
  name: 'bias',
  range: BIAS_RANGE,
  weights: BIAS_WEIGHTS,
};

export const FACTUALITY_COMBINER_CONFIG: CombinerConfig<FactualityComponentName> =
  {
    name: 'factuality',
    range: FACTUALITY_RANGE,
    weights: FACTUALITY_WEIGHTS,
  };

// Center is open on both ends: -2.0 is Left-Center, +2.0 is Right-Center.
export const BIAS_LABEL_TABLE: LabelTable<BiasLabel> = {
  name: 'bias',
  range: BIAS_RANGE,
  bins: [
    {
      min: -10,
      max: -8,
      minInclusive: true,
      maxInclusive: true,
      label: 'Extreme Left',
    },
    {
      min: -8,
      max: -5,
      minInclusive: false,
      maxInclusive: true,
      label: 'Left',
    },
    {
      min: -5,
      max: -2,
      minInclusive: false,
      maxInclusive: true,
      label: 'Left-Center',
    },
    {
      min: -2,
      max: 2,
      minInclusive: false,
      maxInclusive: false,
      label: 'Least Biased (Center)',
    },
    {
      min: 2,
      max: 5,
      minInclusive: true,
      maxInclusive: false,
      label: 'Right-Center',
    },
    {
      min: 5,
      max: 8,
      minInclusive: true,
      maxInclusive: false,
      label: 'Right',
    },
    {
      min: 8,
      max: 10,
      minInclusive: true,
      maxInclusive: true,
      label: 'Extreme Right',
    },
  ],
};

// 0 is best, 10 is worst.
export const FACTUALITY_LABEL_TABLE: LabelTable<FactualityLabel> = {
  name: 'factuality',
  range: FACTUALITY_RANGE,
  bins: [
    {
      min: 0,
      max: 0.5,
      minInclusive: true,
      maxInclusive: false,
      label: 'Very High',
    },
    {
      min: 0.5,
      max: 2,
      minInclusive: true,
      maxInclusive: false,
      label: 'High',
    },
    {
      min: 2,
      max: 4.5,
      minInclusive: true,
      maxInclusive: false,
      label: 'Mostly Factual',
    },
    {
      min: 4.5,
      max: 6.5,
      minInclusive: true,
      maxInclusive: false,
      label: 'Mixed',
    },
    {
      min: 6.5,
      max: 8.5,
      minInclusive: true,
      maxInclusive: false,
      label: 'Low',
    },
    {
      min: 8.5,
      max: 10,
      minInclusive: true,
      maxInclusive: true,
      label: 'Very Low',
    },
  ],
};

export const FACTUALITY_POINTS: Record<FactualityLabel, number> = {
  'Very High': 4,
  High: 3,
  'Mostly Factual': 2,
  Mixed: 1,
  Low: 0,
  'Very Low': 0,
};

export const BIAS_POINTS: Record<BiasLabel, number> = {
  'Least Biased (Center)': 3,
  'Left-Center': 2,
  'Right-Center': 2,
  Left: 1,
  Right: 1,
  'Extreme Left': 0,
  'Extreme Right': 0,
};

export const TRAFFIC_POINTS: Record<TrafficTier, number> = {
  High: 2,
  Medium: 1,
  Minimal: 0,
};

export const LONGEVITY_BONUS_MIN_YEARS = 10;
export const LONGEVITY_BONUS_POINTS = 1;

export const FREEDOM_PENALTY: Record<FreedomTier, number> = {
  Free: 0,
  'Mostly Free': 0,
  'Partly Free': 0,
  'Limited Freedom': -1,
  'Total Oppression': -2,
};

// Checked top to bottom; anything below the last floor is Low.
export const CREDIBILITY_LEVELS: { minPoints: number; level: CredibilityLevel }[] =
  [
    { minPoints: 6, level: 'High Credibility' },
    { minPoints: 3, level: 'Medium Credibility' },
  ];
export const CREDIBILITY_FLOOR_LEVEL: CredibilityLevel = 'Low Credibility';

export const REPORT_SCORE_DECIMALS = 2;

const noMatchPolicyRaw = (process.env.NO_MATCH_POLICY ?? '').trim();
export const NO_MATCH_POLICY: NoMatchPolicy =
  noMatchPolicyRaw === 'exclude' ? 'exclude' : 'weak-default';

const runTimeoutRaw = Number(process.env.ORACLE_RUN_TIMEOUT_MS ?? 120000);
export const ORACLE_RUN_TIMEOUT_MS = Number.isFinite(runTimeoutRaw)
  ? Math.max(0, Math.floor(runTimeoutRaw))
  : 120000;

const maxArticlesRaw = Number(process.env.ORACLE_MAX_ARTICLES ?? 5);
export const ORACLE_MAX_ARTICLES = Number.isFinite(maxArticlesRaw)
  ? Math.max(1, Math.floor(maxArticlesRaw))
  : 5;

export const AI_PROVIDER = (process.env.AI_PROVIDER ?? 'gemini')
  .trim()
  .toLowerCase();
const aiInputMaxCharsRaw = Number(process.env.AI_INPUT_MAX_CHARS ?? 2400);
export const AI_INPUT_MAX_CHARS = Number.isFinite(aiInputMaxCharsRaw)
  ? Math.max(200, Math.floor(aiInputMaxCharsRaw))
  : 2400;

const dataDir = process.env.DATA_DIR ?? path.join(process.cwd(), 'data');
export const REPORTS_DIR =
  process.env.REPORTS_DIR ?? path.join(dataDir, 'reports');
const reportMaxAgeRaw = Number(process.env.REPORT_MAX_AGE_DAYS ?? 30);
export const REPORT_MAX_AGE_DAYS = Number.isFinite(reportMaxAgeRaw)
  ? Math.max(0, reportMaxAgeRaw)
  : 30;

// Ordinal classes for comparing labels with reference ratings.
export const BIAS_ORDINALS: Record<string, number> = {
  'EXTREME LEFT': 0,
  LEFT: 1,
  'LEFT CENTER': 2,
  'LEAST BIASED': 3,
  'LEAST BIASED (CENTER)': 3,
  CENTER: 3,
  'RIGHT CENTER': 4,
  RIGHT: 5,
  'EXTREME RIGHT': 6,
};

export const FACTUALITY_ORDINALS: Record<string, number> = {
  'VERY HIGH': 0,
  HIGH: 1,
  'MOSTLY FACTUAL': 2,
  MIXED: 3,
  LOW: 4,
  'VERY LOW': 5,
};
