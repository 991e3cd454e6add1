// Calendar span of one reported week (start and end inclusive, UTC midnight)
export interface DateRange {
  start: Date;
  end: Date;
}

// One week as delivered by ingestion, before segmentation
export interface RawWeek {
  week: number;
  boxoffice: number;
  audience: number;
  screens: number;
  dateRange: DateRange | null;
}

export interface WeekRecord {
  realWeekIndex: number;
  activeWeekIndex: number | null; // null for zero-revenue weeks
  boxoffice: number;
  audience: number;
  screens: number;
  dateRange: DateRange | null;
  roundIndex: number;
}

// One contiguous theatrical run
export interface Round {
  roundIndex: number;
  weeks: readonly WeekRecord[];
  trailingZeroWeeks: number;
  isOpen: boolean;
}

export interface MovieInfo {
  releaseDate: Date;
  filmLengthMinutes: number;
  isRestricted: boolean;
  rating?: string | null;
  region?: string | null;
}

export interface MovieSeries {
  movieId: string;
  info: MovieInfo;
  rounds: Round[];
}

// Provenance of a forecast step's lag inputs
export type Provenance = 'REAL' | 'PREDICTED';

export interface FeatureMetadata {
  defaultsApplied: string[];
  lagSources: {
    week1: Provenance;
    week2: Provenance;
  };
}

export interface FeatureValues {
  roundIndex: number;
  currentWeekActiveIdx: number;

  // Lag features (active weeks before the target)
  boxofficeWeek1: number;
  boxofficeWeek2: number;
  audienceWeek1: number;
  audienceWeek2: number;
  screensWeek1: number;
  screensWeek2: number;

  // Skipped calendar weeks
  gapRealWeek2to1: number;
  gapRealWeek1toCurrent: number;

  // Opening strength (constant within a round)
  openWeek1Days: number;
  openWeek1Boxoffice: number;
  openWeek1BoxofficeDailyAvg: number;
  openWeek2Boxoffice: number;

  // Static attributes
  filmLengthMinutes: number;
  isRestricted: number;

  // Temporal encodings
  releaseYear: number;
  releaseMonth: number;
  releaseMonthSin: number;
  releaseMonthCos: number;
}

export type FeatureName = keyof FeatureValues;

export interface FeatureVector extends Readonly<FeatureValues> {
  readonly meta: Readonly<FeatureMetadata>;
}

export interface PredictionRecord {
  targetWeek: number;
  predictedBoxoffice: number;
  predictedAudience: number;
  predictedScreens: number;
  declineRate: number;
  provenance: Provenance;
  confidenceLower: number;
  confidenceUpper: number;
}

export type Tier = 'tier_1' | 'tier_2' | 'tier_3' | 'tier_4';

export const TIERS: readonly Tier[] = ['tier_1', 'tier_2', 'tier_3', 'tier_4'];

export interface TierQuantiles {
  p25: number;
  p75: number;
  p90: number;
}

export interface TierWeekStats {
  mean: number;
  median: number;
  std: number;
  count: number;
}

export interface TierTable {
  version: number;
  computedAt: string;
  quantiles: TierQuantiles;
  tiers: Record<Tier, Record<number, TierWeekStats>>;
  corpusSize: number;
  movieCount: number;
}

// One (opening strength, week, decline) observation from training data
export interface HistoricalCorpusEntry {
  movieId?: string;
  openingStrength: number;
  activeWeek: number;
  declineRate: number;
}

export type WarningLevel = 'NORMAL' | 'ATTENTION' | 'CRITICAL' | 'UNKNOWN';

export interface WarningVerdict {
  level: WarningLevel;
  message: string;
  tier: Tier;
  predictedDeclineRate: number;
  historicalAverageDeclineRate: number | null;
  speedRatio: number | null;
}

export type PredictionWithWarning = PredictionRecord & {
  warning: WarningVerdict;
};
