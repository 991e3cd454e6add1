/**
 * Runtime Configuration
 *
 * Reads settings from the environment, falling back to defaults.
 */

export interface ForecastConfig {
  weeksPath: string;
  moviesPath: string;
  corpusPath: string | null;
  modelPath: string | null;
  tierTableCachePath: string;
  forecastOutputPath: string;
  horizon: number;
  maxHorizon: number;
  averageTicketPrice: number;
  screenRetention: number;
  minScreens: number;
  confidenceMargin: number;
  warningThresholds: WarningThresholds;
}

export interface WarningThresholds {
  attentionRatio: number;
  criticalRatio: number;
}

export const DEFAULT_WARNING_THRESHOLDS: WarningThresholds = {
  attentionRatio: 0.3,
  criticalRatio: 0.5,
};

const DEFAULTS = {
  weeksPath: 'data/boxoffice_weeks.xlsx',
  moviesPath: 'data/movies.xlsx',
  tierTableCachePath: 'data/tier_table_cache.json',
  forecastOutputPath: 'data/forecasts.json',
  horizon: 3,
  maxHorizon: 12,
  averageTicketPrice: 300,
  screenRetention: 0.9,
  minScreens: 20,
  confidenceMargin: 0.15,
};

/**
 * Parse a numeric env var, warning and falling back when it is malformed
 */
function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[config] ${key}="${raw}" is not a number, using ${fallback}`);
    return fallback;
  }

  return value;
}

function readPath(env: NodeJS.ProcessEnv, key: string): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

export function getForecastConfig(env: NodeJS.ProcessEnv = process.env): ForecastConfig {
  return {
    weeksPath: readPath(env, 'BOXOFFICE_WEEKS_PATH') ?? DEFAULTS.weeksPath,
    moviesPath: readPath(env, 'MOVIES_PATH') ?? DEFAULTS.moviesPath,
    corpusPath: readPath(env, 'CORPUS_PATH'),
    modelPath: readPath(env, 'MODEL_PATH'),
    tierTableCachePath: readPath(env, 'TIER_TABLE_CACHE_PATH') ?? DEFAULTS.tierTableCachePath,
    forecastOutputPath: readPath(env, 'FORECAST_OUTPUT_PATH') ?? DEFAULTS.forecastOutputPath,
    horizon: readNumber(env, 'FORECAST_HORIZON', DEFAULTS.horizon),
    maxHorizon: readNumber(env, 'FORECAST_MAX_HORIZON', DEFAULTS.maxHorizon),
    averageTicketPrice: readNumber(env, 'AVG_TICKET_PRICE', DEFAULTS.averageTicketPrice),
    screenRetention: readNumber(env, 'SCREEN_RETENTION', DEFAULTS.screenRetention),
    minScreens: readNumber(env, 'MIN_SCREENS', DEFAULTS.minScreens),
    confidenceMargin: readNumber(env, 'CONFIDENCE_MARGIN', DEFAULTS.confidenceMargin),
    warningThresholds: {
      attentionRatio: readNumber(
        env,
        'WARNING_ATTENTION_RATIO',
        DEFAULT_WARNING_THRESHOLDS.attentionRatio
      ),
      criticalRatio: readNumber(
        env,
        'WARNING_CRITICAL_RATIO',
        DEFAULT_WARNING_THRESHOLDS.criticalRatio
      ),
    },
  };
}
