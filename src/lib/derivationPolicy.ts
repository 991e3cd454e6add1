/**
 * Audience / screens derivation
 *
 * The models only predict revenue. Audience and screen counts for a forecast
 * week come from a pluggable policy; the default uses fixed ratios.
 */

import type { FeatureVector } from '../types';
import { getForecastConfig } from './config';

export interface DerivationContext {
  features: FeatureVector;
  step: number;
}

export interface DerivationPolicy {
  deriveAudience(predictedBoxoffice: number, context: DerivationContext): number;
  deriveScreens(predictedBoxoffice: number, context: DerivationContext): number;
}

export interface RatioPolicySettings {
  averageTicketPrice: number;
  screenRetention: number;
  minScreens: number;
}

/**
 * audience = revenue / average ticket price
 * screens = previous screens × retention, floored at a minimum screen count
 */
export function createRatioPolicy(settings: Partial<RatioPolicySettings> = {}): DerivationPolicy {
  const config = getForecastConfig();
  const averageTicketPrice = settings.averageTicketPrice ?? config.averageTicketPrice;
  const screenRetention = settings.screenRetention ?? config.screenRetention;
  const minScreens = settings.minScreens ?? config.minScreens;

  if (averageTicketPrice <= 0) {
    throw new RangeError(`averageTicketPrice must be positive, got ${averageTicketPrice}`);
  }

  return {
    deriveAudience(predictedBoxoffice) {
      return Math.floor(predictedBoxoffice / averageTicketPrice);
    },
    deriveScreens(_predictedBoxoffice, { features }) {
      return Math.max(Math.floor(features.screensWeek1 * screenRetention), minScreens);
    },
  };
}
