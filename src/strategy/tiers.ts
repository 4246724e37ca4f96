import { BotError } from '../errors.js';
import type { SafetyLevel, Tier } from '../types.js';

export type TierFeature =
  | 'autoTrade'
  | 'aiAnalysis'
  | 'gasOptimizer'
  | 'mempoolWatching'
  | 'frontrun'
  | 'sandwich'
  | 'trailingStop';

export interface TierPolicy {
  maxTrackedTokens: number;
  maxSimultaneousTrades: number;
  allowYellow: boolean;
  features: ReadonlySet<TierFeature>;
}

export const TIER_POLICIES: Readonly<Record<Tier, TierPolicy>> = {
  free: {
    maxTrackedTokens: 5,
    maxSimultaneousTrades: 1,
    allowYellow: false,
    features: new Set<TierFeature>(),
  },
  premium: {
    maxTrackedTokens: 20,
    maxSimultaneousTrades: 3,
    allowYellow: true,
    features: new Set<TierFeature>(['autoTrade', 'aiAnalysis', 'gasOptimizer']),
  },
  vip: {
    maxTrackedTokens: Number.POSITIVE_INFINITY,
    maxSimultaneousTrades: Number.POSITIVE_INFINITY,
    allowYellow: true,
    features: new Set<TierFeature>([
      'autoTrade',
      'aiAnalysis',
      'gasOptimizer',
      'mempoolWatching',
      'frontrun',
      'sandwich',
      'trailingStop',
    ]),
  },
};

export function tierAllows(tier: Tier, feature: TierFeature): boolean {
  return TIER_POLICIES[tier].features.has(feature);
}

export function requireFeature(tier: Tier, feature: TierFeature): void {
  if (!tierAllows(tier, feature)) {
    throw new BotError('TierRestricted', `${feature} is not available on the ${tier} tier`);
  }
}

/**
 * Buy gate. Red is refused on every tier; Yellow follows the tier policy.
 * Tier limits never loosen the Red refusal.
 */
export function assertBuyable(level: SafetyLevel, tier: Tier): void {
  if (level === 'Red') {
    throw new BotError('SafetyRefusal', 'token is classified Red', { detail: 'Red' });
  }
  if (level === 'Yellow' && !TIER_POLICIES[tier].allowYellow) {
    throw new BotError('TierRestricted', `Yellow tokens are not tradable on the ${tier} tier`);
  }
}
