// src/services/accessGate.ts
// Premium feature gate. Reads subscription state, never changes it.

import { AccessDecision } from '../types/intake';
import { errMessage } from './errors';

/**
 * Subscription / feature-flag lookup owned by the billing side.
 *
 * Tiers are all-or-nothing: an active premium subscription unlocks every
 * key of PREMIUM_FEATURES at once, so implementations may answer from the
 * tier alone. `featureKey` is passed for stores that grant per feature.
 */
export interface SubscriptionStore {
  hasFeature(identity: string, featureKey: string): Promise<boolean>;
}

/** Available on every tier, no lookup needed. */
export const FREE_FEATURES = [
  'basic_tracking',
  'limited_history',
  'basic_reminders',
  'simple_summary',
  'child_data',
  'basic_analytics',
] as const;

/** Require an active premium subscription. */
export const PREMIUM_FEATURES = [
  'unlimited_history',
  'unlimited_reminders',
  'weekly_trends',
  'monthly_reports',
  'growth_percentiles',
  'data_export',
  'family_sharing',
  'multiple_children',
  'detailed_analytics',
  'custom_reminders',
  'priority_support',
  'pdf_reports',
  'advanced_charts',
] as const;

export type FeatureKey = (typeof FREE_FEATURES)[number] | (typeof PREMIUM_FEATURES)[number];

const FREE_SET: ReadonlySet<string> = new Set(FREE_FEATURES);
const PREMIUM_SET: ReadonlySet<string> = new Set(PREMIUM_FEATURES);

const UPSELL_MESSAGES = new Map<string, string>([
  [
    'advanced_charts',
    'Growth charts are a premium feature. Upgrade to premium to download weight, height ' +
      'and head circumference charts as PNG.',
  ],
  [
    'pdf_reports',
    'PDF reports are a premium feature. Upgrade to premium to access comprehensive PDF ' +
      'reports with charts and analytics.',
  ],
]);

export function upsellMessage(featureKey: string): string {
  return (
    UPSELL_MESSAGES.get(featureKey) ??
    'This feature is available for premium users. Upgrade to premium for unlimited access!'
  );
}

export interface AccessGateOptions {
  disabledFeatures?: ReadonlyArray<string>;
}

export class AccessGate {
  private readonly disabled: ReadonlySet<string>;

  constructor(
    private readonly subscriptions: SubscriptionStore,
    options: AccessGateOptions = {}
  ) {
    this.disabled = new Set(options.disabledFeatures ?? []);
  }

  /**
   * Decide whether `identity` may use `featureKey`.
   *
   * Disabled and uncatalogued features are refused. A failing subscription
   * lookup is treated as the free tier.
   */
  async decide(identity: string, featureKey: string): Promise<AccessDecision> {
    if (this.disabled.has(featureKey)) {
      return { allowed: false, reason: 'feature_disabled' };
    }

    if (FREE_SET.has(featureKey)) {
      return { allowed: true, reason: 'free_tier' };
    }

    if (!PREMIUM_SET.has(featureKey)) {
      console.warn(`[AccessGate] Unknown feature "${featureKey}" requested by ${identity}`);
      return { allowed: false, reason: 'feature_disabled' };
    }

    try {
      const hasFeature = await this.subscriptions.hasFeature(identity, featureKey);
      return hasFeature
        ? { allowed: true, reason: 'premium_active' }
        : { allowed: false, reason: 'free_tier' };
    } catch (err) {
      console.error(`[AccessGate] Subscription lookup failed for ${identity}:`, errMessage(err));
      return { allowed: false, reason: 'free_tier' };
    }
  }
}
