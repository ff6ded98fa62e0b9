// src/services/subscriptionStore.ts
// Postgres lookup of the subscription tier. Read-only: billing owns the tables.

import { Pool } from 'pg';
import { SubscriptionStore } from './accessGate';

type TierRow = {
  subscription_tier: string | null;
  subscription_end: Date | null;
  tier: string | null;
};

/**
 * An unexpired premium subscription wins; otherwise the user_tiers row decides.
 */
export function isPremium(row: TierRow | undefined, now: Date): boolean {
  if (!row) return false;
  if (
    row.subscription_tier === 'premium' &&
    row.subscription_end !== null &&
    row.subscription_end.getTime() > now.getTime()
  ) {
    return true;
  }
  return row.tier === 'premium';
}

export class PgSubscriptionStore implements SubscriptionStore {
  constructor(
    private readonly pool: Pool,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Answers from the tier alone: the premium tier unlocks the whole premium
   * catalog together. AccessGate has already answered free and unknown keys.
   */
  async hasFeature(identity: string, _featureKey: string): Promise<boolean> {
    const result = await this.pool.query<TierRow>(
      `SELECT s.subscription_tier, s.subscription_end, t.tier
       FROM (SELECT $1::text AS user_phone) u
       LEFT JOIN user_subscriptions s ON s.user_phone = u.user_phone
       LEFT JOIN user_tiers t ON t.user_phone = u.user_phone
       LIMIT 1`,
      [identity]
    );
    return isPremium(result.rows[0], this.now());
  }
}
