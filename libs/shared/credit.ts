import { z } from 'zod';

export const CREDIT_SCORE_MIN = 0;
export const CREDIT_SCORE_MAX = 100;
export const DEFAULT_CREDIT_SCORE = 70;

export const CreditTiers = [
  'trusted',
  'good',
  'average',
  'risky',
  'blocked',
] as const;
export type CreditTier = (typeof CreditTiers)[number];

export const CreditEvents = [
  'on_time_delivery',
  'no_show',
  'late_cancellation',
  'early_cancellation',
  'shop_cancellation',
  'positive_feedback',
  'negative_feedback',
  'admin_override',
] as const;
export type CreditEvent = (typeof CreditEvents)[number];

export type DeltaCreditEvent = Exclude<CreditEvent, 'admin_override'>;

export const CREDIT_EVENT_DELTAS: Readonly<Record<DeltaCreditEvent, number>> =
  {
    on_time_delivery: 2,
    no_show: -10,
    late_cancellation: -5,
    early_cancellation: -1,
    shop_cancellation: 0,
    positive_feedback: 3,
    negative_feedback: -3,
  } as const;

type TierRule = {
  tier: CreditTier;
  minScore: number;
  discountPercent: number;
};

// Ordered from the highest threshold down; the first match wins.
export const CREDIT_TIER_RULES: readonly TierRule[] = [
  { tier: 'trusted', minScore: 90, discountPercent: 10 },
  { tier: 'good', minScore: 75, discountPercent: 5 },
  { tier: 'average', minScore: 50, discountPercent: 0 },
  { tier: 'risky', minScore: 30, discountPercent: 0 },
  { tier: 'blocked', minScore: CREDIT_SCORE_MIN, discountPercent: 0 },
] as const;

export const clampCreditScore = (score: number): number =>
  Math.min(CREDIT_SCORE_MAX, Math.max(CREDIT_SCORE_MIN, score));

export function tierForScore(score: number): CreditTier {
  const clamped = clampCreditScore(score);
  const rule = CREDIT_TIER_RULES.find((r) => clamped >= r.minScore);
  return rule ? rule.tier : 'blocked';
}

export function discountPercentForTier(tier: CreditTier): number {
  return CREDIT_TIER_RULES.find((r) => r.tier === tier)?.discountPercent ?? 0;
}

export function discountPercentForScore(score: number): number {
  return discountPercentForTier(tierForScore(score));
}

/** Discount in minor units; rounded half up, never above the subtotal. */
export function computeDiscountCents(
  subtotalCents: number,
  discountPercent: number,
): number {
  if (subtotalCents <= 0 || discountPercent <= 0) return 0;
  return Math.min(
    subtotalCents,
    Math.round((subtotalCents * discountPercent) / 100),
  );
}

export const isOverrideScore = (value: unknown): value is number =>
  typeof value === 'number' &&
  Number.isInteger(value) &&
  value >= CREDIT_SCORE_MIN &&
  value <= CREDIT_SCORE_MAX;

export const AdminOverrideSchema = z.object({
  score: z.number(),
  reason: z.string(),
});
export type AdminOverrideInput = z.infer<typeof AdminOverrideSchema>;

// ---- presentation helpers ----

export function creditBadgeClass(score: number): string {
  return `credit-${tierForScore(score)}`;
}

/** Horizontal position of the score pointer on a 0-100 meter, in percent. */
export function creditMeterPosition(score: number): number {
  return clampCreditScore(score);
}

export function creditWarnings(score: number): string[] {
  const warnings: string[] = [];
  if (score < 50) {
    warnings.push(
      `Your credit score is low (${score}). Complete orders on time to improve it.`,
    );
  }
  if (score < 30) {
    warnings.push(
      'Your account is at risk of being blocked. Please contact support.',
    );
  }
  return warnings;
}

export const CREDIT_TIER_LABELS: Readonly<Record<CreditTier, string>> = {
  trusted: 'Trusted',
  good: 'Good',
  average: 'Average',
  risky: 'Risky',
  blocked: 'Blocked',
};
