// apps/api/src/credit/credit-policy.ts
import {
  CREDIT_EVENT_DELTAS,
  clampCreditScore,
  isOverrideScore,
  tierForScore,
  type CreditEvent,
  type CreditTier,
  type DeltaCreditEvent,
} from '@shared/credit';
import type { OrderStatus } from '@shared/order';
import { DomainValidationException } from '../common/errors/domain-errors';
import type { UserRole } from '../auth/entities/user.entity';
import type { CreditActorRole } from './entities/credit-history.entity';

export type CreditEventInput =
  | {
      type: DeltaCreditEvent;
      reason: string;
      actorId?: string | null;
      actorRole?: CreditActorRole;
      orderId?: string | null;
    }
  | {
      type: 'admin_override';
      value: number;
      reason: string;
      actorId: string;
      actorRole?: CreditActorRole;
      orderId?: null;
    };

export type CreditHistoryDraft = {
  userId: string;
  event: CreditEvent;
  delta: number;
  previousScore: number;
  newScore: number;
  reason: string;
  actorId: string | null;
  actorRole: CreditActorRole;
  orderId: string | null;
};

export type CreditAdjustment = {
  score: number;
  tier: CreditTier;
  entry: CreditHistoryDraft;
};

/**
 * Applies one event to a score. Pure: the caller persists the new score and
 * appends `entry` to the history.
 */
export function adjust(
  profile: { userId: string; score: number },
  input: CreditEventInput,
): CreditAdjustment {
  const previousScore = profile.score;
  let target: number;

  if (input.type === 'admin_override') {
    if (!isOverrideScore(input.value)) {
      throw new DomainValidationException(
        'Override score must be an integer between 0 and 100',
        { value: input.value },
      );
    }
    if (!input.reason.trim()) {
      throw new DomainValidationException('A reason is required');
    }
    target = input.value;
  } else {
    target = previousScore + CREDIT_EVENT_DELTAS[input.type];
  }

  const score = clampCreditScore(target);
  return {
    score,
    tier: tierForScore(score),
    entry: {
      userId: profile.userId,
      event: input.type,
      delta: score - previousScore,
      previousScore,
      newScore: score,
      reason: input.reason.trim(),
      actorId: input.actorId ?? null,
      actorRole:
        input.actorRole ?? (input.type === 'admin_override' ? 'admin' : 'system'),
      orderId: input.orderId ?? null,
    },
  };
}

/** Mean of the three ratings compared against the positive threshold. */
export function feedbackCreditEvent(
  ratings: { politeness: number; punctuality: number; authenticity: number },
  positiveThreshold = 4,
): {
  event: Extract<DeltaCreditEvent, 'positive_feedback' | 'negative_feedback'>;
  overallRating: number;
} {
  const mean =
    (ratings.politeness + ratings.punctuality + ratings.authenticity) / 3;
  return {
    event: mean >= positiveThreshold ? 'positive_feedback' : 'negative_feedback',
    overallRating: Math.round(mean * 100) / 100,
  };
}

/**
 * Which event a cancellation produces. Students pay more the later they
 * cancel; a no-show can only be declared by the shop or an admin once the
 * order is ready.
 */
export function cancellationCreditEvent(params: {
  from: OrderStatus;
  cancelledBy: Extract<UserRole, 'student' | 'shop_owner' | 'admin'>;
  noShow: boolean;
}): DeltaCreditEvent {
  if (params.cancelledBy === 'student') {
    return params.from === 'placed' ? 'early_cancellation' : 'late_cancellation';
  }
  return params.noShow ? 'no_show' : 'shop_cancellation';
}
