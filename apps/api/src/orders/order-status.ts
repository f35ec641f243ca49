import {
  ORDER_STATUS_FLOW,
  ORDER_STATUS_TRANSITIONS,
  type OrderStatus,
} from '@shared/order';
import { IllegalTransitionException } from '../common/errors/domain-errors';

/** A shop may only take the single forward step; cancellation has its own path. */
export function assertAdvanceAllowed(from: OrderStatus, to: OrderStatus): void {
  if (to === 'cancelled') {
    throw new IllegalTransitionException(
      'Use the cancel endpoint to cancel an order',
      { from, to },
    );
  }
  if (ORDER_STATUS_FLOW[from] !== to) {
    throw new IllegalTransitionException(
      `Illegal status transition: ${from} -> ${to}`,
      { from, to },
    );
  }
}

export function assertCancellable(from: OrderStatus): void {
  if (!ORDER_STATUS_TRANSITIONS[from].includes('cancelled')) {
    throw new IllegalTransitionException(`Order is already ${from}`, {
      from,
      to: 'cancelled',
    });
  }
}
