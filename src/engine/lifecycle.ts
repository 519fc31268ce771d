import type { PurchaseOrder, PurchaseOrderState } from '../procurement/index.js';
import { InvalidTransitionError } from '../procurement/index.js';

export const TRANSITIONS = {
  draft: ['routed'],
  routed: ['blocked', 'reserved', 'pending_budget'],
  pending_budget: ['reserved', 'blocked', 'released'],
  reserved: ['approved', 'awaiting_approval'],
  awaiting_approval: ['approved', 'rejected', 'released'],
  approved: ['consumed'],
  rejected: ['released'],
  blocked: [],
  consumed: [],
  released: [],
} as const satisfies Record<PurchaseOrderState, readonly PurchaseOrderState[]>;

export const TERMINAL_STATES: ReadonlySet<PurchaseOrderState> = new Set<PurchaseOrderState>([
  'blocked',
  'consumed',
  'released',
]);

export function canTransition(from: PurchaseOrderState, to: PurchaseOrderState): boolean {
  const allowed: readonly PurchaseOrderState[] = TRANSITIONS[from];
  return allowed.includes(to);
}

export function isTerminal(state: PurchaseOrderState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Returns a copy of `po` moved to `to`, with a history entry. The stored
 * version is left alone; the repository bumps it on save.
 */
export function transition(
  po: PurchaseOrder,
  to: PurchaseOrderState,
  note: string,
  at: string,
): PurchaseOrder {
  if (!canTransition(po.state, to)) {
    throw new InvalidTransitionError(`Purchase order ${po.poId}`, po.state, `move to '${to}'`);
  }
  return {
    ...po,
    state: to,
    updatedAt: at,
    history: [...po.history, { state: to, at, note }],
  };
}
