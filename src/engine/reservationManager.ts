import { v4 as uuidv4 } from 'uuid';

import type {
  Budget,
  BudgetReservation,
  ReservationStatus,
} from '../procurement/index.js';
import {
  LedgerInvariantError,
  NotFoundError,
  ValidationError,
  createLogger,
  fromMinorUnits,
  isWholeMinorAmount,
  toMinorUnits,
} from '../procurement/index.js';
import type { LedgerStore, LedgerTransaction } from '../store/index.js';
import { assertLedgerInvariant, availableMinor } from './budgetLedger.js';

const log = createLogger('ReservationManager');

export type ReserveResult =
  | { kind: 'reserved'; reservation: BudgetReservation; budget: Budget }
  | {
      kind: 'insufficient_budget';
      departmentId: string;
      requested: number;
      available: number;
    };

export type ReleaseResult =
  | { kind: 'released'; reservation: BudgetReservation; budget: Budget }
  | AlreadyTerminal;

export type ConsumeResult =
  | { kind: 'consumed'; reservation: BudgetReservation; budget: Budget }
  | AlreadyTerminal;

/** Returned, not thrown, so retried calls stay safe. */
export interface AlreadyTerminal {
  kind: 'already_terminal';
  reservation: BudgetReservation;
  status: Exclude<ReservationStatus, 'active'>;
}

type Settlement = 'released' | 'consumed';

/**
 * The only code path that changes `reserved` and `spent`. Each operation is
 * a single ledger unit on the department row: balances and the reservation
 * row change together or not at all.
 */
export class ReservationManager {
  constructor(
    private readonly ledger: LedgerStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async reserve(
    departmentId: string,
    amount: number,
    poId: string,
  ): Promise<ReserveResult> {
    if (!(amount > 0) || !isWholeMinorAmount(amount)) {
      throw new ValidationError(
        `Reservation amount must be a positive value with at most two decimals (got ${amount}).`,
      );
    }

    const result = await this.ledger.withDepartment(departmentId, async (tx) => {
      const budget = await tx.lockBudget(departmentId);
      if (!budget) {
        throw new NotFoundError('Budget for department', departmentId);
      }
      assertLedgerInvariant(budget);

      const available = availableMinor(budget);
      if (toMinorUnits(amount) > available) {
        return {
          kind: 'insufficient_budget',
          departmentId,
          requested: amount,
          available: fromMinorUnits(available),
        } satisfies ReserveResult;
      }

      const updated: Budget = {
        ...budget,
        reserved: fromMinorUnits(toMinorUnits(budget.reserved) + toMinorUnits(amount)),
      };
      assertLedgerInvariant(updated);

      const reservation: BudgetReservation = {
        reservationId: uuidv4(),
        poId,
        departmentId,
        amount,
        status: 'active',
        createdAt: this.clock().toISOString(),
      };

      await tx.updateBalances(departmentId, updated);
      await tx.insertReservation(reservation);

      return { kind: 'reserved', reservation, budget: updated } satisfies ReserveResult;
    });

    if (result.kind === 'reserved') {
      log.info(
        `Reserved ${amount} for ${poId} on ${departmentId} (reservation ${result.reservation.reservationId}; reserved now ${result.budget.reserved}).`,
      );
    } else {
      log.info(
        `Insufficient budget for ${poId} on ${departmentId}: requested ${amount}, available ${result.available}.`,
      );
    }
    return result;
  }

  public async release(reservationId: string): Promise<ReleaseResult> {
    const result = await this.settle(reservationId, 'released');
    if (result.kind === 'released') {
      log.info(`Released reservation ${reservationId} (${result.reservation.amount}).`);
    }
    return result;
  }

  public async consume(reservationId: string): Promise<ConsumeResult> {
    const result = await this.settle(reservationId, 'consumed');
    if (result.kind === 'consumed') {
      log.info(`Consumed reservation ${reservationId} (${result.reservation.amount}).`);
    }
    return result;
  }

  /** The active reservation held for a PO, if any. */
  public async findActiveByPo(poId: string): Promise<BudgetReservation | null> {
    const reservations = await this.ledger.listReservationsForPo(poId);
    return reservations.find((reservation) => reservation.status === 'active') ?? null;
  }

  private async settle(
    reservationId: string,
    settlement: 'released',
  ): Promise<ReleaseResult>;
  private async settle(
    reservationId: string,
    settlement: 'consumed',
  ): Promise<ConsumeResult>;
  private async settle(
    reservationId: string,
    settlement: Settlement,
  ): Promise<ReleaseResult | ConsumeResult> {
    const known = await this.ledger.findReservation(reservationId);
    if (!known) {
      throw new NotFoundError('Reservation', reservationId);
    }

    return this.ledger.withDepartment(known.departmentId, async (tx) => {
      const budget = await tx.lockBudget(known.departmentId);
      if (!budget) {
        throw new NotFoundError('Budget for department', known.departmentId);
      }
      const reservation = await tx.lockReservation(reservationId);
      if (!reservation) {
        throw new NotFoundError('Reservation', reservationId);
      }

      if (reservation.status !== 'active') {
        log.debug(
          `Reservation ${reservationId} already ${reservation.status}; ${settlement} is a no-op.`,
        );
        return {
          kind: 'already_terminal',
          reservation,
          status: reservation.status,
        } satisfies AlreadyTerminal;
      }

      const updated = applySettlement(budget, reservation, settlement);
      const settled: BudgetReservation = {
        ...reservation,
        status: settlement,
        settledAt: this.clock().toISOString(),
      };

      await writeSettlement(tx, updated, settled);

      return settlement === 'released'
        ? { kind: 'released' as const, reservation: settled, budget: updated }
        : { kind: 'consumed' as const, reservation: settled, budget: updated };
    });
  }
}

function applySettlement(
  budget: Budget,
  reservation: BudgetReservation,
  settlement: Settlement,
): Budget {
  const amount = toMinorUnits(reservation.amount);
  const reserved = toMinorUnits(budget.reserved) - amount;
  if (reserved < 0) {
    throw new LedgerInvariantError(
      budget.departmentId,
      `reservation ${reservation.reservationId} exceeds reserved balance`,
      { reserved: budget.reserved, amount: reservation.amount },
    );
  }
  const spent =
    settlement === 'consumed'
      ? toMinorUnits(budget.spent) + amount
      : toMinorUnits(budget.spent);

  const updated: Budget = {
    ...budget,
    reserved: fromMinorUnits(reserved),
    spent: fromMinorUnits(spent),
  };
  assertLedgerInvariant(updated);
  return updated;
}

async function writeSettlement(
  tx: LedgerTransaction,
  budget: Budget,
  reservation: BudgetReservation,
): Promise<void> {
  await tx.updateBalances(budget.departmentId, budget);
  await tx.updateReservation(reservation);
}
