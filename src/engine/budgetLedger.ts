import type { Budget, BudgetSummary } from '../procurement/index.js';
import {
  LedgerInvariantError,
  NotFoundError,
  fromMinorUnits,
  toMinorUnits,
} from '../procurement/index.js';
import type { LedgerStore } from '../store/index.js';

export interface AvailabilityCheck {
  departmentId: string;
  available: boolean;
  requested: number;
  availableAmount: number;
}

/** allocated − spent − reserved, in minor units. */
export function availableMinor(budget: Budget): number {
  return (
    toMinorUnits(budget.allocated) - toMinorUnits(budget.spent) - toMinorUnits(budget.reserved)
  );
}

/**
 * Throws when the balances break `spent + reserved <= allocated` or any
 * balance is negative.
 */
export function assertLedgerInvariant(budget: Budget): void {
  if (budget.allocated < 0 || budget.spent < 0 || budget.reserved < 0) {
    throw new LedgerInvariantError(budget.departmentId, 'negative balance', {
      allocated: budget.allocated,
      spent: budget.spent,
      reserved: budget.reserved,
    });
  }
  if (availableMinor(budget) < 0) {
    throw new LedgerInvariantError(budget.departmentId, 'available budget below zero', {
      allocated: budget.allocated,
      spent: budget.spent,
      reserved: budget.reserved,
    });
  }
}

/** Read side of the department budgets. */
export class BudgetLedger {
  constructor(private readonly store: LedgerStore) {}

  public async getBudget(departmentId: string): Promise<Budget> {
    const budget = await this.store.getBudget(departmentId);
    if (!budget) {
      throw new NotFoundError('Budget for department', departmentId);
    }
    return budget;
  }

  public async listBudgets(): Promise<Budget[]> {
    return this.store.listBudgets();
  }

  /** Advisory only: a later reserve may still find the money gone. */
  public async checkAvailability(
    departmentId: string,
    amount: number,
  ): Promise<AvailabilityCheck> {
    const budget = await this.getBudget(departmentId);
    const available = availableMinor(budget);
    return {
      departmentId,
      available: toMinorUnits(amount) <= available,
      requested: amount,
      availableAmount: fromMinorUnits(available),
    };
  }

  public async getSummary(departmentId: string): Promise<BudgetSummary> {
    const budget = await this.getBudget(departmentId);
    const utilization =
      budget.allocated > 0 ? (budget.spent / budget.allocated) * 100 : 0;
    return {
      departmentId: budget.departmentId,
      department: budget.name,
      allocated: budget.allocated,
      spent: budget.spent,
      reserved: budget.reserved,
      available: fromMinorUnits(availableMinor(budget)),
      utilizationPercent: Math.round(utilization * 100) / 100,
      fiscalYear: budget.fiscalYear,
    };
  }
}
