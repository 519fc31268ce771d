import { createEngine, type ProcurementEngine } from '../../src/engine/index.js';
import {
  defaultEngineConfig,
  exampleApprovalRules,
  exampleApprovers,
  exampleBudget,
  exampleSupplier,
  type EngineConfig,
  type PurchaseOrderSubmission,
} from '../../src/procurement/index.js';
import { InMemoryEngineStore } from '../../src/store/index.js';

export const START = '2026-03-02T09:00:00.000Z';

/** A clock tests can move forward by hand. */
export class ManualClock {
  private current: number;

  constructor(iso: string = START) {
    this.current = Date.parse(iso);
  }

  public readonly now = (): Date => new Date(this.current);

  public advance(ms: number): void {
    this.current += ms;
  }
}

/** Store holding the example supplier, budget, rules and approvers. */
export function exampleStore(): InMemoryEngineStore {
  return new InMemoryEngineStore({
    suppliers: [exampleSupplier],
    budgets: [exampleBudget],
    approvalRules: exampleApprovalRules,
    approvers: exampleApprovers,
  });
}

export interface TestEngine extends ProcurementEngine {
  store: InMemoryEngineStore;
  clock: ManualClock;
}

export function exampleEngine(
  store: InMemoryEngineStore = exampleStore(),
  config: EngineConfig = defaultEngineConfig,
): TestEngine {
  const clock = new ManualClock();
  return { ...createEngine(store, config, clock.now), store, clock };
}

export function submission(
  overrides: Partial<PurchaseOrderSubmission> = {},
): PurchaseOrderSubmission {
  return {
    departmentId: 'IT',
    supplierId: 'SUP001',
    amount: 4200,
    items: [{ description: 'Standing desk', quantity: 6, unitPrice: 700 }],
    ...overrides,
  };
}

/** Resolves with the rejection reason; fails when the promise resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
}
