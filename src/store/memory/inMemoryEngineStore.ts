import type {
  ApprovalRule,
  Approver,
  Budget,
  BudgetReservation,
  PurchaseOrder,
  PurchaseOrderState,
  Supplier,
} from '../../procurement/index.js';
import {
  ConcurrentModificationError,
  KeyedSequencer,
  NotFoundError,
} from '../../procurement/index.js';
import type {
  EngineStore,
  LedgerStore,
  LedgerTransaction,
  PolicyRepository,
  PurchaseOrderRepository,
  SupplierRepository,
} from '../types.js';
import type { EngineSeed } from '../seed.js';

const clone = <T>(value: T): T => structuredClone(value);

/**
 * Process-local store. Reads hand out copies, so nothing outside the store
 * can change a row without going through it. Ledger units stage their
 * writes and apply them only when the unit's work resolves.
 */
export class InMemoryEngineStore implements EngineStore {
  private readonly supplierRows = new Map<string, Supplier>();
  private readonly budgetRows = new Map<string, Budget>();
  private readonly ruleRows = new Map<number, ApprovalRule>();
  private readonly approverRows = new Map<string, Approver>();
  private readonly reservationRows = new Map<string, BudgetReservation>();
  private readonly poRows = new Map<string, PurchaseOrder>();
  private readonly departmentSequencer = new KeyedSequencer();

  public readonly policies: PolicyRepository;
  public readonly suppliers: SupplierRepository;
  public readonly ledger: LedgerStore;
  public readonly purchaseOrders: PurchaseOrderRepository;

  constructor(seed?: EngineSeed) {
    if (seed) {
      seed.suppliers.forEach((row) => this.upsertSupplier(row));
      seed.budgets.forEach((row) => this.upsertBudget(row));
      seed.approvalRules.forEach((row) => this.upsertRule(row));
      seed.approvers.forEach((row) => this.upsertApprover(row));
    }

    this.policies = {
      listRules: async () =>
        [...this.ruleRows.values()]
          .sort((a, b) => a.maxAmount - b.maxAmount || a.id - b.id)
          .map(clone),
      listApprovers: async () => [...this.approverRows.values()].map(clone),
      findApprover: async (role) => {
        const row = this.approverRows.get(role);
        return row ? clone(row) : null;
      },
    };

    this.suppliers = {
      findById: async (supplierId) => {
        const row = this.supplierRows.get(supplierId);
        return row ? clone(row) : null;
      },
      listAll: async () => [...this.supplierRows.values()].map(clone),
    };

    this.ledger = {
      getBudget: async (departmentId) => {
        const row = this.budgetRows.get(departmentId);
        return row ? clone(row) : null;
      },
      listBudgets: async () => [...this.budgetRows.values()].map(clone),
      findReservation: async (reservationId) => {
        const row = this.reservationRows.get(reservationId);
        return row ? clone(row) : null;
      },
      listReservationsForPo: async (poId) =>
        [...this.reservationRows.values()]
          .filter((row) => row.poId === poId)
          .map(clone),
      withDepartment: (departmentId, work) =>
        this.departmentSequencer.run(departmentId, () =>
          this.runLedgerUnit(work),
        ),
    };

    this.purchaseOrders = {
      findById: async (poId) => {
        const row = this.poRows.get(poId);
        return row ? clone(row) : null;
      },
      save: async (po, expectedVersion) => {
        const current = this.poRows.get(po.poId);
        const currentVersion = current?.version ?? 0;
        if (currentVersion !== expectedVersion) {
          throw new ConcurrentModificationError('Purchase order', po.poId);
        }
        const stored: PurchaseOrder = { ...clone(po), version: expectedVersion + 1 };
        this.poRows.set(po.poId, stored);
        return clone(stored);
      },
      listByState: async (state: PurchaseOrderState) =>
        [...this.poRows.values()]
          .filter((row) => row.state === state)
          .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
          .map(clone),
    };
  }

  // Entry points for the bulk-import collaborator (and tests) to add or
  // change reference rows between engine reads.

  public upsertSupplier(supplier: Supplier): void {
    this.supplierRows.set(supplier.supplierId, clone(supplier));
  }

  public upsertBudget(budget: Budget): void {
    this.budgetRows.set(budget.departmentId, clone(budget));
  }

  public upsertRule(rule: ApprovalRule): void {
    this.ruleRows.set(rule.id, clone(rule));
  }

  public upsertApprover(approver: Approver): void {
    this.approverRows.set(approver.role, clone(approver));
  }

  public async close(): Promise<void> {
    // Nothing to release.
  }

  private async runLedgerUnit<T>(
    work: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T> {
    const stagedBudgets = new Map<string, Budget>();
    const stagedReservations = new Map<string, BudgetReservation>();

    const tx: LedgerTransaction = {
      lockBudget: async (departmentId) => {
        const staged = stagedBudgets.get(departmentId);
        if (staged) {
          return clone(staged);
        }
        const row = this.budgetRows.get(departmentId);
        return row ? clone(row) : null;
      },
      updateBalances: async (departmentId, balances) => {
        const base = stagedBudgets.get(departmentId) ?? this.budgetRows.get(departmentId);
        if (!base) {
          throw new NotFoundError('Budget for department', departmentId);
        }
        stagedBudgets.set(departmentId, {
          ...clone(base),
          reserved: balances.reserved,
          spent: balances.spent,
        });
      },
      insertReservation: async (reservation) => {
        stagedReservations.set(reservation.reservationId, clone(reservation));
      },
      lockReservation: async (reservationId) => {
        const row =
          stagedReservations.get(reservationId) ??
          this.reservationRows.get(reservationId);
        return row ? clone(row) : null;
      },
      updateReservation: async (reservation) => {
        stagedReservations.set(reservation.reservationId, clone(reservation));
      },
    };

    const result = await work(tx);

    for (const [departmentId, budget] of stagedBudgets) {
      this.budgetRows.set(departmentId, budget);
    }
    for (const [reservationId, reservation] of stagedReservations) {
      this.reservationRows.set(reservationId, reservation);
    }

    return result;
  }
}
