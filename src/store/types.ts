import type {
  ApprovalRule,
  Approver,
  Budget,
  BudgetReservation,
  PurchaseOrder,
  PurchaseOrderState,
  Supplier,
} from '../procurement/index.js';

export interface PolicyRepository {
  /** Every rule, active or not, ordered by maxAmount ascending. */
  listRules(): Promise<ApprovalRule[]>;
  listApprovers(): Promise<Approver[]>;
  findApprover(role: string): Promise<Approver | null>;
}

export interface SupplierRepository {
  findById(supplierId: string): Promise<Supplier | null>;
  listAll(): Promise<Supplier[]>;
}

/**
 * Operations available inside one atomic ledger unit. Everything written
 * through a transaction becomes visible together, or not at all.
 */
export interface LedgerTransaction {
  /** Reads the budget row and holds it until the unit ends. */
  lockBudget(departmentId: string): Promise<Budget | null>;
  updateBalances(
    departmentId: string,
    balances: Pick<Budget, 'reserved' | 'spent'>,
  ): Promise<void>;
  insertReservation(reservation: BudgetReservation): Promise<void>;
  lockReservation(reservationId: string): Promise<BudgetReservation | null>;
  updateReservation(reservation: BudgetReservation): Promise<void>;
}

export interface LedgerStore {
  getBudget(departmentId: string): Promise<Budget | null>;
  listBudgets(): Promise<Budget[]>;
  findReservation(reservationId: string): Promise<BudgetReservation | null>;
  listReservationsForPo(poId: string): Promise<BudgetReservation[]>;
  /**
   * Runs `work` as one atomic unit serialized against other units for the
   * same department. A thrown error rolls every write back.
   */
  withDepartment<T>(
    departmentId: string,
    work: (tx: LedgerTransaction) => Promise<T>,
  ): Promise<T>;
}

export interface PurchaseOrderRepository {
  findById(poId: string): Promise<PurchaseOrder | null>;
  /**
   * Inserts when `expectedVersion` is 0, otherwise updates only if the
   * stored version still matches. Returns the PO with its new version.
   */
  save(po: PurchaseOrder, expectedVersion: number): Promise<PurchaseOrder>;
  listByState(state: PurchaseOrderState): Promise<PurchaseOrder[]>;
}

export interface EngineStore {
  policies: PolicyRepository;
  suppliers: SupplierRepository;
  ledger: LedgerStore;
  purchaseOrders: PurchaseOrderRepository;
  close(): Promise<void>;
}
