import pg from 'pg';
import type { Pool, PoolClient } from 'pg';

import {
  ConcurrentModificationError,
  createLogger,
} from '../../procurement/index.js';
import type { PurchaseOrder, PurchaseOrderState } from '../../procurement/index.js';
import type {
  EngineStore,
  LedgerStore,
  LedgerTransaction,
  PolicyRepository,
  PurchaseOrderRepository,
  SupplierRepository,
} from '../types.js';
import {
  mapApprovalRuleRow,
  mapApproverRow,
  mapBudgetRow,
  mapPurchaseOrderRow,
  mapReservationRow,
  mapSupplierRow,
  type ApprovalRuleRow,
  type ApproverRow,
  type BudgetRow,
  type PurchaseOrderRow,
  type ReservationRow,
  type SupplierRow,
} from './rowMappers.js';

const log = createLogger('PgEngineStore');

export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      log.error('Rollback failed', rollbackErr);
    }
    throw err;
  } finally {
    client.release();
  }
}

function createLedgerTransaction(client: PoolClient): LedgerTransaction {
  return {
    async lockBudget(departmentId) {
      const res = await client.query<BudgetRow>(
        `SELECT * FROM budgets WHERE department_id = $1 FOR UPDATE`,
        [departmentId],
      );
      return res.rows[0] ? mapBudgetRow(res.rows[0]) : null;
    },
    async updateBalances(departmentId, balances) {
      await client.query(
        `UPDATE budgets
            SET reserved = $2, spent = $3, updated_at = now()
          WHERE department_id = $1`,
        [departmentId, balances.reserved, balances.spent],
      );
    },
    async insertReservation(reservation) {
      await client.query(
        `INSERT INTO budget_reservations (id, po_id, department_id, amount, status, created_at)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          reservation.reservationId,
          reservation.poId,
          reservation.departmentId,
          reservation.amount,
          reservation.status,
          reservation.createdAt,
        ],
      );
    },
    async lockReservation(reservationId) {
      const res = await client.query<ReservationRow>(
        `SELECT * FROM budget_reservations WHERE id = $1 FOR UPDATE`,
        [reservationId],
      );
      return res.rows[0] ? mapReservationRow(res.rows[0]) : null;
    },
    async updateReservation(reservation) {
      await client.query(
        `UPDATE budget_reservations SET status = $2, settled_at = $3 WHERE id = $1`,
        [reservation.reservationId, reservation.status, reservation.settledAt ?? null],
      );
    },
  };
}

/**
 * PostgreSQL-backed store. Ledger units lock the department's budget row
 * (and then the reservation row) with SELECT ... FOR UPDATE, so units on
 * the same department serialize inside the database and units on other
 * departments never wait on each other.
 */
export class PgEngineStore implements EngineStore {
  public readonly policies: PolicyRepository;
  public readonly suppliers: SupplierRepository;
  public readonly ledger: LedgerStore;
  public readonly purchaseOrders: PurchaseOrderRepository;

  constructor(private readonly pool: Pool) {
    this.policies = {
      listRules: async () => {
        const res = await pool.query<ApprovalRuleRow>(
          `SELECT * FROM approval_matrix ORDER BY max_amount ASC, id ASC`,
        );
        return res.rows.map(mapApprovalRuleRow);
      },
      listApprovers: async () => {
        const res = await pool.query<ApproverRow>(`SELECT * FROM approvers`);
        return res.rows.map(mapApproverRow);
      },
      findApprover: async (role) => {
        const res = await pool.query<ApproverRow>(
          `SELECT * FROM approvers WHERE approver_role = $1`,
          [role],
        );
        return res.rows[0] ? mapApproverRow(res.rows[0]) : null;
      },
    };

    this.suppliers = {
      findById: async (supplierId) => {
        const res = await pool.query<SupplierRow>(
          `SELECT * FROM suppliers WHERE supplier_id = $1`,
          [supplierId],
        );
        return res.rows[0] ? mapSupplierRow(res.rows[0]) : null;
      },
      listAll: async () => {
        const res = await pool.query<SupplierRow>(
          `SELECT * FROM suppliers ORDER BY supplier_id ASC`,
        );
        return res.rows.map(mapSupplierRow);
      },
    };

    this.ledger = {
      getBudget: async (departmentId) => {
        const res = await pool.query<BudgetRow>(
          `SELECT * FROM budgets WHERE department_id = $1`,
          [departmentId],
        );
        return res.rows[0] ? mapBudgetRow(res.rows[0]) : null;
      },
      listBudgets: async () => {
        const res = await pool.query<BudgetRow>(
          `SELECT * FROM budgets ORDER BY department_id ASC`,
        );
        return res.rows.map(mapBudgetRow);
      },
      findReservation: async (reservationId) => {
        const res = await pool.query<ReservationRow>(
          `SELECT * FROM budget_reservations WHERE id = $1`,
          [reservationId],
        );
        return res.rows[0] ? mapReservationRow(res.rows[0]) : null;
      },
      listReservationsForPo: async (poId) => {
        const res = await pool.query<ReservationRow>(
          `SELECT * FROM budget_reservations WHERE po_id = $1 ORDER BY created_at ASC`,
          [poId],
        );
        return res.rows.map(mapReservationRow);
      },
      withDepartment: (_departmentId, work) =>
        withTransaction(pool, (client) => work(createLedgerTransaction(client))),
    };

    this.purchaseOrders = {
      findById: async (poId) => {
        const res = await pool.query<PurchaseOrderRow>(
          `SELECT * FROM purchase_orders WHERE po_id = $1`,
          [poId],
        );
        return res.rows[0] ? mapPurchaseOrderRow(res.rows[0]) : null;
      },
      save: (po, expectedVersion) => this.savePurchaseOrder(po, expectedVersion),
      listByState: async (state: PurchaseOrderState) => {
        const res = await pool.query<PurchaseOrderRow>(
          `SELECT * FROM purchase_orders WHERE state = $1 ORDER BY created_at ASC`,
          [state],
        );
        return res.rows.map(mapPurchaseOrderRow);
      },
    };
  }

  public static fromConnectionString(connectionString: string): PgEngineStore {
    return new PgEngineStore(new pg.Pool({ connectionString }));
  }

  public async close(): Promise<void> {
    await this.pool.end();
  }

  private async savePurchaseOrder(
    po: PurchaseOrder,
    expectedVersion: number,
  ): Promise<PurchaseOrder> {
    const nextVersion = expectedVersion + 1;
    const values = [
      po.poId,
      po.departmentId,
      po.supplierId,
      po.amount,
      JSON.stringify(po.items),
      po.requestedBy ?? null,
      po.description ?? null,
      po.state,
      po.routing ? JSON.stringify(po.routing) : null,
      po.reservationId ?? null,
      JSON.stringify(po.actions),
      JSON.stringify(po.history),
      nextVersion,
      po.createdAt,
      po.updatedAt,
    ];

    if (expectedVersion === 0) {
      const res = await this.pool.query<PurchaseOrderRow>(
        `INSERT INTO purchase_orders (
            po_id, department_id, supplier_id, amount, items, requested_by, description,
            state, routing, reservation_id, actions, history, version, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
         ON CONFLICT (po_id) DO NOTHING
         RETURNING *`,
        values,
      );
      if (!res.rows[0]) {
        throw new ConcurrentModificationError('Purchase order', po.poId);
      }
      return mapPurchaseOrderRow(res.rows[0]);
    }

    const res = await this.pool.query<PurchaseOrderRow>(
      `UPDATE purchase_orders
          SET department_id = $2, supplier_id = $3, amount = $4, items = $5,
              requested_by = $6, description = $7, state = $8, routing = $9,
              reservation_id = $10, actions = $11, history = $12, version = $13,
              created_at = $14, updated_at = $15
        WHERE po_id = $1 AND version = $16
        RETURNING *`,
      [...values, expectedVersion],
    );
    if (!res.rows[0]) {
      throw new ConcurrentModificationError('Purchase order', po.poId);
    }
    return mapPurchaseOrderRow(res.rows[0]);
  }
}
