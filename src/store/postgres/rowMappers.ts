import type {
  ApprovalRule,
  Approver,
  ApproverAction,
  Budget,
  BudgetReservation,
  LineItem,
  PurchaseOrder,
  PurchaseOrderState,
  ReservationStatus,
  RiskScore,
  RoutingDecision,
  StateHistoryEntry,
  Supplier,
  SupplierStatus,
} from '../../procurement/index.js';

// NUMERIC columns arrive as strings, TIMESTAMPTZ as Date, JSONB parsed.

export type SupplierRow = {
  supplier_id: string;
  name: string;
  status: SupplierStatus;
  rating: string;
  payment_terms: string | null;
  categories: string[];
  risk_score: RiskScore;
  max_order_value: string;
  contact_email: string | null;
};

export type BudgetRow = {
  department_id: string;
  name: string;
  allocated: string;
  spent: string;
  reserved: string;
  fiscal_year: number;
  manager_email: string | null;
};

export type ApprovalRuleRow = {
  id: number;
  max_amount: string;
  required_approvers: string[];
  auto_approve: boolean;
  description: string | null;
  active: boolean;
  expires_at: Date | null;
};

export type ApproverRow = {
  approver_role: string;
  name: string;
  email: string;
  department: string | null;
  active: boolean;
};

export type ReservationRow = {
  id: string;
  po_id: string;
  department_id: string;
  amount: string;
  status: ReservationStatus;
  created_at: Date;
  settled_at: Date | null;
};

export type PurchaseOrderRow = {
  po_id: string;
  department_id: string;
  supplier_id: string;
  amount: string;
  items: LineItem[];
  requested_by: string | null;
  description: string | null;
  state: PurchaseOrderState;
  routing: RoutingDecision | null;
  reservation_id: string | null;
  actions: ApproverAction[];
  history: StateHistoryEntry[];
  version: number;
  created_at: Date;
  updated_at: Date;
};

export function mapSupplierRow(row: SupplierRow): Supplier {
  return {
    supplierId: row.supplier_id,
    name: row.name,
    status: row.status,
    rating: Number(row.rating),
    riskScore: row.risk_score,
    maxOrderValue: Number(row.max_order_value),
    categories: row.categories ?? [],
    paymentTerms: row.payment_terms ?? undefined,
    contactEmail: row.contact_email ?? undefined,
  };
}

export function mapBudgetRow(row: BudgetRow): Budget {
  return {
    departmentId: row.department_id,
    name: row.name,
    allocated: Number(row.allocated),
    spent: Number(row.spent),
    reserved: Number(row.reserved),
    fiscalYear: row.fiscal_year,
    managerEmail: row.manager_email ?? undefined,
  };
}

export function mapApprovalRuleRow(row: ApprovalRuleRow): ApprovalRule {
  return {
    id: row.id,
    maxAmount: Number(row.max_amount),
    requiredApprovers: row.required_approvers ?? [],
    autoApprove: row.auto_approve,
    active: row.active,
    description: row.description ?? undefined,
    expiresAt: row.expires_at ? row.expires_at.toISOString() : undefined,
  };
}

export function mapApproverRow(row: ApproverRow): Approver {
  return {
    role: row.approver_role,
    name: row.name,
    email: row.email,
    department: row.department ?? undefined,
    active: row.active,
  };
}

export function mapReservationRow(row: ReservationRow): BudgetReservation {
  return {
    reservationId: row.id,
    poId: row.po_id,
    departmentId: row.department_id,
    amount: Number(row.amount),
    status: row.status,
    createdAt: row.created_at.toISOString(),
    settledAt: row.settled_at ? row.settled_at.toISOString() : undefined,
  };
}

export function mapPurchaseOrderRow(row: PurchaseOrderRow): PurchaseOrder {
  return {
    poId: row.po_id,
    departmentId: row.department_id,
    supplierId: row.supplier_id,
    amount: Number(row.amount),
    items: row.items,
    requestedBy: row.requested_by ?? undefined,
    description: row.description ?? undefined,
    state: row.state,
    routing: row.routing ?? undefined,
    reservationId: row.reservation_id ?? undefined,
    actions: row.actions,
    history: row.history,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    version: row.version,
  };
}
