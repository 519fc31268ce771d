// src/procurement/domain.ts
// Shared procurement domain types used by the engine, the stores and the agent.

export type SupplierStatus = 'approved' | 'pending' | 'suspended';

export type RiskScore = 'low' | 'medium' | 'high';

export interface Supplier {
  supplierId: string;
  name: string;
  status: SupplierStatus;
  /** 0 to 5. */
  rating: number;
  riskScore: RiskScore;
  /** Largest single order this supplier may receive. */
  maxOrderValue: number;
  categories: string[];
  paymentTerms?: string;
  contactEmail?: string;
}

/** Departmental budget for one fiscal year. */
export interface Budget {
  departmentId: string;
  name: string;
  allocated: number;
  spent: number;
  reserved: number;
  fiscalYear: number;
  managerEmail?: string;
}

/** One amount bracket of the approval matrix. */
export interface ApprovalRule {
  id: number;
  /** Upper bound (inclusive) of the amount bracket. */
  maxAmount: number;
  /** Roles in the order they are listed on the matrix. */
  requiredApprovers: string[];
  autoApprove: boolean;
  active: boolean;
  description?: string;
  /** ISO timestamp after which the rule no longer applies. */
  expiresAt?: string;
}

export interface Approver {
  /** Role key, e.g. "finance_manager". */
  role: string;
  name: string;
  email: string;
  department?: string;
  active: boolean;
}

export type ReservationStatus = 'active' | 'released' | 'consumed';

export interface BudgetReservation {
  reservationId: string;
  poId: string;
  departmentId: string;
  amount: number;
  status: ReservationStatus;
  createdAt: string;
  /** Set when the reservation is released or consumed. */
  settledAt?: string;
}

export type PurchaseOrderState =
  | 'draft'
  | 'routed'
  | 'blocked'
  | 'pending_budget'
  | 'reserved'
  | 'awaiting_approval'
  | 'approved'
  | 'rejected'
  | 'consumed'
  | 'released';

export interface DecisionReason {
  code: string;
  message: string;
}

export type RoutingDecision =
  | {
      kind: 'blocked';
      reasons: DecisionReason[];
      evaluatedAt: string;
    }
  | {
      kind: 'auto_approved';
      ruleId: number;
      reasons: DecisionReason[];
      evaluatedAt: string;
    }
  | {
      kind: 'requires';
      /** Ordered, de-duplicated roles that must each approve. */
      roles: string[];
      /** Rule that produced the list; absent when no bracket matched. */
      ruleId?: number;
      /** True when the roles come from the fallback or escalation config. */
      escalated: boolean;
      reasons: DecisionReason[];
      evaluatedAt: string;
    };

export type ApproverDecision = 'approve' | 'reject';

export interface ApproverAction {
  role: string;
  decision: ApproverDecision;
  actedAt: string;
  /** Who acted on behalf of the role, when the caller tells us. */
  actor?: string;
  comment?: string;
}

export interface LineItem {
  description: string;
  quantity: number;
  unitPrice: number;
}

export interface StateHistoryEntry {
  state: PurchaseOrderState;
  at: string;
  note: string;
}

/** Core data that represents a purchase order moving through approval. */
export interface PurchaseOrder {
  /** e.g. PO-2026-1A2B3C4D. */
  poId: string;
  departmentId: string;
  supplierId: string;
  amount: number;
  items: LineItem[];
  requestedBy?: string;
  description?: string;
  state: PurchaseOrderState;
  /** Routing decision the PO currently carries. */
  routing?: RoutingDecision;
  reservationId?: string;
  actions: ApproverAction[];
  history: StateHistoryEntry[];
  createdAt: string;
  updatedAt: string;
  /** Bumped on every save; persisted stores use it for optimistic checks. */
  version: number;
}

export interface BudgetSummary {
  departmentId: string;
  department: string;
  allocated: number;
  spent: number;
  reserved: number;
  available: number;
  utilizationPercent: number;
  fiscalYear: number;
}

/** What a requester hands in; `poId` is generated when absent. */
export interface PurchaseOrderSubmission {
  poId?: string;
  departmentId: string;
  supplierId: string;
  amount: number;
  items: LineItem[];
  requestedBy?: string;
  description?: string;
}
