import { z } from "zod";

const poId = z.string().trim().min(1);

export const submitPoPayloadSchema = z.object({
  intent: z.literal("submit_po"),
  /** Validated by the orchestrator. */
  purchaseOrder: z.unknown(),
});

export const approverActionPayloadSchema = z.object({
  intent: z.literal("approver_action"),
  poId,
  role: z.string().trim().min(1),
  decision: z.enum(["approve", "reject"]),
  comment: z.string().optional(),
  actor: z.string().optional(),
});

export const cancelPoPayloadSchema = z.object({
  intent: z.literal("cancel_po"),
  poId,
  reason: z.string().optional(),
});

export const retryReservationPayloadSchema = z.object({
  intent: z.literal("retry_reservation"),
  poId,
});

export const poStatusPayloadSchema = z.object({
  intent: z.literal("po_status"),
  poId,
});

export const escalateApproversPayloadSchema = z.object({
  intent: z.literal("escalate_approvers"),
  poId,
});

export const listPendingPayloadSchema = z.object({
  intent: z.literal("list_pending"),
  role: z.string().trim().min(1),
});

export const budgetSummaryPayloadSchema = z.object({
  intent: z.literal("budget_summary"),
  departmentId: z.string().trim().min(1),
});

export const listSuppliersPayloadSchema = z.object({
  intent: z.literal("list_suppliers"),
  category: z.string().trim().min(1).optional(),
});

export const procurementPayloadSchema = z.discriminatedUnion("intent", [
  submitPoPayloadSchema,
  approverActionPayloadSchema,
  cancelPoPayloadSchema,
  retryReservationPayloadSchema,
  poStatusPayloadSchema,
  escalateApproversPayloadSchema,
  listPendingPayloadSchema,
  budgetSummaryPayloadSchema,
  listSuppliersPayloadSchema,
]);

export const procurementMetadataSchema = z.object({
  procurementPayload: procurementPayloadSchema,
});

export type ProcurementPayload = z.infer<typeof procurementPayloadSchema>;
export type ProcurementIntent = ProcurementPayload["intent"];
export type ProcurementMetadataEnvelope = z.infer<typeof procurementMetadataSchema>;

export type SubmitPoPayload = z.infer<typeof submitPoPayloadSchema>;
export type ApproverActionPayload = z.infer<typeof approverActionPayloadSchema>;
export type CancelPoPayload = z.infer<typeof cancelPoPayloadSchema>;
export type ListPendingPayload = z.infer<typeof listPendingPayloadSchema>;

/** What a handler hands back: the readable reply and the task metadata. */
export interface IntentOutcome {
  text: string;
  metadata: Record<string, unknown>;
}
