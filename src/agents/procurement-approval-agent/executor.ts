import { v4 as uuidv4 } from "uuid";

import type { Message, Task, TaskStatusUpdateEvent } from "@a2a-js/sdk";
import type {
  AgentExecutor,
  ExecutionEventBus,
  RequestContext,
} from "@a2a-js/sdk/server";

import type { ActionOutcome, ProcurementEngine } from "../../engine/index.js";
import type {
  BudgetSummary,
  PurchaseOrder,
  Supplier,
} from "../../procurement/index.js";
import {
  EngineError,
  createLogger,
  formatMoney,
} from "../../procurement/index.js";

import {
  procurementMetadataSchema,
  type IntentOutcome,
  type ProcurementPayload,
} from "./types.js";

const log = createLogger("ProcurementApprovalAgent");

function timestamp(): string {
  return new Date().toISOString();
}

export class ProcurementApprovalAgentExecutor implements AgentExecutor {
  constructor(private readonly engine: ProcurementEngine) {}

  public async execute(
    requestContext: RequestContext,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    const { userMessage, task: existingTask, taskId, contextId } =
      requestContext;

    const parsed = procurementMetadataSchema.safeParse(
      userMessage.metadata ?? {},
    );
    if (!parsed.success) {
      log.error(
        `Task ${taskId} has no usable metadata.procurementPayload.`,
        parsed.error.flatten().fieldErrors,
      );
      this.publishTaskStatus(
        taskId,
        contextId,
        eventBus,
        "failed",
        "Procurement Approval Agent requires metadata.procurementPayload with a supported intent.",
      );
      return;
    }

    const payload = parsed.data.procurementPayload;
    const task =
      existingTask ?? this.createInitialTask(taskId, contextId, userMessage);

    try {
      const outcome = await this.handle(payload);
      task.metadata = {
        ...(task.metadata ?? {}),
        intent: payload.intent,
        ...outcome.metadata,
      };
      eventBus.publish(task);
      this.publishTaskStatus(taskId, contextId, eventBus, "completed", outcome.text);
      log.debug(`Task ${taskId} (${payload.intent}) completed.`);
    } catch (err) {
      if (!(err instanceof EngineError)) {
        log.error(`Unexpected failure handling ${payload.intent}`, err);
        this.publishTaskStatus(
          taskId,
          contextId,
          eventBus,
          "failed",
          `Unexpected error while handling '${payload.intent}'. Please try again.`,
        );
        return;
      }

      log.info(`${payload.intent} failed: ${err.message}`);
      task.metadata = {
        ...(task.metadata ?? {}),
        intent: payload.intent,
        error: err.toJSON(),
      };
      eventBus.publish(task);
      this.publishTaskStatus(taskId, contextId, eventBus, "failed", err.message);
    }
  }

  public async cancelTask(
    taskId: string,
    eventBus: ExecutionEventBus,
  ): Promise<void> {
    const update: TaskStatusUpdateEvent = {
      kind: "status-update",
      taskId,
      contextId: `procurement-approval-${taskId}`,
      status: {
        state: "canceled",
        timestamp: timestamp(),
      },
      final: true,
    };
    eventBus.publish(update);
    eventBus.finished();
  }

  private async handle(payload: ProcurementPayload): Promise<IntentOutcome> {
    const { orchestrator, ledger, suppliers } = this.engine;
    const currency = this.engine.config.currency;

    switch (payload.intent) {
      case "submit_po": {
        const purchaseOrder = await orchestrator.submit(payload.purchaseOrder);
        return {
          text: describePurchaseOrder(purchaseOrder, currency),
          metadata: { purchaseOrder },
        };
      }
      case "approver_action": {
        const { outcome, purchaseOrder } = await orchestrator.recordAction({
          poId: payload.poId,
          role: payload.role,
          decision: payload.decision,
          comment: payload.comment,
          actor: payload.actor,
        });
        return {
          text: describeAction(
            payload.role,
            payload.decision,
            outcome,
            purchaseOrder,
            currency,
          ),
          metadata: { outcome, purchaseOrder },
        };
      }
      case "cancel_po": {
        const purchaseOrder = await orchestrator.cancel(
          payload.poId,
          payload.reason,
        );
        return {
          text: `Cancelled ${purchaseOrder.poId}; any reserved budget has been released.`,
          metadata: { purchaseOrder },
        };
      }
      case "retry_reservation": {
        const { outcome, purchaseOrder } = await orchestrator.retryReservation(
          payload.poId,
        );
        return {
          text:
            outcome === "unchanged"
              ? `${purchaseOrder.poId} is still waiting for budget.`
              : describePurchaseOrder(purchaseOrder, currency),
          metadata: { outcome, purchaseOrder },
        };
      }
      case "po_status": {
        const purchaseOrder = await orchestrator.getPurchaseOrder(payload.poId);
        return {
          text: describePurchaseOrder(purchaseOrder, currency),
          metadata: { purchaseOrder },
        };
      }
      case "escalate_approvers": {
        const { outcome, replacedRoles, purchaseOrder } =
          await orchestrator.escalateInactiveApprovers(payload.poId);
        return {
          text:
            outcome === "unchanged"
              ? `Every outstanding approver on ${purchaseOrder.poId} is active.`
              : `Escalated ${replacedRoles.join(", ")} on ${purchaseOrder.poId}. ${describePurchaseOrder(
                  purchaseOrder,
                  currency,
                )}`,
          metadata: { outcome, replacedRoles, purchaseOrder },
        };
      }
      case "list_pending": {
        const pendingItems = await orchestrator.listAwaitingRole(payload.role);
        return {
          text: buildPendingSummary(payload.role, pendingItems, currency),
          metadata: { pendingItems },
        };
      }
      case "budget_summary": {
        const budgetSummary = await ledger.getSummary(payload.departmentId);
        return {
          text: describeBudget(budgetSummary, currency),
          metadata: { budgetSummary },
        };
      }
      case "list_suppliers": {
        const approvedSuppliers = await suppliers.listApproved(payload.category);
        return {
          text: buildSupplierList(approvedSuppliers, payload.category),
          metadata: { suppliers: approvedSuppliers },
        };
      }
    }
  }

  private createInitialTask(
    taskId: string,
    contextId: string,
    userMessage: Message,
  ): Task {
    return {
      kind: "task",
      id: taskId,
      contextId,
      status: {
        state: "submitted",
        timestamp: timestamp(),
      },
      history: [userMessage],
      metadata: {},
    };
  }

  private publishTaskStatus(
    taskId: string,
    contextId: string,
    eventBus: ExecutionEventBus,
    state: TaskStatusUpdateEvent["status"]["state"],
    text: string,
  ): void {
    const agentMessage: Message = {
      kind: "message",
      role: "agent",
      messageId: uuidv4(),
      parts: [{ kind: "text", text }],
      taskId,
      contextId,
    };

    const update: TaskStatusUpdateEvent = {
      kind: "status-update",
      taskId,
      contextId,
      status: {
        state,
        message: agentMessage,
        timestamp: timestamp(),
      },
      final: true,
    };

    eventBus.publish(update);
    eventBus.finished();
  }
}

export function describePurchaseOrder(
  po: PurchaseOrder,
  currency: string,
): string {
  const amount = formatMoney(po.amount, currency);
  switch (po.state) {
    case "awaiting_approval": {
      const roles = po.routing?.kind === "requires" ? po.routing.roles : [];
      const approved = new Set(
        po.actions.filter((a) => a.decision === "approve").map((a) => a.role),
      );
      const outstanding = roles.filter((role) => !approved.has(role));
      return `${po.poId} (${amount}) is awaiting approval from ${outstanding.join(", ")}.`;
    }
    case "pending_budget":
      return `${po.poId} (${amount}) is waiting for budget in ${po.departmentId}.`;
    case "blocked": {
      const reasons = po.routing?.reasons.map((r) => r.message).join(" ") ?? "";
      return `${po.poId} (${amount}) is blocked. ${reasons}`.trim();
    }
    case "consumed":
      return `${po.poId} (${amount}) is approved and committed against ${po.departmentId}.`;
    case "released":
      return `${po.poId} (${amount}) is closed and its budget released.`;
    default:
      return `${po.poId} (${amount}) is ${po.state}.`;
  }
}

function describeAction(
  role: string,
  decision: "approve" | "reject",
  outcome: ActionOutcome,
  po: PurchaseOrder,
  currency: string,
): string {
  switch (outcome) {
    case "unchanged":
      return `${role} had already approved ${po.poId}; nothing changed.`;
    case "rejected":
      return `Recorded ${role} rejection for ${po.poId}. ${describePurchaseOrder(po, currency)}`;
    default:
      return `Recorded ${role} ${decision === "approve" ? "approval" : "rejection"} for ${
        po.poId
      }. ${describePurchaseOrder(po, currency)}`;
  }
}

function buildPendingSummary(
  role: string,
  items: PurchaseOrder[],
  currency: string,
): string {
  if (items.length === 0) {
    return `You have no pending purchase orders for ${role} approval.`;
  }

  const header = `You have ${items.length} pending purchase order${
    items.length === 1 ? "" : "s"
  }:`;
  const lines = items.map((po, index) => {
    const summaryText = truncateText(po.description ?? po.items[0]?.description ?? "");
    return `${index + 1}. ${po.poId} – ${po.supplierId} – ${formatMoney(
      po.amount,
      currency,
    )} – ${summaryText}`;
  });

  return [header, ...lines].join("\n");
}

function describeBudget(summary: BudgetSummary, currency: string): string {
  return (
    `${summary.department} (${summary.departmentId}, FY${summary.fiscalYear}): ` +
    `${formatMoney(summary.available, currency)} available of ${formatMoney(
      summary.allocated,
      currency,
    )}; ${formatMoney(summary.spent, currency)} spent, ${formatMoney(
      summary.reserved,
      currency,
    )} reserved (${summary.utilizationPercent}% utilised).`
  );
}

function buildSupplierList(suppliers: Supplier[], category?: string): string {
  const scope = category ? ` for '${category}'` : "";
  if (suppliers.length === 0) {
    return `No approved suppliers${scope}.`;
  }
  const lines = suppliers.map(
    (s, index) => `${index + 1}. ${s.supplierId} – ${s.name} – rating ${s.rating}, ${s.riskScore} risk`,
  );
  return [`${suppliers.length} approved supplier(s)${scope}:`, ...lines].join("\n");
}

function truncateText(text: string, maxLength = 120): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 3)}...`;
}
