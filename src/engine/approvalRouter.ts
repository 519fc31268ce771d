import type {
  DecisionReason,
  EngineConfig,
  PurchaseOrder,
  RoutingDecision,
  Supplier,
} from '../procurement/index.js';
import { createLogger, formatMoney } from '../procurement/index.js';
import type { PolicyStore } from './policyStore.js';
import { exceedsOrderLimit, type SupplierRegistry } from './supplierRegistry.js';

const log = createLogger('ApprovalRouter');

export type RoutablePurchaseOrder = Pick<PurchaseOrder, 'poId' | 'supplierId' | 'amount'>;

/** Keeps the first occurrence of each role, trimmed, in order. */
export function dedupeRoles(roles: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of roles) {
    const role = raw.trim();
    if (role && !seen.has(role)) {
      seen.add(role);
      result.push(role);
    }
  }
  return result;
}

/**
 * Turns a PO into a routing decision from the current policy and supplier
 * data. Reads only; calling it twice on unchanged data gives the same
 * decision apart from `evaluatedAt`.
 */
export class ApprovalRouter {
  constructor(
    private readonly policies: PolicyStore,
    private readonly suppliers: SupplierRegistry,
    private readonly config: EngineConfig,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  public async route(po: RoutablePurchaseOrder): Promise<RoutingDecision> {
    const evaluatedAt = this.clock().toISOString();
    const supplier = await this.suppliers.getSupplier(po.supplierId);
    const amountText = formatMoney(po.amount, this.config.currency);

    // 1. Hard stops, independent of the amount bracket
    const blockReasons = this.collectBlockReasons(supplier, po.amount);
    if (blockReasons.length) {
      log.debug(`Blocked ${po.poId}:`, blockReasons);
      return { kind: 'blocked', reasons: blockReasons, evaluatedAt };
    }

    // 2. Amount bracket
    const lookup = await this.policies.findRule(po.amount);
    if (lookup.kind === 'requires_manual_escalation') {
      const reasons: DecisionReason[] = [
        {
          code: 'no_matching_bracket',
          message:
            lookup.highestMaxAmount === undefined
              ? `No approval rule is in force; ${amountText} needs manual escalation.`
              : `Amount ${amountText} exceeds every approval bracket (highest ${formatMoney(
                  lookup.highestMaxAmount,
                  this.config.currency,
                )}); manual escalation required.`,
        },
      ];
      const roles = await this.activeRolesOrFallback(
        this.config.escalationApproverRoles,
        reasons,
      );
      return { kind: 'requires', roles, escalated: true, reasons, evaluatedAt };
    }

    const { rule } = lookup;

    // 3. Auto-approval, unless the supplier's signals say otherwise
    if (rule.autoApprove && supplier.riskScore !== 'high' && supplier.status === 'approved') {
      return {
        kind: 'auto_approved',
        ruleId: rule.id,
        reasons: [
          {
            code: 'auto_approve_bracket',
            message: `Amount ${amountText} falls in auto-approve bracket up to ${formatMoney(
              rule.maxAmount,
              this.config.currency,
            )}.`,
          },
        ],
        evaluatedAt,
      };
    }

    const reasons: DecisionReason[] = [];
    if (rule.autoApprove && supplier.riskScore === 'high') {
      reasons.push({
        code: 'high_risk_override',
        message: `Supplier ${supplier.supplierId} is high risk; manual approval required despite auto-approve bracket.`,
      });
    }
    if (rule.autoApprove && supplier.status !== 'approved') {
      reasons.push({
        code: 'supplier_not_approved',
        message: `Supplier ${supplier.supplierId} has status '${supplier.status}'; manual approval required.`,
      });
    }
    reasons.push({
      code: 'approval_bracket',
      message: `Amount ${amountText} falls in bracket up to ${formatMoney(
        rule.maxAmount,
        this.config.currency,
      )} (rule ${rule.id}).`,
    });

    // 4. Required roles, limited to approvers who can act
    const fallbackCount = reasons.length;
    const roles = await this.activeRolesOrFallback(rule.requiredApprovers, reasons);
    return {
      kind: 'requires',
      roles,
      ruleId: rule.id,
      escalated: reasons.length > fallbackCount,
      reasons,
      evaluatedAt,
    };
  }

  private collectBlockReasons(supplier: Supplier, amount: number): DecisionReason[] {
    const reasons: DecisionReason[] = [];
    if (supplier.status === 'suspended') {
      reasons.push({
        code: 'supplier_suspended',
        message: `Supplier ${supplier.supplierId} is suspended.`,
      });
    }
    if (exceedsOrderLimit(supplier, amount)) {
      reasons.push({
        code: 'exceeds_supplier_max_order_value',
        message: `Order of ${formatMoney(amount, this.config.currency)} exceeds supplier ${
          supplier.supplierId
        } maximum of ${formatMoney(supplier.maxOrderValue, this.config.currency)}.`,
      });
    }
    return reasons;
  }

  /**
   * Active approvers among `roles`; when none remain, the configured
   * fallback role, with a reason appended so the escalation is visible.
   */
  private async activeRolesOrFallback(
    roles: string[],
    reasons: DecisionReason[],
  ): Promise<string[]> {
    const wanted = dedupeRoles(roles);
    const approvers = await this.policies.getApprovers(wanted);
    const active = approvers.filter((approver) => approver.active).map((approver) => approver.role);
    if (active.length) {
      return active;
    }

    const fallback = this.config.fallbackApproverRole;
    reasons.push({
      code: 'fallback_approver',
      message: wanted.length
        ? `No active approver for ${wanted.join(', ')}; escalated to '${fallback}'.`
        : `Rule lists no approvers; escalated to '${fallback}'.`,
    });
    log.info(`Escalating to fallback role '${fallback}' (wanted: ${wanted.join(', ') || 'none'}).`);
    return [fallback];
  }
}
