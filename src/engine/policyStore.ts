import type { ApprovalRule, Approver } from '../procurement/index.js';
import { toMinorUnits } from '../procurement/index.js';
import type { PolicyRepository } from '../store/index.js';

export type RuleLookup =
  | { kind: 'rule'; rule: ApprovalRule }
  | {
      kind: 'requires_manual_escalation';
      amount: number;
      /** Largest bracket currently in force, if any. */
      highestMaxAmount?: number;
    };

/**
 * Orders rules for lookup: ascending maxAmount, then the larger approver
 * set first so the more conservative rule wins a tie, then lower id.
 */
export function compareRulesForLookup(a: ApprovalRule, b: ApprovalRule): number {
  return (
    toMinorUnits(a.maxAmount) - toMinorUnits(b.maxAmount) ||
    new Set(b.requiredApprovers).size - new Set(a.requiredApprovers).size ||
    a.id - b.id
  );
}

export function isRuleInForce(rule: ApprovalRule, now: Date): boolean {
  if (!rule.active) {
    return false;
  }
  if (rule.expiresAt === undefined) {
    return true;
  }
  return Date.parse(rule.expiresAt) > now.getTime();
}

/**
 * First index whose maxAmount >= amount in a list sorted by
 * compareRulesForLookup, or -1 when every bracket is smaller.
 */
export function lowerBoundByMaxAmount(sorted: ApprovalRule[], amount: number): number {
  const target = toMinorUnits(amount);
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (toMinorUnits(sorted[mid].maxAmount) < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo < sorted.length ? lo : -1;
}

/** Read-only view over the approval matrix and approver directory. */
export class PolicyStore {
  constructor(
    private readonly repository: PolicyRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /**
   * Tightest active, unexpired bracket that covers `amount`. Rules are
   * re-read on every call.
   */
  public async findRule(amount: number): Promise<RuleLookup> {
    const rules = await this.getMatrix();
    const index = lowerBoundByMaxAmount(rules, amount);
    if (index === -1) {
      return {
        kind: 'requires_manual_escalation',
        amount,
        highestMaxAmount: rules.length ? rules[rules.length - 1].maxAmount : undefined,
      };
    }
    return { kind: 'rule', rule: rules[index] };
  }

  /** Rules currently in force, in lookup order. */
  public async getMatrix(): Promise<ApprovalRule[]> {
    const now = this.clock();
    const rules = await this.repository.listRules();
    return rules
      .filter((rule) => isRuleInForce(rule, now))
      .sort(compareRulesForLookup);
  }

  public async getApprover(role: string): Promise<Approver | null> {
    return this.repository.findApprover(role);
  }

  /** Approvers for the given roles, in the order the roles were given. */
  public async getApprovers(roles: string[]): Promise<Approver[]> {
    const directory = new Map(
      (await this.repository.listApprovers()).map((approver) => [approver.role, approver]),
    );
    return roles.flatMap((role) => {
      const approver = directory.get(role);
      return approver ? [approver] : [];
    });
  }
}
