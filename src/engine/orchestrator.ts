import type {
  ApproverAction,
  ApproverDecision,
  EngineConfig,
  PurchaseOrder,
  PurchaseOrderState,
  RoutingDecision,
} from '../procurement/index.js';
import {
  ApproverNotEligibleError,
  InvalidTransitionError,
  KeyedSequencer,
  NotFoundError,
  ValidationError,
  createLogger,
  formatMoney,
} from '../procurement/index.js';
import type { PurchaseOrderRepository } from '../store/index.js';
import { dedupeRoles, type ApprovalRouter } from './approvalRouter.js';
import type { BudgetLedger } from './budgetLedger.js';
import { transition } from './lifecycle.js';
import type { PolicyStore } from './policyStore.js';
import type { ReservationManager } from './reservationManager.js';
import { generatePoId, parseSubmission } from './validation.js';

const log = createLogger('PurchaseOrderOrchestrator');

export interface OrchestratorDependencies {
  router: ApprovalRouter;
  reservations: ReservationManager;
  ledger: BudgetLedger;
  policies: PolicyStore;
  purchaseOrders: PurchaseOrderRepository;
  config: EngineConfig;
  clock?: () => Date;
}

export interface ApproverActionInput {
  poId: string;
  role: string;
  decision: ApproverDecision;
  comment?: string;
  actor?: string;
}

export type ActionOutcome = 'recorded' | 'unchanged' | 'approved' | 'rejected';

export interface ActionResult {
  outcome: ActionOutcome;
  purchaseOrder: PurchaseOrder;
}

export interface RetryResult {
  /** `unchanged` when the PO is still waiting for budget. */
  outcome: 'progressed' | 'unchanged';
  purchaseOrder: PurchaseOrder;
}

export interface EscalationResult {
  outcome: 'escalated' | 'unchanged';
  /** Roles that were swapped for the fallback role. */
  replacedRoles: string[];
  purchaseOrder: PurchaseOrder;
}

type RequiresDecision = Extract<RoutingDecision, { kind: 'requires' }>;

/**
 * Drives purchase orders through routing, budget reservation and approval.
 * Every state change for one PO runs through a per-PO queue; budget changes
 * are delegated to the reservation manager.
 */
export class PurchaseOrderOrchestrator {
  private readonly perPurchaseOrder = new KeyedSequencer();
  private readonly router: ApprovalRouter;
  private readonly reservations: ReservationManager;
  private readonly ledger: BudgetLedger;
  private readonly policies: PolicyStore;
  private readonly purchaseOrders: PurchaseOrderRepository;
  private readonly config: EngineConfig;
  private readonly clock: () => Date;

  constructor(deps: OrchestratorDependencies) {
    this.router = deps.router;
    this.reservations = deps.reservations;
    this.ledger = deps.ledger;
    this.policies = deps.policies;
    this.purchaseOrders = deps.purchaseOrders;
    this.config = deps.config;
    this.clock = deps.clock ?? (() => new Date());
  }

  public async submit(input: unknown): Promise<PurchaseOrder> {
    const submission = parseSubmission(input);
    const createdAt = this.now();
    const poId = submission.poId ?? generatePoId(new Date(createdAt));

    return this.perPurchaseOrder.run(poId, async () => {
      if (await this.purchaseOrders.findById(poId)) {
        throw new ValidationError(`Purchase order ${poId} already exists`);
      }
      // Unknown departments and suppliers fail before anything is stored.
      await this.ledger.getBudget(submission.departmentId);
      const routing = await this.router.route({
        poId,
        supplierId: submission.supplierId,
        amount: submission.amount,
      });

      // Draft and routed stay in memory; the first save happens once the
      // reservation outcome is known, so a failed reserve stores nothing.
      const draft: PurchaseOrder = {
        poId,
        departmentId: submission.departmentId,
        supplierId: submission.supplierId,
        amount: submission.amount,
        items: submission.items,
        requestedBy: submission.requestedBy,
        description: submission.description,
        state: 'draft',
        actions: [],
        history: [{ state: 'draft', at: createdAt, note: 'Submitted' }],
        createdAt,
        updatedAt: createdAt,
        version: 0,
      };
      log.info(
        `Submitted ${poId}: ${formatMoney(submission.amount, this.config.currency)} ` +
          `for ${submission.departmentId} from ${submission.supplierId}.`,
      );

      const routed: PurchaseOrder = {
        ...transition(draft, 'routed', describeRouting(routing), this.now()),
        routing,
      };
      return this.applyRouting(routed, routing);
    });
  }

  public async recordAction(input: ApproverActionInput): Promise<ActionResult> {
    const { poId, role, decision } = input;
    return this.perPurchaseOrder.run(poId, async () => {
      const po = await this.load(poId);
      if (po.state !== 'awaiting_approval') {
        throw new InvalidTransitionError(`Purchase order ${poId}`, po.state, `record ${decision}`);
      }
      const routing = requiresDecision(po);

      if (!routing.roles.includes(role)) {
        throw new ApproverNotEligibleError(
          poId,
          role,
          `not a required approver (required: ${routing.roles.join(', ')})`,
        );
      }
      const approver = await this.policies.getApprover(role);
      if (!approver || !approver.active) {
        throw new ApproverNotEligibleError(poId, role, 'approver is not active');
      }

      if (decision === 'approve' && approvedRoles(po).has(role)) {
        log.debug(`Duplicate approval from ${role} on ${poId} ignored.`);
        return { outcome: 'unchanged', purchaseOrder: po };
      }

      const actedAt = this.now();
      const action: ApproverAction = { role, decision, actedAt };
      if (input.actor) {
        action.actor = input.actor;
      }
      if (input.comment) {
        action.comment = input.comment;
      }
      const withAction: PurchaseOrder = { ...po, actions: [...po.actions, action] };

      if (decision === 'reject') {
        const rejected = await this.persist(
          transition(
            withAction,
            'rejected',
            `Rejected by ${role}${input.comment ? `: ${input.comment}` : ''}`,
            actedAt,
          ),
        );
        log.info(`${poId} rejected by ${role}.`);
        return {
          outcome: 'rejected',
          purchaseOrder: await this.release(rejected, 'Reservation released after rejection'),
        };
      }

      const outstanding = outstandingRoles(withAction, routing);
      if (outstanding.length) {
        log.info(`${poId} approved by ${role}; still waiting on ${outstanding.join(', ')}.`);
        return {
          outcome: 'recorded',
          purchaseOrder: await this.persist({ ...withAction, updatedAt: actedAt }),
        };
      }

      return { outcome: 'approved', purchaseOrder: await this.approveAndConsume(withAction, role) };
    });
  }

  public async retryReservation(poId: string): Promise<RetryResult> {
    return this.perPurchaseOrder.run(poId, async () => {
      const po = await this.load(poId);
      if (po.state !== 'pending_budget') {
        throw new InvalidTransitionError(`Purchase order ${poId}`, po.state, 'retry reservation');
      }
      const routing = await this.router.route(po);
      const next = await this.applyRouting(po, routing);
      return {
        outcome: next.state === 'pending_budget' ? 'unchanged' : 'progressed',
        purchaseOrder: next,
      };
    });
  }

  public async cancel(poId: string, reason?: string): Promise<PurchaseOrder> {
    return this.perPurchaseOrder.run(poId, async () => {
      const po = await this.load(poId);
      if (!isCancellable(po.state)) {
        throw new InvalidTransitionError(`Purchase order ${poId}`, po.state, 'cancel');
      }
      log.info(`Cancelling ${poId}${reason ? `: ${reason}` : ''}.`);
      return this.release(po, reason ? `Cancelled: ${reason}` : 'Cancelled');
    });
  }

  public async getPurchaseOrder(poId: string): Promise<PurchaseOrder> {
    return this.load(poId);
  }

  /** POs awaiting approval that still need a decision from `role`. */
  public async listAwaitingRole(role: string): Promise<PurchaseOrder[]> {
    const waiting = await this.purchaseOrders.listByState('awaiting_approval');
    return waiting.filter(
      (po) =>
        po.routing?.kind === 'requires' &&
        po.routing.roles.includes(role) &&
        !approvedRoles(po).has(role),
    );
  }

  /**
   * Swaps outstanding roles whose approver is no longer active for the
   * fallback role. Roles that already approved keep their place.
   */
  public async escalateInactiveApprovers(poId: string): Promise<EscalationResult> {
    return this.perPurchaseOrder.run(poId, async () => {
      const po = await this.load(poId);
      if (po.state !== 'awaiting_approval') {
        throw new InvalidTransitionError(`Purchase order ${poId}`, po.state, 'escalate approvers');
      }
      const routing = requiresDecision(po);
      const approved = approvedRoles(po);
      const approvers = await this.policies.getApprovers(routing.roles);
      const active = new Set(approvers.filter((a) => a.active).map((a) => a.role));

      const fallback = this.config.fallbackApproverRole;
      const replacedRoles = routing.roles.filter(
        (role) => role !== fallback && !approved.has(role) && !active.has(role),
      );
      if (!replacedRoles.length) {
        return { outcome: 'unchanged', replacedRoles, purchaseOrder: po };
      }

      const roles = dedupeRoles(
        routing.roles.map((role) => (replacedRoles.includes(role) ? fallback : role)),
      );
      const updatedRouting: RequiresDecision = {
        ...routing,
        roles,
        escalated: true,
        reasons: [
          ...routing.reasons,
          {
            code: 'fallback_approver',
            message: `No active approver for ${replacedRoles.join(', ')}; escalated to '${fallback}'.`,
          },
        ],
      };
      log.warn(`${poId}: escalating ${replacedRoles.join(', ')} to '${fallback}'.`);

      const escalated: PurchaseOrder = { ...po, routing: updatedRouting, updatedAt: this.now() };
      if (!outstandingRoles(escalated, updatedRouting).length) {
        return {
          outcome: 'escalated',
          replacedRoles,
          purchaseOrder: await this.approveAndConsume(escalated, fallback),
        };
      }
      return { outcome: 'escalated', replacedRoles, purchaseOrder: await this.persist(escalated) };
    });
  }

  /** Continues a PO in `routed` or `pending_budget` with a fresh decision. */
  private async applyRouting(po: PurchaseOrder, routing: RoutingDecision): Promise<PurchaseOrder> {
    if (routing.kind === 'blocked') {
      log.info(`${po.poId} blocked: ${routing.reasons.map((r) => r.code).join(', ')}.`);
      return this.persist({
        ...transition(po, 'blocked', describeRouting(routing), this.now()),
        routing,
      });
    }

    const result = await this.reservations.reserve(po.departmentId, po.amount, po.poId);
    if (result.kind === 'insufficient_budget') {
      const note = `Insufficient budget: requested ${formatMoney(
        result.requested,
        this.config.currency,
      )}, available ${formatMoney(result.available, this.config.currency)}`;
      if (po.state === 'pending_budget') {
        return this.persist({ ...po, routing, updatedAt: this.now() });
      }
      return this.persist({ ...transition(po, 'pending_budget', note, this.now()), routing });
    }

    const reserved = await this.persist({
      ...transition(
        po,
        'reserved',
        `Reserved ${formatMoney(po.amount, this.config.currency)} on ${po.departmentId}`,
        this.now(),
      ),
      routing,
      reservationId: result.reservation.reservationId,
    });

    if (routing.kind === 'auto_approved') {
      const approved = await this.persist(
        transition(reserved, 'approved', describeRouting(routing), this.now()),
      );
      return this.consume(approved);
    }

    return this.persist(
      transition(
        reserved,
        'awaiting_approval',
        `Awaiting approval from ${routing.roles.join(', ')}`,
        this.now(),
      ),
    );
  }

  private async approveAndConsume(po: PurchaseOrder, lastRole: string): Promise<PurchaseOrder> {
    const approved = await this.persist(
      transition(po, 'approved', `All required approvals recorded (last: ${lastRole})`, this.now()),
    );
    log.info(`${po.poId} approved.`);
    return this.consume(approved);
  }

  private async consume(po: PurchaseOrder): Promise<PurchaseOrder> {
    const reservationId = await this.reservationFor(po);
    if (!reservationId) {
      throw new NotFoundError('Active reservation for purchase order', po.poId);
    }
    const result = await this.reservations.consume(reservationId);
    if (result.kind === 'already_terminal' && result.status !== 'consumed') {
      throw new InvalidTransitionError(`Reservation ${reservationId}`, result.status, 'consume');
    }
    return this.persist(
      transition(
        { ...po, reservationId },
        'consumed',
        `Spent ${formatMoney(po.amount, this.config.currency)} from ${po.departmentId}`,
        this.now(),
      ),
    );
  }

  /** Releases any held reservation, then moves the PO to `released`. */
  private async release(po: PurchaseOrder, note: string): Promise<PurchaseOrder> {
    const reservationId = await this.reservationFor(po);
    if (reservationId) {
      const result = await this.reservations.release(reservationId);
      if (result.kind === 'already_terminal' && result.status !== 'released') {
        throw new InvalidTransitionError(`Reservation ${reservationId}`, result.status, 'release');
      }
    }
    return this.persist(transition(po, 'released', note, this.now()));
  }

  private async reservationFor(po: PurchaseOrder): Promise<string | undefined> {
    if (po.reservationId) {
      return po.reservationId;
    }
    const active = await this.reservations.findActiveByPo(po.poId);
    return active?.reservationId;
  }

  private async load(poId: string): Promise<PurchaseOrder> {
    const po = await this.purchaseOrders.findById(poId);
    if (!po) {
      throw new NotFoundError('Purchase order', poId);
    }
    return po;
  }

  private async persist(po: PurchaseOrder): Promise<PurchaseOrder> {
    return this.purchaseOrders.save(po, po.version);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

function requiresDecision(po: PurchaseOrder): RequiresDecision {
  if (po.routing?.kind !== 'requires') {
    throw new InvalidTransitionError(
      `Purchase order ${po.poId}`,
      po.state,
      'take approver actions without a routing that requires approvers',
    );
  }
  return po.routing;
}

function approvedRoles(po: PurchaseOrder): Set<string> {
  return new Set(
    po.actions.filter((action) => action.decision === 'approve').map((action) => action.role),
  );
}

function outstandingRoles(po: PurchaseOrder, routing: RequiresDecision): string[] {
  const approved = approvedRoles(po);
  return routing.roles.filter((role) => !approved.has(role));
}

export function describeRouting(routing: RoutingDecision): string {
  switch (routing.kind) {
    case 'blocked':
      return `Blocked: ${routing.reasons.map((reason) => reason.message).join(' ')}`;
    case 'auto_approved':
      return `Auto-approved under rule ${routing.ruleId}`;
    case 'requires':
      return `Requires ${routing.roles.join(', ')}${routing.escalated ? ' (escalated)' : ''}`;
  }
}

export function isCancellable(state: PurchaseOrderState): boolean {
  return state === 'awaiting_approval' || state === 'pending_budget';
}
