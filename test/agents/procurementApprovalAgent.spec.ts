import { expect } from 'chai';
import { v4 as uuidv4 } from 'uuid';

import type { Message, Task, TaskStatusUpdateEvent } from '@a2a-js/sdk';
import {
  DefaultExecutionEventBus,
  RequestContext,
  type AgentExecutionEvent,
} from '@a2a-js/sdk/server';

import { ProcurementApprovalAgentExecutor } from '../../src/agents/procurement-approval-agent/executor.js';
import { exampleApprovers, exampleBudget } from '../../src/procurement/index.js';
import { exampleEngine, submission, type TestEngine } from '../support/fixtures.js';

async function send(
  executor: ProcurementApprovalAgentExecutor,
  metadata: Record<string, unknown>,
): Promise<AgentExecutionEvent[]> {
  const eventBus = new DefaultExecutionEventBus();
  const events: AgentExecutionEvent[] = [];
  eventBus.on('event', (event) => {
    events.push(event);
  });

  const message: Message = {
    kind: 'message',
    role: 'user',
    messageId: uuidv4(),
    parts: [{ kind: 'text', text: 'Procurement request' }],
    metadata,
  };
  await executor.execute(new RequestContext(message, 'task-1', 'ctx-1'), eventBus);
  return events;
}

function taskOf(events: AgentExecutionEvent[]): Task {
  const task = events.find((event): event is Task => event.kind === 'task');
  if (!task) {
    throw new Error('no task was published');
  }
  return task;
}

function finalStatus(events: AgentExecutionEvent[]): TaskStatusUpdateEvent {
  const update = events.find(
    (event): event is TaskStatusUpdateEvent => event.kind === 'status-update',
  );
  if (!update) {
    throw new Error('no status update was published');
  }
  expect(update.final).to.equal(true);
  return update;
}

function statusText(update: TaskStatusUpdateEvent): string {
  const part = update.status.message?.parts[0];
  return part && part.kind === 'text' ? part.text : '';
}

describe('ProcurementApprovalAgentExecutor', () => {
  let engine: TestEngine;
  let executor: ProcurementApprovalAgentExecutor;

  beforeEach(() => {
    engine = exampleEngine();
    executor = new ProcurementApprovalAgentExecutor(engine);
  });

  it('submits a purchase order', async () => {
    const events = await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A1' }) },
    });

    const task = taskOf(events);
    expect(task.id).to.equal('task-1');
    expect(task.metadata).to.have.property('intent', 'submit_po');
    expect(task.metadata).to.have.nested.property('purchaseOrder.state', 'awaiting_approval');

    const status = finalStatus(events);
    expect(status.status.state).to.equal('completed');
    expect(statusText(status)).to.equal(
      'PO-A1 ($4,200.00) is awaiting approval from manager.',
    );
  });

  it('records an approver decision', async () => {
    await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A2' }) },
    });
    const events = await send(executor, {
      procurementPayload: {
        intent: 'approver_action',
        poId: 'PO-A2',
        role: 'manager',
        decision: 'approve',
      },
    });

    expect(taskOf(events).metadata).to.have.property('outcome', 'approved');
    expect(statusText(finalStatus(events))).to.equal(
      'Recorded manager approval for PO-A2. PO-A2 ($4,200.00) is approved and committed against IT.',
    );
  });

  it('lists pending work for a role', async () => {
    const empty = await send(executor, {
      procurementPayload: { intent: 'list_pending', role: 'manager' },
    });
    expect(statusText(finalStatus(empty))).to.equal(
      'You have no pending purchase orders for manager approval.',
    );

    await send(executor, {
      procurementPayload: {
        intent: 'submit_po',
        purchaseOrder: submission({ poId: 'PO-A3', description: 'Desks for support' }),
      },
    });
    const events = await send(executor, {
      procurementPayload: { intent: 'list_pending', role: 'manager' },
    });
    expect(statusText(finalStatus(events))).to.equal(
      'You have 1 pending purchase order:\n1. PO-A3 – SUP001 – $4,200.00 – Desks for support',
    );
  });

  it('reports a budget summary', async () => {
    const events = await send(executor, {
      procurementPayload: { intent: 'budget_summary', departmentId: 'IT' },
    });

    expect(taskOf(events).metadata).to.have.nested.property('budgetSummary.available', 75000);
    expect(statusText(finalStatus(events))).to.equal(
      'Information Technology (IT, FY2026): $75,000.00 available of $100,000.00; ' +
        '$25,000.00 spent, $0.00 reserved (25% utilised).',
    );
  });

  it('lists approved suppliers', async () => {
    const events = await send(executor, {
      procurementPayload: { intent: 'list_suppliers', category: 'furniture' },
    });

    expect(statusText(finalStatus(events))).to.equal(
      "1 approved supplier(s) for 'furniture':\n1. SUP001 – Northwind Office Supply – rating 4.5, low risk",
    );
  });

  it('cancels a purchase order', async () => {
    await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A4' }) },
    });
    const events = await send(executor, {
      procurementPayload: { intent: 'cancel_po', poId: 'PO-A4', reason: 'duplicate' },
    });

    expect(taskOf(events).metadata).to.have.nested.property('purchaseOrder.state', 'released');
    expect(finalStatus(events).status.state).to.equal('completed');
  });

  it('reports the status of a purchase order', async () => {
    await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A5' }) },
    });
    const events = await send(executor, {
      procurementPayload: { intent: 'po_status', poId: 'PO-A5' },
    });

    const task = taskOf(events);
    expect(task.metadata).to.have.property('intent', 'po_status');
    expect(task.metadata).to.have.nested.property('purchaseOrder.poId', 'PO-A5');
    const status = finalStatus(events);
    expect(status.status.state).to.equal('completed');
    expect(statusText(status)).to.equal('PO-A5 ($4,200.00) is awaiting approval from manager.');
  });

  it('retries the reservation of an order waiting for budget', async () => {
    engine.store.upsertBudget({ ...exampleBudget, spent: 98000 });
    await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A6' }) },
    });

    const stillShort = await send(executor, {
      procurementPayload: { intent: 'retry_reservation', poId: 'PO-A6' },
    });
    expect(taskOf(stillShort).metadata).to.have.property('outcome', 'unchanged');
    expect(statusText(finalStatus(stillShort))).to.equal('PO-A6 is still waiting for budget.');

    engine.store.upsertBudget(exampleBudget);
    const events = await send(executor, {
      procurementPayload: { intent: 'retry_reservation', poId: 'PO-A6' },
    });

    const task = taskOf(events);
    expect(task.metadata).to.have.property('outcome', 'progressed');
    expect(task.metadata).to.have.nested.property('purchaseOrder.state', 'awaiting_approval');
    const status = finalStatus(events);
    expect(status.status.state).to.equal('completed');
    expect(statusText(status)).to.equal('PO-A6 ($4,200.00) is awaiting approval from manager.');
  });

  it('escalates inactive approvers to the fallback role', async () => {
    await send(executor, {
      procurementPayload: { intent: 'submit_po', purchaseOrder: submission({ poId: 'PO-A7' }) },
    });
    engine.store.upsertApprover({ ...exampleApprovers[0], active: false });

    const events = await send(executor, {
      procurementPayload: { intent: 'escalate_approvers', poId: 'PO-A7' },
    });

    const task = taskOf(events);
    expect(task.metadata).to.have.property('outcome', 'escalated');
    expect(task.metadata).to.have.deep.property('replacedRoles', ['manager']);
    const status = finalStatus(events);
    expect(status.status.state).to.equal('completed');
    expect(statusText(status)).to.equal(
      'Escalated manager on PO-A7. PO-A7 ($4,200.00) is awaiting approval from director.',
    );
  });

  it('fails the task with the engine error', async () => {
    const events = await send(executor, {
      procurementPayload: { intent: 'po_status', poId: 'PO-404' },
    });

    expect(taskOf(events).metadata).to.have.nested.property('error.error', 'NOT_FOUND');
    const status = finalStatus(events);
    expect(status.status.state).to.equal('failed');
    expect(statusText(status)).to.equal("Purchase order 'PO-404' not found");
  });

  it('fails validation problems in the submitted order', async () => {
    const events = await send(executor, {
      procurementPayload: {
        intent: 'submit_po',
        purchaseOrder: submission({ items: [] }),
      },
    });

    expect(taskOf(events).metadata).to.have.nested.property('error.error', 'VALIDATION_ERROR');
    expect(finalStatus(events).status.state).to.equal('failed');
  });

  it('fails when the payload is missing or unsupported', async () => {
    for (const metadata of [{}, { procurementPayload: { intent: 'approve_everything' } }]) {
      const events = await send(executor, metadata);

      expect(events).to.have.length(1);
      const status = finalStatus(events);
      expect(status.status.state).to.equal('failed');
      expect(statusText(status)).to.equal(
        'Procurement Approval Agent requires metadata.procurementPayload with a supported intent.',
      );
    }
  });

  it('publishes a final canceled status on cancelTask', async () => {
    const eventBus = new DefaultExecutionEventBus();
    const events: AgentExecutionEvent[] = [];
    eventBus.on('event', (event) => {
      events.push(event);
    });

    await executor.cancelTask('task-9', eventBus);

    const status = finalStatus(events);
    expect(status.taskId).to.equal('task-9');
    expect(status.status.state).to.equal('canceled');
  });
});
