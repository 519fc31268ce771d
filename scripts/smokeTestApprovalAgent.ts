// scripts/smokeTestApprovalAgent.ts
//
// Smoke test for a running Procurement Approval Agent.
// Assumptions:
// - the agent is running via `npm run procurement-agent`
// - it was started with PROCUREMENT_SEED_FILE=data/seed.json
//
// Override the target with PROCUREMENT_AGENT_URL (default http://localhost:41010).

import { v4 as uuidv4 } from 'uuid';

import type { SendMessageResponse, Task } from '@a2a-js/sdk';
import { A2AClient } from '@a2a-js/sdk/client';

import type { ProcurementPayload } from '../src/agents/procurement-approval-agent/types.js';
import { exampleSubmission } from '../src/procurement/index.js';

const AGENT_URL = (process.env.PROCUREMENT_AGENT_URL ?? 'http://localhost:41010').replace(
  /\/+$/,
  '',
);

async function send(
  client: A2AClient,
  label: string,
  procurementPayload: ProcurementPayload,
): Promise<Task> {
  console.log(`\n=== ${label} ===`);

  const response: SendMessageResponse = await client.sendMessage({
    message: {
      kind: 'message',
      role: 'user',
      messageId: uuidv4(),
      parts: [{ kind: 'text', text: `Procurement intent: ${procurementPayload.intent}` }],
      metadata: { procurementPayload },
    },
    configuration: {
      blocking: true,
    },
  });

  if ('error' in response) {
    throw new Error(`Agent returned JSON-RPC error: ${response.error.message}`);
  }

  const result = response.result;
  if (result.kind !== 'task') {
    throw new Error(`Expected a Task result but got '${result.kind}'.`);
  }

  const reply = result.status.message?.parts.find((part) => part.kind === 'text');
  console.log(`  state: ${result.status.state}`);
  if (reply && reply.kind === 'text') {
    console.log(`  reply: ${reply.text}`);
  }
  return result;
}

function readPoId(task: Task): string {
  const purchaseOrder = task.metadata?.purchaseOrder;
  if (
    typeof purchaseOrder === 'object' &&
    purchaseOrder !== null &&
    'poId' in purchaseOrder &&
    typeof purchaseOrder.poId === 'string'
  ) {
    return purchaseOrder.poId;
  }
  console.dir(task, { depth: 5 });
  throw new Error('purchaseOrder.poId missing from task.metadata');
}

async function run(): Promise<void> {
  try {
    const client = await A2AClient.fromCardUrl(`${AGENT_URL}/.well-known/agent-card.json`);

    await send(client, 'Budget before', { intent: 'budget_summary', departmentId: 'IT' });

    // 1) 4,200 from an approved low-risk supplier: manager approval expected
    const submitted = await send(client, 'Submit 4,200 PO', {
      intent: 'submit_po',
      purchaseOrder: exampleSubmission,
    });
    const poId = readPoId(submitted);

    await send(client, 'Manager inbox', { intent: 'list_pending', role: 'manager' });
    await send(client, 'Manager approves', {
      intent: 'approver_action',
      poId,
      role: 'manager',
      decision: 'approve',
      comment: 'Smoke test approval',
    });

    // 2) 500 from a high-risk supplier: not auto-approved
    const risky = await send(client, 'Submit 500 PO to high-risk supplier', {
      intent: 'submit_po',
      purchaseOrder: {
        departmentId: 'OPS',
        supplierId: 'SUP003',
        amount: 500,
        items: [{ description: 'Door hinge replacement', quantity: 10, unitPrice: 50 }],
      },
    });
    await send(client, 'Cancel high-risk PO', {
      intent: 'cancel_po',
      poId: readPoId(risky),
      reason: 'Smoke test cleanup',
    });

    // 3) Suspended supplier: blocked
    await send(client, 'Submit PO to suspended supplier', {
      intent: 'submit_po',
      purchaseOrder: {
        departmentId: 'OPS',
        supplierId: 'SUP004',
        amount: 300,
        items: [{ description: 'Letterhead', quantity: 3, unitPrice: 100 }],
      },
    });

    await send(client, 'Budget after', { intent: 'budget_summary', departmentId: 'IT' });

    console.log('\nProcurement Approval Agent smoke test completed.');
  } catch (err) {
    console.error('\nError running procurement smoke test:', err);
    process.exitCode = 1;
  }
}

void run();
