import "dotenv/config";
import express from "express";

import type { AgentCard } from "@a2a-js/sdk";
import {
  InMemoryTaskStore,
  DefaultRequestHandler,
} from "@a2a-js/sdk/server";
import type { TaskStore, AgentExecutor } from "@a2a-js/sdk/server";
import { A2AExpressApp } from "@a2a-js/sdk/server/express";

import { createEngine } from "../../engine/index.js";
import {
  createLogger,
  parseProcurementEnv,
  setDebugLogging,
  toEngineConfig,
} from "../../procurement/index.js";
import { createEngineStore } from "../../store/index.js";
import { ProcurementApprovalAgentExecutor } from "./executor.js";

const log = createLogger("ProcurementApprovalAgent");

function buildAgentCard(port: number): AgentCard {
  return {
    name: "Procurement Approval Agent",
    description:
      "Routes purchase orders through the approval matrix, reserves departmental budget and records approver decisions.",
    url: `http://localhost:${port}/`,
    provider: {
      organization: "Procurement Platform",
      url: "https://example.com/procurement-approval",
    },
    version: "0.1.0",
    protocolVersion: "0.3.0",
    capabilities: {
      streaming: true,
      pushNotifications: false,
      stateTransitionHistory: true,
    },
    defaultInputModes: ["text"],
    defaultOutputModes: ["text", "task-status"],
    skills: [
      {
        id: "po_approval",
        name: "Purchase Order Approval",
        description:
          "Submits POs, records approve/reject actions, cancels or retries them and reports their status.",
        tags: ["procurement", "approval", "purchase-order"],
        inputModes: ["text"],
        outputModes: ["text", "task-status"],
      },
      {
        id: "budget_ledger",
        name: "Budget Ledger",
        description: "Reports departmental budget availability and utilisation.",
        tags: ["procurement", "budget"],
        inputModes: ["text"],
        outputModes: ["text", "task-status"],
      },
      {
        id: "supplier_registry",
        name: "Supplier Registry",
        description: "Lists approved suppliers, optionally by category.",
        tags: ["procurement", "supplier"],
        inputModes: ["text"],
        outputModes: ["text", "task-status"],
      },
    ],
    supportsAuthenticatedExtendedCard: false,
  };
}

async function main(): Promise<void> {
  const env = parseProcurementEnv();
  setDebugLogging(env.PROCUREMENT_DEBUG);
  const store = await createEngineStore(env);
  const engine = createEngine(store, toEngineConfig(env));

  const agentCard = buildAgentCard(env.PORT);
  const taskStore: TaskStore = new InMemoryTaskStore();
  const agentExecutor: AgentExecutor = new ProcurementApprovalAgentExecutor(engine);

  const requestHandler = new DefaultRequestHandler(
    agentCard,
    taskStore,
    agentExecutor,
  );

  const appBuilder = new A2AExpressApp(requestHandler);
  const expressApp = appBuilder.setupRoutes(express());

  const server = expressApp.listen(env.PORT, (err?: unknown) => {
    if (err) {
      throw err;
    }

    const baseUrl = `http://localhost:${env.PORT}`;
    log.info(`Procurement Approval Agent listening on ${baseUrl}`);
    log.info(`Agent Card available at ${baseUrl}/.well-known/agent-card.json`);
    log.info(
      "Tip: run 'npm run smoke:procurement-agent' against this agent to submit a sample PO.",
    );
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received; closing.`);
    server.close();
    store.close().catch((err: unknown) => {
      log.error("Failed to close the engine store", err);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error("Fatal error starting Procurement Approval Agent server", err);
  process.exitCode = 1;
});
