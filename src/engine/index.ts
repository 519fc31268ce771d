import type { EngineConfig } from '../procurement/index.js';
import { defaultEngineConfig } from '../procurement/index.js';
import type { EngineStore } from '../store/index.js';
import { ApprovalRouter } from './approvalRouter.js';
import { BudgetLedger } from './budgetLedger.js';
import { PurchaseOrderOrchestrator } from './orchestrator.js';
import { PolicyStore } from './policyStore.js';
import { ReservationManager } from './reservationManager.js';
import { SupplierRegistry } from './supplierRegistry.js';

export * from './approvalRouter.js';
export * from './budgetLedger.js';
export * from './lifecycle.js';
export * from './orchestrator.js';
export * from './policyStore.js';
export * from './reservationManager.js';
export * from './supplierRegistry.js';
export * from './validation.js';

export interface ProcurementEngine {
  config: EngineConfig;
  policies: PolicyStore;
  suppliers: SupplierRegistry;
  router: ApprovalRouter;
  ledger: BudgetLedger;
  reservations: ReservationManager;
  orchestrator: PurchaseOrderOrchestrator;
}

/** Wires every component over one store. */
export function createEngine(
  store: EngineStore,
  config: EngineConfig = defaultEngineConfig,
  clock: () => Date = () => new Date(),
): ProcurementEngine {
  const policies = new PolicyStore(store.policies, clock);
  const suppliers = new SupplierRegistry(store.suppliers);
  const router = new ApprovalRouter(policies, suppliers, config, clock);
  const ledger = new BudgetLedger(store.ledger);
  const reservations = new ReservationManager(store.ledger, clock);
  const orchestrator = new PurchaseOrderOrchestrator({
    router,
    reservations,
    ledger,
    policies,
    purchaseOrders: store.purchaseOrders,
    config,
    clock,
  });

  return { config, policies, suppliers, router, ledger, reservations, orchestrator };
}
