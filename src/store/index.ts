import type { ProcurementEnv } from '../procurement/index.js';
import { createLogger } from '../procurement/index.js';
import { InMemoryEngineStore } from './memory/inMemoryEngineStore.js';
import { PgEngineStore } from './postgres/pgEngineStore.js';
import { loadEngineSeedFile } from './seed.js';
import type { EngineStore } from './types.js';

export type * from './types.js';
export { InMemoryEngineStore } from './memory/inMemoryEngineStore.js';
export { PgEngineStore, withTransaction } from './postgres/pgEngineStore.js';
export {
  engineSeedSchema,
  loadEngineSeedFile,
  parseEngineSeed,
  type EngineSeed,
} from './seed.js';

const log = createLogger('EngineStore');

export async function createEngineStore(env: ProcurementEnv): Promise<EngineStore> {
  if (env.PROCUREMENT_STORE === 'postgres' && env.DATABASE_URL) {
    log.info('Using PostgreSQL store.');
    return PgEngineStore.fromConnectionString(env.DATABASE_URL);
  }

  if (env.PROCUREMENT_SEED_FILE) {
    const seed = await loadEngineSeedFile(env.PROCUREMENT_SEED_FILE);
    log.info(
      `Using in-memory store seeded from ${env.PROCUREMENT_SEED_FILE} ` +
        `(${seed.suppliers.length} supplier(s), ${seed.budgets.length} budget(s), ` +
        `${seed.approvalRules.length} rule(s), ${seed.approvers.length} approver(s)).`,
    );
    return new InMemoryEngineStore(seed);
  }

  log.info('Using empty in-memory store.');
  return new InMemoryEngineStore();
}
