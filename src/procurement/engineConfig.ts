import { z } from 'zod';

import { ValidationError } from './errors.js';

export interface EngineConfig {
  /** Role that takes over when every matched approver is inactive. */
  fallbackApproverRole: string;
  /** Roles required when the amount exceeds every approval bracket. */
  escalationApproverRoles: string[];
  /** Single currency every amount is expressed in. */
  currency: string;
}

const roleList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((role) => role.trim())
      .filter((role) => role.length > 0),
  )
  .pipe(z.array(z.string()).min(1));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(41010),
  PROCUREMENT_STORE: z.enum(['memory', 'postgres']).default('memory'),
  DATABASE_URL: z.string().url().optional(),
  PROCUREMENT_SEED_FILE: z.string().optional(),
  FALLBACK_APPROVER_ROLE: z.string().min(1).default('director'),
  ESCALATION_APPROVER_ROLES: roleList.default('director,cfo'),
  CURRENCY: z.string().length(3).default('USD'),
  PROCUREMENT_DEBUG: z
    .enum(['0', '1', 'true', 'false'])
    .default('0')
    .transform((value) => value === '1' || value === 'true'),
});

export type ProcurementEnv = z.infer<typeof envSchema>;

/**
 * Validates the process environment. Postgres mode needs a DATABASE_URL.
 */
export function parseProcurementEnv(
  source: Record<string, string | undefined> = process.env,
): ProcurementEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ValidationError(
      'Invalid procurement environment variables',
      result.error.flatten().fieldErrors,
    );
  }

  if (result.data.PROCUREMENT_STORE === 'postgres' && !result.data.DATABASE_URL) {
    throw new ValidationError(
      'DATABASE_URL is required when PROCUREMENT_STORE=postgres',
    );
  }

  return result.data;
}

export function toEngineConfig(env: ProcurementEnv): EngineConfig {
  return {
    fallbackApproverRole: env.FALLBACK_APPROVER_ROLE,
    escalationApproverRoles: env.ESCALATION_APPROVER_ROLES,
    currency: env.CURRENCY.toUpperCase(),
  };
}

export const defaultEngineConfig: EngineConfig = {
  fallbackApproverRole: 'director',
  escalationApproverRoles: ['director', 'cfo'],
  currency: 'USD',
};
