import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ValidationError } from '../procurement/index.js';

const supplierSchema = z.object({
  supplierId: z.string().min(1),
  name: z.string().min(1),
  status: z.enum(['approved', 'pending', 'suspended']),
  rating: z.number().min(0).max(5),
  riskScore: z.enum(['low', 'medium', 'high']),
  maxOrderValue: z.number().nonnegative(),
  categories: z.array(z.string()),
  paymentTerms: z.string().optional(),
  contactEmail: z.string().email().optional(),
});

const budgetSchema = z
  .object({
    departmentId: z.string().min(1),
    name: z.string().min(1),
    allocated: z.number().nonnegative(),
    spent: z.number().nonnegative(),
    reserved: z.number().nonnegative(),
    fiscalYear: z.number().int(),
    managerEmail: z.string().email().optional(),
  })
  .refine((budget) => budget.spent + budget.reserved <= budget.allocated, {
    message: 'spent + reserved must not exceed allocated',
  });

const approvalRuleSchema = z.object({
  id: z.number().int(),
  maxAmount: z.number().nonnegative(),
  requiredApprovers: z.array(z.string().min(1)),
  autoApprove: z.boolean(),
  active: z.boolean(),
  description: z.string().optional(),
  expiresAt: z.string().datetime().optional(),
});

const approverSchema = z.object({
  role: z.string().min(1),
  name: z.string().min(1),
  email: z.string().email(),
  department: z.string().optional(),
  active: z.boolean(),
});

export const engineSeedSchema = z.object({
  suppliers: z.array(supplierSchema).default([]),
  budgets: z.array(budgetSchema).default([]),
  approvalRules: z.array(approvalRuleSchema).default([]),
  approvers: z.array(approverSchema).default([]),
});

export type EngineSeed = z.infer<typeof engineSeedSchema>;

export function parseEngineSeed(raw: unknown): EngineSeed {
  const result = engineSeedSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Invalid engine seed data', result.error.issues);
  }
  return result.data;
}

export async function loadEngineSeedFile(path: string): Promise<EngineSeed> {
  const text = await readFile(path, 'utf8');
  return parseEngineSeed(JSON.parse(text));
}
