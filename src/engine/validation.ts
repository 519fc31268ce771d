import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { PurchaseOrderSubmission } from '../procurement/index.js';
import { ValidationError, isWholeMinorAmount } from '../procurement/index.js';

const money = z
  .number()
  .finite()
  .refine(isWholeMinorAmount, { message: 'must have at most two decimal places' });

const lineItemSchema = z.object({
  description: z.string().trim().min(1),
  quantity: z.number().int().positive(),
  unitPrice: money.refine((value) => value >= 0, { message: 'must not be negative' }),
});

export const submissionSchema = z.object({
  poId: z.string().trim().min(1).max(64).optional(),
  departmentId: z.string().trim().min(1, 'departmentId is required'),
  supplierId: z.string().trim().min(1, 'supplierId is required'),
  amount: money.refine((value) => value > 0, { message: 'Amount must be a positive number' }),
  items: z.array(lineItemSchema).min(1, 'Items must be a non-empty list'),
  requestedBy: z.string().trim().min(1).optional(),
  description: z.string().optional(),
});

export function parseSubmission(input: unknown): PurchaseOrderSubmission {
  const result = submissionSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(
      `Invalid purchase order: ${where}${issue?.message ?? 'unknown problem'}`,
      result.error.flatten().fieldErrors,
    );
  }
  return result.data;
}

/** e.g. `PO-2026-1A2B3C4D`. */
export function generatePoId(now: Date): string {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `PO-${now.getUTCFullYear()}-${suffix}`;
}
