// src/procurement/examples.ts
// Non-production example objects for documentation, smoke scripts, or manual experiments.

import type {
  ApprovalRule,
  Approver,
  Budget,
  PurchaseOrderSubmission,
  Supplier,
} from './domain.js';

export const exampleSupplier: Supplier = {
  supplierId: 'SUP001',
  name: 'Northwind Office Supply',
  status: 'approved',
  rating: 4.5,
  riskScore: 'low',
  maxOrderValue: 50000,
  categories: ['office_supplies', 'furniture'],
  paymentTerms: 'NET30',
  contactEmail: 'orders@northwind.example',
};

export const exampleBudget: Budget = {
  departmentId: 'IT',
  name: 'Information Technology',
  allocated: 100000,
  spent: 25000,
  reserved: 0,
  fiscalYear: 2026,
  managerEmail: 'it.manager@example.com',
};

export const exampleApprovalRules: ApprovalRule[] = [
  {
    id: 1,
    maxAmount: 1000,
    requiredApprovers: [],
    autoApprove: true,
    active: true,
    description: 'Small purchases are approved automatically.',
  },
  {
    id: 2,
    maxAmount: 10000,
    requiredApprovers: ['manager'],
    autoApprove: false,
    active: true,
    description: 'Manager sign-off.',
  },
  {
    id: 3,
    maxAmount: 50000,
    requiredApprovers: ['manager', 'finance_manager'],
    autoApprove: false,
    active: true,
    description: 'Manager and finance sign-off.',
  },
];

export const exampleApprovers: Approver[] = [
  {
    role: 'manager',
    name: 'Dana Reyes',
    email: 'manager@example.com',
    department: 'IT',
    active: true,
  },
  {
    role: 'finance_manager',
    name: 'Sam Okafor',
    email: 'finance.manager@example.com',
    department: 'Finance',
    active: true,
  },
  {
    role: 'director',
    name: 'Lee Martin',
    email: 'director@example.com',
    active: true,
  },
];

export const exampleSubmission: PurchaseOrderSubmission = {
  departmentId: 'IT',
  supplierId: 'SUP001',
  amount: 4200,
  items: [
    { description: 'Standing desk', quantity: 6, unitPrice: 700 },
  ],
  requestedBy: 'requester@example.com',
  description: 'Desks for the new support team.',
};
