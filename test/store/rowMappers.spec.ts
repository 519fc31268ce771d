import { expect } from 'chai';

import {
  mapApprovalRuleRow,
  mapBudgetRow,
  mapPurchaseOrderRow,
  mapReservationRow,
  mapSupplierRow,
} from '../../src/store/postgres/rowMappers.js';

describe('postgres row mappers', () => {
  it('turns NUMERIC strings into numbers', () => {
    expect(
      mapBudgetRow({
        department_id: 'IT',
        name: 'Information Technology',
        allocated: '100000.00',
        spent: '2500.50',
        reserved: '0.00',
        fiscal_year: 2026,
        manager_email: null,
      }),
    ).to.deep.equal({
      departmentId: 'IT',
      name: 'Information Technology',
      allocated: 100000,
      spent: 2500.5,
      reserved: 0,
      fiscalYear: 2026,
      managerEmail: undefined,
    });
  });

  it('maps supplier columns', () => {
    const supplier = mapSupplierRow({
      supplier_id: 'SUP001',
      name: 'Northwind Office Supply',
      status: 'approved',
      rating: '4.50',
      payment_terms: 'NET30',
      categories: ['furniture'],
      risk_score: 'low',
      max_order_value: '50000.00',
      contact_email: null,
    });

    expect(supplier.rating).to.equal(4.5);
    expect(supplier.maxOrderValue).to.equal(50000);
    expect(supplier.riskScore).to.equal('low');
    expect(supplier.paymentTerms).to.equal('NET30');
    expect(supplier.contactEmail).to.equal(undefined);
  });

  it('renders rule expiry as an ISO timestamp', () => {
    const rule = mapApprovalRuleRow({
      id: 4,
      max_amount: '10000.00',
      required_approvers: ['manager'],
      auto_approve: false,
      description: null,
      active: true,
      expires_at: new Date('2026-12-31T23:59:59.000Z'),
    });

    expect(rule.maxAmount).to.equal(10000);
    expect(rule.expiresAt).to.equal('2026-12-31T23:59:59.000Z');
    expect(rule.description).to.equal(undefined);
  });

  it('maps reservations with and without a settlement time', () => {
    const base = {
      id: 'res-1',
      po_id: 'PO-1',
      department_id: 'IT',
      amount: '120.25',
      created_at: new Date('2026-03-02T09:00:00.000Z'),
    };

    expect(mapReservationRow({ ...base, status: 'active', settled_at: null }).settledAt).to.equal(
      undefined,
    );
    const settled = mapReservationRow({
      ...base,
      status: 'consumed',
      settled_at: new Date('2026-03-03T09:00:00.000Z'),
    });
    expect(settled.amount).to.equal(120.25);
    expect(settled.settledAt).to.equal('2026-03-03T09:00:00.000Z');
  });

  it('maps a purchase order row', () => {
    const po = mapPurchaseOrderRow({
      po_id: 'PO-2026-ABCD1234',
      department_id: 'IT',
      supplier_id: 'SUP001',
      amount: '4200.00',
      items: [{ description: 'Standing desk', quantity: 6, unitPrice: 700 }],
      requested_by: null,
      description: null,
      state: 'awaiting_approval',
      routing: null,
      reservation_id: 'res-1',
      actions: [],
      history: [],
      version: 5,
      created_at: new Date('2026-03-02T09:00:00.000Z'),
      updated_at: new Date('2026-03-02T09:05:00.000Z'),
    });

    expect(po.amount).to.equal(4200);
    expect(po.routing).to.equal(undefined);
    expect(po.reservationId).to.equal('res-1');
    expect(po.updatedAt).to.equal('2026-03-02T09:05:00.000Z');
    expect(po.version).to.equal(5);
  });
});
