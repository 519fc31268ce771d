import { expect } from 'chai';

import { SupplierRegistry } from '../../src/engine/index.js';
import { NotFoundError, exampleSupplier } from '../../src/procurement/index.js';
import { exampleStore, rejectionOf } from '../support/fixtures.js';

describe('SupplierRegistry', () => {
  it('returns a known supplier', async () => {
    const registry = new SupplierRegistry(exampleStore().suppliers);
    expect(await registry.getSupplier('SUP001')).to.deep.equal(exampleSupplier);
  });

  it('raises NotFoundError for an unknown supplier', async () => {
    const registry = new SupplierRegistry(exampleStore().suppliers);
    const err = await rejectionOf(registry.getSupplier('SUP404'));

    expect(err).to.be.instanceOf(NotFoundError);
    expect(err).to.have.property('message', "Supplier 'SUP404' not found");
  });

  it('checks order capacity against maxOrderValue', async () => {
    const registry = new SupplierRegistry(exampleStore().suppliers);

    expect(await registry.checkCapacity('SUP001', 50000)).to.deep.equal({
      supplierId: 'SUP001',
      capacityOk: true,
      maxCapacity: 50000,
      requested: 50000,
    });
    expect((await registry.checkCapacity('SUP001', 50000.01)).capacityOk).to.equal(false);
  });

  it('lists approved suppliers by rating, optionally per category', async () => {
    const store = exampleStore();
    store.upsertSupplier({ ...exampleSupplier, supplierId: 'SUP002', rating: 4.9, categories: ['hardware'] });
    store.upsertSupplier({ ...exampleSupplier, supplierId: 'SUP003', status: 'suspended' });
    store.upsertSupplier({ ...exampleSupplier, supplierId: 'SUP000', rating: 4.5 });
    const registry = new SupplierRegistry(store.suppliers);

    const all = await registry.listApproved();
    expect(all.map((s) => s.supplierId)).to.deep.equal(['SUP002', 'SUP000', 'SUP001']);

    const furniture = await registry.listApproved('furniture');
    expect(furniture.map((s) => s.supplierId)).to.deep.equal(['SUP000', 'SUP001']);
  });
});
