import type { Supplier } from '../procurement/index.js';
import { NotFoundError, toMinorUnits } from '../procurement/index.js';
import type { SupplierRepository } from '../store/index.js';

export interface CapacityCheck {
  supplierId: string;
  capacityOk: boolean;
  maxCapacity: number;
  requested: number;
}

export class SupplierRegistry {
  constructor(private readonly repository: SupplierRepository) {}

  public async getSupplier(supplierId: string): Promise<Supplier> {
    const supplier = await this.repository.findById(supplierId);
    if (!supplier) {
      throw new NotFoundError('Supplier', supplierId);
    }
    return supplier;
  }

  public async checkCapacity(supplierId: string, amount: number): Promise<CapacityCheck> {
    const supplier = await this.getSupplier(supplierId);
    return {
      supplierId,
      capacityOk: !exceedsOrderLimit(supplier, amount),
      maxCapacity: supplier.maxOrderValue,
      requested: amount,
    };
  }

  /** Approved suppliers, optionally limited to one category, by rating. */
  public async listApproved(category?: string): Promise<Supplier[]> {
    const suppliers = await this.repository.listAll();
    return suppliers
      .filter((supplier) => supplier.status === 'approved')
      .filter((supplier) => category === undefined || supplier.categories.includes(category))
      .sort((a, b) => b.rating - a.rating || a.supplierId.localeCompare(b.supplierId));
  }
}

export function exceedsOrderLimit(supplier: Supplier, amount: number): boolean {
  return toMinorUnits(amount) > toMinorUnits(supplier.maxOrderValue);
}
