import { randomUUID } from 'crypto';
import { ProductLockedError } from '../../errors';
import type { NewProduct, Product, ProductPatch, ProductRemoval } from '../../types/index';
import type { ProductCatalogStore, SettingsStore } from '../types';

/**
 * In-process catalog. `isReferenced` answers synchronously from the ledger,
 * so each reference check runs in the same tick as the write it guards.
 */
export class MemoryProductCatalog implements ProductCatalogStore {
  private readonly products = new Map<string, Product>();

  constructor(private readonly isReferenced: (productId: string) => boolean) {}

  /** Current row without copying; for the ledger's order-time check. */
  peek(id: string): Product | undefined {
    return this.products.get(id);
  }

  async get(id: string): Promise<Product | null> {
    const product = this.products.get(id);
    return product ? { ...product } : null;
  }

  async list(options: { category?: string; includeArchived?: boolean } = {}): Promise<Product[]> {
    return [...this.products.values()]
      .filter((p) => options.includeArchived || !p.archived)
      .filter((p) => !options.category || p.category === options.category)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime())
      .map((p) => ({ ...p }));
  }

  async create(input: NewProduct): Promise<Product> {
    const now = new Date();
    const product: Product = {
      id: randomUUID(),
      ...input,
      archived: false,
      created_at: now,
      updated_at: now,
    };
    this.products.set(product.id, product);
    return { ...product };
  }

  async update(id: string, patch: ProductPatch): Promise<Product | null> {
    const current = this.products.get(id);
    if (!current) return null;
    if (patch.artifact_ref !== undefined && patch.artifact_ref !== current.artifact_ref && this.isReferenced(id)) {
      throw new ProductLockedError(id);
    }
    const updated: Product = { ...current, ...patch, updated_at: new Date() };
    this.products.set(id, updated);
    return { ...updated };
  }

  async remove(id: string): Promise<ProductRemoval | null> {
    const current = this.products.get(id);
    if (!current) return null;
    if (this.isReferenced(id)) {
      this.products.set(id, { ...current, archived: true, updated_at: new Date() });
      return 'archived';
    }
    this.products.delete(id);
    return 'deleted';
  }
}

export class MemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}
