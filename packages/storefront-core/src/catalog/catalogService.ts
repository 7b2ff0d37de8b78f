/**
 * Owner-side catalog management, the seller bio, the payment code upload
 * and store statistics.
 */

import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import { DEFAULT_BIO } from '../messages/templates';
import type { OrderLedger, ProductCatalogStore, RecipientStore, SettingsStore } from '../stores/types';
import { assertBlobRef } from '../transport/blobStore';
import type { BlobStore } from '../transport/types';
import type { Product, ProductRemoval, Recipient, StoreStats } from '../types/index';
import { logger } from '../utils/logger';

export const BIO_SETTING = 'bio_message';

const PAYMENT_CODE_TYPES = new Set(['image/png', 'image/jpeg']);

const productFields = {
  category: z.string().trim().min(1).max(64),
  title: z.string().trim().min(1).max(200),
  description: z.string().max(4000),
  price: z.string().regex(/^\d+(\.\d{1,2})?$/, 'price must be a decimal amount'),
  artifact_ref: z.string().min(1).max(500),
};

export const newProductSchema = z.object({
  ...productFields,
  description: productFields.description.default(''),
});

export const productPatchSchema = z
  .object(productFields)
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'patch must change at least one field');

export type NewProductInput = z.input<typeof newProductSchema>;
export type ProductPatchInput = z.input<typeof productPatchSchema>;

export interface CatalogServiceDeps {
  catalog: ProductCatalogStore;
  ledger: OrderLedger;
  recipients: RecipientStore;
  settings: SettingsStore;
  blobs: BlobStore;
  paymentCodeRef: string;
}

export interface RecipientPage {
  /** Non-blocked recipients in total. */
  total: number;
  recipients: Recipient[];
}

export class CatalogService {
  constructor(private readonly deps: CatalogServiceDeps) {}

  listProducts(options: { category?: string; includeArchived?: boolean } = {}): Promise<Product[]> {
    return this.deps.catalog.list(options);
  }

  async getProduct(id: string): Promise<Product> {
    const product = await this.deps.catalog.get(id);
    if (!product) throw new NotFoundError(`Product ${id} not found`);
    return product;
  }

  async addProduct(input: NewProductInput): Promise<Product> {
    const product = newProductSchema.parse(input);
    assertBlobRef(product.artifact_ref);
    const created = await this.deps.catalog.create(product);
    logger.info('[Catalog] Product added', { productId: created.id, category: created.category });
    return created;
  }

  /** Artifact changes are refused once any order references the product. */
  async updateProduct(id: string, input: ProductPatchInput): Promise<Product> {
    const patch = productPatchSchema.parse(input);
    if (patch.artifact_ref !== undefined) assertBlobRef(patch.artifact_ref);

    const updated = await this.deps.catalog.update(id, patch);
    if (!updated) throw new NotFoundError(`Product ${id} not found`);
    return updated;
  }

  /** Products that were ever sold are archived instead of deleted. */
  async removeProduct(id: string): Promise<ProductRemoval> {
    const removal = await this.deps.catalog.remove(id);
    if (!removal) throw new NotFoundError(`Product ${id} not found`);

    logger.info('[Catalog] Product removed', { productId: id, removal });
    return removal;
  }

  async getBio(): Promise<string> {
    return (await this.deps.settings.get(BIO_SETTING)) ?? DEFAULT_BIO;
  }

  async setBio(text: string): Promise<string> {
    const bio = text.trim();
    if (bio.length === 0 || bio.length > 4000) {
      throw new ValidationError('Bio must be between 1 and 4000 characters');
    }
    await this.deps.settings.set(BIO_SETTING, bio);
    return bio;
  }

  /** Replaces the seller's payment code image. */
  async setPaymentCode(contentType: string, base64: string): Promise<void> {
    if (!PAYMENT_CODE_TYPES.has(contentType)) {
      throw new ValidationError('Payment code must be a PNG or JPEG image');
    }
    const bytes = Buffer.from(base64, 'base64');
    if (bytes.length === 0) {
      throw new ValidationError('Payment code image is empty');
    }
    await this.deps.blobs.put(this.deps.paymentCodeRef, bytes);
    logger.info('[Catalog] Payment code replaced', { bytes: bytes.length });
  }

  async listRecipients(limit = 100): Promise<RecipientPage> {
    const [counts, recipients] = await Promise.all([
      this.deps.recipients.count(),
      this.deps.recipients.list({ limit }),
    ]);
    return { total: counts.total - counts.blocked, recipients };
  }

  async stats(): Promise<StoreStats> {
    const [recipients, products, ordersByStatus] = await Promise.all([
      this.deps.recipients.count(),
      this.deps.catalog.list(),
      this.deps.ledger.countByStatus(),
    ]);
    return {
      recipients: recipients.total,
      blocked_recipients: recipients.blocked,
      products: products.length,
      orders_by_status: ordersByStatus,
    };
  }
}
