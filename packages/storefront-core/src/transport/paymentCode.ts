import { contentTypeForRef } from './blobStore';
import type { BlobStore, PaymentCodeEncoder, PaymentCodeImage } from './types';

/**
 * The seller's payment code is one uploaded image; the order's reference
 * token travels in the caption instead of being encoded into it.
 */
export class StaticPaymentCodeEncoder implements PaymentCodeEncoder {
  constructor(
    private readonly blobs: BlobStore,
    private readonly ref: string
  ) {}

  async encode(_token: string): Promise<PaymentCodeImage | null> {
    const data = await this.blobs.get(this.ref);
    if (!data) return null;
    const contentType = contentTypeForRef(this.ref);
    // Refs without an extension are the uploaded PNG.
    return { data, content_type: contentType === 'application/octet-stream' ? 'image/png' : contentType };
  }
}
