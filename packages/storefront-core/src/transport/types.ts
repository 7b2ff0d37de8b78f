import type { OutboundMessage, SendResult } from '../types/index';

/**
 * Outbound message gateway. `send` resolves with the classified outcome;
 * a rejected promise is treated as a transient failure by callers.
 */
export interface Transport {
  send(userId: string, message: OutboundMessage): Promise<SendResult>;
}

export interface BlobStore {
  put(ref: string, data: Buffer): Promise<void>;
  get(ref: string): Promise<Buffer | null>;
}

export interface PaymentCodeImage {
  data: Buffer;
  content_type: string;
}

/** Turns a payment reference token into a scannable image, when one is configured. */
export interface PaymentCodeEncoder {
  encode(token: string): Promise<PaymentCodeImage | null>;
}
