import { errorMessage, PermanentDeliveryError, TransientDeliveryError } from '../errors';
import type { OutboundMessage, SendResult } from '../types/index';
import type { Transport } from './types';

/**
 * Sends once and turns anything but `delivered` into a typed error, so the
 * result can drive `retryWithBackoff`.
 */
export async function sendOrThrow(transport: Transport, userId: string, message: OutboundMessage): Promise<void> {
  let result: SendResult;
  try {
    result = await transport.send(userId, message);
  } catch (error) {
    throw new TransientDeliveryError(errorMessage(error));
  }

  if (result.status === 'blocked') {
    throw new PermanentDeliveryError(result.error);
  }
  if (result.status === 'transient_error') {
    throw new TransientDeliveryError(result.error);
  }
}

export function isTransientDeliveryError(error: unknown): boolean {
  return error instanceof TransientDeliveryError;
}
