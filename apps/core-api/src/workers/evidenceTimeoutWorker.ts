/**
 * Evidence Timeout Worker
 *
 * Every TIMEOUT_POLL_MS, cancels orders that have been awaiting payment
 * evidence longer than EVIDENCE_TIMEOUT_MINUTES and tells the buyer.
 */

import { errorMessage, logger } from 'storefront-core';
import type { PaymentVerificationService } from 'storefront-core';

let isRunning = false;
let pollTimer: NodeJS.Timeout | null = null;

export async function runEvidenceTimeoutSweep(payments: PaymentVerificationService): Promise<number> {
  try {
    const count = await payments.expireStaleOrders();
    if (count > 0) {
      logger.info(`[EvidenceTimeout] Cancelled ${count} order(s) without evidence`);
    }
    return count;
  } catch (error) {
    logger.error('[EvidenceTimeout] Error expiring orders', { error: errorMessage(error) });
    return 0;
  }
}

export function startEvidenceTimeoutWorker(payments: PaymentVerificationService, intervalMs: number): void {
  if (isRunning) return;
  isRunning = true;

  const tick = async () => {
    if (!isRunning) return;
    await runEvidenceTimeoutSweep(payments);
    if (isRunning) {
      pollTimer = setTimeout(tick, intervalMs);
    }
  };

  logger.info(`[EvidenceTimeout] Worker started (poll every ${intervalMs}ms)`);
  // First tick after a short delay
  pollTimer = setTimeout(tick, Math.min(5000, intervalMs));
}

export function stopEvidenceTimeoutWorker(): void {
  isRunning = false;
  if (pollTimer) {
    clearTimeout(pollTimer);
    pollTimer = null;
  }
  logger.info('[EvidenceTimeout] Worker stopped');
}
