/**
 * Wires stores, transport and services into one storefront. The API process
 * builds exactly one; tests build one per case over memory stores.
 */

import { ApprovalCoordinator } from './approval/coordinator';
import { OwnerAllowList } from './approval/owners';
import { BroadcastDispatcher } from './broadcast/dispatcher';
import { CatalogService } from './catalog/catalogService';
import { ChatCommandRouter } from './chat/commandRouter';
import type { StorefrontConfig } from './config';
import { FulfillmentDeliverer } from './fulfillment/fulfillmentDeliverer';
import { Notifier } from './notifications/notifier';
import { PaymentVerificationService } from './orders/paymentVerification';
import { createStores } from './stores';
import type { Stores } from './stores/types';
import { FsBlobStore } from './transport/blobStore';
import { HttpTransport } from './transport/httpTransport';
import { StaticPaymentCodeEncoder } from './transport/paymentCode';
import type { BlobStore, PaymentCodeEncoder, Transport } from './transport/types';
import { logger } from './utils/logger';

export interface StorefrontOptions {
  stores?: Stores;
  transport?: Transport;
  blobs?: BlobStore;
  paymentCodes?: PaymentCodeEncoder;
  clock?: () => Date;
}

export interface Storefront {
  config: StorefrontConfig;
  stores: Stores;
  blobs: BlobStore;
  transport: Transport;
  owners: OwnerAllowList;
  notifier: Notifier;
  catalog: CatalogService;
  payments: PaymentVerificationService;
  coordinator: ApprovalCoordinator;
  fulfillment: FulfillmentDeliverer;
  dispatcher: BroadcastDispatcher;
  router: ChatCommandRouter;
  /** Resumes interrupted broadcasts and re-drives pending deliveries. */
  recover(): Promise<{ broadcasts: number; deliveries: number }>;
  /** Waits for background deliveries, broadcasts and notifications. */
  drain(): Promise<void>;
}

export function createStorefront(config: StorefrontConfig, options: StorefrontOptions = {}): Storefront {
  const stores = options.stores ?? createStores(config);
  const blobs = options.blobs ?? new FsBlobStore(config.blobDir);
  const transport =
    options.transport ?? new HttpTransport({ baseUrl: config.transport.url, timeoutMs: config.transport.timeoutMs });
  const paymentCodes = options.paymentCodes ?? new StaticPaymentCodeEncoder(blobs, config.paymentCodeRef);

  const owners = new OwnerAllowList(config.ownerIds);
  const notifier = new Notifier(transport, stores.recipients, config.notificationRetry);

  const fulfillment = new FulfillmentDeliverer({
    ledger: stores.ledger,
    recipients: stores.recipients,
    blobs,
    transport,
    notifier,
    owners,
    retry: config.fulfillment.retry,
  });

  const coordinator = new ApprovalCoordinator({
    ledger: stores.ledger,
    catalog: stores.catalog,
    blobs,
    notifier,
    owners,
    onApproved: (order) => fulfillment.schedule(order),
    clock: options.clock,
  });

  const payments = new PaymentVerificationService({
    ledger: stores.ledger,
    catalog: stores.catalog,
    blobs,
    paymentCodes,
    notifier,
    coordinator,
    maxEvidenceBytes: config.maxEvidenceBytes,
    evidenceTimeoutMinutes: config.evidenceTimeoutMinutes,
    clock: options.clock,
  });

  const catalog = new CatalogService({
    catalog: stores.catalog,
    ledger: stores.ledger,
    recipients: stores.recipients,
    settings: stores.settings,
    blobs,
    paymentCodeRef: config.paymentCodeRef,
  });

  const dispatcher = new BroadcastDispatcher({
    jobs: stores.broadcasts,
    recipients: stores.recipients,
    transport,
    notifier,
    owners,
    concurrency: config.broadcast.concurrency,
    retry: config.broadcast.retry,
  });

  const router = new ChatCommandRouter({
    recipients: stores.recipients,
    catalog,
    payments,
    coordinator,
    dispatcher,
    notifier,
    owners,
  });

  return {
    config,
    stores,
    blobs,
    transport,
    owners,
    notifier,
    catalog,
    payments,
    coordinator,
    fulfillment,
    dispatcher,
    router,

    async recover() {
      const broadcasts = await dispatcher.resumeIncomplete();
      const deliveries = await fulfillment.resumePending();
      logger.info('[Storefront] Recovery started', { broadcasts, deliveries });
      return { broadcasts, deliveries };
    },

    async drain() {
      await dispatcher.drain();
      await fulfillment.drain();
      await notifier.drain();
    },
  };
}
