// Storefront core: domain types, ledger, services and their infrastructure.

export * from './types/index';
export * from './errors';
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';
export * from './utils/retry';
export * from './config';

export * from './state-machine/stateMachine';
export * from './ledger/transition';

export {
  initPool,
  getPool,
  query,
  queryOne,
  queryRows,
  transaction,
  checkDatabaseHealth,
  migrate,
  closePool,
} from './db/client';

export * from './stores';

export type { Transport, BlobStore, PaymentCodeEncoder, PaymentCodeImage } from './transport/types';
export { HttpTransport } from './transport/httpTransport';
export type { HttpTransportOptions } from './transport/httpTransport';
export { FsBlobStore, MemoryBlobStore, assertBlobRef, contentTypeForRef, fileNameForRef } from './transport/blobStore';
export { StaticPaymentCodeEncoder } from './transport/paymentCode';
export { sendOrThrow, isTransientDeliveryError } from './transport/send';

export { Notifier } from './notifications/notifier';
export type { NotifyOutcome } from './notifications/notifier';
export * as templates from './messages/templates';

export { OwnerAllowList } from './approval/owners';
export { ApprovalCoordinator, verdictForStatus } from './approval/coordinator';
export type { ApprovalCoordinatorDeps } from './approval/coordinator';
export {
  PaymentVerificationService,
  decodeEvidence,
  generatePaymentRef,
  inboundAttachmentSchema,
} from './orders/paymentVerification';
export type { PaymentVerificationDeps } from './orders/paymentVerification';
export { FulfillmentDeliverer } from './fulfillment/fulfillmentDeliverer';
export type { FulfillmentResult, FulfillmentDelivererDeps } from './fulfillment/fulfillmentDeliverer';
export { BroadcastDispatcher, summarize } from './broadcast/dispatcher';
export type { BroadcastDispatcherDeps } from './broadcast/dispatcher';
export {
  CatalogService,
  BIO_SETTING,
  newProductSchema,
  productPatchSchema,
} from './catalog/catalogService';
export type { NewProductInput, ProductPatchInput, RecipientPage } from './catalog/catalogService';
export { ChatCommandRouter, parseCommand } from './chat/commandRouter';
export type { CommandOutcome } from './chat/commandRouter';

export { createStorefront } from './storefront';
export type { Storefront, StorefrontOptions } from './storefront';
