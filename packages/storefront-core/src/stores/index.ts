import type { StorefrontConfig } from '../config';
import { MemoryBroadcastJobStore } from './memory/broadcastJobs';
import { MemoryProductCatalog, MemorySettingsStore } from './memory/catalog';
import { MemoryOrderLedger } from './memory/orderLedger';
import { MemoryRecipientStore } from './memory/recipients';
import { PgBroadcastJobStore } from './postgres/broadcastJobs';
import { PgProductCatalog, PgSettingsStore } from './postgres/catalog';
import { PgOrderLedger } from './postgres/orderLedger';
import { PgRecipientStore } from './postgres/recipients';
import type { Stores } from './types';

export function createMemoryStores(): Stores {
  const ledger = new MemoryOrderLedger();
  const catalog = new MemoryProductCatalog((productId) => ledger.referencesProduct(productId));
  ledger.attachCatalog(catalog);
  return {
    ledger,
    catalog,
    recipients: new MemoryRecipientStore(),
    broadcasts: new MemoryBroadcastJobStore(),
    settings: new MemorySettingsStore(),
  };
}

export function createPostgresStores(): Stores {
  return {
    ledger: new PgOrderLedger(),
    catalog: new PgProductCatalog(),
    recipients: new PgRecipientStore(),
    broadcasts: new PgBroadcastJobStore(),
    settings: new PgSettingsStore(),
  };
}

export function createStores(config: Pick<StorefrontConfig, 'storeDriver'>): Stores {
  return config.storeDriver === 'memory' ? createMemoryStores() : createPostgresStores();
}

export * from './types';
export { MemoryOrderLedger, MemoryProductCatalog, MemorySettingsStore, MemoryRecipientStore, MemoryBroadcastJobStore };
export { PgOrderLedger, PgProductCatalog, PgSettingsStore, PgRecipientStore, PgBroadcastJobStore };
