/**
 * Routes inbound chat messages to the storefront services. Replies go out
 * through the notifier in the background; the caller only waits for the
 * ledger work a command does.
 */

import { ZodError } from 'zod';
import type { ApprovalCoordinator } from '../approval/coordinator';
import type { OwnerAllowList } from '../approval/owners';
import type { BroadcastDispatcher } from '../broadcast/dispatcher';
import type { CatalogService } from '../catalog/catalogService';
import { StorefrontError } from '../errors';
import { catalogListing, plainText, HELP_MESSAGE, recipientListing, statsMessage } from '../messages/templates';
import type { Notifier } from '../notifications/notifier';
import type { PaymentVerificationService } from '../orders/paymentVerification';
import type { RecipientStore } from '../stores/types';
import type { InboundMessage } from '../types/index';
import { logger } from '../utils/logger';

export interface CommandRouterDeps {
  recipients: RecipientStore;
  catalog: CatalogService;
  payments: PaymentVerificationService;
  coordinator: ApprovalCoordinator;
  dispatcher: BroadcastDispatcher;
  notifier: Notifier;
  owners: OwnerAllowList;
}

export interface CommandOutcome {
  command: string;
  ok: boolean;
  code?: string;
}

const OWNER_COMMANDS = new Set(['/approve', '/reject', '/broadcast', '/cancelbroadcast', '/stats', '/users']);

const USERS_PAGE = 10;

interface ParsedCommand {
  name: string;
  args: string[];
  rest: string;
}

export function parseCommand(payload: string): ParsedCommand | null {
  const trimmed = payload.trim();
  if (!trimmed.startsWith('/')) return null;

  const match = /^(\/[A-Za-z_]+)(?:@\S+)?\s*([\s\S]*)$/.exec(trimmed);
  if (!match) return null;

  const name = (match[1] ?? '').toLowerCase();
  const rest = (match[2] ?? '').trim();
  return { name, args: rest.length > 0 ? rest.split(/\s+/) : [], rest };
}

export class ChatCommandRouter {
  constructor(private readonly deps: CommandRouterDeps) {}

  async handle(message: InboundMessage): Promise<CommandOutcome> {
    await this.deps.recipients.touch(message.user_id, message.display_name);

    const command = parseCommand(message.payload);
    const name = message.attachment ? 'evidence' : command?.name ?? 'help';

    try {
      await this.dispatch(message, command);
      return { command: name, ok: true };
    } catch (error) {
      if (error instanceof ZodError) {
        const detail = error.issues[0]?.message ?? 'Invalid input';
        this.reply(message.user_id, detail);
        return { command: name, ok: false, code: 'VALIDATION_FAILED' };
      }
      if (error instanceof StorefrontError && error.statusCode < 500) {
        this.reply(message.user_id, error.message);
        return { command: name, ok: false, code: error.code };
      }
      logger.error('[Chat] Command failed', { userId: message.user_id, command: name });
      throw error;
    }
  }

  private async dispatch(message: InboundMessage, command: ParsedCommand | null): Promise<void> {
    const userId = message.user_id;

    if (message.attachment) {
      const orderId = command?.name === '/evidence' ? command.args[0] : undefined;
      await this.deps.payments.submitEvidence(userId, message.attachment, orderId);
      return;
    }

    if (!command) {
      this.deps.notifier.post(userId, HELP_MESSAGE);
      return;
    }

    if (OWNER_COMMANDS.has(command.name)) {
      this.deps.owners.assertOwner(userId);
    }

    switch (command.name) {
      case '/start': {
        const [bio, products] = await Promise.all([
          this.deps.catalog.getBio(),
          this.deps.catalog.listProducts(),
        ]);
        this.deps.notifier.post(userId, catalogListing(bio, products));
        return;
      }
      case '/buy': {
        const productId = command.args[0];
        if (!productId) {
          this.reply(userId, 'Usage: /buy <productId>');
          return;
        }
        await this.deps.payments.placeOrder(userId, productId);
        return;
      }
      case '/evidence':
        this.reply(userId, 'Attach the payment screenshot to /evidence <orderId>.');
        return;
      case '/approve': {
        const orderId = command.args[0];
        if (!orderId) {
          this.reply(userId, 'Usage: /approve <orderId>');
          return;
        }
        await this.deps.coordinator.approve(orderId, userId);
        return;
      }
      case '/reject': {
        const [orderId, ...reason] = command.args;
        if (!orderId || reason.length === 0) {
          this.reply(userId, 'Usage: /reject <orderId> <reason>');
          return;
        }
        await this.deps.coordinator.reject(orderId, userId, reason.join(' '));
        return;
      }
      case '/broadcast':
        if (command.rest.length === 0) {
          this.reply(userId, 'Usage: /broadcast <message>');
          return;
        }
        await this.deps.dispatcher.start({ kind: 'text', text: command.rest }, { kind: 'all' }, userId);
        return;
      case '/cancelbroadcast': {
        const jobId = command.args[0];
        if (!jobId) {
          this.reply(userId, 'Usage: /cancelbroadcast <jobId>');
          return;
        }
        await this.deps.dispatcher.cancel(jobId, userId, { wait: false });
        this.reply(userId, `Broadcast ${jobId} is being cancelled.`);
        return;
      }
      case '/stats':
        this.deps.notifier.post(userId, statsMessage(await this.deps.catalog.stats()));
        return;
      case '/users':
        this.deps.notifier.post(userId, recipientListing(await this.deps.catalog.listRecipients(USERS_PAGE)));
        return;
      default:
        this.deps.notifier.post(userId, HELP_MESSAGE);
    }
  }

  private reply(userId: string, text: string): void {
    this.deps.notifier.post(userId, plainText(text));
  }
}
