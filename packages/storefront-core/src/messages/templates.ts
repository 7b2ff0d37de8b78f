/**
 * Chat copy. Everything the storefront says to buyers and owners is built
 * here so services only decide *when* to speak.
 */

import type { BroadcastSummary, Order, OutboundMessage, Product, Recipient, Verdict } from '../types/index';

export const DEFAULT_BIO = 'Welcome to our store!';

const text = (body: string): OutboundMessage => ({ kind: 'text', text: body });

export function orderLabel(order: Pick<Order, 'order_number'>): string {
  return `#${order.order_number}`;
}

export function paymentInstructions(order: Order, product: Product): string {
  return [
    'Payment Instructions',
    '',
    `Product: ${product.title}`,
    `Amount: ${order.amount}`,
    `Reference: ${order.payment_ref}`,
    '',
    'Pay using the code above, then send a screenshot of the payment here.',
    `Order ${orderLabel(order)} (${order.id}) is waiting for your evidence.`,
  ].join('\n');
}

export function evidenceReceived(order: Order): OutboundMessage {
  return text(
    `Payment evidence for order ${orderLabel(order)} received. You will be notified once it is verified.`
  );
}

export function reviewPrompt(order: Order, product: Product | null): string {
  return [
    `Order ${orderLabel(order)} is waiting for review`,
    `Order id: ${order.id}`,
    `Buyer: ${order.buyer_id}`,
    `Product: ${product ? product.title : order.product_id}`,
    `Amount: ${order.amount}`,
    `Reference: ${order.payment_ref}`,
    `Evidence: ${order.evidence_ref ?? 'none'}`,
    '',
    `/approve ${order.id}`,
    `/reject ${order.id} <reason>`,
  ].join('\n');
}

const VERDICT_WORDS: Record<Verdict, string> = {
  approve: 'approved',
  reject: 'rejected',
};

export function decisionNotice(order: Order, ownerId: string, verdict: Verdict): OutboundMessage {
  return text(`Order ${orderLabel(order)} was ${VERDICT_WORDS[verdict]} by ${ownerId}.`);
}

export function supersededNotice(order: Order, decidedBy: string | null, verdict: Verdict | null): OutboundMessage {
  const what = verdict ? VERDICT_WORDS[verdict] : 'decided';
  const who = decidedBy ?? 'another owner';
  return text(`Your decision on order ${orderLabel(order)} was not applied: it was already ${what} by ${who}.`);
}

export function notReviewableNotice(order: Order): OutboundMessage {
  return text(`Order ${orderLabel(order)} is ${order.status.replace('_', ' ')} and cannot be reviewed.`);
}

export function rejectionNotice(order: Order): OutboundMessage {
  const reason = order.decision_reason ? `\nReason: ${order.decision_reason}` : '';
  return text(`Your payment for order ${orderLabel(order)} could not be verified.${reason}`);
}

export function approvalNotice(order: Order): OutboundMessage {
  return text(`Payment for order ${orderLabel(order)} verified. Your purchase is on its way.`);
}

export function fulfillmentCaption(order: Order): string {
  return `Thank you! Here is your purchase for order ${orderLabel(order)}.`;
}

export function manualFulfillmentAlert(order: Order, error: string): OutboundMessage {
  return text(
    [
      `Delivery of order ${orderLabel(order)} to ${order.buyer_id} failed: ${error}`,
      'The order stays approved and is waiting for manual fulfillment.',
      `Retry with POST /v1/orders/${order.id}/fulfill`,
    ].join('\n')
  );
}

export function cancellationNotice(order: Order): OutboundMessage {
  return text(`Order ${orderLabel(order)} was cancelled because no payment evidence arrived in time.`);
}

export function broadcastStarted(jobId: string, recipients: number): OutboundMessage {
  return text(`Broadcast ${jobId} started for ${recipients} recipient(s).`);
}

export function broadcastSummary(summary: BroadcastSummary): OutboundMessage {
  const headline = summary.cancelled ? 'cancelled' : 'finished';
  return text(
    [
      `Broadcast ${summary.job_id} ${headline}`,
      `Delivered: ${summary.delivered}`,
      `Blocked: ${summary.blocked}`,
      `Failed: ${summary.failed}`,
      `Skipped: ${summary.skipped}`,
    ].join('\n')
  );
}

export function catalogListing(bio: string, products: Product[]): OutboundMessage {
  if (products.length === 0) {
    return text(`${bio}\n\nNo products are available right now.`);
  }

  const byCategory = new Map<string, Product[]>();
  for (const product of products) {
    const list = byCategory.get(product.category) ?? [];
    list.push(product);
    byCategory.set(product.category, list);
  }

  const lines = [bio];
  for (const [category, items] of byCategory) {
    lines.push('', category);
    for (const item of items) {
      lines.push(`- ${item.title} (${item.price}): /buy ${item.id}`);
    }
  }
  return text(lines.join('\n'));
}

export function statsMessage(stats: {
  recipients: number;
  blocked_recipients: number;
  products: number;
}): OutboundMessage {
  return text(
    `Users: ${stats.recipients} (blocked: ${stats.blocked_recipients})\nProducts: ${stats.products}`
  );
}

export function recipientListing(page: { total: number; recipients: Recipient[] }): OutboundMessage {
  if (page.recipients.length === 0) {
    return text('Users\n\nNo users found.');
  }
  const lines = page.recipients.map(
    (r, i) => `${i + 1}. ${r.display_name ?? 'Unknown'} (${r.user_id})\n   Joined: ${r.first_seen.toISOString().slice(0, 10)}`
  );
  const more = page.total > page.recipients.length ? `\n... and ${page.total - page.recipients.length} more` : '';
  return text(`Users (${page.total})\n\n${lines.join('\n')}${more}`);
}

export const HELP_MESSAGE: OutboundMessage = text(
  'Hello! Use /start to see available products, /buy <productId> to order, and send a screenshot of your payment when asked.'
);

export function plainText(message: string): OutboundMessage {
  return text(message);
}
