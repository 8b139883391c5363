import type { KitchenOrder, KitchenOrderItem } from '../models/kitchen-order.dto';
import type { TicketItem } from '../models/dispatch.dto';
import { TICKET_WIDTH } from './constants';

/**
 * Plain-text kitchen ticket renderer.
 * Output depends only on its arguments.
 */

export function toTicketItem(item: KitchenOrderItem): TicketItem {
  return {
    itemId: item.id,
    name: item.menuItemName,
    quantity: item.quantity,
    variant: item.variant,
    modifiers: [...item.modifiers],
    specialInstructions: item.specialInstructions,
    notes: item.notes,
  };
}

/** `YYYY-MM-DD HH:MM:SS` in UTC */
export function formatTicketTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function centered(text: string, width: number = TICKET_WIDTH): string {
  const padding = Math.max(Math.floor((width - text.length) / 2), 0);
  return ' '.repeat(padding) + text;
}

export function renderKitchenTicket(
  order: KitchenOrder,
  items: TicketItem[],
  printerName: string,
  printedAt: Date,
): string {
  const rule = '='.repeat(TICKET_WIDTH);
  const thinRule = '-'.repeat(TICKET_WIDTH);

  const lines: string[] = [
    rule,
    centered('KITCHEN TICKET'),
    rule,
    `Order: ${order.orderNumber}`,
    `Time: ${formatTicketTime(printedAt)}`,
    `Table: ${order.tableLabel ?? 'Take-Out'}`,
    `Customer: ${order.customerName ?? 'Walk-in'}`,
  ];

  if (order.serverName) {
    lines.push(`Server: ${order.serverName}`);
  }

  lines.push(`Printer: ${printerName}`, rule, '', 'ITEMS:', thinRule);

  for (const item of items) {
    lines.push(`${item.quantity}x ${item.name}`);
    if (item.variant) lines.push(`   Variant: ${item.variant}`);
    if (item.modifiers.length > 0) lines.push(`   Modifiers: ${item.modifiers.join(', ')}`);
    if (item.specialInstructions) lines.push(`   Special: ${item.specialInstructions}`);
    if (item.notes) lines.push(`   Notes: ${item.notes}`);
    lines.push('');
  }

  lines.push(
    thinRule,
    `Total Items: ${items.length}`,
    `Priority: ${order.isUrgent ? 'URGENT' : 'Normal'}`,
    rule,
    // tear-off spacing
    '',
    '',
    '',
  );

  return lines.join('\n');
}
