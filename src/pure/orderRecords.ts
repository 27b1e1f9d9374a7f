import {Order, OrderRecord} from '../domain';
import {formatMoney, toFixedMoney} from './money';

export function toOrderRecord(order: Order): OrderRecord {
  return {
    orderId: order.orderId,
    email: order.customerEmail,
    createdAt: order.createdAt.toISOString(),
    fulfilment: order.fulfilment.type,
    deliveryAddress: order.fulfilment.type === 'DELIVERY' ? order.fulfilment.deliveryAddress : '',
    storeId: order.fulfilment.type === 'PICKUP' ? order.fulfilment.storeId : '',
    promoCode: order.promoCode,
    subtotal: toFixedMoney(order.subtotal),
    studentDiscount: toFixedMoney(order.studentDiscount),
    promoDiscount: toFixedMoney(order.promoDiscount),
    deliveryFee: toFixedMoney(order.deliveryFee),
    total: toFixedMoney(order.total),
    lines: order.lines.map(line => ({
      sku: line.sku,
      name: line.name,
      quantity: line.quantity,
      unitPrice: toFixedMoney(line.unitPrice),
      memberPrice: toFixedMoney(line.memberPrice),
      lineTotal: toFixedMoney(line.lineTotal),
    })),
  };
}

/**
 * Order ids look like ORD-1A2B3C4D: the first eight hex digits of a UUID.
 */
export function formatOrderId(uuid: string): string {
  return `ORD-${uuid.replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

export function buildOrderSummary(order: Order): string {
  const lines = [
    `Order ${order.orderId}`,
    ...order.lines.map(line => `  ${line.quantity} × ${line.name} ${formatMoney(line.lineTotal)}`),
    `Subtotal: ${formatMoney(order.subtotal)}`,
  ];
  if (order.studentDiscount > 0) {
    lines.push(`Student discount: -${formatMoney(order.studentDiscount)}`);
  }
  if (order.promoCode) {
    lines.push(`Promotion ${order.promoCode}: -${formatMoney(order.promoDiscount)}`);
  }
  lines.push(`Delivery fee: ${formatMoney(order.deliveryFee)}`);
  lines.push(`Total: ${formatMoney(order.total)}`);
  return lines.join('\n');
}
