// Domain types shared across the application

export type FulfilmentType = 'DELIVERY' | 'PICKUP';

export type CatalogEntry = {
  readonly sku: string;
  readonly name: string;
  readonly category: string;
  readonly regularPrice: number;
  readonly memberPrice: number;
  readonly stockQuantity: number;
};

export type VipMembership = {
  readonly years: number;
  readonly purchasedAt: Date;
  readonly expiresAt: Date;
  readonly cancelled: boolean;
};

export type Customer = {
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly funds: number;
  readonly isStudent: boolean;
  readonly address: string;
  readonly vipMembership: VipMembership | null;
};

/**
 * The pricing-relevant view of a customer, fixed when an order is started.
 */
export type CustomerSnapshot = {
  readonly email: string;
  readonly isStudent: boolean;
  readonly isVip: boolean;
};

export type CartLine = {
  readonly sku: string;
  readonly quantity: number;
  readonly addedAt: Date;
};

export type Cart = {
  readonly lines: readonly CartLine[];
};

export type Store = {
  readonly storeId: string;
  readonly name: string;
  readonly address: string;
  readonly phone: string;
  readonly hours: string;
};

export type Fulfilment =
  | { readonly type: 'DELIVERY'; readonly deliveryAddress: string }
  | { readonly type: 'PICKUP'; readonly storeId: string };

export type PricedLine = {
  readonly sku: string;
  readonly name: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly memberPrice: number;
  readonly lineTotal: number;
};

export type OrderPricing = {
  readonly subtotal: number;
  readonly studentDiscount: number;
  readonly promoDiscount: number;
  readonly deliveryFee: number;
  readonly total: number;
};

export type Order = OrderPricing & {
  readonly orderId: string;
  readonly createdAt: Date;
  readonly customerEmail: string;
  readonly isVipOrder: boolean;
  readonly lines: readonly PricedLine[];
  readonly fulfilment: Fulfilment;
  readonly promoCode: string | null;
};

export type OrderRecordLine = {
  readonly sku: string;
  readonly name: string;
  readonly quantity: number;
  readonly unitPrice: string;
  readonly memberPrice: string;
  readonly lineTotal: string;
};

/**
 * Flattened order as persisted. Money is kept as fixed 2-decimal strings.
 */
export type OrderRecord = {
  readonly orderId: string;
  readonly email: string;
  readonly createdAt: string;
  readonly fulfilment: FulfilmentType;
  readonly deliveryAddress: string;
  readonly storeId: string;
  readonly promoCode: string | null;
  readonly subtotal: string;
  readonly studentDiscount: string;
  readonly promoDiscount: string;
  readonly deliveryFee: string;
  readonly total: string;
  readonly lines: readonly OrderRecordLine[];
};

export type OrderConfirmation = {
  readonly orderId: string;
  readonly total: number;
  readonly remainingFunds: number;
  readonly message: string;
};
