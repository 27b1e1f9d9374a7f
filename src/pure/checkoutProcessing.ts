/**
 * CHECKOUT PROCESSING - Coordinator
 *
 * 1. Gather inputs (customer, live catalog entries, store, promotion)
 * 2. Assemble and price the order (pure)
 * 3. Place it (see orderPlacement)
 */

import {Either, Left, Right} from 'purify-ts';
import {Cart, CatalogEntry, Customer, CustomerSnapshot, Fulfilment, Order, OrderConfirmation} from '../domain';
import {toCustomerSnapshot} from './account';
import {emptyCart} from './cart';
import {validateCheckoutReady} from './cartProcessing';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';
import {addItemsFromCart, applyPromotion, buildOrder, OrderIdentity, setDelivery, setPickup, startOrder} from './orderAssembly';
import {placeOrder} from './orderPlacement';
import {PromotionStrategy} from './promotions';
import {validatePromotion} from './promotionValidation';

export type FulfilmentChoice =
  | { readonly type: 'DELIVERY'; readonly deliveryAddress?: string }
  | { readonly type: 'PICKUP'; readonly storeId: string };

export type CheckoutRequest = {
  readonly email: string;
  readonly cart: Cart;
  readonly fulfilment: FulfilmentChoice;
  readonly promoCode: string | null;
};

export type CheckoutResult = {
  readonly order: Order;
  readonly confirmation: OrderConfirmation;
  /** The customer's cart after checkout, always empty. */
  readonly cart: Cart;
};

type CheckoutInputs = {
  readonly customer: CustomerSnapshot;
  readonly products: Record<string, CatalogEntry>;
  readonly fulfilment: Fulfilment;
  readonly promotion: PromotionStrategy | null;
};

/**
 * Build and price the order the customer would place, without placing it.
 */
export function quoteOrder(
  request: CheckoutRequest
): (effects: AppEffects) => Promise<Either<OrderingError, Order>> {
  return async (effects: AppEffects) => {
    const inputs = await gatherCheckoutInputs(request)(effects);
    return inputs.chain(details => assembleOrder(request.cart, details, {
      orderId: effects.orderIds.next(),
      createdAt: effects.clock.now(),
    }));
  };
}

/**
 * Quote the order and place it. On success the returned cart is empty.
 */
export function checkout(
  request: CheckoutRequest
): (effects: AppEffects) => Promise<Either<OrderingError, CheckoutResult>> {
  return async (effects: AppEffects) => {
    const quote = await quoteOrder(request)(effects);
    return quote.caseOf<Promise<Either<OrderingError, CheckoutResult>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (order) => {
        const placed = await placeOrder(order)(effects);
        return placed.map(confirmation => ({ order, confirmation, cart: emptyCart() }));
      },
    });
  };
}

function gatherCheckoutInputs(
  request: CheckoutRequest
): (effects: AppEffects) => Promise<Either<OrderingError, CheckoutInputs>> {
  return async (effects: AppEffects) => {
    const customer = await effects.customers.findByEmail(request.email);
    if (!customer) {
      return Left(orderingError('NotFound', `Customer ${request.email} not found`));
    }
    const snapshot = toCustomerSnapshot(customer, effects.clock.now());

    const promotionCheck: Promise<Either<OrderingError, PromotionStrategy | null>> =
      request.promoCode && request.promoCode.trim().length > 0
        ? validatePromotion(request.promoCode, snapshot, request.fulfilment.type)(effects)
        : Promise.resolve(Right(null));

    const [ready, fulfilment, promotion] = await Promise.all([
      validateCheckoutReady(request.cart)(effects),
      resolveFulfilment(request.fulfilment, customer)(effects),
      promotionCheck,
    ]);

    return ready.chain(products =>
      fulfilment.chain(resolved =>
        promotion.map(strategy => ({
          customer: snapshot,
          products,
          fulfilment: resolved,
          promotion: strategy,
        }))
      )
    );
  };
}

function resolveFulfilment(
  choice: FulfilmentChoice,
  customer: Customer
): (effects: Pick<AppEffects, 'stores'>) => Promise<Either<OrderingError, Fulfilment>> {
  return async (effects) => {
    if (choice.type === 'DELIVERY') {
      const deliveryAddress = (choice.deliveryAddress ?? customer.address).trim();
      if (deliveryAddress.length === 0) {
        return Left(orderingError('MissingField', 'No delivery address on file'));
      }
      const delivery: Fulfilment = { type: 'DELIVERY', deliveryAddress };
      return Right(delivery);
    }

    const store = await effects.stores.findById(choice.storeId.trim().toUpperCase());
    if (!store) {
      return Left(orderingError('UnknownStore', `Invalid store ID: ${choice.storeId}`));
    }
    const pickup: Fulfilment = { type: 'PICKUP', storeId: store.storeId };
    return Right(pickup);
  };
}

function assembleOrder(
  cart: Cart,
  inputs: CheckoutInputs,
  identity: OrderIdentity
): Either<OrderingError, Order> {
  const started = startOrder(inputs.customer);
  const fulfilled = inputs.fulfilment.type === 'DELIVERY'
    ? setDelivery(started, inputs.fulfilment.deliveryAddress)
    : setPickup(started, inputs.fulfilment.storeId);
  const withItems = addItemsFromCart(fulfilled, cart, inputs.products);
  return buildOrder(applyPromotion(withItems, inputs.promotion), identity);
}
