/**
 * HTTP ROUTES
 *
 * Each handler takes the parsed parts of a request and returns a status
 * and JSON body. Expected failures come back as values from the
 * coordinators and are mapped to 4xx/5xx responses here; handlers never
 * throw for them.
 */

import {Either, Right} from 'purify-ts';
import {Cart, Customer} from '../domain';
import {isVip, toCustomerSnapshot} from '../pure/account';
import {buyVipMembership, cancelVipMembership, findOrder, orderHistory, topUp} from '../pure/accountProcessing';
import {CartChange, cartLines, clearCart} from '../pure/cart';
import {addProductBySku, removeProduct, summarizeCart, updateProductQuantity} from '../pure/cartProcessing';
import {addProduct, editEntry, listCatalog, removeFromCatalog} from '../pure/catalogProcessing';
import {checkout, quoteOrder} from '../pure/checkoutProcessing';
import {AppEffects} from '../pure/effects';
import {orderingError, OrderingError} from '../pure/errors';
import {buildOrderSummary, toOrderRecord} from '../pure/orderRecords';
import {describePromotion, discountPercentage, PromotionStrategy} from '../pure/promotions';
import {bestPromotion, eligiblePromotions, registerPromotion} from '../pure/promotionValidation';
import {failure, HttpResponse, ok, parseWith, toResponse} from './http';
import {
  CartItemBodySchema,
  CatalogEntryBodySchema,
  CatalogPatchBodySchema,
  CheckoutBodySchema,
  FulfilmentQuerySchema,
  PromotionBodySchema,
  QuantityBodySchema,
  TopUpBodySchema,
  VipBodySchema,
} from './schemas';
import {CartSessionStore} from './sessions';

export type ApiRequest = {
  readonly params: Record<string, string>;
  readonly query: Record<string, unknown>;
  readonly body: unknown;
};

export type Handler = (request: ApiRequest) => Promise<HttpResponse>;

export type Route = {
  readonly method: 'get' | 'post' | 'patch' | 'delete';
  readonly path: string;
  readonly handler: Handler;
};

function presentPromotion(strategy: PromotionStrategy) {
  return {
    code: strategy.code,
    description: strategy.description,
    requirements: strategy.requirements,
    percentage: discountPercentage(strategy),
    summary: describePromotion(strategy),
  };
}

export function createRoutes(effects: AppEffects, sessions: CartSessionStore): Route[] {
  async function withCustomer(
    email: string,
    handle: (customer: Customer) => Promise<HttpResponse>
  ): Promise<HttpResponse> {
    const customer = await effects.customers.findByEmail(email);
    return customer ? handle(customer) : failure(orderingError('NotFound', `Customer ${email} not found`));
  }

  async function presentCart(customer: Customer, cart: Cart) {
    const summary = await summarizeCart(cart, isVip(customer, effects.clock.now()))(effects);
    return {
      lines: cartLines(cart).map(line => ({ sku: line.sku, quantity: line.quantity })),
      summary,
    };
  }

  async function applyCartChange(
    customer: Customer,
    change: Either<OrderingError, CartChange>
  ): Promise<HttpResponse> {
    return change.caseOf<Promise<HttpResponse>>({
      Left: (error) => Promise.resolve(failure(error)),
      Right: async ({ cart, message }) => {
        sessions.set(customer.email, cart);
        return ok({ message, ...(await presentCart(customer, cart)) });
      },
    });
  }

  // ==========================================================================
  // Catalog
  // ==========================================================================

  const catalogRoutes: Route[] = [
    {
      method: 'get',
      path: '/api/catalog',
      handler: async () => ok(await listCatalog()(effects)),
    },
    {
      method: 'post',
      path: '/api/catalog',
      handler: ({ body }) => parseWith(CatalogEntryBodySchema, body, async ({ replace, ...entry }) =>
        toResponse(await addProduct(entry, replace)(effects), change => change, 201)
      ),
    },
    {
      method: 'patch',
      path: '/api/catalog/:sku',
      handler: ({ params, body }) => parseWith(CatalogPatchBodySchema, body, async ({ regularPrice, memberPrice, stockQuantity }) =>
        toResponse(await editEntry(params.sku, {
          prices: regularPrice !== undefined && memberPrice !== undefined ? { regularPrice, memberPrice } : undefined,
          stockQuantity,
        })(effects))
      ),
    },
    {
      method: 'delete',
      path: '/api/catalog/:sku',
      handler: async ({ params }) =>
        toResponse(await removeFromCatalog(params.sku)(effects), message => ({ message })),
    },
  ];

  // ==========================================================================
  // Stores and promotions
  // ==========================================================================

  const directoryRoutes: Route[] = [
    {
      method: 'get',
      path: '/api/stores',
      handler: async () => ok(await effects.stores.findAll()),
    },
    {
      method: 'get',
      path: '/api/promotions',
      handler: async () => ok(effects.promotions.all().map(presentPromotion)),
    },
    {
      method: 'post',
      path: '/api/promotions',
      handler: ({ body }) => parseWith(PromotionBodySchema, body, async (input) =>
        toResponse(registerPromotion(input)(effects), presentPromotion, 201)
      ),
    },
    {
      method: 'get',
      path: '/api/customers/:email/promotions',
      handler: ({ params, query }) => parseWith(FulfilmentQuerySchema, query, ({ fulfilment }) =>
        withCustomer(params.email, async (customer) => {
          const snapshot = toCustomerSnapshot(customer, effects.clock.now());
          const eligible = await eligiblePromotions(snapshot, fulfilment)(effects);
          const summary = await summarizeCart(sessions.get(customer.email), snapshot.isVip)(effects);
          const best = await bestPromotion(
            eligible.map(strategy => strategy.code),
            snapshot,
            fulfilment,
            summary.subtotal
          )(effects);
          return ok({
            fulfilment,
            eligible: eligible.map(presentPromotion),
            best: best.map(({ strategy, discount }) => ({ code: strategy.code, discount })).extractNullable(),
          });
        })
      ),
    },
  ];

  // ==========================================================================
  // Cart
  // ==========================================================================

  const cartRoutes: Route[] = [
    {
      method: 'get',
      path: '/api/customers/:email/cart',
      handler: ({ params }) => withCustomer(params.email, async (customer) =>
        ok(await presentCart(customer, sessions.get(customer.email)))
      ),
    },
    {
      method: 'post',
      path: '/api/customers/:email/cart/items',
      handler: ({ params, body }) => parseWith(CartItemBodySchema, body, ({ sku, quantity }) =>
        withCustomer(params.email, async (customer) => {
          const cart = sessions.get(customer.email);
          return applyCartChange(customer, await addProductBySku(cart, sku.trim().toUpperCase(), quantity)(effects));
        })
      ),
    },
    {
      method: 'patch',
      path: '/api/customers/:email/cart/items/:sku',
      handler: ({ params, body }) => parseWith(QuantityBodySchema, body, ({ quantity }) =>
        withCustomer(params.email, async (customer) => {
          const cart = sessions.get(customer.email);
          return applyCartChange(customer, await updateProductQuantity(cart, params.sku.toUpperCase(), quantity)(effects));
        })
      ),
    },
    {
      method: 'delete',
      path: '/api/customers/:email/cart/items/:sku',
      handler: ({ params }) => withCustomer(params.email, async (customer) => {
        const cart = sessions.get(customer.email);
        return applyCartChange(customer, await removeProduct(cart, params.sku.toUpperCase())(effects));
      }),
    },
    {
      method: 'delete',
      path: '/api/customers/:email/cart',
      handler: ({ params }) => withCustomer(params.email, async (customer) =>
        applyCartChange(customer, Right<CartChange, OrderingError>({ cart: clearCart(), message: 'Cart cleared' }))
      ),
    },
  ];

  // ==========================================================================
  // Checkout
  // ==========================================================================

  const checkoutRoutes: Route[] = [
    {
      method: 'post',
      path: '/api/customers/:email/checkout/quote',
      handler: ({ params, body }) => parseWith(CheckoutBodySchema, body, async ({ fulfilment, promoCode }) => {
        const quote = await quoteOrder({
          email: params.email,
          cart: sessions.get(params.email),
          fulfilment,
          promoCode,
        })(effects);
        return toResponse(quote, order => ({ order: toOrderRecord(order), summary: buildOrderSummary(order) }));
      }),
    },
    {
      method: 'post',
      path: '/api/customers/:email/checkout',
      handler: ({ params, body }) => parseWith(CheckoutBodySchema, body, async ({ fulfilment, promoCode }) => {
        const placed = await checkout({
          email: params.email,
          cart: sessions.get(params.email),
          fulfilment,
          promoCode,
        })(effects);
        placed.ifRight(result => {
          sessions.set(params.email, result.cart);
          console.log(`🛒 Order ${result.confirmation.orderId} placed for ${params.email}`);
        });
        return toResponse(placed, result => ({
          ...result.confirmation,
          order: toOrderRecord(result.order),
          summary: buildOrderSummary(result.order),
        }), 201);
      }),
    },
  ];

  // ==========================================================================
  // Account and order history
  // ==========================================================================

  const accountRoutes: Route[] = [
    {
      method: 'post',
      path: '/api/customers/:email/funds',
      handler: ({ params, body }) => parseWith(TopUpBodySchema, body, async ({ amount }) =>
        toResponse(await topUp(params.email, amount)(effects))
      ),
    },
    {
      method: 'post',
      path: '/api/customers/:email/vip',
      handler: ({ params, body }) => parseWith(VipBodySchema, body, async ({ years }) =>
        toResponse(await buyVipMembership(params.email, years)(effects))
      ),
    },
    {
      method: 'delete',
      path: '/api/customers/:email/vip',
      handler: async ({ params }) => toResponse(await cancelVipMembership(params.email)(effects)),
    },
    {
      method: 'get',
      path: '/api/customers/:email/orders',
      handler: ({ params }) => withCustomer(params.email, async (customer) =>
        ok(await orderHistory(customer.email)(effects))
      ),
    },
    {
      method: 'get',
      path: '/api/orders/:orderId',
      handler: async ({ params }) => toResponse(await findOrder(params.orderId)(effects)),
    },
  ];

  return [
    {
      method: 'get',
      path: '/health',
      handler: async () => ok({ status: 'healthy', service: 'retail-ordering-engine' }),
    },
    ...catalogRoutes,
    ...directoryRoutes,
    ...cartRoutes,
    ...checkoutRoutes,
    ...accountRoutes,
  ];
}
