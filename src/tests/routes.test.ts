/**
 * TESTS FOR THE HTTP LAYER
 *
 * Handlers are called directly with parsed request parts; no server is
 * started.
 */

import {makeInMemoryEffects} from '../effects/InMemoryEffects';
import {orderingError} from '../pure/errors';
import {PromotionRegistry} from '../pure/promotions';
import {statusFor} from '../server/http';
import {ApiRequest, createRoutes, Route} from '../server/routes';
import {CartSessionStore} from '../server/sessions';
import {customer, loaf, milk, T0} from './fixtures';

function setup() {
  const effects = makeInMemoryEffects(
    {
      catalog: [loaf, milk],
      customers: [customer()],
      stores: [{ storeId: 'CITY01', name: 'City Central', address: '100 Main Street', phone: '555-0100', hours: 'Mon-Sun 7am-10pm' }],
      orders: [],
    },
    {
      promotions: new PromotionRegistry(),
      clock: { now: () => T0 },
      orderIds: { next: () => 'ORD-0000HTTP' },
    }
  );
  const sessions = new CartSessionStore();
  const routes = createRoutes(effects, sessions);

  function call(method: Route['method'], path: string, request: Partial<ApiRequest> = {}) {
    const route = routes.find(r => r.method === method && r.path === path);
    if (!route) {
      throw new Error(`No route for ${method} ${path}`);
    }
    return route.handler({ params: {}, query: {}, body: {}, ...request });
  }

  return { effects, sessions, call };
}

const student = { email: 'student@example.com' };

describe('statusFor', () => {
  it('maps error categories onto status codes', () => {
    expect(statusFor(orderingError('InvalidAmount', 'x'))).toBe(400);
    expect(statusFor(orderingError('NotFound', 'x'))).toBe(404);
    expect(statusFor(orderingError('OutOfStock', 'x'))).toBe(409);
    expect(statusFor(orderingError('OrderSaveFailed', 'x'))).toBe(500);
  });
});

describe('routes', () => {
  it('reports health', async () => {
    const { call } = setup();

    expect(await call('get', '/health')).toEqual({
      status: 200,
      body: { status: 'healthy', service: 'retail-ordering-engine' },
    });
  });

  it('answers 400 for a malformed catalog entry', async () => {
    const { call } = setup();

    const response = await call('post', '/api/catalog', { body: { sku: 'BAK-009' } });

    expect(response.status).toBe(400);
    expect(response.body).toEqual(expect.objectContaining({ error: 'Invalid request' }));
  });

  it('requires both prices together', async () => {
    const { call } = setup();

    const response = await call('patch', '/api/catalog/:sku', { params: { sku: 'BAK-001' }, body: { regularPrice: 12 } });

    expect(response).toEqual({
      status: 400,
      body: { error: 'Invalid request', details: ['regularPrice and memberPrice must be given together'] },
    });
  });

  it('applies prices and stock in one patch', async () => {
    const { call } = setup();

    const response = await call('patch', '/api/catalog/:sku', {
      params: { sku: 'BAK-001' },
      body: { regularPrice: 12, memberPrice: 9, stockQuantity: 7 },
    });

    expect(response).toEqual({
      status: 200,
      body: {
        entry: { ...loaf, regularPrice: 12, memberPrice: 9, stockQuantity: 7 },
        messages: ['Updated prices for Sourdough Loaf', 'Stock for Sourdough Loaf set to 7'],
      },
    });
  });

  it('leaves the entry untouched when a patch is rejected', async () => {
    const { call, effects } = setup();

    const response = await call('patch', '/api/catalog/:sku', {
      params: { sku: 'BAK-001' },
      body: { regularPrice: 99, memberPrice: 90, stockQuantity: -5 },
    });

    expect(response).toEqual({
      status: 400,
      body: { error: 'Stock quantity must be a whole number of 0 or more', kind: 'InvalidQuantity' },
    });
    expect(await effects.catalog.findBySku('BAK-001')).toEqual(loaf);
  });

  it('answers 404 for an unknown customer', async () => {
    const { call } = setup();

    expect(await call('get', '/api/customers/:email/cart', { params: { email: 'nobody@example.com' } })).toEqual({
      status: 404,
      body: { error: 'Customer nobody@example.com not found', kind: 'NotFound' },
    });
  });

  it('fills a cart and checks it out', async () => {
    const { call, sessions, effects } = setup();

    const added = await call('post', '/api/customers/:email/cart/items', {
      params: student,
      body: { sku: 'bak-001', quantity: 2 },
    });
    expect(added.status).toBe(200);
    expect(added.body).toEqual(expect.objectContaining({
      message: 'Added 2 × Sourdough Loaf to cart',
      lines: [{ sku: 'BAK-001', quantity: 2 }],
    }));

    const placed = await call('post', '/api/customers/:email/checkout', {
      params: student,
      body: { fulfilment: { type: 'PICKUP', storeId: 'CITY01' } },
    });
    expect(placed.status).toBe(201);
    expect(placed.body).toEqual(expect.objectContaining({
      orderId: 'ORD-0000HTTP',
      total: 19,
      remainingFunds: 81,
    }));
    expect(sessions.get('student@example.com').lines).toEqual([]);
    expect(await effects.catalog.currentStock('BAK-001')).toBe(48);
  });

  it('answers 409 when checking out an empty cart', async () => {
    const { call } = setup();

    const response = await call('post', '/api/customers/:email/checkout', {
      params: student,
      body: { fulfilment: { type: 'DELIVERY' } },
    });

    expect(response).toEqual({ status: 409, body: { error: 'Cart is empty', kind: 'EmptyCart' } });
  });

  it('tops up funds', async () => {
    const { call } = setup();

    expect((await call('post', '/api/customers/:email/funds', { params: student, body: { amount: 'ten' } })).status).toBe(400);
    expect(await call('post', '/api/customers/:email/funds', { params: student, body: { amount: 20 } })).toEqual({
      status: 200,
      body: { funds: 120, message: 'Added $20.00. New balance: $120.00' },
    });
  });

  it('registers promotions once', async () => {
    const { call } = setup();
    const body = { code: 'welcome10', variant: 'FLAT', description: '10% off products subtotal', discountRate: 0.1 };

    const created = await call('post', '/api/promotions', { body });
    const repeated = await call('post', '/api/promotions', { body });

    expect(created.status).toBe(201);
    expect(created.body).toEqual(expect.objectContaining({ code: 'WELCOME10', percentage: 10 }));
    expect(repeated).toEqual({
      status: 409,
      body: { error: 'Promotion code WELCOME10 already exists', kind: 'DuplicatePromotion' },
    });
  });

  it('answers 404 for an unknown order', async () => {
    const { call } = setup();

    expect((await call('get', '/api/orders/:orderId', { params: { orderId: 'ORD-NOPE' } })).status).toBe(404);
  });
});
