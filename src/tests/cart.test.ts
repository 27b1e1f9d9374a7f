/**
 * TESTS FOR CART OPERATIONS
 *
 * Pure functions only: a cart and catalog entries in, a new cart or an
 * error out.
 */

import {Cart} from '../domain';
import {
  addItem,
  calculateCartSubtotal,
  cartLines,
  cartSummary,
  emptyCart,
  priceCartLines,
  removeItem,
  totalQuantity,
  updateQuantity,
  validateAllStock,
} from '../pure/cart';
import {cartOf, chocolate, entry, errorOf, loaf, milk, productsOf, T0} from './fixtures';

describe('addItem', () => {
  it('adds a new line with the requested quantity', () => {
    const result = addItem(emptyCart(), loaf, 3, T0);

    expect(result.isRight()).toBe(true);
    const change = result.unsafeCoerce();
    expect(change.cart.lines).toEqual([{ sku: 'BAK-001', quantity: 3, addedAt: T0 }]);
    expect(change.message).toBe('Added 3 × Sourdough Loaf to cart');
  });

  it('rejects an out-of-stock product and leaves the cart empty', () => {
    const cart = emptyCart();
    const result = addItem(cart, chocolate, 1, T0);

    expect(errorOf(result)).toEqual({ kind: 'OutOfStock', message: 'Dark Chocolate is out of stock' });
    expect(cart.lines).toHaveLength(0);
  });

  it.each([0, 11, 2.5, -1])('rejects quantity %p', (quantity) => {
    expect(errorOf(addItem(emptyCart(), loaf, quantity, T0))).toEqual({
      kind: 'InvalidQuantity',
      message: 'Quantity must be between 1 and 10',
    });
  });

  it('rejects more units than are in stock', () => {
    const scarce = entry({ stockQuantity: 2 });

    expect(errorOf(addItem(emptyCart(), scarce, 3, T0))).toEqual({
      kind: 'OutOfStock',
      message: 'Only 2 units of Sourdough Loaf available',
    });
  });

  it('rejects a product that is already in the cart', () => {
    expect(errorOf(addItem(cartOf(['BAK-001', 1]), loaf, 1, T0))).toEqual({
      kind: 'DuplicateProduct',
      message: 'Sourdough Loaf is already in cart. Use update to change quantity.',
    });
  });

  it('reports how many more items fit under the cart limit', () => {
    const cart = cartOf(['X-1', 10], ['X-2', 8]);

    expect(errorOf(addItem(cart, milk, 5, T0))).toEqual({
      kind: 'CartLimitExceeded',
      message: 'Cart limit: only 2 more items allowed (max 20 total)',
    });
  });

  it('reports a full cart', () => {
    const cart = cartOf(['X-1', 10], ['X-2', 10]);

    expect(errorOf(addItem(cart, milk, 1, T0))).toEqual({
      kind: 'CartLimitExceeded',
      message: 'Cart is full (max 20 items)',
    });
  });

  it('accepts an add that exactly reaches the limit', () => {
    const result = addItem(cartOf(['X-1', 10], ['X-2', 8]), milk, 2, T0);

    expect(result.isRight()).toBe(true);
    expect(totalQuantity(result.unsafeCoerce().cart)).toBe(20);
  });
});

describe('updateQuantity', () => {
  const products = productsOf(loaf, milk);

  it('replaces the quantity of an existing line', () => {
    const result = updateQuantity(cartOf(['BAK-001', 2]), 'BAK-001', 5, products);

    const change = result.unsafeCoerce();
    expect(change.cart.lines[0].quantity).toBe(5);
    expect(change.message).toBe('Updated quantity to 5');
  });

  it('fails for a product not in the cart', () => {
    expect(errorOf(updateQuantity(emptyCart(), 'BAK-001', 1, products))).toEqual({
      kind: 'NotFound',
      message: 'Product not found in cart',
    });
  });

  it('fails when the new quantity exceeds stock', () => {
    const scarce = entry({ stockQuantity: 4 });

    expect(errorOf(updateQuantity(cartOf(['BAK-001', 2]), 'BAK-001', 5, productsOf(scarce)))).toEqual({
      kind: 'OutOfStock',
      message: 'Only 4 units available',
    });
  });

  it('fails when the change would exceed the cart limit', () => {
    const cart = cartOf(['X-1', 10], ['X-2', 5], ['X-3', 5]);

    expect(errorOf(updateQuantity(cart, 'X-2', 6, products))).toEqual({
      kind: 'CartLimitExceeded',
      message: 'Cart limit exceeded (max 20 total items)',
    });
  });

  it('fails when the product has left the catalog', () => {
    expect(errorOf(updateQuantity(cartOf(['GONE-1', 1]), 'GONE-1', 2, products))).toEqual({
      kind: 'NotFound',
      message: 'Product with SKU GONE-1 not found',
    });
  });
});

describe('removeItem', () => {
  it('removes the line and names the product', () => {
    const change = removeItem(cartOf(['BAK-001', 2], ['DAI-001', 1]), 'BAK-001', productsOf(loaf, milk)).unsafeCoerce();

    expect(change.cart.lines.map(line => line.sku)).toEqual(['DAI-001']);
    expect(change.message).toBe('Removed Sourdough Loaf from cart');
  });

  it('falls back to the SKU when the product is gone', () => {
    expect(removeItem(cartOf(['BAK-001', 2]), 'BAK-001', {}).unsafeCoerce().message).toBe('Removed BAK-001 from cart');
  });

  it('fails for a product not in the cart', () => {
    expect(errorOf(removeItem(emptyCart(), 'BAK-001', {}))).toEqual({
      kind: 'NotFound',
      message: 'Product not found in cart',
    });
  });
});

describe('cartLines', () => {
  it('returns lines in the order they were added', () => {
    const cart: Cart = {
      lines: [
        { sku: 'B', quantity: 1, addedAt: new Date('2026-03-01T10:05:00.000Z') },
        { sku: 'A', quantity: 1, addedAt: new Date('2026-03-01T10:00:00.000Z') },
      ],
    };

    expect(cartLines(cart).map(line => line.sku)).toEqual(['A', 'B']);
  });
});

describe('validateAllStock', () => {
  it('passes when every line is covered', () => {
    const cart = cartOf(['BAK-001', 3], ['DAI-001', 2]);

    expect(validateAllStock(cart, productsOf(loaf, milk)).isRight()).toBe(true);
  });

  it('reports the first line that is short', () => {
    const cart = cartOf(['BAK-001', 3], ['SNK-001', 1]);

    expect(errorOf(validateAllStock(cart, productsOf(loaf, chocolate)))).toEqual({
      kind: 'OutOfStock',
      message: 'Dark Chocolate is out of stock',
    });
  });

  it('reports products that left the catalog', () => {
    expect(errorOf(validateAllStock(cartOf(['BAK-001', 1]), {}))).toEqual({
      kind: 'OutOfStock',
      message: 'Product BAK-001 is no longer available',
    });
  });
});

describe('pricing', () => {
  const products = productsOf(loaf, milk);

  it('prices lines at the regular price for non-members', () => {
    const { lines } = priceCartLines(cartOf(['BAK-001', 3]), products, false);

    expect(lines).toEqual([
      { sku: 'BAK-001', name: 'Sourdough Loaf', quantity: 3, unitPrice: 10, memberPrice: 8, lineTotal: 30 },
    ]);
  });

  it('prices lines at the member price for VIP customers', () => {
    const { lines } = priceCartLines(cartOf(['BAK-001', 3]), products, true);

    expect(lines[0].lineTotal).toBe(24);
  });

  it('rounds each line total to cents', () => {
    const { lines } = priceCartLines(cartOf(['DAI-001', 3]), products, false);

    expect(lines[0].lineTotal).toBe(9.3);
  });

  it('collects SKUs that are missing from the catalog', () => {
    const { lines, missingSkus } = priceCartLines(cartOf(['BAK-001', 1], ['GONE-1', 2]), products, false);

    expect(lines).toHaveLength(1);
    expect(missingSkus.extract()).toEqual(['GONE-1']);
  });

  it('summarizes the cart for a non-member', () => {
    expect(cartSummary(cartOf(['BAK-001', 3], ['DAI-001', 3]), products, false)).toEqual({
      itemCount: 2,
      totalQuantity: 6,
      subtotal: 39.3,
      vipSavings: 0,
      isEmpty: false,
      itemsRemaining: 14,
    });
  });

  it('shows VIP savings to members', () => {
    const summary = cartSummary(cartOf(['BAK-001', 3], ['DAI-001', 3]), products, true);

    expect(summary.subtotal).toBe(32.4);
    expect(summary.vipSavings).toBe(6.9);
  });

  it('summarizes an empty cart', () => {
    expect(cartSummary(emptyCart(), products, false)).toEqual({
      itemCount: 0,
      totalQuantity: 0,
      subtotal: 0,
      vipSavings: 0,
      isEmpty: true,
      itemsRemaining: 20,
    });
  });
});

describe('cart properties', () => {
  const apples = entry({ sku: 'FRU-001', name: 'Apples 1kg', regularPrice: 5.5, memberPrice: 4.95 });
  const products = productsOf(loaf, milk, apples);

  it.each([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])('grows the total quantity by exactly %p', (quantity) => {
    const cart = cartOf(['DAI-001', 2]);

    const grown = addItem(cart, loaf, quantity, T0).unsafeCoerce().cart;

    expect(totalQuantity(grown) - totalQuantity(cart)).toBe(quantity);
  });

  it('leaves a full cart unchanged when an add is rejected', () => {
    const cart = cartOf(['BAK-001', 10], ['DAI-001', 10]);
    const before = cartOf(['BAK-001', 10], ['DAI-001', 10]);

    const result = addItem(cart, apples, 1, T0);

    expect(errorOf(result)).toEqual({ kind: 'CartLimitExceeded', message: 'Cart is full (max 20 items)' });
    expect(cart).toEqual(before);
  });

  it.each([
    ['one line', cartOf(['BAK-001', 1])],
    ['two lines', cartOf(['BAK-001', 3], ['DAI-001', 7])],
    ['three lines', cartOf(['BAK-001', 10], ['DAI-001', 1], ['FRU-001', 9])],
    ['an empty cart', cartOf()],
  ])('never prices %s higher for a VIP', (_label, cart) => {
    expect(calculateCartSubtotal(cart, products, true)).toBeLessThanOrEqual(calculateCartSubtotal(cart, products, false));
  });
});
