/**
 * CART
 *
 * Pure cart operations. A cart is an immutable value: every operation
 * returns either the failure or a new cart, so a rejected operation can
 * never leave a half-applied change behind.
 *
 * Lines reference catalog entries by SKU. Prices and stock are always read
 * from the catalog entries passed in, never copied into the cart.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {Cart, CartLine, CatalogEntry, PricedLine} from '../domain';
import {OrderingError, orderingError} from './errors';
import {roundMoney} from './money';

export const MAX_QUANTITY_PER_LINE = 10;
export const MAX_CART_QUANTITY = 20;

export type CartChange = {
  readonly cart: Cart;
  readonly message: string;
};

export type CartSummary = {
  readonly itemCount: number;
  readonly totalQuantity: number;
  readonly subtotal: number;
  readonly vipSavings: number;
  readonly isEmpty: boolean;
  readonly itemsRemaining: number;
};

// ============================================================================
// Reads
// ============================================================================

export function emptyCart(): Cart {
  return { lines: [] };
}

export function itemCount(cart: Cart): number {
  return cart.lines.length;
}

export function totalQuantity(cart: Cart): number {
  return cart.lines.reduce((sum, line) => sum + line.quantity, 0);
}

export function findLine(cart: Cart, sku: string): Maybe<CartLine> {
  return Maybe.fromNullable(cart.lines.find(line => line.sku === sku));
}

/**
 * Lines in the order they were added.
 */
export function cartLines(cart: Cart): CartLine[] {
  return [...cart.lines].sort((a, b) => a.addedAt.getTime() - b.addedAt.getTime());
}

export function effectivePrice(product: CatalogEntry, isVip: boolean): number {
  return isVip ? product.memberPrice : product.regularPrice;
}

// ============================================================================
// Mutations
// ============================================================================

function checkLineQuantity(quantity: number): Either<OrderingError, number> {
  if (!Number.isInteger(quantity) || quantity < 1 || quantity > MAX_QUANTITY_PER_LINE) {
    return Left(orderingError('InvalidQuantity', `Quantity must be between 1 and ${MAX_QUANTITY_PER_LINE}`));
  }
  return Right(quantity);
}

export function addItem(
  cart: Cart,
  product: CatalogEntry,
  quantity: number,
  addedAt: Date
): Either<OrderingError, CartChange> {
  return checkLineQuantity(quantity).chain((): Either<OrderingError, CartChange> => {
    if (product.stockQuantity <= 0) {
      return Left(orderingError('OutOfStock', `${product.name} is out of stock`));
    }
    if (quantity > product.stockQuantity) {
      return Left(orderingError('OutOfStock', `Only ${product.stockQuantity} units of ${product.name} available`));
    }
    if (findLine(cart, product.sku).isJust()) {
      return Left(orderingError(
        'DuplicateProduct',
        `${product.name} is already in cart. Use update to change quantity.`
      ));
    }

    const current = totalQuantity(cart);
    if (current + quantity > MAX_CART_QUANTITY) {
      const remaining = MAX_CART_QUANTITY - current;
      return Left(orderingError(
        'CartLimitExceeded',
        remaining > 0
          ? `Cart limit: only ${remaining} more items allowed (max ${MAX_CART_QUANTITY} total)`
          : `Cart is full (max ${MAX_CART_QUANTITY} items)`
      ));
    }

    return Right({
      cart: { lines: [...cart.lines, { sku: product.sku, quantity, addedAt }] },
      message: `Added ${quantity} × ${product.name} to cart`,
    });
  });
}

export function updateQuantity(
  cart: Cart,
  sku: string,
  newQuantity: number,
  products: Record<string, CatalogEntry>
): Either<OrderingError, CartChange> {
  return findLine(cart, sku)
    .toEither(orderingError('NotFound', 'Product not found in cart'))
    .chain(line => checkLineQuantity(newQuantity).map(() => line))
    .chain((line): Either<OrderingError, CartChange> => {
      if (totalQuantity(cart) + (newQuantity - line.quantity) > MAX_CART_QUANTITY) {
        return Left(orderingError('CartLimitExceeded', `Cart limit exceeded (max ${MAX_CART_QUANTITY} total items)`));
      }

      const product = products[sku];
      if (!product) {
        return Left(orderingError('NotFound', `Product with SKU ${sku} not found`));
      }
      if (newQuantity > product.stockQuantity) {
        return Left(orderingError('OutOfStock', `Only ${product.stockQuantity} units available`));
      }

      return Right({
        cart: {
          lines: cart.lines.map(l => (l.sku === sku ? { ...l, quantity: newQuantity } : l)),
        },
        message: `Updated quantity to ${newQuantity}`,
      });
    });
}

export function removeItem(
  cart: Cart,
  sku: string,
  products: Record<string, CatalogEntry>
): Either<OrderingError, CartChange> {
  return findLine(cart, sku)
    .toEither(orderingError('NotFound', 'Product not found in cart'))
    .map(() => ({
      cart: { lines: cart.lines.filter(line => line.sku !== sku) },
      message: `Removed ${products[sku]?.name ?? sku} from cart`,
    }));
}

export function clearCart(): Cart {
  return emptyCart();
}

// ============================================================================
// Stock validation
// ============================================================================

export function validateLineStock(
  line: CartLine,
  product: CatalogEntry | undefined
): Either<OrderingError, CartLine> {
  if (!product) {
    return Left(orderingError('OutOfStock', `Product ${line.sku} is no longer available`));
  }
  if (product.stockQuantity <= 0) {
    return Left(orderingError('OutOfStock', `${product.name} is out of stock`));
  }
  if (line.quantity > product.stockQuantity) {
    return Left(orderingError('OutOfStock', `Only ${product.stockQuantity} units of ${product.name} available`));
  }
  return Right(line);
}

/**
 * Re-checks every line against live stock, stopping at the first failure.
 */
export function validateAllStock(
  cart: Cart,
  products: Record<string, CatalogEntry>
): Either<OrderingError, Cart> {
  return cartLines(cart).reduce<Either<OrderingError, Cart>>(
    (acc, line) => acc.chain(() => validateLineStock(line, products[line.sku]).map(() => cart)),
    Right(cart)
  );
}

// ============================================================================
// Pricing
// ============================================================================

export function priceCartLines(
  cart: Cart,
  products: Record<string, CatalogEntry>,
  isVip: boolean
): { lines: PricedLine[]; missingSkus: Maybe<string[]> } {
  const result = cartLines(cart).reduce<{ lines: PricedLine[]; missingSkus: string[] }>(
    (acc, line) => {
      const product = products[line.sku];

      if (!product) {
        return { ...acc, missingSkus: [...acc.missingSkus, line.sku] };
      }

      return {
        ...acc,
        lines: [...acc.lines, {
          sku: product.sku,
          name: product.name,
          quantity: line.quantity,
          unitPrice: product.regularPrice,
          memberPrice: product.memberPrice,
          lineTotal: roundMoney(effectivePrice(product, isVip) * line.quantity),
        }],
      };
    },
    { lines: [], missingSkus: [] }
  );

  return {
    lines: result.lines,
    missingSkus: Maybe.fromPredicate(skus => skus.length > 0, result.missingSkus),
  };
}

export function sumLineTotals(lines: readonly PricedLine[]): number {
  return roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));
}

export function calculateCartSubtotal(
  cart: Cart,
  products: Record<string, CatalogEntry>,
  isVip: boolean
): number {
  return sumLineTotals(priceCartLines(cart, products, isVip).lines);
}

export function calculateVipSavings(cart: Cart, products: Record<string, CatalogEntry>): number {
  return roundMoney(
    calculateCartSubtotal(cart, products, false) - calculateCartSubtotal(cart, products, true)
  );
}

export function cartSummary(
  cart: Cart,
  products: Record<string, CatalogEntry>,
  isVip: boolean
): CartSummary {
  return {
    itemCount: itemCount(cart),
    totalQuantity: totalQuantity(cart),
    subtotal: calculateCartSubtotal(cart, products, isVip),
    vipSavings: isVip ? calculateVipSavings(cart, products) : 0,
    isEmpty: cart.lines.length === 0,
    itemsRemaining: MAX_CART_QUANTITY - totalQuantity(cart),
  };
}
