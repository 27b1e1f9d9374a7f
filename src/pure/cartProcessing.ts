/**
 * CART PROCESSING - Coordinator
 *
 * Looks up the catalog entries a cart operation needs, then hands them to
 * the pure cart functions. The cart itself is owned by the caller.
 */

import {Either, Left} from 'purify-ts';
import {Cart, CatalogEntry} from '../domain';
import {
  addItem,
  CartChange,
  cartSummary,
  CartSummary,
  removeItem,
  updateQuantity,
  validateAllStock,
} from './cart';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';

type CartEffects = Pick<AppEffects, 'catalog' | 'clock'>;

export function fetchCartProducts(
  cart: Cart
): (effects: Pick<AppEffects, 'catalog'>) => Promise<Record<string, CatalogEntry>> {
  return (effects) => effects.catalog.findBySkus(cart.lines.map(line => line.sku));
}

export function addProductBySku(
  cart: Cart,
  sku: string,
  quantity: number
): (effects: CartEffects) => Promise<Either<OrderingError, CartChange>> {
  return async (effects: CartEffects) => {
    const product = await effects.catalog.findBySku(sku);
    if (!product) {
      return Left(orderingError('NotFound', `Product with SKU ${sku} not found`));
    }
    return addItem(cart, product, quantity, effects.clock.now());
  };
}

export function updateProductQuantity(
  cart: Cart,
  sku: string,
  quantity: number
): (effects: CartEffects) => Promise<Either<OrderingError, CartChange>> {
  return async (effects: CartEffects) => {
    const products = await fetchCartProducts(cart)(effects);
    return updateQuantity(cart, sku, quantity, products);
  };
}

export function removeProduct(
  cart: Cart,
  sku: string
): (effects: CartEffects) => Promise<Either<OrderingError, CartChange>> {
  return async (effects: CartEffects) => {
    const products = await fetchCartProducts(cart)(effects);
    return removeItem(cart, sku, products);
  };
}

export function summarizeCart(
  cart: Cart,
  isVip: boolean
): (effects: CartEffects) => Promise<CartSummary> {
  return async (effects: CartEffects) => cartSummary(cart, await fetchCartProducts(cart)(effects), isVip);
}

/**
 * A cart is ready for checkout when it has lines and every line is covered
 * by live stock.
 * @return either the first problem found or the catalog entries of the cart
 */
export function validateCheckoutReady(
  cart: Cart
): (effects: Pick<AppEffects, 'catalog'>) => Promise<Either<OrderingError, Record<string, CatalogEntry>>> {
  return async (effects) => {
    if (cart.lines.length === 0) {
      return Left(orderingError('EmptyCart', 'Cart is empty'));
    }
    const products = await fetchCartProducts(cart)(effects);
    return validateAllStock(cart, products).map(() => products);
  };
}
