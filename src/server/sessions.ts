import {Cart} from '../domain';
import {emptyCart} from '../pure/cart';

/**
 * Carts held for the lifetime of the server, one per customer email.
 */
export class CartSessionStore {
  private readonly carts = new Map<string, Cart>();

  private static key(email: string): string {
    return email.trim().toLowerCase();
  }

  get(email: string): Cart {
    return this.carts.get(CartSessionStore.key(email)) ?? emptyCart();
  }

  set(email: string, cart: Cart): void {
    this.carts.set(CartSessionStore.key(email), cart);
  }
}
