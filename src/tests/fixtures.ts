import {Either} from 'purify-ts';
import {Cart, CatalogEntry, Customer, CustomerSnapshot} from '../domain';
import {OrderingError} from '../pure/errors';

export const T0 = new Date('2026-03-01T10:00:00.000Z');

export function entry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
  return {
    sku: 'BAK-001',
    name: 'Sourdough Loaf',
    category: 'Bakery',
    regularPrice: 10,
    memberPrice: 8,
    stockQuantity: 50,
    ...overrides,
  };
}

export const loaf = entry();
export const milk = entry({ sku: 'DAI-001', name: 'Milk 2L', category: 'Dairy', regularPrice: 3.1, memberPrice: 2.8, stockQuantity: 40 });
export const chocolate = entry({ sku: 'SNK-001', name: 'Dark Chocolate', category: 'Snacks', regularPrice: 4.5, memberPrice: 4, stockQuantity: 0 });

export function productsOf(...entries: CatalogEntry[]): Record<string, CatalogEntry> {
  return Object.fromEntries(entries.map(e => [e.sku, e]));
}

export function cartOf(...lines: Array<[string, number]>): Cart {
  return {
    lines: lines.map(([sku, quantity], index) => ({
      sku,
      quantity,
      addedAt: new Date(T0.getTime() + index * 1000),
    })),
  };
}

export function customer(overrides: Partial<Customer> = {}): Customer {
  return {
    email: 'student@example.com',
    firstName: 'Sam',
    lastName: 'Student',
    funds: 100,
    isStudent: true,
    address: '8 College Walk, Springfield',
    vipMembership: null,
    ...overrides,
  };
}

export const studentSnapshot: CustomerSnapshot = { email: 'student@example.com', isStudent: true, isVip: false };
export const regularSnapshot: CustomerSnapshot = { email: 'shopper@example.com', isStudent: false, isVip: false };

export function errorOf<T>(result: Either<OrderingError, T>): OrderingError {
  return result.caseOf({
    Left: error => error,
    Right: value => {
      throw new Error(`Expected a failure, got ${JSON.stringify(value)}`);
    },
  });
}
