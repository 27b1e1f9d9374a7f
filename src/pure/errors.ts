/**
 * ORDERING ERRORS
 *
 * Expected failures are returned as values (Left) rather than thrown.
 * Every error carries the message shown to the customer. Persistence
 * failures also keep the thrown error, when there was one, as `cause`.
 */

export type ErrorCategory =
  | 'ValidationError'
  | 'NotFoundError'
  | 'BusinessRuleViolation'
  | 'PersistenceError';

const categories = {
  InvalidQuantity: 'ValidationError',
  InvalidPrice: 'ValidationError',
  InvalidAmount: 'ValidationError',
  MissingField: 'ValidationError',
  FulfilmentNotSet: 'ValidationError',
  NotFound: 'NotFoundError',
  UnknownPromoCode: 'NotFoundError',
  UnknownStore: 'NotFoundError',
  OutOfStock: 'BusinessRuleViolation',
  DuplicateProduct: 'BusinessRuleViolation',
  DuplicatePromotion: 'BusinessRuleViolation',
  CartLimitExceeded: 'BusinessRuleViolation',
  EmptyCart: 'BusinessRuleViolation',
  InsufficientFunds: 'BusinessRuleViolation',
  PromotionIneligible: 'BusinessRuleViolation',
  MembershipRule: 'BusinessRuleViolation',
  FundsUpdateFailed: 'PersistenceError',
  MembershipUpdateFailed: 'PersistenceError',
  StockCommitFailed: 'PersistenceError',
  OrderSaveFailed: 'PersistenceError',
} as const satisfies Record<string, ErrorCategory>;

export type ErrorKind = keyof typeof categories;

export type OrderingError = {
  readonly kind: ErrorKind;
  readonly message: string;
  readonly cause?: unknown;
};

export function orderingError(kind: ErrorKind, message: string, cause?: unknown): OrderingError {
  return cause === undefined ? { kind, message } : { kind, message, cause };
}

export function errorCategory(kind: ErrorKind): ErrorCategory {
  return categories[kind];
}
