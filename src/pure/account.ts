/**
 * CUSTOMER ACCOUNT
 *
 * Funds top-up and VIP membership rules. Pure: the caller supplies "now"
 * and persists whatever comes back.
 */

import {Either, Left, Right} from 'purify-ts';
import {Customer, CustomerSnapshot, VipMembership} from '../domain';
import {OrderingError, orderingError} from './errors';
import {formatMoney, roundMoney} from './money';

export const MAX_TOP_UP = 1000.0;
export const VIP_COST_PER_YEAR = 20.0;

const DAY_MS = 24 * 60 * 60 * 1000;

export type MembershipChange = {
  readonly funds: number;
  readonly membership: VipMembership;
  readonly message: string;
};

export function isVip(customer: Customer, now: Date): boolean {
  const membership = customer.vipMembership;
  return membership !== null && !membership.cancelled && membership.expiresAt.getTime() > now.getTime();
}

export function toCustomerSnapshot(customer: Customer, now: Date): CustomerSnapshot {
  return {
    email: customer.email,
    isStudent: customer.isStudent,
    isVip: isVip(customer, now),
  };
}

export function topUpFunds(funds: number, amount: number): Either<OrderingError, number> {
  if (!(amount > 0)) {
    return Left(orderingError('InvalidAmount', 'Top-up amount must be greater than $0.00'));
  }
  if (amount > MAX_TOP_UP) {
    return Left(orderingError('InvalidAmount', `Top-up amount cannot exceed ${formatMoney(MAX_TOP_UP)} per transaction`));
  }
  return Right(roundMoney(funds + amount));
}

function addYears(from: Date, years: number): Date {
  return new Date(from.getTime() + 365 * years * DAY_MS);
}

export function purchaseVip(customer: Customer, years: number, now: Date): Either<OrderingError, MembershipChange> {
  if (!Number.isInteger(years) || years <= 0) {
    return Left(orderingError('InvalidQuantity', 'Years must be a positive whole number.'));
  }

  const cost = roundMoney(VIP_COST_PER_YEAR * years);
  if (customer.funds < cost) {
    return Left(orderingError(
      'InsufficientFunds',
      `Insufficient funds. Need ${formatMoney(cost)}, have ${formatMoney(customer.funds)}.`
    ));
  }

  const current = customer.vipMembership;
  const membership: VipMembership = current && isVip(customer, now)
    ? { ...current, years: current.years + years, expiresAt: addYears(current.expiresAt, years) }
    : { years, purchasedAt: now, expiresAt: addYears(now, years), cancelled: false };

  return Right({
    funds: roundMoney(customer.funds - cost),
    membership,
    message: `VIP membership ${current && isVip(customer, now) ? 'renewed' : 'purchased'}. `
      + `Expires: ${membership.expiresAt.toISOString().slice(0, 10)}`,
  });
}

/**
 * Cancelling is non-refundable and ends the membership immediately.
 */
export function cancelVip(customer: Customer, now: Date): Either<OrderingError, VipMembership> {
  const current = customer.vipMembership;
  if (!current || !isVip(customer, now)) {
    return Left(orderingError('MembershipRule', 'No active VIP membership to cancel.'));
  }
  return Right({ ...current, cancelled: true, expiresAt: now });
}
