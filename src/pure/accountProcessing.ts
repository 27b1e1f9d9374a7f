/**
 * ACCOUNT PROCESSING - Coordinator
 *
 * Funds top-up, VIP purchase and cancellation, and order history.
 */

import {Either, Left, Right} from 'purify-ts';
import {Customer, OrderRecord, VipMembership} from '../domain';
import {EffectsError} from '../effects/EffectsError';
import {cancelVip, MembershipChange, purchaseVip, topUpFunds} from './account';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';
import {formatMoney} from './money';

type AccountEffects = Pick<AppEffects, 'customers' | 'clock'>;

export type TopUpResult = {
  readonly funds: number;
  readonly message: string;
};

export type CancellationResult = {
  readonly membership: VipMembership;
  readonly message: string;
};

function findCustomer(
  email: string
): (effects: Pick<AppEffects, 'customers'>) => Promise<Either<OrderingError, Customer>> {
  return async (effects) => {
    const customer = await effects.customers.findByEmail(email);
    return customer ? Right(customer) : Left(orderingError('NotFound', `Customer ${email} not found`));
  };
}

export function topUp(
  email: string,
  amount: number
): (effects: AccountEffects) => Promise<Either<OrderingError, TopUpResult>> {
  return async (effects: AccountEffects) => {
    const customer = await findCustomer(email)(effects);
    const funds = customer.chain(found => topUpFunds(found.funds, amount));
    return funds.caseOf<Promise<Either<OrderingError, TopUpResult>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (newFunds) => {
        if (!(await effects.customers.setFunds(email, newFunds))) {
          return Left(orderingError('FundsUpdateFailed', 'Could not update customer funds.'));
        }
        return Right({ funds: newFunds, message: `Added ${formatMoney(amount)}. New balance: ${formatMoney(newFunds)}` });
      },
    });
  };
}

/**
 * Charge for the membership, then record it. When the membership cannot be
 * recorded the charge is refunded.
 * @throws EffectsError when the refund itself fails
 */
export function buyVipMembership(
  email: string,
  years: number
): (effects: AccountEffects) => Promise<Either<OrderingError, MembershipChange>> {
  return async (effects: AccountEffects) => {
    const customer = await findCustomer(email)(effects);
    const change = customer.chain(found =>
      purchaseVip(found, years, effects.clock.now()).map(purchased => ({ previousFunds: found.funds, purchased }))
    );
    return change.caseOf<Promise<Either<OrderingError, MembershipChange>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async ({ previousFunds, purchased }) => {
        if (!(await effects.customers.setFunds(email, purchased.funds))) {
          return Left(orderingError('FundsUpdateFailed', 'Could not update customer funds.'));
        }
        if (!(await effects.customers.setMembership(email, purchased.membership))) {
          if (!(await effects.customers.setFunds(email, previousFunds))) {
            throw new EffectsError(`VIP purchase for ${email} incomplete`, [
              new Error(`refund ${formatMoney(previousFunds - purchased.funds)}: rejected`),
            ]);
          }
          return Left(orderingError('MembershipUpdateFailed', 'Could not update VIP membership. You have not been charged.'));
        }
        return Right(purchased);
      },
    });
  };
}

export function cancelVipMembership(
  email: string
): (effects: AccountEffects) => Promise<Either<OrderingError, CancellationResult>> {
  return async (effects: AccountEffects) => {
    const customer = await findCustomer(email)(effects);
    const cancelled = customer.chain(found => cancelVip(found, effects.clock.now()));
    return cancelled.caseOf<Promise<Either<OrderingError, CancellationResult>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: async (membership) => {
        if (!(await effects.customers.setMembership(email, membership))) {
          return Left(orderingError('MembershipUpdateFailed', 'Could not update VIP membership.'));
        }
        return Right({ membership, message: 'VIP membership cancelled (non-refundable).' });
      },
    });
  };
}

export function orderHistory(
  email: string
): (effects: Pick<AppEffects, 'orders'>) => Promise<OrderRecord[]> {
  return (effects) => effects.orders.findByEmail(email);
}

export function findOrder(
  orderId: string
): (effects: Pick<AppEffects, 'orders'>) => Promise<Either<OrderingError, OrderRecord>> {
  return async (effects) => {
    const record = await effects.orders.findById(orderId);
    return record ? Right(record) : Left(orderingError('NotFound', `Order ${orderId} not found`));
  };
}
