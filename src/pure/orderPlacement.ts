/**
 * ORDER PLACEMENT - The Coordinator
 *
 * Commits a built Order against shared state:
 * 1. Check funds and live stock (no effects performed yet)
 * 2. Debit funds, decrement stock line by line, append the order record
 * 3. If any write in step 2 fails, undo the writes already made
 *
 * Placement is all-or-nothing. A customer is never charged for an order
 * that was not saved, and stock is never taken for an order that failed.
 */

import {Either, EitherAsync, Left, Right} from 'purify-ts';
import {Order, OrderConfirmation, PricedLine} from '../domain';
import {EffectsError} from '../effects/EffectsError';
import {AppEffects} from './effects';
import {OrderingError, orderingError} from './errors';
import {formatMoney, roundMoney} from './money';
import {toOrderRecord} from './orderRecords';

type PlacementEffects = Pick<AppEffects, 'catalog' | 'customers' | 'orders'>;

/**
 * Place the given order.
 * @return a function that places the order using the given effects,
 * returning either the first failure or the confirmation
 * @throws EffectsError when a failed placement could not be undone
 */
export function placeOrder(
  order: Order
): (effects: PlacementEffects) => Promise<Either<OrderingError, OrderConfirmation>> {
  return async (effects: PlacementEffects) => {
    const funds = await checkOrderCanBePlaced(order)(effects);
    return funds.caseOf<Promise<Either<OrderingError, OrderConfirmation>>>({
      Left: (error) => Promise.resolve(Left(error)),
      Right: (available) => commitOrder(order, available)(effects),
    });
  };
}

/**
 * Check the customer can pay and every line is still in stock.
 * @return either the failure or the customer's current funds
 */
function checkOrderCanBePlaced(
  order: Order
): (effects: PlacementEffects) => Promise<Either<OrderingError, number>> {
  return async (effects: PlacementEffects) => {
    const funds = await effects.customers.getFunds(order.customerEmail);
    if (funds === null) {
      return Left(orderingError('NotFound', `Customer ${order.customerEmail} not found`));
    }
    if (funds < order.total) {
      return Left(orderingError(
        'InsufficientFunds',
        `Insufficient funds. Please top up (balance ${formatMoney(funds)}, order total ${formatMoney(order.total)}).`
      ));
    }

    const stock = await Promise.all(order.lines.map(line => effects.catalog.currentStock(line.sku)));
    const shortLine = order.lines.find((line, index) => (stock[index] ?? 0) < line.quantity);
    if (shortLine) {
      const available = stock[order.lines.indexOf(shortLine)] ?? 0;
      return Left(orderingError('OutOfStock', `Only ${available} units of ${shortLine.name} available`));
    }

    return Right(funds);
  };
}

/**
 * Perform the writes for a checked order, undoing them on the first failure.
 */
function commitOrder(
  order: Order,
  funds: number
): (effects: PlacementEffects) => Promise<Either<OrderingError, OrderConfirmation>> {
  return async (effects: PlacementEffects) => {
    const remainingFunds = roundMoney(funds - order.total);

    const debited = await attempt(() => effects.customers.setFunds(order.customerEmail, remainingFunds));
    if (debited.isLeft()) {
      return Left(orderingError('FundsUpdateFailed', 'Could not update customer funds.', debited.extract()));
    }

    const decremented: PricedLine[] = [];
    for (const line of order.lines) {
      const taken = await attempt(() => effects.catalog.decrementStock(line.sku, line.quantity));
      if (taken.isLeft()) {
        await rollback(order, funds, decremented)(effects);
        return Left(orderingError('StockCommitFailed', `Could not update stock for ${line.name}.`, taken.extract()));
      }
      decremented.push(line);
    }

    const saved = await attempt(() => effects.orders.append(toOrderRecord(order)));
    if (saved.isLeft()) {
      await rollback(order, funds, decremented)(effects);
      return Left(orderingError('OrderSaveFailed', 'Failed to save order.', saved.extract()));
    }

    return Right({
      orderId: order.orderId,
      total: order.total,
      remainingFunds,
      message: 'Order placed successfully.',
    });
  };
}

/**
 * Restore stock for the given lines and the customer's original funds.
 * @throws EffectsError listing every compensation that failed
 */
function rollback(
  order: Order,
  funds: number,
  decremented: readonly PricedLine[]
): (effects: PlacementEffects) => Promise<void> {
  return async (effects: PlacementEffects) => {
    const compensations = [
      ...decremented.map(line => ({
        description: `restore ${line.quantity} × ${line.sku}`,
        run: () => effects.catalog.restoreStock(line.sku, line.quantity),
      })),
      {
        description: `restore funds for ${order.customerEmail}`,
        run: () => effects.customers.setFunds(order.customerEmail, funds),
      },
    ];

    const results = await Promise.all(compensations.map(c => EitherAsync(c.run).run()));
    const errors = results.flatMap((result, index) => {
      const description = compensations[index]?.description ?? 'compensation';
      return result.caseOf({
        Left: (err) => [new Error(`${description}: ${err instanceof Error ? err.message : String(err)}`)],
        Right: (ok) => (ok ? [] : [new Error(`${description}: rejected`)]),
      });
    });
    if (errors.length) throw new EffectsError(`Rollback of order ${order.orderId} incomplete`, errors);
  };
}

/**
 * Run a write, treating both a thrown error and a false result as failure.
 * @return on failure, whatever the write threw (undefined when it returned false)
 */
async function attempt(write: () => Promise<boolean>): Promise<Either<unknown, true>> {
  const result = await EitherAsync(write).run();
  return result.chain((ok): Either<unknown, true> => (ok ? Right(true) : Left(undefined)));
}
