import {OrderRecord, VipMembership} from '../domain';
import {InMemoryCustomerRepository, makeInMemoryEffects} from '../effects/InMemoryEffects';
import {cancelVip, isVip, purchaseVip, toCustomerSnapshot, topUpFunds} from '../pure/account';
import {buyVipMembership, cancelVipMembership, findOrder, orderHistory, topUp} from '../pure/accountProcessing';
import {customer, errorOf, T0} from './fixtures';

const activeMembership: VipMembership = {
  years: 1,
  purchasedAt: new Date('2026-01-10T09:00:00.000Z'),
  expiresAt: new Date('2027-01-10T09:00:00.000Z'),
  cancelled: false,
};

const member = customer({ email: 'member@example.com', funds: 250, isStudent: false, vipMembership: activeMembership });

describe('isVip', () => {
  it('is true only for an active, uncancelled membership', () => {
    expect(isVip(customer(), T0)).toBe(false);
    expect(isVip(member, T0)).toBe(true);
    expect(isVip({ ...member, vipMembership: { ...activeMembership, cancelled: true } }, T0)).toBe(false);
    expect(isVip(member, new Date('2027-02-01T00:00:00.000Z'))).toBe(false);
  });

  it('carries the flag into the customer snapshot', () => {
    expect(toCustomerSnapshot(member, T0)).toEqual({ email: 'member@example.com', isStudent: false, isVip: true });
  });
});

describe('topUpFunds', () => {
  it('adds the amount', () => {
    expect(topUpFunds(10, 25.5).unsafeCoerce()).toBe(35.5);
    expect(topUpFunds(10, 1000).unsafeCoerce()).toBe(1010);
  });

  it('rejects amounts of zero or less', () => {
    expect(errorOf(topUpFunds(10, 0))).toEqual({
      kind: 'InvalidAmount',
      message: 'Top-up amount must be greater than $0.00',
    });
  });

  it('rejects amounts over the per-transaction limit', () => {
    expect(errorOf(topUpFunds(10, 1000.01))).toEqual({
      kind: 'InvalidAmount',
      message: 'Top-up amount cannot exceed $1000.00 per transaction',
    });
  });
});

describe('purchaseVip', () => {
  it('starts a new membership from now', () => {
    const change = purchaseVip(customer(), 2, T0).unsafeCoerce();

    expect(change.funds).toBe(60);
    expect(change.membership).toEqual({
      years: 2,
      purchasedAt: T0,
      expiresAt: new Date('2028-02-29T10:00:00.000Z'),
      cancelled: false,
    });
    expect(change.message).toBe('VIP membership purchased. Expires: 2028-02-29');
  });

  it('extends an active membership from its expiry', () => {
    const change = purchaseVip(member, 1, T0).unsafeCoerce();

    expect(change.funds).toBe(230);
    expect(change.membership.years).toBe(2);
    expect(change.membership.expiresAt).toEqual(new Date('2028-01-10T09:00:00.000Z'));
    expect(change.message).toBe('VIP membership renewed. Expires: 2028-01-10');
  });

  it('requires enough funds', () => {
    expect(errorOf(purchaseVip(customer({ funds: 10 }), 1, T0))).toEqual({
      kind: 'InsufficientFunds',
      message: 'Insufficient funds. Need $20.00, have $10.00.',
    });
  });

  it.each([0, -1, 1.5])('rejects %p years', (years) => {
    expect(errorOf(purchaseVip(customer(), years, T0))).toEqual({
      kind: 'InvalidQuantity',
      message: 'Years must be a positive whole number.',
    });
  });
});

describe('cancelVip', () => {
  it('expires the membership immediately', () => {
    expect(cancelVip(member, T0).unsafeCoerce()).toEqual({ ...activeMembership, cancelled: true, expiresAt: T0 });
  });

  it('requires an active membership', () => {
    expect(errorOf(cancelVip(customer(), T0))).toEqual({
      kind: 'MembershipRule',
      message: 'No active VIP membership to cancel.',
    });
  });
});

class RejectingMembershipRepository extends InMemoryCustomerRepository {
  async setMembership(): Promise<boolean> {
    return false;
  }
}

describe('account coordinators', () => {
  const record: OrderRecord = {
    orderId: 'ORD-AAAA0001',
    email: 'student@example.com',
    createdAt: '2026-02-01T12:00:00.000Z',
    fulfilment: 'PICKUP',
    deliveryAddress: '',
    storeId: 'CITY01',
    promoCode: null,
    subtotal: '10.00',
    studentDiscount: '0.50',
    promoDiscount: '0.00',
    deliveryFee: '0.00',
    total: '9.50',
    lines: [{ sku: 'BAK-001', name: 'Sourdough Loaf', quantity: 1, unitPrice: '10.00', memberPrice: '8.00', lineTotal: '10.00' }],
  };

  function testEffects() {
    return makeInMemoryEffects(
      { catalog: [], customers: [customer(), member], stores: [], orders: [record] },
      { clock: { now: () => T0 } }
    );
  }

  it('tops up and persists the new balance', async () => {
    const effects = testEffects();

    const result = await topUp('student@example.com', 50)(effects);

    expect(result.unsafeCoerce()).toEqual({ funds: 150, message: 'Added $50.00. New balance: $150.00' });
    expect(await effects.customers.getFunds('student@example.com')).toBe(150);
  });

  it('fails to top up an unknown customer', async () => {
    expect(errorOf(await topUp('nobody@example.com', 50)(testEffects()))).toEqual({
      kind: 'NotFound',
      message: 'Customer nobody@example.com not found',
    });
  });

  it('leaves funds alone when the top-up is invalid', async () => {
    const effects = testEffects();

    await topUp('student@example.com', 5000)(effects);

    expect(await effects.customers.getFunds('student@example.com')).toBe(100);
  });

  it('buys and then cancels a membership', async () => {
    const effects = testEffects();

    const bought = await buyVipMembership('student@example.com', 1)(effects);
    expect(bought.unsafeCoerce().funds).toBe(80);
    const afterPurchase = await effects.customers.findByEmail('student@example.com');
    expect(afterPurchase?.vipMembership?.expiresAt).toEqual(new Date('2027-03-01T10:00:00.000Z'));

    const cancelled = await cancelVipMembership('member@example.com')(effects);
    expect(cancelled.unsafeCoerce().message).toBe('VIP membership cancelled (non-refundable).');
    const afterCancel = await effects.customers.findByEmail('member@example.com');
    expect(afterCancel?.vipMembership?.cancelled).toBe(true);
    expect(afterCancel?.vipMembership?.expiresAt).toEqual(T0);
  });

  it('refunds the purchase when the membership cannot be recorded', async () => {
    const customers = new RejectingMembershipRepository([customer()]);
    const effects = makeInMemoryEffects(undefined, { customers, clock: { now: () => T0 } });

    const result = await buyVipMembership('student@example.com', 1)(effects);

    expect(errorOf(result)).toEqual({
      kind: 'MembershipUpdateFailed',
      message: 'Could not update VIP membership. You have not been charged.',
    });
    expect(await customers.getFunds('student@example.com')).toBe(100);
    expect((await customers.findByEmail('student@example.com'))?.vipMembership).toBeNull();
  });

  it('reports a cancellation that could not be recorded', async () => {
    const customers = new RejectingMembershipRepository([member]);
    const effects = makeInMemoryEffects(undefined, { customers, clock: { now: () => T0 } });

    expect(errorOf(await cancelVipMembership('member@example.com')(effects))).toEqual({
      kind: 'MembershipUpdateFailed',
      message: 'Could not update VIP membership.',
    });
  });

  it('lists a customer order history', async () => {
    expect(await orderHistory('student@example.com')(testEffects())).toEqual([record]);
    expect(await orderHistory('member@example.com')(testEffects())).toEqual([]);
  });

  it('finds orders by id', async () => {
    expect((await findOrder('ORD-AAAA0001')(testEffects())).unsafeCoerce()).toEqual(record);
    expect(errorOf(await findOrder('ORD-MISSING')(testEffects()))).toEqual({
      kind: 'NotFound',
      message: 'Order ORD-MISSING not found',
    });
  });
});
