/**
 * Donation Ledger - Integration Tests
 *
 * End-to-end flows across registry, donations, admin and queries.
 */

import { createFoodLedger, FoodLedger, signRequest, unwrap } from '../index';
import { ManualClock } from '../types/common';
import { DonationErrorCode, DonationStatus } from '../types/donation';
import { LedgerEventType } from '../types/events';
import { silentLogger } from '../utils/logger';

const T0 = Date.UTC(2024, 0, 1);
const HOUR = 60 * 60 * 1000;

const bread = {
  title: 'Sourdough',
  description: 'Twelve loaves from today',
  quantity: 5,
  locationNote: 'Rear entrance, ring bell',
};

describe('Food donation ledger', () => {
  let food: FoodLedger;
  let clock: ManualClock;

  beforeEach(async () => {
    clock = new ManualClock(T0);
    food = await createFoodLedger({
      ledgerId: 'integration-ledger',
      admin: 'admin',
      clock,
      logger: silentLogger,
    });
    await food.registry.registerDonor('dana', 'Dana Bakery', 'dana@example.org');
  });

  test('offer, claim, complete; a second claim is refused', async () => {
    const created = await food.donations.createDonation('dana', bread);
    expect(created.status).toBe(DonationStatus.AVAILABLE);
    expect(created.recipient).toBeUndefined();

    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    const claimed = await food.donations.claimDonation('rico', created.id);
    expect(claimed.status).toBe(DonationStatus.CLAIMED);
    expect(claimed.recipient).toBe('rico');

    const completed = await food.donations.completeDonation('rico', created.id);
    expect(completed.status).toBe(DonationStatus.COMPLETED);

    await expect(food.donations.claimDonation('rico', created.id))
      .rejects.toMatchObject({ code: DonationErrorCode.NOT_AVAILABLE });
  });

  test('a scheduled offer opens at its start time', async () => {
    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    const created = await food.donations.createDonation('dana', {
      ...bread,
      availableFrom: T0 + HOUR,
    });

    await expect(food.donations.claimDonation('rico', created.id))
      .rejects.toMatchObject({ code: DonationErrorCode.NOT_YET_AVAILABLE });

    clock.advance(HOUR + 1);
    const claimed = await food.donations.claimDonation('rico', created.id);
    expect(claimed.status).toBe(DonationStatus.CLAIMED);
  });

  test('a cancelled offer can be neither claimed nor picked up', async () => {
    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    const created = await food.donations.createDonation('dana', bread);

    const cancelled = await food.donations.cancelDonation('dana', created.id, 'Sold in store');
    expect(cancelled.status).toBe(DonationStatus.CANCELLED);

    await expect(food.donations.claimDonation('rico', created.id))
      .rejects.toMatchObject({ code: DonationErrorCode.NOT_AVAILABLE });
    await expect(food.donations.markPickedUp('dana', created.id))
      .rejects.toMatchObject({ code: DonationErrorCode.INVALID_TRANSITION });
  });

  test('an unrelated identity cannot report pickup', async () => {
    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    const created = await food.donations.createDonation('dana', bread);
    await food.donations.claimDonation('rico', created.id);

    await expect(food.donations.markPickedUp('mallory', created.id))
      .rejects.toMatchObject({ code: DonationErrorCode.UNAUTHORIZED });
    expect(food.queries.getDonation(created.id)?.status).toBe(DonationStatus.CLAIMED);
  });

  test('admin cancels a donation that was already picked up', async () => {
    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    const created = await food.donations.createDonation('dana', bread);
    await food.donations.claimDonation('rico', created.id);
    await food.donations.markPickedUp('rico', created.id);

    const cancelled = await food.admin.adminForceCancel('admin', created.id, 'Recipient disputes delivery');

    expect(cancelled.status).toBe(DonationStatus.CANCELLED);
  });

  test('signed requests resolve to the identities the ledger records', async () => {
    const keys = unwrap(food.crypto.generateKeyPair());
    const request = unwrap(
      signRequest(
        food.crypto,
        {
          publicKey: keys.publicKey,
          operation: 'registerRecipient',
          payload: { name: 'Keyed Kitchen', contact: 'kitchen@example.org' },
          issuedAt: clock.now(),
        },
        keys.secretKey
      )
    );

    const caller = unwrap(food.identity.resolve(request));
    await food.registry.registerRecipient(caller, 'Keyed Kitchen', 'kitchen@example.org');
    const created = await food.donations.createDonation('dana', bread);
    const claimed = await food.donations.claimDonation(caller, created.id);

    expect(caller).toBe(food.crypto.deriveIdentityId(keys.publicKey));
    expect(claimed.recipient).toBe(caller);
  });

  test('the event log tells the whole story', async () => {
    await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
    await food.donations.createDonation('dana', bread);
    await food.donations.claimDonation('rico', 1);
    await food.donations.markPickedUp('rico', 1);
    await food.donations.completeDonation('dana', 1);
    await food.registry.unregisterRecipient('rico');

    const events = await food.ledger.getEvents();

    expect(events.map((e) => e.type)).toEqual([
      LedgerEventType.DONOR_REGISTERED,
      LedgerEventType.RECIPIENT_REGISTERED,
      LedgerEventType.DONATION_CREATED,
      LedgerEventType.DONATION_CLAIMED,
      LedgerEventType.DONATION_PICKED_UP,
      LedgerEventType.DONATION_COMPLETED,
      LedgerEventType.RECIPIENT_UNREGISTERED,
    ]);
    expect(events.map((e) => e.sequenceNumber)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(food.queries.donationsForRecipient('rico').map((d) => d.status)).toEqual([
      DonationStatus.COMPLETED,
    ]);
    await expect(food.ledger.verifyEventLog()).resolves.toEqual({ valid: true, length: 7 });
  });
});
