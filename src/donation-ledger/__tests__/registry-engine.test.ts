/**
 * Donation Ledger - Registry Engine Tests
 *
 * Donor/recipient registration, upsert semantics and removal.
 */

import { createFoodLedger, FoodLedger } from '../index';
import { ManualClock } from '../types/common';
import { RegistryErrorCode } from '../types/registry';
import { DonationErrorCode } from '../types/donation';
import { LedgerEventType } from '../types/events';
import { silentLogger } from '../utils/logger';

const T0 = Date.UTC(2024, 0, 1);

describe('RegistryEngine', () => {
  let food: FoodLedger;
  let clock: ManualClock;

  beforeEach(async () => {
    clock = new ManualClock(T0);
    food = await createFoodLedger({
      ledgerId: 'test-ledger',
      admin: 'admin',
      clock,
      logger: silentLogger,
    });
  });

  describe('Registration', () => {
    test('registers a donor profile', async () => {
      const profile = await food.registry.registerDonor('dana', 'Dana Bakery', 'dana@example.org');

      expect(profile).toEqual({
        identity: 'dana',
        name: 'Dana Bakery',
        contact: 'dana@example.org',
        registeredAt: T0,
        updatedAt: T0,
      });
      expect(food.registry.isRegisteredDonor('dana')).toBe(true);
      expect(food.registry.isRegisteredRecipient('dana')).toBe(false);
    });

    test('registering twice keeps one profile with the latest values', async () => {
      await food.registry.registerDonor('dana', 'Dana Bakery', 'old@example.org');
      clock.advance(1000);
      await food.registry.registerDonor('dana', 'Dana Bakery', 'new@example.org');

      expect(food.registry.getDonorCount()).toBe(1);
      expect(food.registry.getDonorProfile('dana')).toEqual({
        identity: 'dana',
        name: 'Dana Bakery',
        contact: 'new@example.org',
        registeredAt: T0,
        updatedAt: T0 + 1000,
      });
    });

    test('donor and recipient registries are independent', async () => {
      await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');

      expect(food.registry.isRegisteredRecipient('rico')).toBe(true);
      expect(food.registry.isRegisteredDonor('rico')).toBe(false);
      expect(food.registry.getRecipientProfile('rico')?.contact).toBe('555-0100');
      expect(food.registry.getRecipientCount()).toBe(1);
      expect(food.registry.getDonorCount()).toBe(0);
    });

    test('one identity can hold both roles', async () => {
      await food.registry.registerDonor('kim', 'Kim', 'kim@example.org');
      await food.registry.registerRecipient('kim', 'Kim', 'kim@example.org');

      expect(food.registry.isRegisteredDonor('kim')).toBe(true);
      expect(food.registry.isRegisteredRecipient('kim')).toBe(true);
    });

    test('rejects an empty identity', async () => {
      await expect(food.registry.registerDonor('  ', 'Nobody', ''))
        .rejects.toMatchObject({ code: RegistryErrorCode.INVALID_IDENTITY });
      expect(food.registry.getDonorCount()).toBe(0);
    });

    test('emits a registration notification', async () => {
      const events: string[] = [];
      food.ledger.subscribe((e) => events.push(e.type));

      await food.registry.registerDonor('dana', 'Dana Bakery', 'dana@example.org');
      await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');

      expect(events).toEqual([
        LedgerEventType.DONOR_REGISTERED,
        LedgerEventType.RECIPIENT_REGISTERED,
      ]);
    });
  });

  describe('Unregistration', () => {
    test('fails with NOT_REGISTERED when there is no profile', async () => {
      await expect(food.registry.unregisterDonor('ghost'))
        .rejects.toMatchObject({ code: RegistryErrorCode.NOT_REGISTERED });
      await expect(food.registry.unregisterRecipient('ghost'))
        .rejects.toMatchObject({ code: RegistryErrorCode.NOT_REGISTERED });
    });

    test('removes the profile', async () => {
      await food.registry.registerRecipient('rico', 'Rico Shelter', '555-0100');
      await food.registry.unregisterRecipient('rico');

      expect(food.registry.isRegisteredRecipient('rico')).toBe(false);
      expect(food.registry.getRecipientProfile('rico')).toBeUndefined();
    });

    test('keeps existing donations and indexes but blocks new offers', async () => {
      await food.registry.registerDonor('dana', 'Dana Bakery', 'dana@example.org');
      await food.donations.createDonation('dana', {
        title: 'Bread',
        description: 'Day-old loaves',
        quantity: 12,
        locationNote: 'Back door',
      });

      await food.registry.unregisterDonor('dana');

      const history = food.queries.donationsForDonor('dana');
      expect(history.map((d) => d.id)).toEqual([1]);
      expect(food.queries.getDonation(1)?.donor).toBe('dana');

      await expect(food.donations.createDonation('dana', {
        title: 'Rolls',
        description: '',
        quantity: 3,
        locationNote: '',
      })).rejects.toMatchObject({ code: DonationErrorCode.NOT_REGISTERED_DONOR });
    });
  });
});
