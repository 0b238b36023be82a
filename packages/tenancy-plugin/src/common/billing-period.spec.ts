import { describe, expect, it } from 'vitest';

import { BillingInterval, SubscriptionStatus } from '../entities/subscription.enums';

import {
    addBillingInterval,
    getInitialPeriod,
    getRenewalBlocker,
    getRenewalPeriodStart,
    isExpiryDue,
    isSubscriptionLive,
} from './billing-period';

const now = new Date('2024-03-01T12:00:00.000Z');
const before = new Date('2024-02-20T12:00:00.000Z');
const after = new Date('2024-03-10T12:00:00.000Z');

describe('addBillingInterval()', () => {
    it('counts months as 30 days', () => {
        expect(addBillingInterval(now, BillingInterval.MONTHLY).toISOString()).toBe('2024-03-31T12:00:00.000Z');
    });

    it('counts quarters as 90 days', () => {
        expect(addBillingInterval(now, BillingInterval.QUARTERLY).toISOString()).toBe('2024-05-30T12:00:00.000Z');
    });

    it('counts years as 365 days', () => {
        expect(addBillingInterval(now, BillingInterval.YEARLY).toISOString()).toBe('2025-03-01T12:00:00.000Z');
    });
});

describe('getInitialPeriod()', () => {
    it('starts a trial when the plan has trial days', () => {
        const period = getInitialPeriod({ trialDays: 14, billingInterval: BillingInterval.MONTHLY }, now);
        expect(period.status).toBe(SubscriptionStatus.TRIAL);
        expect(period.endsAt.toISOString()).toBe('2024-03-15T12:00:00.000Z');
        expect(period.trialEndsAt?.toISOString()).toBe('2024-03-15T12:00:00.000Z');
    });

    it('starts ACTIVE for one interval without trial days', () => {
        const period = getInitialPeriod({ trialDays: 0, billingInterval: BillingInterval.YEARLY }, now);
        expect(period.status).toBe(SubscriptionStatus.ACTIVE);
        expect(period.endsAt.toISOString()).toBe('2025-03-01T12:00:00.000Z');
        expect(period.trialEndsAt).toBeNull();
    });
});

describe('isSubscriptionLive()', () => {
    it('is live within the period', () => {
        expect(isSubscriptionLive({ status: SubscriptionStatus.ACTIVE, endsAt: after, autoRenew: false }, now)).toBe(
            true,
        );
    });

    it('stays live past endsAt while auto-renew is on', () => {
        expect(isSubscriptionLive({ status: SubscriptionStatus.TRIAL, endsAt: before, autoRenew: true }, now)).toBe(
            true,
        );
    });

    it('is not live past endsAt without auto-renew', () => {
        expect(isSubscriptionLive({ status: SubscriptionStatus.ACTIVE, endsAt: before, autoRenew: false }, now)).toBe(
            false,
        );
    });

    it('keeps a cancelled subscription live until endsAt', () => {
        expect(
            isSubscriptionLive({ status: SubscriptionStatus.CANCELLED, endsAt: after, autoRenew: false }, now),
        ).toBe(true);
        expect(
            isSubscriptionLive({ status: SubscriptionStatus.CANCELLED, endsAt: before, autoRenew: false }, now),
        ).toBe(false);
    });

    it('is never live once EXPIRED', () => {
        expect(isSubscriptionLive({ status: SubscriptionStatus.EXPIRED, endsAt: after, autoRenew: true }, now)).toBe(
            false,
        );
    });
});

describe('isExpiryDue()', () => {
    it('is due for a lapsed subscription without auto-renew', () => {
        expect(isExpiryDue({ status: SubscriptionStatus.TRIAL, endsAt: before, autoRenew: false }, now)).toBe(true);
    });

    it('is not due while auto-renew is on', () => {
        expect(isExpiryDue({ status: SubscriptionStatus.ACTIVE, endsAt: before, autoRenew: true }, now)).toBe(false);
    });

    it('is not due for cancelled subscriptions', () => {
        expect(isExpiryDue({ status: SubscriptionStatus.CANCELLED, endsAt: before, autoRenew: false }, now)).toBe(
            false,
        );
    });

    it('is not due exactly at endsAt', () => {
        expect(isExpiryDue({ status: SubscriptionStatus.ACTIVE, endsAt: now, autoRenew: false }, now)).toBe(false);
    });
});

describe('getRenewalBlocker()', () => {
    it('allows renewal once the period has ended', () => {
        expect(
            getRenewalBlocker({ status: SubscriptionStatus.ACTIVE, endsAt: before, autoRenew: true }, now),
        ).toBeUndefined();
        expect(
            getRenewalBlocker({ status: SubscriptionStatus.ACTIVE, endsAt: now, autoRenew: true }, now),
        ).toBeUndefined();
    });

    it('refuses before the period has ended', () => {
        expect(getRenewalBlocker({ status: SubscriptionStatus.TRIAL, endsAt: after, autoRenew: true }, now)).toBe(
            'The current period runs until 2024-03-10',
        );
    });

    it('refuses without auto-renew', () => {
        expect(getRenewalBlocker({ status: SubscriptionStatus.ACTIVE, endsAt: before, autoRenew: false }, now)).toBe(
            'Auto-renew is switched off for this subscription',
        );
    });

    it('refuses terminal subscriptions', () => {
        expect(getRenewalBlocker({ status: SubscriptionStatus.EXPIRED, endsAt: before, autoRenew: true }, now)).toBe(
            'Only TRIAL or ACTIVE subscriptions can be renewed, this one is EXPIRED',
        );
    });
});

describe('getRenewalPeriodStart()', () => {
    it('continues an ACTIVE period settled before it ends', () => {
        expect(
            getRenewalPeriodStart({ status: SubscriptionStatus.ACTIVE, endsAt: after, autoRenew: true }, now),
        ).toBe(after);
    });

    it('restarts from now when the period has already lapsed', () => {
        expect(
            getRenewalPeriodStart({ status: SubscriptionStatus.ACTIVE, endsAt: before, autoRenew: true }, now),
        ).toBe(now);
    });

    it('restarts a trial from now', () => {
        expect(
            getRenewalPeriodStart({ status: SubscriptionStatus.TRIAL, endsAt: after, autoRenew: true }, now),
        ).toBe(now);
    });
});
