import { BillingInterval, SubscriptionStatus } from '../entities/subscription.enums';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Length of one billing period. Periods are counted in whole days so that
 * a period always has the same length regardless of the calendar month.
 */
export const BILLING_INTERVAL_DAYS: Record<BillingInterval, number> = {
    [BillingInterval.MONTHLY]: 30,
    [BillingInterval.QUARTERLY]: 90,
    [BillingInterval.YEARLY]: 365,
};

export function addDays(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

export function addBillingInterval(date: Date, interval: BillingInterval): Date {
    return addDays(date, BILLING_INTERVAL_DAYS[interval]);
}

/**
 * The subset of a subscription the period rules look at.
 */
export interface SubscriptionPeriod {
    status: SubscriptionStatus;
    endsAt: Date;
    autoRenew: boolean;
}

/**
 * TRIAL and ACTIVE are the only statuses that count towards the
 * one-subscription-per-tenant rule.
 */
export function isNonTerminal(status: SubscriptionStatus): boolean {
    return status === SubscriptionStatus.TRIAL || status === SubscriptionStatus.ACTIVE;
}

/**
 * Whether the subscription currently grants its plan's limits.
 *
 * An auto-renewing subscription stays live past `endsAt` until its renewal
 * invoice is settled. A cancelled subscription keeps access until `endsAt`.
 */
export function isSubscriptionLive(subscription: SubscriptionPeriod, now: Date): boolean {
    const withinPeriod = subscription.endsAt.getTime() > now.getTime();
    if (isNonTerminal(subscription.status)) {
        return withinPeriod || subscription.autoRenew;
    }
    return subscription.status === SubscriptionStatus.CANCELLED && withinPeriod;
}

export function isExpiryDue(subscription: SubscriptionPeriod, now: Date): boolean {
    return (
        isNonTerminal(subscription.status) &&
        !subscription.autoRenew &&
        subscription.endsAt.getTime() < now.getTime()
    );
}

/**
 * Returns why the subscription cannot be renewed at `now`, or undefined when it can.
 */
export function getRenewalBlocker(subscription: SubscriptionPeriod, now: Date): string | undefined {
    if (!isNonTerminal(subscription.status)) {
        return `Only TRIAL or ACTIVE subscriptions can be renewed, this one is ${subscription.status}`;
    }
    if (!subscription.autoRenew) {
        return 'Auto-renew is switched off for this subscription';
    }
    if (now.getTime() < subscription.endsAt.getTime()) {
        return `The current period runs until ${subscription.endsAt.toISOString().slice(0, 10)}`;
    }
    return undefined;
}

/**
 * Start of the period a settled renewal pays for. An ACTIVE subscription
 * settled before its period ran out continues from `endsAt`; a trial or a
 * lapsed period starts again from `now`.
 */
export function getRenewalPeriodStart(subscription: SubscriptionPeriod, now: Date): Date {
    if (subscription.status === SubscriptionStatus.ACTIVE && subscription.endsAt.getTime() >= now.getTime()) {
        return subscription.endsAt;
    }
    return now;
}

export interface InitialPeriod {
    status: SubscriptionStatus;
    endsAt: Date;
    trialEndsAt: Date | null;
}

/**
 * A plan with trial days starts in TRIAL for that many days; otherwise the
 * subscription is ACTIVE for one billing interval.
 */
export function getInitialPeriod(
    plan: { trialDays: number; billingInterval: BillingInterval },
    now: Date,
): InitialPeriod {
    if (plan.trialDays > 0) {
        const trialEndsAt = addDays(now, plan.trialDays);
        return { status: SubscriptionStatus.TRIAL, endsAt: trialEndsAt, trialEndsAt };
    }
    return {
        status: SubscriptionStatus.ACTIVE,
        endsAt: addBillingInterval(now, plan.billingInterval),
        trialEndsAt: null,
    };
}
