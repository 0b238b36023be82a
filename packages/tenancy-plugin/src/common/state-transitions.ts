import { InvoiceStatus } from '../entities/invoice.enums';
import { PaymentVerificationStatus } from '../entities/payment.enums';
import { SubscriptionStatus } from '../entities/subscription.enums';
import { TenantStatus } from '../entities/tenant-status.enum';

import { InvalidTransitionError } from './errors';

/**
 * For each state, the states it may move to.
 */
export type TransitionTable<S extends string> = { readonly [K in S]: readonly S[] };

export const tenantTransitions: TransitionTable<TenantStatus> = {
    [TenantStatus.PENDING]: [TenantStatus.ACTIVE, TenantStatus.REJECTED],
    [TenantStatus.ACTIVE]: [TenantStatus.SUSPENDED],
    [TenantStatus.SUSPENDED]: [TenantStatus.ACTIVE],
    [TenantStatus.REJECTED]: [],
};

/**
 * EXPIRED → ACTIVE is the re-activation path of an approved payment.
 * Renewals keep the subscription in ACTIVE and are not transitions.
 */
export const subscriptionTransitions: TransitionTable<SubscriptionStatus> = {
    [SubscriptionStatus.TRIAL]: [SubscriptionStatus.ACTIVE, SubscriptionStatus.EXPIRED, SubscriptionStatus.CANCELLED],
    [SubscriptionStatus.ACTIVE]: [SubscriptionStatus.EXPIRED, SubscriptionStatus.CANCELLED],
    [SubscriptionStatus.EXPIRED]: [SubscriptionStatus.ACTIVE],
    [SubscriptionStatus.CANCELLED]: [],
};

export const paymentVerificationTransitions: TransitionTable<PaymentVerificationStatus> = {
    [PaymentVerificationStatus.PENDING]: [PaymentVerificationStatus.APPROVED, PaymentVerificationStatus.REJECTED],
    [PaymentVerificationStatus.APPROVED]: [],
    [PaymentVerificationStatus.REJECTED]: [],
};

export const invoiceTransitions: TransitionTable<InvoiceStatus> = {
    [InvoiceStatus.DRAFT]: [InvoiceStatus.SENT, InvoiceStatus.PAID, InvoiceStatus.CANCELLED],
    [InvoiceStatus.SENT]: [InvoiceStatus.PAID, InvoiceStatus.OVERDUE, InvoiceStatus.CANCELLED],
    [InvoiceStatus.OVERDUE]: [InvoiceStatus.PAID, InvoiceStatus.CANCELLED],
    [InvoiceStatus.PAID]: [],
    [InvoiceStatus.CANCELLED]: [],
};

export function canTransition<S extends string>(table: TransitionTable<S>, from: S, to: S): boolean {
    return table[from].includes(to);
}

export function assertTransition<S extends string>(
    entityName: string,
    table: TransitionTable<S>,
    from: S,
    to: S,
): void {
    if (!canTransition(table, from, to)) {
        throw new InvalidTransitionError(entityName, from, to, table[from]);
    }
}
