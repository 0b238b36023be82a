import { describe, expect, it } from 'vitest';

import { InvoiceStatus } from '../entities/invoice.enums';
import { PaymentVerificationStatus } from '../entities/payment.enums';
import { SubscriptionStatus } from '../entities/subscription.enums';
import { TenantStatus } from '../entities/tenant-status.enum';

import { InvalidTransitionError } from './errors';
import {
    assertTransition,
    canTransition,
    invoiceTransitions,
    paymentVerificationTransitions,
    subscriptionTransitions,
    tenantTransitions,
} from './state-transitions';

describe('tenant transitions', () => {
    it('allows the approval lifecycle', () => {
        expect(canTransition(tenantTransitions, TenantStatus.PENDING, TenantStatus.ACTIVE)).toBe(true);
        expect(canTransition(tenantTransitions, TenantStatus.PENDING, TenantStatus.REJECTED)).toBe(true);
        expect(canTransition(tenantTransitions, TenantStatus.ACTIVE, TenantStatus.SUSPENDED)).toBe(true);
        expect(canTransition(tenantTransitions, TenantStatus.SUSPENDED, TenantStatus.ACTIVE)).toBe(true);
    });

    it('treats REJECTED as terminal', () => {
        for (const to of Object.values(TenantStatus)) {
            expect(canTransition(tenantTransitions, TenantStatus.REJECTED, to)).toBe(false);
        }
    });

    it('does not allow suspending a pending tenant or approving an active one', () => {
        expect(canTransition(tenantTransitions, TenantStatus.PENDING, TenantStatus.SUSPENDED)).toBe(false);
        expect(canTransition(tenantTransitions, TenantStatus.ACTIVE, TenantStatus.ACTIVE)).toBe(false);
        expect(canTransition(tenantTransitions, TenantStatus.SUSPENDED, TenantStatus.REJECTED)).toBe(false);
    });
});

describe('subscription transitions', () => {
    it('lets an EXPIRED subscription be re-activated but not cancelled', () => {
        expect(canTransition(subscriptionTransitions, SubscriptionStatus.EXPIRED, SubscriptionStatus.ACTIVE)).toBe(true);
        expect(
            canTransition(subscriptionTransitions, SubscriptionStatus.EXPIRED, SubscriptionStatus.CANCELLED),
        ).toBe(false);
    });

    it('never leaves CANCELLED', () => {
        expect(subscriptionTransitions[SubscriptionStatus.CANCELLED]).toEqual([]);
    });
});

describe('payment verification transitions', () => {
    it('only moves out of PENDING', () => {
        expect(paymentVerificationTransitions[PaymentVerificationStatus.APPROVED]).toEqual([]);
        expect(paymentVerificationTransitions[PaymentVerificationStatus.REJECTED]).toEqual([]);
        expect(
            canTransition(
                paymentVerificationTransitions,
                PaymentVerificationStatus.PENDING,
                PaymentVerificationStatus.APPROVED,
            ),
        ).toBe(true);
    });
});

describe('invoice transitions', () => {
    it('allows paying an overdue invoice', () => {
        expect(canTransition(invoiceTransitions, InvoiceStatus.OVERDUE, InvoiceStatus.PAID)).toBe(true);
    });

    it('does not reopen a paid invoice', () => {
        expect(canTransition(invoiceTransitions, InvoiceStatus.PAID, InvoiceStatus.SENT)).toBe(false);
    });
});

describe('assertTransition()', () => {
    it('passes for a legal transition', () => {
        expect(() =>
            assertTransition('tenant', tenantTransitions, TenantStatus.PENDING, TenantStatus.ACTIVE),
        ).not.toThrow();
    });

    it('names the allowed transitions in the error', () => {
        expect(() =>
            assertTransition('tenant', tenantTransitions, TenantStatus.ACTIVE, TenantStatus.REJECTED),
        ).toThrow('Invalid tenant transition from ACTIVE to REJECTED. Allowed transitions are SUSPENDED');
    });

    it('reports "none" for terminal states', () => {
        let error: unknown;
        try {
            assertTransition(
                'payment verification',
                paymentVerificationTransitions,
                PaymentVerificationStatus.APPROVED,
                PaymentVerificationStatus.APPROVED,
            );
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(InvalidTransitionError);
        expect(error instanceof InvalidTransitionError && error.message).toBe(
            'Invalid payment verification transition from APPROVED to APPROVED. Allowed transitions are none',
        );
        expect(error instanceof InvalidTransitionError && error.code).toBe('INVALID_TRANSITION');
    });
});
