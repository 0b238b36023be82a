import { SUPER_ADMIN_USER_IDENTIFIER } from '@vendure/common/lib/shared-constants';
import { mergeConfig, RequestContext, RequestContextService, TransactionalConnection, User } from '@vendure/core';
import { createTestEnvironment, testConfig as defaultTestConfig } from '@vendure/testing';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { addDays } from '../src/common/billing-period';
import {
    InvoiceKind,
    InvoiceStatus,
    SubscriptionPaymentMethod,
    SubscriptionStatus,
    TenantSubscription,
    VerificationDecision,
} from '../src/entities';
import {
    PaymentVerificationService,
    SubscriptionRenewalService,
    SubscriptionService,
    TenantService,
} from '../src/services';
import { TenancyPlugin } from '../src/tenancy.plugin';

import {
    APPROVE_TENANT,
    CANCEL_INVOICE,
    CANCEL_SUBSCRIPTION,
    CHECK_USAGE_LIMIT,
    CREATE_INVOICE,
    CREATE_SUBSCRIPTION,
    CREATE_TENANT,
    GET_ACTIVE_SUBSCRIPTION,
    GET_AUDIT_LOGS,
    GET_INVOICE,
    GET_PAYMENT,
    GET_PLANS,
    GET_SUBSCRIPTION,
    GET_TENANT,
    RENEW_SUBSCRIPTION,
    RUN_EXPIRY_SWEEP,
    SEND_INVOICE,
    SUBMIT_PAYMENT,
    VERIFY_PAYMENT,
} from './graphql/admin-definitions';
import { getDbConfig, TEST_SETUP_TIMEOUT_MS, testInitialData, testPlans } from './utils/test-config';

/**
 * E2E tests for subscriptions, payment verification, invoices and expiry.
 */

const config = mergeConfig(defaultTestConfig, {
    apiOptions: {
        port: 3103,
    },
    dbConnectionOptions: getDbConfig(),
    plugins: [TenancyPlugin.init({ plans: testPlans })],
});

const DAY_MS = 24 * 60 * 60 * 1000;

function daysFromNow(value: string): number {
    return (new Date(value).getTime() - Date.now()) / DAY_MS;
}

describe('Billing E2E', () => {
    const { server, adminClient } = createTestEnvironment(config);

    const planIds: Record<string, string> = {};
    let billingCoId: string;
    let subscriptionId: string;

    async function createActiveTenant(name: string, slug: string): Promise<string> {
        const { createTenant } = await adminClient.query(CREATE_TENANT, {
            input: { name, slug, companyName: name, companyEmail: `billing@${slug}.test` },
        });
        await adminClient.query(APPROVE_TENANT, { id: createTenant.id });
        return createTenant.id;
    }

    async function subscribe(tenantId: string, planCode: string, autoRenew = true) {
        const { createTenantSubscription } = await adminClient.query(CREATE_SUBSCRIPTION, {
            input: { tenantId, planId: planIds[planCode], autoRenew },
        });
        return createTenantSubscription;
    }

    async function submitPayment(input: Record<string, unknown>) {
        const { submitSubscriptionPayment } = await adminClient.query(SUBMIT_PAYMENT, {
            input: { method: 'BANK_TRANSFER', ...input },
        });
        return submitSubscriptionPayment;
    }

    function verify(id: string, decision: 'APPROVE' | 'REJECT', notes?: string) {
        return adminClient.query(VERIFY_PAYMENT, { id, decision, notes });
    }

    beforeAll(async () => {
        await server.init({
            initialData: testInitialData,
            customerCount: 0,
        });
        await adminClient.asSuperAdmin();

        const { subscriptionPlans } = await adminClient.query(GET_PLANS);
        for (const plan of subscriptionPlans) {
            planIds[plan.code] = plan.id;
        }
        billingCoId = await createActiveTenant('Billing Co', 'billing-co');
    }, TEST_SETUP_TIMEOUT_MS);

    afterAll(async () => {
        await server.destroy();
    });

    describe('Trial and payment verification', () => {
        let trialEndsAt: string;
        let activeEndsAt: string;
        let approvedPaymentId: string;

        it('starts a trial for a plan with trial days', async () => {
            const subscription = await subscribe(billingCoId, 'starter');

            expect(subscription.status).toBe('TRIAL');
            expect(subscription.plan.code).toBe('starter');
            expect(subscription.autoRenew).toBe(true);
            expect(subscription.trialEndsAt).toBe(subscription.endsAt);
            expect(daysFromNow(subscription.endsAt)).toBeCloseTo(14, 1);
            subscriptionId = subscription.id;
            trialEndsAt = subscription.trialEndsAt;
        });

        it('allows only one live subscription per tenant', async () => {
            await expect(subscribe(billingCoId, 'basic')).rejects.toThrow(
                'Tenant "billing-co" already has a TRIAL subscription',
            );
        });

        it('rejects a payment that is not a positive amount', async () => {
            await expect(submitPayment({ subscriptionId, amount: 0 })).rejects.toThrow(
                'Payment amount must be a positive integer in minor units',
            );
        });

        it('records a submitted payment as pending', async () => {
            const payment = await submitPayment({ subscriptionId, amount: 2900, proofReference: 'TRX-001' });

            expect(payment.status).toBe('PENDING');
            expect(payment.verificationStatus).toBe('PENDING');
            expect(payment.amount).toBe(2900);

            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: subscriptionId });
            expect(tenantSubscription.status).toBe('TRIAL');
        });

        it('activates the subscription when the payment is approved', async () => {
            const payment = await submitPayment({ subscriptionId, amount: 2900, proofReference: 'TRX-002' });
            const result = await verify(payment.id, 'APPROVE', 'Bank statement matches');

            expect(result.verifySubscriptionPayment.status).toBe('COMPLETED');
            expect(result.verifySubscriptionPayment.verificationStatus).toBe('APPROVED');
            expect(result.verifySubscriptionPayment.verificationNotes).toBe('Bank statement matches');
            expect(result.verifySubscriptionPayment.paidAt).not.toBeNull();
            expect(result.verifySubscriptionPayment.verifiedById).toBeTruthy();

            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: subscriptionId });
            expect(tenantSubscription.status).toBe('ACTIVE');
            expect(tenantSubscription.trialEndsAt).toBe(trialEndsAt);
            expect(daysFromNow(tenantSubscription.endsAt)).toBeCloseTo(30, 1);
            activeEndsAt = tenantSubscription.endsAt;
            approvedPaymentId = payment.id;
        });

        it('refuses to verify the same payment twice', async () => {
            await expect(verify(approvedPaymentId, 'APPROVE')).rejects.toThrow(
                'Invalid payment verification transition from APPROVED to APPROVED. Allowed transitions are none',
            );
            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: subscriptionId });
            expect(tenantSubscription.endsAt).toBe(activeEndsAt);
        });

        it('marks a rejected payment as failed', async () => {
            const payment = await submitPayment({ subscriptionId, amount: 2900, proofReference: 'TRX-004' });
            const result = await verify(payment.id, 'REJECT', 'Proof unreadable');

            expect(result.verifySubscriptionPayment.status).toBe('FAILED');
            expect(result.verifySubscriptionPayment.verificationStatus).toBe('REJECTED');
            expect(result.verifySubscriptionPayment.paidAt).toBeNull();
        });

        it('audits refused verifications', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: billingCoId, action: 'PAYMENT_APPROVED', outcome: 'DENIED' },
            });

            expect(result.auditLogs.totalItems).toBe(1);
            expect(result.auditLogs.items[0].metadata.errorCode).toBe('INVALID_TRANSITION');
        });

        it('refuses to renew before the period has ended', async () => {
            await expect(adminClient.query(RENEW_SUBSCRIPTION, { id: subscriptionId })).rejects.toThrow(
                `The current period runs until ${activeEndsAt.slice(0, 10)}`,
            );
        });
    });

    describe('Concurrent verification', () => {
        it('activates a trial once when the same payment is approved twice at the same time', async () => {
            const raceId = await createActiveTenant('Race Co', 'race-co');
            const trial = await subscribe(raceId, 'starter');
            const payment = await submitPayment({
                subscriptionId: trial.id,
                amount: 2900,
                proofReference: 'TRX-003',
            });

            const results = await Promise.allSettled([verify(payment.id, 'APPROVE'), verify(payment.id, 'APPROVE')]);

            expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
            const { subscriptionPayment } = await adminClient.query(GET_PAYMENT, { id: payment.id });
            expect(subscriptionPayment.verificationStatus).toBe('APPROVED');
            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: trial.id });
            expect(tenantSubscription.status).toBe('ACTIVE');
            expect(daysFromNow(tenantSubscription.endsAt)).toBeCloseTo(30, 1);

            const approvals = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: raceId, action: 'PAYMENT_APPROVED', outcome: 'SUCCESS' },
            });
            expect(approvals.auditLogs.totalItems).toBe(1);
            const refused = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: raceId, action: 'PAYMENT_APPROVED', outcome: 'DENIED' },
            });
            expect(refused.auditLogs.totalItems).toBe(1);
            const activations = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: raceId, action: 'SUBSCRIPTION_ACTIVATED' },
            });
            expect(activations.auditLogs.totalItems).toBe(1);
        });
    });

    describe('Invoices', () => {
        let invoiceId: string;

        it('creates a draft invoice with computed totals', async () => {
            const { createSubscriptionInvoice } = await adminClient.query(CREATE_INVOICE, {
                input: {
                    subscriptionId,
                    items: [{ description: 'Onboarding workshop', quantity: 2, unitPrice: 5000 }],
                    taxRate: 10,
                },
            });

            expect(createSubscriptionInvoice.status).toBe('DRAFT');
            expect(createSubscriptionInvoice.kind).toBe('MANUAL');
            expect(createSubscriptionInvoice.invoiceNumber).toMatch(/^INV-\d{14}-\d{4}$/);
            expect(createSubscriptionInvoice.subtotal).toBe(10000);
            expect(createSubscriptionInvoice.taxAmount).toBe(1000);
            expect(createSubscriptionInvoice.discountAmount).toBe(0);
            expect(createSubscriptionInvoice.total).toBe(11000);
            expect(createSubscriptionInvoice.items).toEqual([
                { description: 'Onboarding workshop', quantity: 2, unitPrice: 5000, amount: 10000 },
            ]);
            invoiceId = createSubscriptionInvoice.id;
        });

        it('settles a sent invoice through an approved payment', async () => {
            const { sendSubscriptionInvoice } = await adminClient.query(SEND_INVOICE, { id: invoiceId });
            expect(sendSubscriptionInvoice.status).toBe('SENT');

            const before = await adminClient.query(GET_SUBSCRIPTION, { id: subscriptionId });
            const payment = await submitPayment({ subscriptionId, amount: 11000, invoiceId });
            await verify(payment.id, 'APPROVE');

            const { subscriptionInvoice } = await adminClient.query(GET_INVOICE, { id: invoiceId });
            expect(subscriptionInvoice.status).toBe('PAID');
            expect(subscriptionInvoice.paymentId).toBe(payment.id);
            const after = await adminClient.query(GET_SUBSCRIPTION, { id: subscriptionId });
            expect(after.tenantSubscription.endsAt).toBe(before.tenantSubscription.endsAt);
        });

        it('refuses payments against a paid invoice', async () => {
            const { subscriptionInvoice } = await adminClient.query(GET_INVOICE, { id: invoiceId });

            await expect(submitPayment({ subscriptionId, amount: 11000, invoiceId })).rejects.toThrow(
                `Invoice ${String(subscriptionInvoice.invoiceNumber)} is PAID`,
            );
        });

        it('treats PAID as final', async () => {
            await expect(adminClient.query(CANCEL_INVOICE, { id: invoiceId })).rejects.toThrow(
                'Invalid invoice transition from PAID to CANCELLED. Allowed transitions are none',
            );
        });

        it('activates a trial when its payment settles a manual invoice', async () => {
            const tenantId = await createActiveTenant('Invoice Trial Co', 'invoice-trial-co');
            const trial = await subscribe(tenantId, 'starter');
            const { createSubscriptionInvoice } = await adminClient.query(CREATE_INVOICE, {
                input: {
                    subscriptionId: trial.id,
                    items: [{ description: 'Starter plan', quantity: 1, unitPrice: 2900 }],
                },
            });
            await adminClient.query(SEND_INVOICE, { id: createSubscriptionInvoice.id });

            const payment = await submitPayment({
                subscriptionId: trial.id,
                amount: 2900,
                invoiceId: createSubscriptionInvoice.id,
            });
            await verify(payment.id, 'APPROVE');

            const { subscriptionInvoice } = await adminClient.query(GET_INVOICE, { id: createSubscriptionInvoice.id });
            expect(subscriptionInvoice.status).toBe('PAID');
            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: trial.id });
            expect(tenantSubscription.status).toBe('ACTIVE');
            expect(daysFromNow(tenantSubscription.endsAt)).toBeCloseTo(30, 1);
        });
    });

    describe('Cancellation', () => {
        let graceId: string;
        let graceSubscriptionId: string;

        beforeAll(async () => {
            graceId = await createActiveTenant('Grace Co', 'grace-co');
        });

        it('starts a plan without trial days as ACTIVE', async () => {
            const subscription = await subscribe(graceId, 'basic');

            expect(subscription.status).toBe('ACTIVE');
            expect(subscription.trialEndsAt).toBeNull();
            expect(daysFromNow(subscription.endsAt)).toBeCloseTo(30, 1);
            graceSubscriptionId = subscription.id;
        });

        it('keeps the period of a cancelled subscription', async () => {
            const { tenantSubscription: before } = await adminClient.query(GET_SUBSCRIPTION, {
                id: graceSubscriptionId,
            });
            const { cancelTenantSubscription } = await adminClient.query(CANCEL_SUBSCRIPTION, {
                id: graceSubscriptionId,
                reason: 'Switching provider',
            });

            expect(cancelTenantSubscription.status).toBe('CANCELLED');
            expect(cancelTenantSubscription.autoRenew).toBe(false);
            expect(cancelTenantSubscription.cancelledAt).not.toBeNull();
            expect(cancelTenantSubscription.cancellationReason).toBe('Switching provider');
            expect(cancelTenantSubscription.endsAt).toBe(before.endsAt);
        });

        it('applies the cancelled plan until the period ends', async () => {
            const active = await adminClient.query(GET_ACTIVE_SUBSCRIPTION, { tenantId: graceId });
            const check = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: graceId, resource: 'TEAMS' });

            expect(active.activeTenantSubscription.id).toBe(graceSubscriptionId);
            expect(check.checkUsageLimit.allowed).toBe(true);
            expect(check.checkUsageLimit.limit).toBe(10);
        });

        it('refuses to cancel twice', async () => {
            await expect(adminClient.query(CANCEL_SUBSCRIPTION, { id: graceSubscriptionId })).rejects.toThrow(
                'Invalid subscription transition from CANCELLED to CANCELLED. Allowed transitions are none',
            );
        });
    });

    describe('Expiry sweep', () => {
        const asOf = new Date(Date.now() + 31 * DAY_MS).toISOString();
        let lapseId: string;
        let lapseSubscriptionId: string;

        beforeAll(async () => {
            lapseId = await createActiveTenant('Lapse Co', 'lapse-co');
            lapseSubscriptionId = (await subscribe(lapseId, 'basic', false)).id;
        });

        it('expires subscriptions past their period that do not auto-renew', async () => {
            const { runSubscriptionExpirySweep } = await adminClient.query(RUN_EXPIRY_SWEEP, { asOf });

            expect(runSubscriptionExpirySweep.expiredSubscriptionIds).toEqual([lapseSubscriptionId]);
            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: lapseSubscriptionId });
            expect(tenantSubscription.status).toBe('EXPIRED');
        });

        it('changes nothing when run again', async () => {
            const { runSubscriptionExpirySweep } = await adminClient.query(RUN_EXPIRY_SWEEP, { asOf });

            expect(runSubscriptionExpirySweep.expiredSubscriptionIds).toEqual([]);
            expect(runSubscriptionExpirySweep.overdueInvoiceIds).toEqual([]);
        });

        it('keeps the tenant ACTIVE but without a plan', async () => {
            const { tenant } = await adminClient.query(GET_TENANT, { id: lapseId });
            const check = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: lapseId, resource: 'USERS' });

            expect(tenant.status).toBe('ACTIVE');
            expect(check.checkUsageLimit.reason).toBe('NO_ACTIVE_PLAN');
        });

        it('reactivates an expired subscription with an approved payment', async () => {
            const payment = await submitPayment({ subscriptionId: lapseSubscriptionId, amount: 1000 });
            await verify(payment.id, 'APPROVE');

            const { tenantSubscription } = await adminClient.query(GET_SUBSCRIPTION, { id: lapseSubscriptionId });
            expect(tenantSubscription.status).toBe('ACTIVE');
            expect(daysFromNow(tenantSubscription.endsAt)).toBeCloseTo(30, 1);
        });

        it('refuses reactivation while another subscription is live', async () => {
            const twiceId = await createActiveTenant('Twice Co', 'twice-co');
            const old = await subscribe(twiceId, 'basic', false);
            const { runSubscriptionExpirySweep } = await adminClient.query(RUN_EXPIRY_SWEEP, { asOf });
            expect(runSubscriptionExpirySweep.expiredSubscriptionIds).toContain(old.id);
            const replacement = await subscribe(twiceId, 'basic');
            expect(replacement.status).toBe('ACTIVE');

            const payment = await submitPayment({ subscriptionId: old.id, amount: 1000 });
            await expect(verify(payment.id, 'APPROVE')).rejects.toThrow('Cannot reactivate subscription');

            const { subscriptionPayment } = await adminClient.query(GET_PAYMENT, { id: payment.id });
            expect(subscriptionPayment.verificationStatus).toBe('PENDING');
        });

        it('marks sent invoices past their due date as overdue', async () => {
            const { createSubscriptionInvoice } = await adminClient.query(CREATE_INVOICE, {
                input: {
                    subscriptionId: lapseSubscriptionId,
                    items: [{ description: 'Extra seats', quantity: 1, unitPrice: 1500 }],
                    dueInDays: 7,
                },
            });
            await adminClient.query(SEND_INVOICE, { id: createSubscriptionInvoice.id });

            const { runSubscriptionExpirySweep } = await adminClient.query(RUN_EXPIRY_SWEEP, {
                asOf: new Date(Date.now() + 8 * DAY_MS).toISOString(),
            });

            expect(runSubscriptionExpirySweep.overdueInvoiceIds).toEqual([createSubscriptionInvoice.id]);
            const { subscriptionInvoice } = await adminClient.query(GET_INVOICE, { id: createSubscriptionInvoice.id });
            expect(subscriptionInvoice.status).toBe('OVERDUE');
        });
    });

    describe('Renewal', () => {
        let ctx: RequestContext;
        let subscription: TenantSubscription;

        beforeAll(async () => {
            const user = await server.app
                .get(TransactionalConnection)
                .rawConnection.getRepository(User)
                .findOneOrFail({
                    where: { identifier: SUPER_ADMIN_USER_IDENTIFIER },
                    relations: ['roles', 'roles.channels'],
                });
            ctx = await server.app.get(RequestContextService).create({ apiType: 'admin', user });

            const tenant = await server.app.get(TenantService).findBySlug(ctx, 'billing-co');
            const live = tenant && (await server.app.get(SubscriptionService).findNonTerminal(ctx, tenant.id));
            if (!live) {
                throw new Error('billing-co has no live subscription');
            }
            subscription = live;
        });

        it('issues a renewal invoice once the period has ended and extends the period on payment', async () => {
            const renewals = server.app.get(SubscriptionRenewalService);
            const payments = server.app.get(PaymentVerificationService);
            const previousEnd = subscription.endsAt;

            const invoice = await renewals.renew(ctx, subscription.id, addDays(previousEnd, 1));
            expect(invoice.kind).toBe(InvoiceKind.RENEWAL);
            expect(invoice.status).toBe(InvoiceStatus.SENT);
            expect(invoice.total).toBe(2900);
            expect(invoice.items.map(i => i.description)).toEqual(['Starter subscription renewal (monthly)']);

            await expect(renewals.renew(ctx, subscription.id, addDays(previousEnd, 1))).rejects.toThrow(
                `Renewal invoice ${invoice.invoiceNumber} is still unpaid`,
            );

            const payment = await payments.submit(ctx, {
                subscriptionId: subscription.id,
                amount: 2900,
                method: SubscriptionPaymentMethod.CARD,
                invoiceId: invoice.id,
            });
            await payments.verify(ctx, payment.id, VerificationDecision.APPROVE);

            const renewed = await server.app.get(SubscriptionService).findOne(ctx, subscription.id);
            expect(renewed?.status).toBe(SubscriptionStatus.ACTIVE);
            expect(renewed?.currentPeriodStart.getTime()).toBe(previousEnd.getTime());
            expect(renewed?.endsAt.getTime()).toBe(previousEnd.getTime() + 30 * DAY_MS);
        });

        it.each([
            { slug: 'late-trial-co', planCode: 'starter', price: 2900, initialStatus: SubscriptionStatus.TRIAL },
            { slug: 'late-active-co', planCode: 'basic', price: 1000, initialStatus: SubscriptionStatus.ACTIVE },
        ])(
            'starts a renewal paid after the period lapsed from now ($slug)',
            async ({ slug, planCode, price, initialStatus }) => {
                const renewals = server.app.get(SubscriptionRenewalService);
                const payments = server.app.get(PaymentVerificationService);
                const subscriptions = server.app.get(SubscriptionService);
                const tenantId = await createActiveTenant(slug, slug);
                await subscribe(tenantId, planCode);
                const tenant = await server.app.get(TenantService).findBySlug(ctx, slug);
                const lapsed = tenant && (await subscriptions.findNonTerminal(ctx, tenant.id));
                if (!lapsed) {
                    throw new Error(`${slug} has no live subscription`);
                }
                expect(lapsed.status).toBe(initialStatus);
                await server.app
                    .get(TransactionalConnection)
                    .rawConnection.getRepository(TenantSubscription)
                    .update(lapsed.id, { endsAt: addDays(new Date(), -60) });

                const invoice = await renewals.renew(ctx, lapsed.id);
                expect(invoice.total).toBe(price);
                const payment = await payments.submit(ctx, {
                    subscriptionId: lapsed.id,
                    amount: price,
                    method: SubscriptionPaymentMethod.BANK_TRANSFER,
                    invoiceId: invoice.id,
                });
                const approvedFrom = Date.now();
                await payments.verify(ctx, payment.id, VerificationDecision.APPROVE);
                const approvedUntil = Date.now();

                const renewed = await subscriptions.findOne(ctx, lapsed.id);
                if (!renewed) {
                    throw new Error('subscription disappeared');
                }
                expect(renewed.status).toBe(SubscriptionStatus.ACTIVE);
                expect(renewed.currentPeriodStart.getTime()).toBeGreaterThanOrEqual(approvedFrom);
                expect(renewed.currentPeriodStart.getTime()).toBeLessThanOrEqual(approvedUntil);
                expect(renewed.endsAt.getTime()).toBe(renewed.currentPeriodStart.getTime() + 30 * DAY_MS);
            },
        );

        it('extends the period when a renewal invoice is settled manually', async () => {
            const renewals = server.app.get(SubscriptionRenewalService);
            const current = await server.app.get(SubscriptionService).findOne(ctx, subscription.id);
            if (!current) {
                throw new Error('subscription disappeared');
            }

            const invoice = await renewals.renew(ctx, current.id, addDays(current.endsAt, 1));
            const settled = await renewals.settleInvoice(ctx, invoice.id, 'Paid by cheque');

            expect(settled.status).toBe(InvoiceStatus.PAID);
            expect(settled.paymentId).toBeNull();
            const renewed = await server.app.get(SubscriptionService).findOne(ctx, current.id);
            expect(renewed?.endsAt.getTime()).toBe(current.endsAt.getTime() + 30 * DAY_MS);
        });
    });
});
