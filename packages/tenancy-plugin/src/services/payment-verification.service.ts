import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EventBus,
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
    idsAreEqual,
} from '@vendure/core';

import { assertTransition, paymentVerificationTransitions } from '../common/state-transitions';
import {
    InvoiceKind,
    InvoiceStatus,
    PaymentStatus,
    PaymentVerificationStatus,
    SubscriptionInvoice,
    SubscriptionPayment,
    SubscriptionPaymentMethod,
    SubscriptionStatus,
    TenantSubscription,
    VerificationDecision,
} from '../entities';
import { PaymentSubmittedEvent, PaymentVerifiedEvent } from '../events';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { SubscriptionRenewalService } from './subscription-renewal.service';
import { SubscriptionService } from './subscription.service';
import { TenantLockService } from './tenant-lock.service';

export interface SubmitPaymentInput {
    subscriptionId: ID;
    /** Minor units */
    amount: number;
    method: SubscriptionPaymentMethod;
    proofReference?: string | null;
    invoiceId?: ID | null;
}

export interface PaymentListOptions {
    take?: number | null;
    skip?: number | null;
    tenantId?: ID | null;
    subscriptionId?: ID | null;
    verificationStatus?: PaymentVerificationStatus | null;
}

/**
 * Manual review of submitted subscription payments.
 *
 * Submitting never touches the subscription. Verification re-reads the payment
 * under a row lock and only proceeds from PENDING, so a retried or concurrent
 * approval cannot apply twice.
 */
@Injectable()
export class PaymentVerificationService {
    constructor(
        private connection: TransactionalConnection,
        private eventBus: EventBus,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private tenantLock: TenantLockService,
        private subscriptionService: SubscriptionService,
        private renewalService: SubscriptionRenewalService,
    ) {}

    async findAll(ctx: RequestContext, options?: PaymentListOptions | null): Promise<PaginatedList<SubscriptionPayment>> {
        const [items, totalItems] = await this.connection.getRepository(ctx, SubscriptionPayment).findAndCount({
            where: {
                ...(options?.tenantId != null ? { tenantId: options.tenantId } : {}),
                ...(options?.subscriptionId != null ? { subscriptionId: options.subscriptionId } : {}),
                ...(options?.verificationStatus ? { verificationStatus: options.verificationStatus } : {}),
            },
            take: options?.take ?? 50,
            skip: options?.skip ?? 0,
            order: { createdAt: 'ASC', id: 'ASC' },
        });
        return { items, totalItems };
    }

    async findOne(ctx: RequestContext, id: ID): Promise<SubscriptionPayment | undefined> {
        const payment = await this.connection.getRepository(ctx, SubscriptionPayment).findOne({ where: { id } });
        return payment ?? undefined;
    }

    async submit(ctx: RequestContext, input: SubmitPaymentInput): Promise<SubscriptionPayment> {
        const attempt: AuditAttempt = {
            action: 'PAYMENT_SUBMITTED',
            entityType: 'TenantSubscription',
            entityId: input.subscriptionId,
            metadata: { amount: input.amount, method: input.method },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            if (!Number.isInteger(input.amount) || input.amount <= 0) {
                throw new UserInputError('Payment amount must be a positive integer in minor units');
            }
            const subscription = await this.connection.getEntityOrThrow(ctx, TenantSubscription, input.subscriptionId, {
                relations: ['plan'],
            });
            attempt.tenantId = subscription.tenantId;
            await this.accessPolicy.assert(ctx, 'manageSubscription', { tenantId: subscription.tenantId });

            return this.connection.withTransaction(ctx, async txCtx => {
                let currencyCode = subscription.plan.currencyCode;
                if (input.invoiceId != null) {
                    const invoice = await this.connection.getEntityOrThrow(txCtx, SubscriptionInvoice, input.invoiceId);
                    if (!idsAreEqual(invoice.subscriptionId, subscription.id)) {
                        throw new UserInputError(
                            `Invoice ${invoice.invoiceNumber} does not belong to subscription ${String(subscription.id)}`,
                        );
                    }
                    if (invoice.status === InvoiceStatus.PAID || invoice.status === InvoiceStatus.CANCELLED) {
                        throw new UserInputError(`Invoice ${invoice.invoiceNumber} is ${invoice.status}`);
                    }
                    currencyCode = invoice.currencyCode;
                }

                const payment = await this.connection.getRepository(txCtx, SubscriptionPayment).save(
                    new SubscriptionPayment({
                        subscriptionId: subscription.id,
                        tenantId: subscription.tenantId,
                        invoiceId: input.invoiceId ?? null,
                        amount: input.amount,
                        currencyCode,
                        method: input.method,
                        proofReference: input.proofReference ?? null,
                        status: PaymentStatus.PENDING,
                        verificationStatus: PaymentVerificationStatus.PENDING,
                        verifiedById: null,
                        verifiedAt: null,
                        verificationNotes: null,
                        paidAt: null,
                    }),
                );
                await this.auditService.log(txCtx, {
                    action: 'PAYMENT_SUBMITTED',
                    severity: 'INFO',
                    tenantId: payment.tenantId,
                    entityType: 'SubscriptionPayment',
                    entityId: payment.id,
                    toState: payment.verificationStatus,
                    metadata: { amount: payment.amount, currencyCode, method: payment.method },
                });
                await this.eventBus.publish(new PaymentSubmittedEvent(txCtx, payment));
                return payment;
            });
        });
    }

    /**
     * Approves or rejects a PENDING payment.
     *
     * On approval a linked open invoice is settled and renewal invoices extend
     * the period. Unless a renewal invoice was settled, a TRIAL or EXPIRED
     * subscription becomes ACTIVE for one interval from now. A rejection leaves
     * the subscription untouched.
     */
    async verify(
        ctx: RequestContext,
        paymentId: ID,
        decision: VerificationDecision,
        notes?: string | null,
    ): Promise<SubscriptionPayment> {
        const target =
            decision === VerificationDecision.APPROVE
                ? PaymentVerificationStatus.APPROVED
                : PaymentVerificationStatus.REJECTED;
        const attempt: AuditAttempt = {
            action: decision === VerificationDecision.APPROVE ? 'PAYMENT_APPROVED' : 'PAYMENT_REJECTED',
            entityType: 'SubscriptionPayment',
            entityId: paymentId,
            toState: target,
            notes,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'verifyPayment');
            return this.tenantLock.withEntityLock(
                ctx,
                SubscriptionPayment,
                paymentId,
                'verification',
                async (txCtx, payment) => {
                    attempt.tenantId = payment.tenantId;
                    const fromStatus = payment.verificationStatus;
                    assertTransition('payment verification', paymentVerificationTransitions, fromStatus, target);

                    const now = new Date();
                    payment.verificationStatus = target;
                    payment.verifiedById = txCtx.activeUserId ?? null;
                    payment.verifiedAt = now;
                    payment.verificationNotes = notes ?? null;
                    if (decision === VerificationDecision.APPROVE) {
                        payment.status = PaymentStatus.COMPLETED;
                        payment.paidAt = now;
                    } else {
                        payment.status = PaymentStatus.FAILED;
                    }
                    const saved = await this.connection.getRepository(txCtx, SubscriptionPayment).save(payment);

                    if (decision === VerificationDecision.APPROVE) {
                        await this.applyApprovedPayment(txCtx, saved, now);
                    }

                    await this.auditService.log(txCtx, {
                        action: attempt.action,
                        severity: decision === VerificationDecision.APPROVE ? 'INFO' : 'WARN',
                        tenantId: saved.tenantId,
                        entityType: 'SubscriptionPayment',
                        entityId: saved.id,
                        fromState: fromStatus,
                        toState: saved.verificationStatus,
                        notes,
                        metadata: { amount: saved.amount, currencyCode: saved.currencyCode, status: saved.status },
                    });
                    await this.eventBus.publish(new PaymentVerifiedEvent(txCtx, saved, decision));
                    return saved;
                },
            );
        });
    }

    private async applyApprovedPayment(ctx: RequestContext, payment: SubscriptionPayment, now: Date): Promise<void> {
        await this.tenantLock.withTenantLock(ctx, payment.tenantId, 'subscription', async txCtx => {
            if (payment.invoiceId != null) {
                const invoice = await this.connection.getEntityOrThrow(txCtx, SubscriptionInvoice, payment.invoiceId);
                if (invoice.status !== InvoiceStatus.PAID && invoice.status !== InvoiceStatus.CANCELLED) {
                    const paid = await this.renewalService.applySettlement(txCtx, invoice, payment.id, now);
                    if (paid.kind === InvoiceKind.RENEWAL) {
                        return;
                    }
                }
            }
            const subscription = await this.connection.getEntityOrThrow(txCtx, TenantSubscription, payment.subscriptionId);
            if (
                subscription.status === SubscriptionStatus.TRIAL ||
                subscription.status === SubscriptionStatus.EXPIRED
            ) {
                await this.subscriptionService.activateForPayment(txCtx, subscription, now);
            }
        });
    }
}
