import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import { RequestContext, TransactionalConnection } from '@vendure/core';

import { getRenewalBlocker } from '../common/billing-period';
import { RenewalError } from '../common/errors';
import { InvoiceKind, SubscriptionInvoice, SubscriptionPlan, TenantSubscription } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { InvoiceService } from './invoice.service';
import { SubscriptionService } from './subscription.service';
import { TenantLockService } from './tenant-lock.service';

/**
 * Renewal invoicing and invoice settlement.
 *
 * Renewing issues an invoice; the subscription period only moves once that
 * invoice is settled, either by an approved payment or by a billing admin.
 */
@Injectable()
export class SubscriptionRenewalService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private tenantLock: TenantLockService,
        private subscriptionService: SubscriptionService,
        private invoiceService: InvoiceService,
    ) {}

    /**
     * Issues the renewal invoice of a due, auto-renewing TRIAL or ACTIVE
     * subscription. Throws RenewalError when the subscription is not due or an
     * earlier renewal invoice is still open.
     */
    async renew(ctx: RequestContext, subscriptionId: ID, now: Date = new Date()): Promise<SubscriptionInvoice> {
        const attempt: AuditAttempt = {
            action: 'SUBSCRIPTION_RENEWAL_REQUESTED',
            entityType: 'TenantSubscription',
            entityId: subscriptionId,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            const { tenantId } = await this.connection.getEntityOrThrow(ctx, TenantSubscription, subscriptionId);
            attempt.tenantId = tenantId;
            await this.accessPolicy.assert(ctx, 'manageSubscription', { tenantId });

            return this.tenantLock.withTenantLock(ctx, tenantId, 'subscription', async txCtx => {
                const subscription = await this.connection.getEntityOrThrow(txCtx, TenantSubscription, subscriptionId);
                const blocker = getRenewalBlocker(subscription, now);
                if (blocker) {
                    throw new RenewalError(blocker, { subscriptionId: String(subscriptionId) });
                }
                const open = await this.invoiceService.findOpenRenewalInvoice(txCtx, subscription.id);
                if (open) {
                    throw new RenewalError(`Renewal invoice ${open.invoiceNumber} is still unpaid`, {
                        invoiceNumber: open.invoiceNumber,
                    });
                }
                const plan = await this.connection.getEntityOrThrow(txCtx, SubscriptionPlan, subscription.planId);
                const invoice = await this.invoiceService.issueRenewalInvoice(txCtx, subscription, plan, now);
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    metadata: { invoiceNumber: invoice.invoiceNumber, total: invoice.total },
                });
                return invoice;
            });
        });
    }

    /**
     * Marks an invoice paid without a recorded payment (e.g. settled offline).
     */
    async settleInvoice(ctx: RequestContext, invoiceId: ID, notes?: string | null): Promise<SubscriptionInvoice> {
        const attempt: AuditAttempt = {
            action: 'INVOICE_SETTLED',
            entityType: 'SubscriptionInvoice',
            entityId: invoiceId,
            notes,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageBilling');
            const { tenantId } = await this.connection.getEntityOrThrow(ctx, SubscriptionInvoice, invoiceId);
            attempt.tenantId = tenantId;
            return this.tenantLock.withTenantLock(ctx, tenantId, 'subscription', async txCtx => {
                const invoice = await this.connection.getEntityOrThrow(txCtx, SubscriptionInvoice, invoiceId);
                const paid = await this.applySettlement(txCtx, invoice, null, new Date());
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    metadata: { invoiceNumber: paid.invoiceNumber, total: paid.total },
                });
                return paid;
            });
        });
    }

    /**
     * Marks the invoice paid and, for renewal invoices, extends the subscription.
     * Must run inside the tenant's subscription lock.
     */
    async applySettlement(
        ctx: RequestContext,
        invoice: SubscriptionInvoice,
        paymentId: ID | null,
        now: Date,
    ): Promise<SubscriptionInvoice> {
        const paid = await this.invoiceService.markPaid(ctx, invoice, paymentId, now);
        if (paid.kind === InvoiceKind.RENEWAL) {
            const subscription = await this.connection.getEntityOrThrow(ctx, TenantSubscription, paid.subscriptionId);
            await this.subscriptionService.applyRenewal(ctx, subscription, now);
        }
        return paid;
    }
}
