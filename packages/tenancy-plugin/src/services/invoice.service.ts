import { Inject, Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EventBus,
    Logger,
    PaginatedList,
    RequestContext,
    TransactionalConnection,
} from '@vendure/core';
import { In, LessThan } from 'typeorm';

import { addDays } from '../common/billing-period';
import { calculateInvoiceTotals, generateInvoiceNumber, InvoiceLineInput } from '../common/invoice-calculations';
import { assertTransition, invoiceTransitions } from '../common/state-transitions';
import { TENANCY_PLUGIN_OPTIONS } from '../constants';
import {
    InvoiceKind,
    InvoiceStatus,
    SubscriptionInvoice,
    SubscriptionInvoiceItem,
    SubscriptionPlan,
    TenantSubscription,
} from '../entities';
import { InvoiceIssuedEvent } from '../events';
import { ResolvedTenancyPluginOptions } from '../types';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';

const loggerCtx = 'InvoiceService';

export interface CreateInvoiceInput {
    subscriptionId: ID;
    items: InvoiceLineInput[];
    taxRate?: number | null;
    discountAmount?: number | null;
    dueInDays?: number | null;
    notes?: string | null;
}

export interface InvoiceListOptions {
    take?: number | null;
    skip?: number | null;
    tenantId?: ID | null;
    subscriptionId?: ID | null;
    status?: InvoiceStatus | null;
}

const openStatuses = [InvoiceStatus.DRAFT, InvoiceStatus.SENT, InvoiceStatus.OVERDUE];

/**
 * Subscription invoices and their line items.
 *
 * Totals always come from `calculateInvoiceTotals`, so stored items add up to
 * the subtotal. Settling a renewal invoice is coordinated by
 * SubscriptionRenewalService, which also extends the subscription.
 */
@Injectable()
export class InvoiceService {
    constructor(
        private connection: TransactionalConnection,
        private eventBus: EventBus,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        @Inject(TENANCY_PLUGIN_OPTIONS) private options: ResolvedTenancyPluginOptions,
    ) {}

    async findAll(ctx: RequestContext, options?: InvoiceListOptions | null): Promise<PaginatedList<SubscriptionInvoice>> {
        const [items, totalItems] = await this.connection.getRepository(ctx, SubscriptionInvoice).findAndCount({
            where: {
                ...(options?.tenantId != null ? { tenantId: options.tenantId } : {}),
                ...(options?.subscriptionId != null ? { subscriptionId: options.subscriptionId } : {}),
                ...(options?.status ? { status: options.status } : {}),
            },
            take: options?.take ?? 50,
            skip: options?.skip ?? 0,
            order: { issuedAt: 'DESC', id: 'DESC' },
        });
        return { items, totalItems };
    }

    async findOne(ctx: RequestContext, id: ID): Promise<SubscriptionInvoice | undefined> {
        const invoice = await this.connection.getRepository(ctx, SubscriptionInvoice).findOne({ where: { id } });
        return invoice ?? undefined;
    }

    async getItems(ctx: RequestContext, invoiceId: ID): Promise<SubscriptionInvoiceItem[]> {
        return this.connection.getRepository(ctx, SubscriptionInvoiceItem).find({
            where: { invoiceId },
            order: { id: 'ASC' },
        });
    }

    async findOpenRenewalInvoice(ctx: RequestContext, subscriptionId: ID): Promise<SubscriptionInvoice | undefined> {
        const invoice = await this.connection.getRepository(ctx, SubscriptionInvoice).findOne({
            where: { subscriptionId, kind: InvoiceKind.RENEWAL, status: In(openStatuses) },
        });
        return invoice ?? undefined;
    }

    /**
     * Raises a manual DRAFT invoice against a subscription.
     */
    async create(ctx: RequestContext, input: CreateInvoiceInput): Promise<SubscriptionInvoice> {
        const attempt: AuditAttempt = {
            action: 'INVOICE_CREATED',
            entityType: 'TenantSubscription',
            entityId: input.subscriptionId,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageBilling');
            return this.connection.withTransaction(ctx, async txCtx => {
                const subscription = await this.connection.getEntityOrThrow(
                    txCtx,
                    TenantSubscription,
                    input.subscriptionId,
                    { relations: ['plan'] },
                );
                attempt.tenantId = subscription.tenantId;
                return this.createInvoice(txCtx, subscription, {
                    kind: InvoiceKind.MANUAL,
                    status: InvoiceStatus.DRAFT,
                    currencyCode: subscription.plan.currencyCode,
                    lines: input.items,
                    taxRate: input.taxRate ?? this.options.invoice.taxRate,
                    discountAmount: input.discountAmount ?? 0,
                    dueInDays: input.dueInDays ?? this.options.invoice.dueInDays,
                    notes: input.notes ?? null,
                    now: new Date(),
                });
            });
        });
    }

    /**
     * Issues a SENT renewal invoice for one period of the subscription's plan.
     */
    async issueRenewalInvoice(
        ctx: RequestContext,
        subscription: TenantSubscription,
        plan: SubscriptionPlan,
        now: Date,
    ): Promise<SubscriptionInvoice> {
        const invoice = await this.createInvoice(ctx, subscription, {
            kind: InvoiceKind.RENEWAL,
            status: InvoiceStatus.SENT,
            currencyCode: plan.currencyCode,
            lines: [
                {
                    description: `${plan.name} subscription renewal (${subscription.billingInterval.toLowerCase()})`,
                    quantity: 1,
                    unitPrice: plan.price,
                },
            ],
            taxRate: this.options.invoice.taxRate,
            discountAmount: 0,
            dueInDays: this.options.invoice.dueInDays,
            notes: null,
            now,
        });
        await this.eventBus.publish(new InvoiceIssuedEvent(ctx, invoice));
        return invoice;
    }

    /**
     * DRAFT → SENT
     */
    async send(ctx: RequestContext, id: ID): Promise<SubscriptionInvoice> {
        return this.changeStatus(ctx, id, InvoiceStatus.SENT, 'INVOICE_SENT');
    }

    async cancel(ctx: RequestContext, id: ID, reason?: string | null): Promise<SubscriptionInvoice> {
        return this.changeStatus(ctx, id, InvoiceStatus.CANCELLED, 'INVOICE_CANCELLED', reason);
    }

    /**
     * Marks an invoice PAID. Callers are responsible for any effect on the
     * subscription and for holding the tenant's subscription lock.
     */
    async markPaid(
        ctx: RequestContext,
        invoice: SubscriptionInvoice,
        paymentId: ID | null,
        now: Date,
    ): Promise<SubscriptionInvoice> {
        const fromStatus = invoice.status;
        assertTransition('invoice', invoiceTransitions, fromStatus, InvoiceStatus.PAID);
        invoice.status = InvoiceStatus.PAID;
        invoice.paidAt = now;
        invoice.paymentId = paymentId;
        const saved = await this.connection.getRepository(ctx, SubscriptionInvoice).save(invoice);
        await this.auditService.log(ctx, {
            action: 'INVOICE_PAID',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'SubscriptionInvoice',
            entityId: saved.id,
            fromState: fromStatus,
            toState: saved.status,
            metadata: { invoiceNumber: saved.invoiceNumber, paymentId: paymentId != null ? String(paymentId) : null },
        });
        return saved;
    }

    /**
     * SENT invoices past their due date become OVERDUE.
     */
    async markOverdue(ctx: RequestContext, now: Date): Promise<SubscriptionInvoice[]> {
        const repo = this.connection.getRepository(ctx, SubscriptionInvoice);
        const due = await repo.find({ where: { status: InvoiceStatus.SENT, dueAt: LessThan(now) } });
        const overdue: SubscriptionInvoice[] = [];
        for (const invoice of due) {
            try {
                invoice.status = InvoiceStatus.OVERDUE;
                overdue.push(await repo.save(invoice));
                await this.auditService.log(ctx, {
                    action: 'INVOICE_OVERDUE',
                    severity: 'WARN',
                    tenantId: invoice.tenantId,
                    entityType: 'SubscriptionInvoice',
                    entityId: invoice.id,
                    fromState: InvoiceStatus.SENT,
                    toState: InvoiceStatus.OVERDUE,
                });
            } catch (e) {
                Logger.error(`Failed to mark invoice ${invoice.invoiceNumber} overdue: ${String(e)}`, loggerCtx);
            }
        }
        return overdue;
    }

    private async changeStatus(
        ctx: RequestContext,
        id: ID,
        to: InvoiceStatus,
        action: string,
        notes?: string | null,
    ): Promise<SubscriptionInvoice> {
        const attempt: AuditAttempt = { action, entityType: 'SubscriptionInvoice', entityId: id, toState: to, notes };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageBilling');
            return this.connection.withTransaction(ctx, async txCtx => {
                const invoice = await this.connection.getEntityOrThrow(txCtx, SubscriptionInvoice, id);
                attempt.tenantId = invoice.tenantId;
                const fromStatus = invoice.status;
                assertTransition('invoice', invoiceTransitions, fromStatus, to);
                invoice.status = to;
                const saved = await this.connection.getRepository(txCtx, SubscriptionInvoice).save(invoice);
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: to === InvoiceStatus.CANCELLED ? 'WARN' : 'INFO',
                    fromState: fromStatus,
                });
                if (to === InvoiceStatus.SENT) {
                    await this.eventBus.publish(new InvoiceIssuedEvent(txCtx, saved));
                }
                return saved;
            });
        });
    }

    private async createInvoice(
        ctx: RequestContext,
        subscription: TenantSubscription,
        params: {
            kind: InvoiceKind;
            status: InvoiceStatus;
            currencyCode: string;
            lines: InvoiceLineInput[];
            taxRate: number;
            discountAmount: number;
            dueInDays: number;
            notes: string | null;
            now: Date;
        },
    ): Promise<SubscriptionInvoice> {
        const totals = calculateInvoiceTotals(params.lines, params.taxRate, params.discountAmount);
        const invoiceNumber = await this.nextInvoiceNumber(ctx, params.now);
        const invoice = await this.connection.getRepository(ctx, SubscriptionInvoice).save(
            new SubscriptionInvoice({
                invoiceNumber,
                subscriptionId: subscription.id,
                tenantId: subscription.tenantId,
                kind: params.kind,
                status: params.status,
                currencyCode: params.currencyCode,
                subtotal: totals.subtotal,
                taxRate: params.taxRate,
                taxAmount: totals.taxAmount,
                discountAmount: totals.discountAmount,
                total: totals.total,
                issuedAt: params.now,
                dueAt: addDays(params.now, params.dueInDays),
                paidAt: null,
                paymentId: null,
                notes: params.notes,
            }),
        );
        invoice.items = await this.connection.getRepository(ctx, SubscriptionInvoiceItem).save(
            totals.lines.map(
                line =>
                    new SubscriptionInvoiceItem({
                        invoiceId: invoice.id,
                        description: line.description,
                        quantity: line.quantity,
                        unitPrice: line.unitPrice,
                        amount: line.amount,
                    }),
            ),
        );

        await this.auditService.log(ctx, {
            action: params.kind === InvoiceKind.RENEWAL ? 'RENEWAL_INVOICE_ISSUED' : 'INVOICE_CREATED',
            severity: 'INFO',
            tenantId: invoice.tenantId,
            entityType: 'SubscriptionInvoice',
            entityId: invoice.id,
            toState: invoice.status,
            metadata: { invoiceNumber, total: invoice.total, currencyCode: invoice.currencyCode },
        });
        return invoice;
    }

    private async nextInvoiceNumber(ctx: RequestContext, now: Date): Promise<string> {
        const repo = this.connection.getRepository(ctx, SubscriptionInvoice);
        for (let attempt = 0; attempt < 5; attempt++) {
            const candidate = generateInvoiceNumber(this.options.invoice.numberPrefix, now);
            if (!(await repo.findOne({ where: { invoiceNumber: candidate } }))) {
                return candidate;
            }
        }
        throw new Error(`Could not allocate a unique invoice number for ${now.toISOString()}`);
    }
}
