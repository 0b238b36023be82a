import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ModuleRef } from '@nestjs/core';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EventBus,
    Injector,
    Logger,
    RequestContext,
    TransactionalConnection,
} from '@vendure/core';

import { NotificationType, renderTemplate } from '../config/notification-templates';
import { TENANCY_PLUGIN_OPTIONS } from '../constants';
import {
    PaymentVerificationStatus,
    SubscriptionPlan,
    SubscriptionStatus,
    Tenant,
    TenantStatus,
    TenantSubscription,
} from '../entities';
import {
    InvoiceIssuedEvent,
    PaymentVerifiedEvent,
    SubscriptionStatusChangedEvent,
    TenantRegisteredEvent,
    TenantStatusChangedEvent,
} from '../events';
import { ResolvedTenancyPluginOptions } from '../types';

const loggerCtx = 'NotificationService';

type TemplateVariables = Record<string, string | number>;

const tenantStatusNotifications: Partial<Record<TenantStatus, NotificationType>> = {
    [TenantStatus.REJECTED]: 'TENANT_REJECTED',
    [TenantStatus.SUSPENDED]: 'TENANT_SUSPENDED',
};

const subscriptionStatusNotifications: Record<SubscriptionStatus, NotificationType> = {
    [SubscriptionStatus.TRIAL]: 'SUBSCRIPTION_STARTED',
    [SubscriptionStatus.ACTIVE]: 'SUBSCRIPTION_ACTIVATED',
    [SubscriptionStatus.CANCELLED]: 'SUBSCRIPTION_CANCELLED',
    [SubscriptionStatus.EXPIRED]: 'SUBSCRIPTION_EXPIRED',
};

function formatDate(date: Date | null | undefined): string {
    return date ? date.toISOString().slice(0, 10) : '-';
}

/**
 * Tells the tenant's contact address about status changes.
 *
 * Listens to the plugin's events, which are published only after the change has
 * been committed. Delivery goes through the configured NotificationStrategy and
 * is not awaited by the request; failures are logged.
 */
@Injectable()
export class NotificationService implements OnApplicationBootstrap, OnModuleDestroy {
    constructor(
        private connection: TransactionalConnection,
        private eventBus: EventBus,
        private moduleRef: ModuleRef,
        @Inject(TENANCY_PLUGIN_OPTIONS) private options: ResolvedTenancyPluginOptions,
    ) {}

    async onApplicationBootstrap() {
        const { notificationStrategy } = this.options;
        if (typeof notificationStrategy.init === 'function') {
            await notificationStrategy.init(new Injector(this.moduleRef));
        }

        this.eventBus.ofType(TenantRegisteredEvent).subscribe(event => {
            this.dispatch(event.ctx, 'TENANT_REGISTERED', event.tenant.id, {});
        });

        this.eventBus.ofType(TenantStatusChangedEvent).subscribe(event => {
            const type =
                event.toStatus === TenantStatus.ACTIVE
                    ? event.fromStatus === TenantStatus.SUSPENDED
                        ? 'TENANT_REACTIVATED'
                        : 'TENANT_APPROVED'
                    : tenantStatusNotifications[event.toStatus];
            if (type) {
                this.dispatch(event.ctx, type, event.tenant.id, { reason: event.reason ?? '-' });
            }
        });

        this.eventBus.ofType(SubscriptionStatusChangedEvent).subscribe(event => {
            const { subscription } = event;
            this.dispatch(event.ctx, subscriptionStatusNotifications[event.toStatus], subscription.tenantId, {
                status: subscription.status,
                endsAt: formatDate(subscription.endsAt),
            }, subscription);
        });

        this.eventBus.ofType(PaymentVerifiedEvent).subscribe(event => {
            const { payment } = event;
            const type =
                payment.verificationStatus === PaymentVerificationStatus.APPROVED
                    ? 'PAYMENT_APPROVED'
                    : 'PAYMENT_REJECTED';
            this.dispatch(event.ctx, type, payment.tenantId, {
                amount: payment.amount,
                currencyCode: payment.currencyCode,
                notes: payment.verificationNotes ?? '-',
            });
        });

        this.eventBus.ofType(InvoiceIssuedEvent).subscribe(event => {
            const { invoice } = event;
            this.dispatch(event.ctx, 'INVOICE_ISSUED', invoice.tenantId, {
                invoiceNumber: invoice.invoiceNumber,
                total: invoice.total,
                currencyCode: invoice.currencyCode,
                dueAt: formatDate(invoice.dueAt),
            });
        });
    }

    async onModuleDestroy() {
        const { notificationStrategy } = this.options;
        if (typeof notificationStrategy.destroy === 'function') {
            await notificationStrategy.destroy();
        }
    }

    /**
     * Renders and sends one notification without holding up the caller.
     */
    dispatch(
        ctx: RequestContext,
        type: NotificationType,
        tenantId: ID,
        variables: TemplateVariables,
        subscription?: TenantSubscription,
    ): void {
        this.send(ctx, type, tenantId, variables, subscription).catch(err =>
            Logger.error(`Failed to send ${type} notification for tenant ${String(tenantId)}: ${String(err)}`, loggerCtx),
        );
    }

    private async send(
        ctx: RequestContext,
        type: NotificationType,
        tenantId: ID,
        variables: TemplateVariables,
        subscription?: TenantSubscription,
    ): Promise<void> {
        const tenant = await this.connection.getRepository(ctx, Tenant).findOne({ where: { id: tenantId } });
        if (!tenant) {
            Logger.warn(`Skipping ${type} notification, tenant ${String(tenantId)} not found`, loggerCtx);
            return;
        }
        const plan = subscription
            ? await this.connection.getRepository(ctx, SubscriptionPlan).findOne({ where: { id: subscription.planId } })
            : undefined;
        const allVariables: TemplateVariables = {
            tenantName: tenant.name,
            tenantSlug: tenant.slug,
            ...(plan ? { planName: plan.name } : {}),
            ...variables,
        };
        const template = this.options.notificationTemplates[type];
        await this.options.notificationStrategy.send(ctx, {
            type,
            tenantId: tenant.id,
            recipient: tenant.companyEmail,
            subject: renderTemplate(template.subject, allVariables),
            body: renderTemplate(template.body, allVariables),
        });
    }
}
