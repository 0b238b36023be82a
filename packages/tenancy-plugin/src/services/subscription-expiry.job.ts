import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    JobQueue,
    JobQueueService,
    Logger,
    RequestContext,
    UserInputError,
} from '@vendure/core';

import { SUBSCRIPTION_EXPIRY_QUEUE, TENANCY_PLUGIN_OPTIONS } from '../constants';
import { ResolvedTenancyPluginOptions } from '../types';

import { InvoiceService } from './invoice.service';
import { SubscriptionService } from './subscription.service';

const loggerCtx = 'SubscriptionExpiryJob';

export interface ExpirySweepResult {
    asOf: Date;
    expiredSubscriptionIds: ID[];
    overdueInvoiceIds: ID[];
}

/**
 * Vendure JobQueue worker for the billing sweep.
 *
 * 1. TRIAL/ACTIVE subscriptions past `endsAt` without auto-renew → EXPIRED
 * 2. SENT invoices past `dueAt` → OVERDUE
 *
 * Tenants are never suspended here. The sweep is idempotent for a given
 * `asOf`. It can be queued on an interval, queued from the Admin API, or run
 * synchronously with `sweep()`.
 */
@Injectable()
export class SubscriptionExpiryJob implements OnModuleInit, OnApplicationBootstrap, OnModuleDestroy {
    private jobQueue: JobQueue<{ asOf: string }> | undefined;
    private interval: NodeJS.Timeout | undefined;

    constructor(
        private jobQueueService: JobQueueService,
        private subscriptionService: SubscriptionService,
        private invoiceService: InvoiceService,
        @Inject(TENANCY_PLUGIN_OPTIONS) private options: ResolvedTenancyPluginOptions,
    ) {}

    async onModuleInit() {
        this.jobQueue = await this.jobQueueService.createQueue({
            name: SUBSCRIPTION_EXPIRY_QUEUE,
            process: async job => {
                const result = await this.sweep(RequestContext.empty(), new Date(job.data.asOf));
                return {
                    expired: result.expiredSubscriptionIds.length,
                    overdue: result.overdueInvoiceIds.length,
                };
            },
        });
    }

    onApplicationBootstrap() {
        const { expirySweepIntervalMs } = this.options;
        if (expirySweepIntervalMs && expirySweepIntervalMs > 0) {
            this.interval = setInterval(() => {
                this.trigger().catch(e => Logger.error(`Failed to queue expiry sweep: ${String(e)}`, loggerCtx));
            }, expirySweepIntervalMs);
            this.interval.unref();
        }
    }

    onModuleDestroy() {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = undefined;
        }
    }

    /**
     * Queue a sweep (for the Admin API or the interval timer).
     */
    async trigger(asOf: Date = new Date()): Promise<void> {
        if (!this.jobQueue) {
            throw new UserInputError('The subscription expiry queue has not been started');
        }
        await this.jobQueue.add({ asOf: asOf.toISOString() }, { retries: 0 });
    }

    async sweep(ctx: RequestContext, asOf: Date = new Date()): Promise<ExpirySweepResult> {
        const expired = await this.subscriptionService.expireLapsed(ctx, asOf);
        const overdue = await this.invoiceService.markOverdue(ctx, asOf);
        if (expired.length || overdue.length) {
            Logger.info(
                `Expiry sweep as of ${asOf.toISOString()} expired ${expired.length} subscription(s), marked ${overdue.length} invoice(s) overdue`,
                loggerCtx,
            );
        } else {
            Logger.verbose(`Expiry sweep as of ${asOf.toISOString()} found nothing to do`, loggerCtx);
        }
        return {
            asOf,
            expiredSubscriptionIds: expired.map(s => s.id),
            overdueInvoiceIds: overdue.map(i => i.id),
        };
    }
}
