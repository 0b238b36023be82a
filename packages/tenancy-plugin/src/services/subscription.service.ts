import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EventBus,
    IllegalOperationError,
    Logger,
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
    idsAreEqual,
} from '@vendure/core';
import { In, LessThan } from 'typeorm';

import {
    addBillingInterval,
    getRenewalPeriodStart,
    getInitialPeriod,
    isExpiryDue,
    isNonTerminal,
    isSubscriptionLive,
} from '../common/billing-period';
import { ConflictError } from '../common/errors';
import { assertTransition, subscriptionTransitions } from '../common/state-transitions';
import {
    SubscriptionPlan,
    SubscriptionStatus,
    TenantStatus,
    TenantSubscription,
} from '../entities';
import { SubscriptionStatusChangedEvent } from '../events';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { TenantLockService } from './tenant-lock.service';

const loggerCtx = 'SubscriptionService';

export interface CreateSubscriptionInput {
    tenantId: ID;
    planId: ID;
    autoRenew?: boolean | null;
}

export interface SubscriptionListOptions {
    take?: number | null;
    skip?: number | null;
    tenantId?: ID | null;
    status?: SubscriptionStatus | null;
}

/**
 * Creates, cancels and expires tenant subscriptions.
 *
 * A tenant holds at most one TRIAL or ACTIVE subscription. Creation and every
 * status change run under the tenant's `subscription` lock so that rule holds
 * under concurrent requests. Renewal invoicing lives in SubscriptionRenewalService.
 */
@Injectable()
export class SubscriptionService {
    constructor(
        private connection: TransactionalConnection,
        private eventBus: EventBus,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private tenantLock: TenantLockService,
    ) {}

    async findAll(
        ctx: RequestContext,
        options?: SubscriptionListOptions | null,
    ): Promise<PaginatedList<TenantSubscription>> {
        const [items, totalItems] = await this.connection.getRepository(ctx, TenantSubscription).findAndCount({
            where: {
                ...(options?.tenantId != null ? { tenantId: options.tenantId } : {}),
                ...(options?.status ? { status: options.status } : {}),
            },
            relations: ['plan'],
            take: options?.take ?? 50,
            skip: options?.skip ?? 0,
            order: { createdAt: 'DESC', id: 'DESC' },
        });
        return { items, totalItems };
    }

    async findOne(ctx: RequestContext, id: ID): Promise<TenantSubscription | undefined> {
        const subscription = await this.connection
            .getRepository(ctx, TenantSubscription)
            .findOne({ where: { id }, relations: ['plan'] });
        return subscription ?? undefined;
    }

    /**
     * The TRIAL or ACTIVE subscription of a tenant, whether or not it is still live.
     */
    async findNonTerminal(ctx: RequestContext, tenantId: ID): Promise<TenantSubscription | undefined> {
        const subscription = await this.connection.getRepository(ctx, TenantSubscription).findOne({
            where: { tenantId, status: In([SubscriptionStatus.TRIAL, SubscriptionStatus.ACTIVE]) },
            relations: ['plan'],
            order: { createdAt: 'DESC' },
        });
        return subscription ?? undefined;
    }

    /**
     * The subscription whose plan currently applies to the tenant, if any.
     * A TRIAL or ACTIVE subscription wins over a cancelled one in its grace period.
     */
    async findLiveSubscription(
        ctx: RequestContext,
        tenantId: ID,
        now: Date = new Date(),
    ): Promise<TenantSubscription | undefined> {
        const candidates = await this.connection.getRepository(ctx, TenantSubscription).find({
            where: {
                tenantId,
                status: In([SubscriptionStatus.TRIAL, SubscriptionStatus.ACTIVE, SubscriptionStatus.CANCELLED]),
            },
            relations: ['plan'],
            order: { endsAt: 'DESC' },
        });
        return (
            candidates.find(s => isNonTerminal(s.status) && isSubscriptionLive(s, now)) ??
            candidates.find(s => isSubscriptionLive(s, now))
        );
    }

    async create(ctx: RequestContext, input: CreateSubscriptionInput): Promise<TenantSubscription> {
        const attempt: AuditAttempt = {
            action: 'SUBSCRIPTION_CREATED',
            tenantId: input.tenantId,
            entityType: 'TenantSubscription',
            metadata: { planId: String(input.planId) },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageSubscription', { tenantId: input.tenantId });
            return this.tenantLock.withTenantLock(ctx, input.tenantId, 'subscription', async (txCtx, tenant) => {
                if (tenant.status === TenantStatus.REJECTED) {
                    throw new IllegalOperationError(`Tenant "${tenant.slug}" was rejected and cannot subscribe`);
                }
                const plan = await this.connection.getEntityOrThrow(txCtx, SubscriptionPlan, input.planId);
                if (!plan.isActive) {
                    throw new UserInputError(`Subscription plan "${plan.code}" is not available`);
                }
                const existing = await this.findNonTerminal(txCtx, tenant.id);
                if (existing) {
                    throw new ConflictError(
                        `Tenant "${tenant.slug}" already has a ${existing.status} subscription`,
                        { tenantSlug: tenant.slug, status: existing.status },
                    );
                }

                const now = new Date();
                const period = getInitialPeriod(plan, now);
                const subscription = await this.connection.getRepository(txCtx, TenantSubscription).save(
                    new TenantSubscription({
                        tenantId: tenant.id,
                        planId: plan.id,
                        status: period.status,
                        billingInterval: plan.billingInterval,
                        startsAt: now,
                        currentPeriodStart: now,
                        endsAt: period.endsAt,
                        trialEndsAt: period.trialEndsAt,
                        autoRenew: input.autoRenew ?? true,
                        cancelledAt: null,
                        cancellationReason: null,
                    }),
                );
                subscription.plan = plan;

                await this.auditService.log(txCtx, {
                    action: 'SUBSCRIPTION_CREATED',
                    severity: 'INFO',
                    tenantId: tenant.id,
                    entityType: 'TenantSubscription',
                    entityId: subscription.id,
                    toState: subscription.status,
                    metadata: { planCode: plan.code, endsAt: subscription.endsAt.toISOString() },
                });
                await this.eventBus.publish(
                    new SubscriptionStatusChangedEvent(txCtx, subscription, undefined, subscription.status),
                );
                return subscription;
            });
        });
    }

    /**
     * Cancels a TRIAL or ACTIVE subscription. The plan keeps applying until
     * `endsAt`; no further renewal happens.
     */
    async cancel(ctx: RequestContext, id: ID, reason?: string | null): Promise<TenantSubscription> {
        const attempt: AuditAttempt = {
            action: 'SUBSCRIPTION_CANCELLED',
            entityType: 'TenantSubscription',
            entityId: id,
            toState: SubscriptionStatus.CANCELLED,
            notes: reason,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            const { tenantId } = await this.connection.getEntityOrThrow(ctx, TenantSubscription, id);
            attempt.tenantId = tenantId;
            await this.accessPolicy.assert(ctx, 'manageSubscription', { tenantId });
            return this.tenantLock.withTenantLock(ctx, tenantId, 'subscription', async txCtx => {
                const subscription = await this.connection.getEntityOrThrow(txCtx, TenantSubscription, id);
                return this.changeStatus(txCtx, subscription, SubscriptionStatus.CANCELLED, {
                    action: 'SUBSCRIPTION_CANCELLED',
                    notes: reason,
                    apply: (s, now) => {
                        s.autoRenew = false;
                        s.cancelledAt = now;
                        s.cancellationReason = reason ?? null;
                    },
                });
            });
        });
    }

    async setAutoRenew(ctx: RequestContext, id: ID, autoRenew: boolean): Promise<TenantSubscription> {
        const attempt: AuditAttempt = {
            action: 'SUBSCRIPTION_AUTO_RENEW_CHANGED',
            entityType: 'TenantSubscription',
            entityId: id,
            metadata: { autoRenew },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            const { tenantId } = await this.connection.getEntityOrThrow(ctx, TenantSubscription, id);
            attempt.tenantId = tenantId;
            await this.accessPolicy.assert(ctx, 'manageSubscription', { tenantId });
            return this.tenantLock.withTenantLock(ctx, tenantId, 'subscription', async txCtx => {
                const subscription = await this.connection.getEntityOrThrow(txCtx, TenantSubscription, id);
                if (!isNonTerminal(subscription.status)) {
                    throw new IllegalOperationError(
                        `Auto-renew cannot be changed on a ${subscription.status} subscription`,
                    );
                }
                subscription.autoRenew = autoRenew;
                const saved = await this.connection.getRepository(txCtx, TenantSubscription).save(subscription);
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    tenantId: saved.tenantId,
                });
                return saved;
            });
        });
    }

    /**
     * Starts a fresh period from `now` after a payment has been approved for a
     * TRIAL or EXPIRED subscription. Must run inside the tenant's subscription lock.
     */
    async activateForPayment(ctx: RequestContext, subscription: TenantSubscription, now: Date): Promise<TenantSubscription> {
        if (subscription.status === SubscriptionStatus.EXPIRED) {
            const other = await this.findNonTerminal(ctx, subscription.tenantId);
            if (other && !idsAreEqual(other.id, subscription.id)) {
                throw new ConflictError(
                    `Cannot reactivate subscription ${String(subscription.id)} while subscription ${String(other.id)} is ${other.status}`,
                    { subscriptionId: String(subscription.id), otherId: String(other.id) },
                );
            }
        }
        return this.changeStatus(ctx, subscription, SubscriptionStatus.ACTIVE, {
            action: 'SUBSCRIPTION_ACTIVATED',
            notes: 'Payment approved',
            apply: (s, at) => {
                s.currentPeriodStart = at;
                s.endsAt = addBillingInterval(at, s.billingInterval);
            },
            now,
        });
    }

    /**
     * Extends the period by one interval once a renewal invoice is paid. The new
     * period follows the old `endsAt` only for an ACTIVE subscription that has
     * not lapsed yet; otherwise it starts at `now`. Must run inside the tenant's
     * subscription lock.
     */
    async applyRenewal(ctx: RequestContext, subscription: TenantSubscription, now: Date): Promise<TenantSubscription> {
        if (subscription.status === SubscriptionStatus.EXPIRED) {
            return this.activateForPayment(ctx, subscription, now);
        }
        if (!isNonTerminal(subscription.status)) {
            Logger.warn(
                `Renewal paid for ${subscription.status} subscription ${String(subscription.id)}; period left unchanged`,
                loggerCtx,
            );
            return subscription;
        }
        const fromStatus = subscription.status;
        const previousEnd = subscription.endsAt;
        const start = getRenewalPeriodStart(subscription, now);
        subscription.currentPeriodStart = start;
        subscription.endsAt = addBillingInterval(start, subscription.billingInterval);
        subscription.status = SubscriptionStatus.ACTIVE;
        const saved = await this.connection.getRepository(ctx, TenantSubscription).save(subscription);

        await this.auditService.log(ctx, {
            action: 'SUBSCRIPTION_RENEWED',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'TenantSubscription',
            entityId: saved.id,
            fromState: fromStatus,
            toState: saved.status,
            metadata: { previousEndsAt: previousEnd.toISOString(), endsAt: saved.endsAt.toISOString() },
        });
        if (fromStatus !== saved.status) {
            await this.eventBus.publish(new SubscriptionStatusChangedEvent(ctx, saved, fromStatus, saved.status));
        }
        return saved;
    }

    /**
     * Moves every TRIAL or ACTIVE subscription whose period ended before `now`
     * and that does not auto-renew to EXPIRED. Running it again at the same
     * `now` changes nothing. Tenants keep their status.
     */
    async expireLapsed(ctx: RequestContext, now: Date): Promise<TenantSubscription[]> {
        const candidates = await this.connection.getRepository(ctx, TenantSubscription).find({
            where: {
                status: In([SubscriptionStatus.TRIAL, SubscriptionStatus.ACTIVE]),
                autoRenew: false,
                endsAt: LessThan(now),
            },
        });

        const expired: TenantSubscription[] = [];
        for (const candidate of candidates) {
            try {
                const result = await this.tenantLock.withTenantLock(
                    ctx,
                    candidate.tenantId,
                    'subscription',
                    async txCtx => {
                        const subscription = await this.connection.getEntityOrThrow(
                            txCtx,
                            TenantSubscription,
                            candidate.id,
                        );
                        if (!isExpiryDue(subscription, now)) {
                            return undefined;
                        }
                        return this.changeStatus(txCtx, subscription, SubscriptionStatus.EXPIRED, {
                            action: 'SUBSCRIPTION_EXPIRED',
                            notes: 'Billing period ended without renewal',
                            now,
                        });
                    },
                );
                if (result) {
                    expired.push(result);
                }
            } catch (e) {
                Logger.error(`Failed to expire subscription ${String(candidate.id)}: ${String(e)}`, loggerCtx);
            }
        }
        return expired;
    }

    private async changeStatus(
        ctx: RequestContext,
        subscription: TenantSubscription,
        to: SubscriptionStatus,
        options: {
            action: string;
            notes?: string | null;
            apply?: (subscription: TenantSubscription, now: Date) => void;
            now?: Date;
        },
    ): Promise<TenantSubscription> {
        const fromStatus = subscription.status;
        assertTransition('subscription', subscriptionTransitions, fromStatus, to);

        options.apply?.(subscription, options.now ?? new Date());
        subscription.status = to;
        const saved = await this.connection.getRepository(ctx, TenantSubscription).save(subscription);

        await this.auditService.log(ctx, {
            action: options.action,
            severity: to === SubscriptionStatus.EXPIRED || to === SubscriptionStatus.CANCELLED ? 'WARN' : 'INFO',
            tenantId: saved.tenantId,
            entityType: 'TenantSubscription',
            entityId: saved.id,
            fromState: fromStatus,
            toState: to,
            notes: options.notes,
            metadata: { endsAt: saved.endsAt.toISOString() },
        });
        await this.eventBus.publish(new SubscriptionStatusChangedEvent(ctx, saved, fromStatus, to));
        return saved;
    }
}
