import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import { Logger, RequestContext, TransactionalConnection, UserInputError } from '@vendure/core';

import { LimitExceededError } from '../common/errors';
import {
    evaluateUsage,
    getResourceLimit,
    UNLIMITED,
    UsageAllowed,
    UsageDecision,
    UsageDenied,
    UsageResource,
} from '../common/usage-limits';
import { PlanFeatures, Project, Team, Tenant, TenantMember, TenantStatus } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditService } from './audit.service';
import { SubscriptionService } from './subscription.service';
import { TenantLockService } from './tenant-lock.service';

const loggerCtx = 'UsageLimitService';

export type ReservationResult<T> =
    | { allowed: true; decision: UsageAllowed; value: T }
    | { allowed: false; decision: UsageDenied };

export interface ResourceUsage {
    resource: UsageResource;
    used: number;
    limit: number;
    unlimited: boolean;
}

export interface TenantUsage {
    tenantId: ID;
    planCode: string | null;
    subscriptionId: ID | null;
    resources: ResourceUsage[];
}

/**
 * Enforces plan limits on countable tenant resources.
 *
 * `checkUsageLimit()` is a read-only answer. Anything that creates a counted
 * resource goes through `checkAndReserve()`, which re-counts and commits under
 * the tenant lock, so two concurrent requests for the last slot cannot both
 * succeed. Lifecycle transitions take the same lock, so a suspension is never
 * interleaved with a reservation.
 */
@Injectable()
export class UsageLimitService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private tenantLock: TenantLockService,
        private subscriptionService: SubscriptionService,
    ) {}

    async checkUsageLimit(
        ctx: RequestContext,
        tenantId: ID,
        resource: UsageResource,
        requested = 1,
    ): Promise<UsageDecision> {
        assertQuantity(requested);
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const tenant = await this.connection.getEntityOrThrow(ctx, Tenant, tenantId);
        return this.evaluate(ctx, tenant, resource, requested);
    }

    /**
     * Runs `commit` only if `requested` more units fit. The decision and the
     * commit share one transaction under the tenant lock. Denials are returned,
     * not thrown.
     */
    async checkAndReserve<T>(
        ctx: RequestContext,
        tenantId: ID,
        resource: UsageResource,
        requested: number,
        commit: (txCtx: RequestContext, tenant: Tenant) => Promise<T>,
    ): Promise<ReservationResult<T>> {
        assertQuantity(requested);
        return this.tenantLock.withTenantLock(ctx, tenantId, 'tenant', async (txCtx, tenant) => {
            const decision = await this.evaluate(txCtx, tenant, resource, requested);
            if (!decision.allowed) {
                Logger.verbose(`Denied ${resource} for tenant ${tenant.slug}: ${decision.reason}`, loggerCtx);
                return { allowed: false, decision };
            }
            const value = await commit(txCtx, tenant);
            return { allowed: true, decision, value };
        });
    }

    /**
     * Like `checkAndReserve()` but surfaces a denial as a LimitExceededError.
     */
    async reserveOrThrow<T>(
        ctx: RequestContext,
        tenantId: ID,
        resource: UsageResource,
        requested: number,
        commit: (txCtx: RequestContext, tenant: Tenant) => Promise<T>,
    ): Promise<T> {
        const result = await this.checkAndReserve(ctx, tenantId, resource, requested, commit);
        if (!result.allowed) {
            throw new LimitExceededError(result.decision.message, {
                resource,
                reason: result.decision.reason,
            });
        }
        return result.value;
    }

    async reserveStorage(ctx: RequestContext, tenantId: ID, megabytes: number): Promise<Tenant> {
        const attempt = {
            action: 'STORAGE_RESERVED',
            tenantId,
            entityType: 'Tenant',
            entityId: tenantId,
            metadata: { megabytes },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId });
            return this.reserveOrThrow(ctx, tenantId, UsageResource.STORAGE, megabytes, async (txCtx, tenant) => {
                tenant.storageUsedMb += megabytes;
                const saved = await this.connection.getRepository(txCtx, Tenant).save(tenant);
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    metadata: { megabytes, storageUsedMb: saved.storageUsedMb },
                });
                return saved;
            });
        });
    }

    /**
     * Gives storage back. Never checked against limits, so a suspended tenant
     * can still free space. Usage does not go below zero.
     */
    async releaseStorage(ctx: RequestContext, tenantId: ID, megabytes: number): Promise<Tenant> {
        assertQuantity(megabytes);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId });
        return this.tenantLock.withTenantLock(ctx, tenantId, 'tenant', async (txCtx, tenant) => {
            tenant.storageUsedMb = Math.max(0, tenant.storageUsedMb - megabytes);
            const saved = await this.connection.getRepository(txCtx, Tenant).save(tenant);
            await this.auditService.log(txCtx, {
                action: 'STORAGE_RELEASED',
                severity: 'INFO',
                tenantId: saved.id,
                entityType: 'Tenant',
                entityId: saved.id,
                metadata: { megabytes, storageUsedMb: saved.storageUsedMb },
            });
            return saved;
        });
    }

    async getUsage(ctx: RequestContext, tenantId: ID, now: Date = new Date()): Promise<TenantUsage> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const tenant = await this.connection.getEntityOrThrow(ctx, Tenant, tenantId);
        const subscription = await this.subscriptionService.findLiveSubscription(ctx, tenantId, now);
        const resources: ResourceUsage[] = [];
        for (const resource of Object.values(UsageResource)) {
            const limit = subscription ? getResourceLimit(subscription.plan, resource) : 0;
            resources.push({
                resource,
                used: await this.countUsed(ctx, tenant, resource),
                limit,
                unlimited: limit === UNLIMITED,
            });
        }
        return {
            tenantId: tenant.id,
            planCode: subscription?.plan.code ?? null,
            subscriptionId: subscription?.id ?? null,
            resources,
        };
    }

    /**
     * False for tenants that are not ACTIVE or have no live plan.
     */
    async hasFeature(ctx: RequestContext, tenantId: ID, feature: keyof PlanFeatures): Promise<boolean> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const tenant = await this.connection.getEntityOrThrow(ctx, Tenant, tenantId);
        if (tenant.status !== TenantStatus.ACTIVE) {
            return false;
        }
        const subscription = await this.subscriptionService.findLiveSubscription(ctx, tenantId);
        return subscription?.plan.features[feature] === true;
    }

    private async evaluate(
        ctx: RequestContext,
        tenant: Tenant,
        resource: UsageResource,
        requested: number,
    ): Promise<UsageDecision> {
        const subscription =
            tenant.status === TenantStatus.ACTIVE
                ? await this.subscriptionService.findLiveSubscription(ctx, tenant.id)
                : undefined;
        return evaluateUsage({
            tenantSlug: tenant.slug,
            tenantStatus: tenant.status,
            limits: subscription?.plan,
            resource,
            used: await this.countUsed(ctx, tenant, resource),
            requested,
        });
    }

    private async countUsed(ctx: RequestContext, tenant: Tenant, resource: UsageResource): Promise<number> {
        const where = { tenantId: tenant.id };
        switch (resource) {
            case UsageResource.USERS:
                return this.connection.getRepository(ctx, TenantMember).count({ where });
            case UsageResource.TEAMS:
                return this.connection.getRepository(ctx, Team).count({ where });
            case UsageResource.PROJECTS:
                return this.connection.getRepository(ctx, Project).count({ where });
            case UsageResource.STORAGE:
                return tenant.storageUsedMb;
        }
    }
}

function assertQuantity(quantity: number) {
    if (!Number.isInteger(quantity) || quantity <= 0) {
        throw new UserInputError('Quantity must be a positive integer');
    }
}
