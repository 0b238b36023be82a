import { Injectable } from '@nestjs/common';
import { normalizeString } from '@vendure/common/lib/normalize-string';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EventBus,
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
} from '@vendure/core';

import { assertTransition, tenantTransitions } from '../common/state-transitions';
import { Tenant, TenantStatus } from '../entities';
import { TenantRegisteredEvent, TenantStatusChangedEvent } from '../events';

import { AccessPolicyService } from './access-policy.service';
import { AuditService, AuditSeverity } from './audit.service';
import { TenantLockService } from './tenant-lock.service';

/**
 * Input for signing up a new tenant.
 */
export interface RegisterTenantInput {
    name: string;
    /** Derived from `name` when omitted */
    slug?: string | null;
    companyName: string;
    companyEmail: string;
    companyPhone?: string | null;
}

/**
 * Input for updating tenant metadata. Status is changed through the
 * lifecycle methods only.
 */
export interface UpdateTenantInput {
    id: ID;
    name?: string | null;
    companyName?: string | null;
    companyEmail?: string | null;
    companyPhone?: string | null;
    config?: Record<string, unknown> | null;
    notes?: string | null;
}

export interface TenantListOptions {
    take?: number | null;
    skip?: number | null;
    status?: TenantStatus | null;
}

interface TransitionRequest {
    action: string;
    to: TenantStatus;
    severity: AuditSeverity;
    notes?: string | null;
    apply: (tenant: Tenant, ctx: RequestContext, now: Date) => void;
}

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

/**
 * Signup and the approval lifecycle of tenants.
 *
 * PENDING → ACTIVE (approve) | REJECTED (reject)
 * ACTIVE → SUSPENDED (suspend)
 * SUSPENDED → ACTIVE (reactivate)
 *
 * Each transition checks the `approveTenant` capability, writes its audit entry
 * in the same transaction as the status change and publishes a
 * TenantStatusChangedEvent.
 */
@Injectable()
export class TenantService {
    constructor(
        private connection: TransactionalConnection,
        private eventBus: EventBus,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private tenantLock: TenantLockService,
    ) {}

    /**
     * Find all tenants with pagination and an optional status filter.
     */
    async findAll(ctx: RequestContext, options?: TenantListOptions | null): Promise<PaginatedList<Tenant>> {
        const [items, totalItems] = await this.connection.getRepository(ctx, Tenant).findAndCount({
            where: options?.status ? { status: options.status } : {},
            take: options?.take ?? 100,
            skip: options?.skip ?? 0,
            order: { createdAt: 'DESC', id: 'DESC' },
        });
        return { items, totalItems };
    }

    async findById(ctx: RequestContext, id: ID): Promise<Tenant | undefined> {
        const tenant = await this.connection.getRepository(ctx, Tenant).findOne({ where: { id } });
        return tenant ?? undefined;
    }

    async findBySlug(ctx: RequestContext, slug: string): Promise<Tenant | undefined> {
        const tenant = await this.connection.getRepository(ctx, Tenant).findOne({ where: { slug } });
        return tenant ?? undefined;
    }

    /**
     * Creates a PENDING tenant waiting for approval.
     */
    async register(ctx: RequestContext, input: RegisterTenantInput): Promise<Tenant> {
        const name = input.name.trim();
        if (!name) {
            throw new UserInputError('Tenant name must not be empty');
        }
        const slug = normalizeString(input.slug?.trim() || name, '-');
        if (!/^[a-z0-9]+(-[a-z0-9]+)*$/.test(slug)) {
            throw new UserInputError(`"${slug}" is not a valid tenant slug`);
        }
        const companyEmail = input.companyEmail.trim().toLowerCase();
        if (!EMAIL_PATTERN.test(companyEmail)) {
            throw new UserInputError(`"${input.companyEmail}" is not a valid email address`);
        }

        return this.connection.withTransaction(ctx, async txCtx => {
            const repo = this.connection.getRepository(txCtx, Tenant);
            if (await repo.findOne({ where: { slug } })) {
                throw new UserInputError(`Tenant with slug "${slug}" already exists`);
            }

            const tenant = await repo.save(
                new Tenant({
                    name,
                    slug,
                    companyName: input.companyName.trim() || name,
                    companyEmail,
                    companyPhone: input.companyPhone ?? null,
                    status: TenantStatus.PENDING,
                    isApproved: false,
                    approvedById: null,
                    approvedAt: null,
                    rejectedAt: null,
                    suspendedAt: null,
                    statusReason: null,
                    storageUsedMb: 0,
                    config: {},
                    notes: null,
                }),
            );

            await this.auditService.log(txCtx, {
                action: 'TENANT_REGISTERED',
                severity: 'INFO',
                tenantId: tenant.id,
                entityType: 'Tenant',
                entityId: tenant.id,
                toState: tenant.status,
                metadata: { name: tenant.name, slug: tenant.slug },
            });
            await this.eventBus.publish(new TenantRegisteredEvent(txCtx, tenant));
            return tenant;
        });
    }

    /**
     * Update tenant metadata (name, company details, config, notes).
     */
    async update(ctx: RequestContext, input: UpdateTenantInput): Promise<Tenant> {
        const tenant = await this.connection.getEntityOrThrow(ctx, Tenant, input.id);

        if (input.name != null) tenant.name = input.name;
        if (input.companyName != null) tenant.companyName = input.companyName;
        if (input.companyEmail != null) {
            if (!EMAIL_PATTERN.test(input.companyEmail)) {
                throw new UserInputError(`"${input.companyEmail}" is not a valid email address`);
            }
            tenant.companyEmail = input.companyEmail.toLowerCase();
        }
        if (input.companyPhone !== undefined) tenant.companyPhone = input.companyPhone;
        if (input.config != null) tenant.config = { ...tenant.config, ...input.config };
        if (input.notes !== undefined) tenant.notes = input.notes;

        const saved = await this.connection.getRepository(ctx, Tenant).save(tenant);
        await this.auditService.log(ctx, {
            action: 'TENANT_UPDATED',
            severity: 'INFO',
            tenantId: saved.id,
            entityType: 'Tenant',
            entityId: saved.id,
            metadata: { fields: Object.keys(input).filter(key => key !== 'id') },
        });
        return saved;
    }

    async approve(ctx: RequestContext, id: ID, notes?: string | null): Promise<Tenant> {
        return this.transition(ctx, id, {
            action: 'TENANT_APPROVED',
            to: TenantStatus.ACTIVE,
            severity: 'INFO',
            notes,
            apply: (tenant, txCtx, now) => {
                tenant.isApproved = true;
                tenant.approvedById = txCtx.activeUserId ?? null;
                tenant.approvedAt = now;
                tenant.statusReason = null;
            },
        });
    }

    async reject(ctx: RequestContext, id: ID, reason: string): Promise<Tenant> {
        return this.transition(ctx, id, {
            action: 'TENANT_REJECTED',
            to: TenantStatus.REJECTED,
            severity: 'WARN',
            notes: reason,
            apply: (tenant, txCtx, now) => {
                tenant.rejectedAt = now;
                tenant.statusReason = reason;
            },
        });
    }

    async suspend(ctx: RequestContext, id: ID, reason: string): Promise<Tenant> {
        return this.transition(ctx, id, {
            action: 'TENANT_SUSPENDED',
            to: TenantStatus.SUSPENDED,
            severity: 'WARN',
            notes: reason,
            apply: (tenant, txCtx, now) => {
                tenant.suspendedAt = now;
                tenant.statusReason = reason;
            },
        });
    }

    async reactivate(ctx: RequestContext, id: ID, notes?: string | null): Promise<Tenant> {
        return this.transition(ctx, id, {
            action: 'TENANT_REACTIVATED',
            to: TenantStatus.ACTIVE,
            severity: 'INFO',
            notes,
            apply: tenant => {
                tenant.suspendedAt = null;
                tenant.statusReason = null;
            },
        });
    }

    private async transition(ctx: RequestContext, id: ID, request: TransitionRequest): Promise<Tenant> {
        const attempt = {
            action: request.action,
            tenantId: id,
            entityType: 'Tenant',
            entityId: id,
            toState: request.to,
            notes: request.notes,
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'approveTenant');
            return this.tenantLock.withTenantLock(ctx, id, 'tenant', async (txCtx, tenant) => {
                const fromStatus = tenant.status;
                assertTransition('tenant', tenantTransitions, fromStatus, request.to);

                request.apply(tenant, txCtx, new Date());
                tenant.status = request.to;
                const saved = await this.connection.getRepository(txCtx, Tenant).save(tenant);

                await this.auditService.log(txCtx, {
                    action: request.action,
                    severity: request.severity,
                    tenantId: saved.id,
                    entityType: 'Tenant',
                    entityId: saved.id,
                    fromState: fromStatus,
                    toState: saved.status,
                    notes: request.notes,
                });
                await this.eventBus.publish(
                    new TenantStatusChangedEvent(txCtx, saved, fromStatus, saved.status, request.notes ?? undefined),
                );
                return saved;
            });
        });
    }
}
