import { Injectable } from '@nestjs/common';
import { DeletionResponse, DeletionResult } from '@vendure/common/lib/generated-types';
import { ID } from '@vendure/common/lib/shared-types';
import {
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
} from '@vendure/core';

import { UsageResource } from '../common/usage-limits';
import { TenantMember, TenantMemberRole } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { WorkspaceListOptions } from './team.service';
import { UsageLimitService } from './usage-limit.service';

export interface AddTenantMemberInput {
    tenantId: ID;
    emailAddress: string;
    firstName?: string | null;
    lastName?: string | null;
    role?: TenantMemberRole | null;
    /** Vendure User the seat belongs to, once that user has an account */
    userId?: ID | null;
}

export interface UpdateTenantMemberInput {
    id: ID;
    firstName?: string | null;
    lastName?: string | null;
    role?: TenantMemberRole | null;
    userId?: ID | null;
}

/**
 * User seats of a tenant (the USERS resource).
 * A member's role decides what that user may do inside the tenant.
 */
@Injectable()
export class TenantMemberService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private usageLimits: UsageLimitService,
    ) {}

    async findAll(
        ctx: RequestContext,
        tenantId: ID,
        options?: WorkspaceListOptions | null,
    ): Promise<PaginatedList<TenantMember>> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const [items, totalItems] = await this.connection.getRepository(ctx, TenantMember).findAndCount({
            where: { tenantId },
            take: options?.take ?? 100,
            skip: options?.skip ?? 0,
            order: { emailAddress: 'ASC' },
        });
        return { items, totalItems };
    }

    async add(ctx: RequestContext, input: AddTenantMemberInput): Promise<TenantMember> {
        const emailAddress = input.emailAddress.trim().toLowerCase();
        const attempt: AuditAttempt = {
            action: 'MEMBER_ADDED',
            tenantId: input.tenantId,
            entityType: 'TenantMember',
            metadata: { emailAddress, role: input.role ?? TenantMemberRole.MEMBER },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: input.tenantId });
            if (!emailAddress.includes('@')) {
                throw new UserInputError(`"${input.emailAddress}" is not a valid email address`);
            }

            return this.usageLimits.reserveOrThrow(ctx, input.tenantId, UsageResource.USERS, 1, async txCtx => {
                const repo = this.connection.getRepository(txCtx, TenantMember);
                if (await repo.findOne({ where: { tenantId: input.tenantId, emailAddress } })) {
                    throw new UserInputError(`${emailAddress} is already a member of this tenant`);
                }
                const member = await repo.save(
                    new TenantMember({
                        tenantId: input.tenantId,
                        emailAddress,
                        firstName: input.firstName ?? '',
                        lastName: input.lastName ?? '',
                        role: input.role ?? TenantMemberRole.MEMBER,
                        userId: input.userId ?? null,
                    }),
                );
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    entityId: member.id,
                    toState: member.role,
                });
                return member;
            });
        });
    }

    async update(ctx: RequestContext, input: UpdateTenantMemberInput): Promise<TenantMember> {
        const member = await this.connection.getEntityOrThrow(ctx, TenantMember, input.id);
        const fromRole = member.role;
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: member.tenantId });

        if (input.firstName != null) member.firstName = input.firstName;
        if (input.lastName != null) member.lastName = input.lastName;
        if (input.role != null) member.role = input.role;
        if (input.userId !== undefined) member.userId = input.userId;

        const saved = await this.connection.getRepository(ctx, TenantMember).save(member);
        await this.auditService.log(ctx, {
            action: 'MEMBER_UPDATED',
            severity: fromRole === saved.role ? 'INFO' : 'WARN',
            tenantId: saved.tenantId,
            entityType: 'TenantMember',
            entityId: saved.id,
            fromState: fromRole,
            toState: saved.role,
        });
        return saved;
    }

    async remove(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const member = await this.connection.getEntityOrThrow(ctx, TenantMember, id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: member.tenantId });
        await this.connection.getRepository(ctx, TenantMember).remove(member);
        await this.auditService.log(ctx, {
            action: 'MEMBER_REMOVED',
            severity: 'INFO',
            tenantId: member.tenantId,
            entityType: 'TenantMember',
            entityId: id,
            metadata: { emailAddress: member.emailAddress },
        });
        return { result: DeletionResult.DELETED };
    }
}
