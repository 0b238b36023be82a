import { Injectable } from '@nestjs/common';
import { DeletionResponse, DeletionResult } from '@vendure/common/lib/generated-types';
import { normalizeString } from '@vendure/common/lib/normalize-string';
import { ID } from '@vendure/common/lib/shared-types';
import {
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
} from '@vendure/core';

import { UsageResource } from '../common/usage-limits';
import { Team } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { UsageLimitService } from './usage-limit.service';

export interface CreateTeamInput {
    tenantId: ID;
    name: string;
    slug?: string | null;
    description?: string | null;
    isPrivate?: boolean | null;
    color?: string | null;
}

export interface UpdateTeamInput {
    id: ID;
    name?: string | null;
    description?: string | null;
    isPrivate?: boolean | null;
    color?: string | null;
}

export interface WorkspaceListOptions {
    take?: number | null;
    skip?: number | null;
}

/**
 * Teams inside a tenant. Creating a team consumes one TEAMS slot
 * of the tenant's plan.
 */
@Injectable()
export class TeamService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
        private usageLimits: UsageLimitService,
    ) {}

    async findAll(ctx: RequestContext, tenantId: ID, options?: WorkspaceListOptions | null): Promise<PaginatedList<Team>> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const [items, totalItems] = await this.connection.getRepository(ctx, Team).findAndCount({
            where: { tenantId },
            take: options?.take ?? 100,
            skip: options?.skip ?? 0,
            order: { name: 'ASC' },
        });
        return { items, totalItems };
    }

    async findOne(ctx: RequestContext, id: ID): Promise<Team | undefined> {
        const team = await this.connection.getRepository(ctx, Team).findOne({ where: { id } });
        if (!team) {
            return undefined;
        }
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: team.tenantId });
        return team;
    }

    async create(ctx: RequestContext, input: CreateTeamInput): Promise<Team> {
        const attempt: AuditAttempt = {
            action: 'TEAM_CREATED',
            tenantId: input.tenantId,
            entityType: 'Team',
            metadata: { name: input.name },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: input.tenantId });
            const name = input.name.trim();
            if (!name) {
                throw new UserInputError('Team name must not be empty');
            }
            const slug = normalizeString(input.slug?.trim() || name, '-');

            return this.usageLimits.reserveOrThrow(ctx, input.tenantId, UsageResource.TEAMS, 1, async txCtx => {
                const repo = this.connection.getRepository(txCtx, Team);
                if (await repo.findOne({ where: { tenantId: input.tenantId, slug } })) {
                    throw new UserInputError(`A team with slug "${slug}" already exists in this tenant`);
                }
                const team = await repo.save(
                    new Team({
                        tenantId: input.tenantId,
                        name,
                        slug,
                        description: input.description ?? '',
                        isPrivate: input.isPrivate ?? false,
                        ...(input.color ? { color: input.color } : {}),
                    }),
                );
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    entityId: team.id,
                    metadata: { name: team.name, slug: team.slug },
                });
                return team;
            });
        });
    }

    async update(ctx: RequestContext, input: UpdateTeamInput): Promise<Team> {
        const team = await this.connection.getEntityOrThrow(ctx, Team, input.id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: team.tenantId });

        if (input.name != null) team.name = input.name;
        if (input.description != null) team.description = input.description;
        if (input.isPrivate != null) team.isPrivate = input.isPrivate;
        if (input.color != null) team.color = input.color;

        const saved = await this.connection.getRepository(ctx, Team).save(team);
        await this.auditService.log(ctx, {
            action: 'TEAM_UPDATED',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'Team',
            entityId: saved.id,
        });
        return saved;
    }

    async delete(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const team = await this.connection.getEntityOrThrow(ctx, Team, id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: team.tenantId });
        await this.connection.getRepository(ctx, Team).remove(team);
        await this.auditService.log(ctx, {
            action: 'TEAM_DELETED',
            severity: 'INFO',
            tenantId: team.tenantId,
            entityType: 'Team',
            entityId: id,
            metadata: { name: team.name },
        });
        return { result: DeletionResult.DELETED };
    }
}
