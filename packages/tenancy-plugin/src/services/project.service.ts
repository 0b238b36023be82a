import { Injectable } from '@nestjs/common';
import { DeletionResponse, DeletionResult } from '@vendure/common/lib/generated-types';
import { ID } from '@vendure/common/lib/shared-types';
import {
    PaginatedList,
    RequestContext,
    TransactionalConnection,
    UserInputError,
    idsAreEqual,
} from '@vendure/core';

import { UsageResource } from '../common/usage-limits';
import { Project, Team } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { WorkspaceListOptions } from './team.service';
import { UsageLimitService } from './usage-limit.service';

export interface CreateProjectInput {
    tenantId: ID;
    name: string;
    description?: string | null;
    teamId?: ID | null;
}

export interface UpdateProjectInput {
    id: ID;
    name?: string | null;
    description?: string | null;
    teamId?: ID | null;
    isArchived?: boolean | null;
}

/**
 * Projects inside a tenant, optionally owned by one of its
 * teams. Archived projects still count against `maxProjects`.
 */
@Injectable()
export class ProjectService {
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
    ): Promise<PaginatedList<Project>> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const [items, totalItems] = await this.connection.getRepository(ctx, Project).findAndCount({
            where: { tenantId },
            take: options?.take ?? 100,
            skip: options?.skip ?? 0,
            order: { createdAt: 'ASC', id: 'ASC' },
        });
        return { items, totalItems };
    }

    async create(ctx: RequestContext, input: CreateProjectInput): Promise<Project> {
        const attempt: AuditAttempt = {
            action: 'PROJECT_CREATED',
            tenantId: input.tenantId,
            entityType: 'Project',
            metadata: { name: input.name },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: input.tenantId });
            const name = input.name.trim();
            if (!name) {
                throw new UserInputError('Project name must not be empty');
            }

            return this.usageLimits.reserveOrThrow(ctx, input.tenantId, UsageResource.PROJECTS, 1, async txCtx => {
                const teamId = await this.resolveTeamId(txCtx, input.tenantId, input.teamId);
                const project = await this.connection.getRepository(txCtx, Project).save(
                    new Project({
                        tenantId: input.tenantId,
                        teamId,
                        name,
                        description: input.description ?? '',
                        isArchived: false,
                    }),
                );
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    entityId: project.id,
                });
                return project;
            });
        });
    }

    async update(ctx: RequestContext, input: UpdateProjectInput): Promise<Project> {
        const project = await this.connection.getEntityOrThrow(ctx, Project, input.id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: project.tenantId });

        if (input.name != null) project.name = input.name;
        if (input.description != null) project.description = input.description;
        if (input.isArchived != null) project.isArchived = input.isArchived;
        if (input.teamId !== undefined) {
            project.teamId = await this.resolveTeamId(ctx, project.tenantId, input.teamId);
        }

        const saved = await this.connection.getRepository(ctx, Project).save(project);
        await this.auditService.log(ctx, {
            action: 'PROJECT_UPDATED',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'Project',
            entityId: saved.id,
        });
        return saved;
    }

    async delete(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const project = await this.connection.getEntityOrThrow(ctx, Project, id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: project.tenantId });
        await this.connection.getRepository(ctx, Project).remove(project);
        await this.auditService.log(ctx, {
            action: 'PROJECT_DELETED',
            severity: 'INFO',
            tenantId: project.tenantId,
            entityType: 'Project',
            entityId: id,
        });
        return { result: DeletionResult.DELETED };
    }

    private async resolveTeamId(ctx: RequestContext, tenantId: ID, teamId: ID | null | undefined): Promise<ID | null> {
        if (teamId == null) {
            return null;
        }
        const team = await this.connection.getEntityOrThrow(ctx, Team, teamId);
        if (!idsAreEqual(team.tenantId, tenantId)) {
            throw new UserInputError('The team belongs to a different tenant');
        }
        return team.id;
    }
}
