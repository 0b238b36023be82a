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

import { Team, TeamMember, TeamMemberRole, TenantMember } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { WorkspaceListOptions } from './team.service';

export interface AddTeamMemberInput {
    teamId: ID;
    tenantMemberId: ID;
    role?: TeamMemberRole | null;
}

export interface UpdateTeamMemberInput {
    id: ID;
    role: TeamMemberRole;
}

/**
 * Membership of tenant members in the tenant's teams.
 */
@Injectable()
export class TeamMemberService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
    ) {}

    async findAll(
        ctx: RequestContext,
        teamId: ID,
        options?: WorkspaceListOptions | null,
    ): Promise<PaginatedList<TeamMember>> {
        const team = await this.connection.getEntityOrThrow(ctx, Team, teamId);
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: team.tenantId });
        const [items, totalItems] = await this.connection.getRepository(ctx, TeamMember).findAndCount({
            where: { teamId: team.id },
            relations: ['tenantMember'],
            take: options?.take ?? 100,
            skip: options?.skip ?? 0,
            order: { createdAt: 'ASC', id: 'ASC' },
        });
        return { items, totalItems };
    }

    async add(ctx: RequestContext, input: AddTeamMemberInput): Promise<TeamMember> {
        const role = input.role ?? TeamMemberRole.MEMBER;
        const attempt: AuditAttempt = {
            action: 'TEAM_MEMBER_ADDED',
            entityType: 'TeamMember',
            metadata: { teamId: String(input.teamId), tenantMemberId: String(input.tenantMemberId), role },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            const team = await this.connection.getEntityOrThrow(ctx, Team, input.teamId);
            attempt.tenantId = team.tenantId;
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: team.tenantId });

            return this.connection.withTransaction(ctx, async txCtx => {
                const member = await this.connection.getEntityOrThrow(txCtx, TenantMember, input.tenantMemberId);
                if (!idsAreEqual(member.tenantId, team.tenantId)) {
                    throw new UserInputError('The member belongs to a different tenant');
                }
                const repo = this.connection.getRepository(txCtx, TeamMember);
                if (await repo.findOne({ where: { teamId: team.id, tenantMemberId: member.id } })) {
                    throw new UserInputError(`${member.emailAddress} is already in team "${team.name}"`);
                }
                const teamMember = await repo.save(
                    new TeamMember({
                        teamId: team.id,
                        tenantMemberId: member.id,
                        tenantId: team.tenantId,
                        role,
                    }),
                );
                teamMember.tenantMember = member;
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    entityId: teamMember.id,
                    toState: role,
                });
                return teamMember;
            });
        });
    }

    async update(ctx: RequestContext, input: UpdateTeamMemberInput): Promise<TeamMember> {
        const teamMember = await this.connection.getEntityOrThrow(ctx, TeamMember, input.id, {
            relations: ['tenantMember'],
        });
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: teamMember.tenantId });
        const fromRole = teamMember.role;
        teamMember.role = input.role;
        const saved = await this.connection.getRepository(ctx, TeamMember).save(teamMember);
        await this.auditService.log(ctx, {
            action: 'TEAM_MEMBER_UPDATED',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'TeamMember',
            entityId: saved.id,
            fromState: fromRole,
            toState: saved.role,
        });
        return saved;
    }

    async remove(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const teamMember = await this.connection.getEntityOrThrow(ctx, TeamMember, id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: teamMember.tenantId });
        await this.connection.getRepository(ctx, TeamMember).remove(teamMember);
        await this.auditService.log(ctx, {
            action: 'TEAM_MEMBER_REMOVED',
            severity: 'INFO',
            tenantId: teamMember.tenantId,
            entityType: 'TeamMember',
            entityId: id,
            metadata: { teamId: String(teamMember.teamId) },
        });
        return { result: DeletionResult.DELETED };
    }
}
