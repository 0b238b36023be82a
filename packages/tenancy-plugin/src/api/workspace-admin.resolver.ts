import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ID } from '@vendure/common/lib/shared-types';
import {
    Allow,
    Ctx,
    Permission,
    RequestContext,
    Transaction,
    UserInputError,
} from '@vendure/core';

import { UsageResource } from '../common/usage-limits';
import { isPlanFeature } from '../services/plan.service';
import { CreateProjectInput, ProjectService, UpdateProjectInput } from '../services/project.service';
import { AddTeamMemberInput, TeamMemberService, UpdateTeamMemberInput } from '../services/team-member.service';
import { CreateTeamInput, TeamService, UpdateTeamInput, WorkspaceListOptions } from '../services/team.service';
import {
    AddTenantMemberInput,
    TenantMemberService,
    UpdateTenantMemberInput,
} from '../services/tenant-member.service';
import { UsageLimitService } from '../services/usage-limit.service';

/**
 * Admin API resolver for tenant workspace resources and plan usage.
 *
 * Open to any administrator; access is decided per tenant by the services,
 * so tenant staff can manage their own workspace through their member role.
 */
@Resolver()
export class WorkspaceAdminResolver {
    constructor(
        private teamService: TeamService,
        private projectService: ProjectService,
        private memberService: TenantMemberService,
        private teamMemberService: TeamMemberService,
        private usageLimits: UsageLimitService,
    ) {}

    @Query()
    @Allow(Permission.Authenticated)
    async teams(
        @Ctx() ctx: RequestContext,
        @Args() args: { tenantId: ID; options?: WorkspaceListOptions | null },
    ) {
        return this.teamService.findAll(ctx, args.tenantId, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async projects(
        @Ctx() ctx: RequestContext,
        @Args() args: { tenantId: ID; options?: WorkspaceListOptions | null },
    ) {
        return this.projectService.findAll(ctx, args.tenantId, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async tenantMembers(
        @Ctx() ctx: RequestContext,
        @Args() args: { tenantId: ID; options?: WorkspaceListOptions | null },
    ) {
        return this.memberService.findAll(ctx, args.tenantId, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async teamMembers(
        @Ctx() ctx: RequestContext,
        @Args() args: { teamId: ID; options?: WorkspaceListOptions | null },
    ) {
        return this.teamMemberService.findAll(ctx, args.teamId, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async checkUsageLimit(
        @Ctx() ctx: RequestContext,
        @Args() args: { tenantId: ID; resource: UsageResource; quantity?: number | null },
    ) {
        return this.usageLimits.checkUsageLimit(ctx, args.tenantId, args.resource, args.quantity ?? 1);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async tenantUsage(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID }) {
        return this.usageLimits.getUsage(ctx, args.tenantId);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async tenantHasFeature(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID; feature: string }) {
        const { feature } = args;
        if (!isPlanFeature(feature)) {
            throw new UserInputError(`Unknown plan feature "${feature}"`);
        }
        return this.usageLimits.hasFeature(ctx, args.tenantId, feature);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async createTeam(@Ctx() ctx: RequestContext, @Args() args: { input: CreateTeamInput }) {
        return this.teamService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateTeam(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateTeamInput }) {
        return this.teamService.update(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async deleteTeam(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.teamService.delete(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async createProject(@Ctx() ctx: RequestContext, @Args() args: { input: CreateProjectInput }) {
        return this.projectService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateProject(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateProjectInput }) {
        return this.projectService.update(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async deleteProject(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.projectService.delete(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async addTenantMember(@Ctx() ctx: RequestContext, @Args() args: { input: AddTenantMemberInput }) {
        return this.memberService.add(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateTenantMember(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateTenantMemberInput }) {
        return this.memberService.update(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async removeTenantMember(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.memberService.remove(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async addTeamMember(@Ctx() ctx: RequestContext, @Args() args: { input: AddTeamMemberInput }) {
        return this.teamMemberService.add(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateTeamMember(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateTeamMemberInput }) {
        return this.teamMemberService.update(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async removeTeamMember(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.teamMemberService.remove(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async reserveTenantStorage(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID; megabytes: number }) {
        return this.usageLimits.reserveStorage(ctx, args.tenantId, args.megabytes);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async releaseTenantStorage(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID; megabytes: number }) {
        return this.usageLimits.releaseStorage(ctx, args.tenantId, args.megabytes);
    }
}
