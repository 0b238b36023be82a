import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ID } from '@vendure/common/lib/shared-types';
import {
    Allow,
    Ctx,
    Permission,
    RequestContext,
    Transaction,
} from '@vendure/core';

import {
    approveTenantPermission,
    manageBillingPermission,
    manageSubscriptionsPermission,
    manageTeamsPermission,
    verifyPaymentPermission,
} from '../constants';
import { TenantStatus } from '../entities/tenant-status.enum';
import { AccessPolicyService } from '../services/access-policy.service';
import { AuditLogListOptions, AuditService } from '../services/audit.service';
import { RegisterTenantInput, TenantService, UpdateTenantInput } from '../services/tenant.service';

/**
 * Admin API resolver for tenants and the audit log.
 *
 * Lifecycle mutations only require an authenticated administrator: the
 * service checks the `approveTenant` capability itself, so refused attempts
 * still reach the audit log.
 */
@Resolver()
export class TenantAdminResolver {
    constructor(
        private tenantService: TenantService,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
    ) {}

    @Query()
    @Allow(approveTenantPermission.Permission)
    async tenants(
        @Ctx() ctx: RequestContext,
        @Args() args: { options?: { take?: number | null; skip?: number | null; status?: TenantStatus | null } },
    ) {
        return this.tenantService.findAll(ctx, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async tenant(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: args.id });
        return this.tenantService.findById(ctx, args.id);
    }

    @Query()
    @Allow(approveTenantPermission.Permission)
    async tenantBySlug(@Ctx() ctx: RequestContext, @Args() args: { slug: string }) {
        return this.tenantService.findBySlug(ctx, args.slug);
    }

    @Query()
    @Allow(
        approveTenantPermission.Permission,
        verifyPaymentPermission.Permission,
        manageBillingPermission.Permission,
        manageSubscriptionsPermission.Permission,
        manageTeamsPermission.Permission,
    )
    async auditLogs(@Ctx() ctx: RequestContext, @Args() args: { options?: AuditLogListOptions }) {
        return this.auditService.findAll(ctx, args.options);
    }

    @Mutation()
    @Allow(approveTenantPermission.Permission)
    async createTenant(@Ctx() ctx: RequestContext, @Args() args: { input: RegisterTenantInput }) {
        return this.tenantService.register(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(approveTenantPermission.Permission)
    async updateTenant(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateTenantInput }) {
        return this.tenantService.update(ctx, args.input);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async approveTenant(@Ctx() ctx: RequestContext, @Args() args: { id: ID; notes?: string | null }) {
        return this.tenantService.approve(ctx, args.id, args.notes);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async rejectTenant(@Ctx() ctx: RequestContext, @Args() args: { id: ID; reason: string }) {
        return this.tenantService.reject(ctx, args.id, args.reason);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async suspendTenant(@Ctx() ctx: RequestContext, @Args() args: { id: ID; reason: string }) {
        return this.tenantService.suspend(ctx, args.id, args.reason);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async reactivateTenant(@Ctx() ctx: RequestContext, @Args() args: { id: ID; notes?: string | null }) {
        return this.tenantService.reactivate(ctx, args.id, args.notes);
    }
}
