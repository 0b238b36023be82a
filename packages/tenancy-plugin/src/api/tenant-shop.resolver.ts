import { Inject } from '@nestjs/common';
import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import {
    Allow,
    Ctx,
    ForbiddenError,
    Permission,
    RequestContext,
} from '@vendure/core';

import { TENANCY_PLUGIN_OPTIONS } from '../constants';
import { PlanService } from '../services/plan.service';
import { RegisterTenantInput, TenantService } from '../services/tenant.service';
import { ResolvedTenancyPluginOptions } from '../types';

/**
 * Public plan catalog and tenant signup.
 */
@Resolver()
export class TenantShopResolver {
    constructor(
        private tenantService: TenantService,
        private planService: PlanService,
        @Inject(TENANCY_PLUGIN_OPTIONS) private options: ResolvedTenancyPluginOptions,
    ) {}

    @Query()
    @Allow(Permission.Public)
    async subscriptionPlans(@Ctx() ctx: RequestContext) {
        return this.planService.findAll(ctx);
    }

    @Mutation()
    @Allow(Permission.Public)
    async registerTenant(@Ctx() ctx: RequestContext, @Args() args: { input: RegisterTenantInput }) {
        if (!this.options.allowSelfSignup) {
            throw new ForbiddenError();
        }
        return this.tenantService.register(ctx, args.input);
    }
}
