import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ID } from '@vendure/common/lib/shared-types';
import {
    Allow,
    Ctx,
    Permission,
    RequestContext,
    Transaction,
} from '@vendure/core';

import { manageBillingPermission, manageSubscriptionsPermission } from '../constants';
import { AccessPolicyService } from '../services/access-policy.service';
import { CreatePlanInput, PlanService, UpdatePlanInput } from '../services/plan.service';
import { SubscriptionExpiryJob } from '../services/subscription-expiry.job';
import { SubscriptionRenewalService } from '../services/subscription-renewal.service';
import {
    CreateSubscriptionInput,
    SubscriptionListOptions,
    SubscriptionService,
} from '../services/subscription.service';

/**
 * Admin API resolver for the plan catalog, tenant subscriptions and the
 * expiry sweep.
 */
@Resolver()
export class BillingAdminResolver {
    constructor(
        private planService: PlanService,
        private subscriptionService: SubscriptionService,
        private renewalService: SubscriptionRenewalService,
        private expiryJob: SubscriptionExpiryJob,
        private accessPolicy: AccessPolicyService,
    ) {}

    @Query()
    @Allow(Permission.Authenticated)
    async subscriptionPlans(@Ctx() ctx: RequestContext, @Args() args: { includeInactive?: boolean | null }) {
        return this.planService.findAll(ctx, { includeInactive: args.includeInactive ?? false });
    }

    @Query()
    @Allow(Permission.Authenticated)
    async subscriptionPlan(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.planService.findOne(ctx, args.id);
    }

    @Transaction()
    @Mutation()
    @Allow(manageBillingPermission.Permission)
    async createSubscriptionPlan(@Ctx() ctx: RequestContext, @Args() args: { input: CreatePlanInput }) {
        return this.planService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(manageBillingPermission.Permission)
    async updateSubscriptionPlan(@Ctx() ctx: RequestContext, @Args() args: { input: UpdatePlanInput }) {
        return this.planService.update(ctx, args.input);
    }

    @Query()
    @Allow(manageSubscriptionsPermission.Permission, manageBillingPermission.Permission)
    async tenantSubscriptions(@Ctx() ctx: RequestContext, @Args() args: { options?: SubscriptionListOptions | null }) {
        return this.subscriptionService.findAll(ctx, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async tenantSubscription(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        const subscription = await this.subscriptionService.findOne(ctx, args.id);
        if (subscription) {
            await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: subscription.tenantId });
        }
        return subscription;
    }

    @Query()
    @Allow(Permission.Authenticated)
    async activeTenantSubscription(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID }) {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: args.tenantId });
        return this.subscriptionService.findLiveSubscription(ctx, args.tenantId);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async createTenantSubscription(@Ctx() ctx: RequestContext, @Args() args: { input: CreateSubscriptionInput }) {
        return this.subscriptionService.create(ctx, args.input);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async cancelTenantSubscription(@Ctx() ctx: RequestContext, @Args() args: { id: ID; reason?: string | null }) {
        return this.subscriptionService.cancel(ctx, args.id, args.reason);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async setTenantSubscriptionAutoRenew(
        @Ctx() ctx: RequestContext,
        @Args() args: { id: ID; autoRenew: boolean },
    ) {
        return this.subscriptionService.setAutoRenew(ctx, args.id, args.autoRenew);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async renewTenantSubscription(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.renewalService.renew(ctx, args.id);
    }

    @Mutation()
    @Allow(manageBillingPermission.Permission)
    async runSubscriptionExpirySweep(@Ctx() ctx: RequestContext, @Args() args: { asOf?: Date | null }) {
        return this.expiryJob.sweep(ctx, args.asOf ?? new Date());
    }

    @Mutation()
    @Allow(manageBillingPermission.Permission)
    async queueSubscriptionExpirySweep(@Args() args: { asOf?: Date | null }) {
        await this.expiryJob.trigger(args.asOf ?? new Date());
        return true;
    }
}
