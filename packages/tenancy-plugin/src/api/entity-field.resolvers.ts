import { Parent, ResolveField, Resolver } from '@nestjs/graphql';
import { Ctx, RequestContext, TransactionalConnection } from '@vendure/core';

import { isTaskOverdue } from '../common/task-rules';
import { SubscriptionInvoice, Task, TeamMember, TenantMember, TenantSubscription } from '../entities';
import { InvoiceService } from '../services/invoice.service';
import { PlanService } from '../services/plan.service';
import { TaskService } from '../services/task.service';
import { TenantService } from '../services/tenant.service';

@Resolver('TenantSubscription')
export class TenantSubscriptionEntityResolver {
    constructor(
        private planService: PlanService,
        private tenantService: TenantService,
    ) {}

    @ResolveField()
    async plan(@Ctx() ctx: RequestContext, @Parent() subscription: TenantSubscription) {
        return subscription.plan ?? this.planService.findOne(ctx, subscription.planId);
    }

    @ResolveField()
    async tenant(@Ctx() ctx: RequestContext, @Parent() subscription: TenantSubscription) {
        return subscription.tenant ?? this.tenantService.findById(ctx, subscription.tenantId);
    }
}

@Resolver('SubscriptionInvoice')
export class SubscriptionInvoiceEntityResolver {
    constructor(private invoiceService: InvoiceService) {}

    @ResolveField()
    async items(@Ctx() ctx: RequestContext, @Parent() invoice: SubscriptionInvoice) {
        return invoice.items ?? this.invoiceService.getItems(ctx, invoice.id);
    }
}

@Resolver('Task')
export class TaskEntityResolver {
    constructor(private taskService: TaskService) {}

    @ResolveField()
    async labels(@Ctx() ctx: RequestContext, @Parent() task: Task) {
        return task.labels ?? this.taskService.getLabels(ctx, task.id);
    }

    @ResolveField()
    async subtasks(@Ctx() ctx: RequestContext, @Parent() task: Task) {
        return this.taskService.getSubtasks(ctx, task.id);
    }

    @ResolveField()
    async progress(@Ctx() ctx: RequestContext, @Parent() task: Task) {
        return this.taskService.getProgress(ctx, task);
    }

    @ResolveField()
    isOverdue(@Parent() task: Task) {
        return isTaskOverdue(task, new Date());
    }

    @ResolveField()
    async commentCount(@Ctx() ctx: RequestContext, @Parent() task: Task) {
        return this.taskService.countComments(ctx, task.id);
    }
}

@Resolver('TeamMember')
export class TeamMemberEntityResolver {
    constructor(private connection: TransactionalConnection) {}

    @ResolveField()
    async tenantMember(@Ctx() ctx: RequestContext, @Parent() teamMember: TeamMember) {
        return (
            teamMember.tenantMember ??
            this.connection.getEntityOrThrow(ctx, TenantMember, teamMember.tenantMemberId)
        );
    }
}
