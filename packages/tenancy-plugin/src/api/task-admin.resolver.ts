import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ID } from '@vendure/common/lib/shared-types';
import { Allow, Ctx, Permission, RequestContext, Transaction } from '@vendure/core';

import { TaskCommentService } from '../services/task-comment.service';
import {
    CreateTaskInput,
    CreateTaskLabelInput,
    TaskListOptions,
    TaskService,
    UpdateTaskInput,
} from '../services/task.service';

/**
 * Admin API resolver for tenant tasks, labels and comments. Access is
 * decided per tenant by the services.
 */
@Resolver()
export class TaskAdminResolver {
    constructor(
        private taskService: TaskService,
        private commentService: TaskCommentService,
    ) {}

    @Query()
    @Allow(Permission.Authenticated)
    async tasks(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID; options?: TaskListOptions | null }) {
        return this.taskService.findAll(ctx, args.tenantId, args.options);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async task(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.taskService.findOne(ctx, args.id);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async taskLabels(@Ctx() ctx: RequestContext, @Args() args: { tenantId: ID }) {
        return this.taskService.findLabels(ctx, args.tenantId);
    }

    @Query()
    @Allow(Permission.Authenticated)
    async taskComments(@Ctx() ctx: RequestContext, @Args() args: { taskId: ID }) {
        return this.commentService.findAll(ctx, args.taskId);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async createTask(@Ctx() ctx: RequestContext, @Args() args: { input: CreateTaskInput }) {
        return this.taskService.create(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateTask(@Ctx() ctx: RequestContext, @Args() args: { input: UpdateTaskInput }) {
        return this.taskService.update(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async deleteTask(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.taskService.delete(ctx, args.id);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async createTaskLabel(@Ctx() ctx: RequestContext, @Args() args: { input: CreateTaskLabelInput }) {
        return this.taskService.createLabel(ctx, args.input);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async deleteTaskLabel(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.taskService.deleteLabel(ctx, args.id);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async addTaskComment(@Ctx() ctx: RequestContext, @Args() args: { taskId: ID; content: string }) {
        return this.commentService.add(ctx, args.taskId, args.content);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async updateTaskComment(@Ctx() ctx: RequestContext, @Args() args: { id: ID; content: string }) {
        return this.commentService.update(ctx, args.id, args.content);
    }

    @Transaction()
    @Mutation()
    @Allow(Permission.Authenticated)
    async deleteTaskComment(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.commentService.delete(ctx, args.id);
    }
}
