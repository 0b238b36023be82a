import { Injectable } from '@nestjs/common';
import { DeletionResponse, DeletionResult } from '@vendure/common/lib/generated-types';
import { ID } from '@vendure/common/lib/shared-types';
import {
    ForbiddenError,
    RequestContext,
    TransactionalConnection,
    UserInputError,
    idsAreEqual,
} from '@vendure/core';

import { Task, TaskComment } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditService } from './audit.service';

/**
 * Discussion on a task. Authors edit and delete their own comments;
 * managers of the tenant may remove any of them.
 */
@Injectable()
export class TaskCommentService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
    ) {}

    async findAll(ctx: RequestContext, taskId: ID): Promise<TaskComment[]> {
        const task = await this.connection.getEntityOrThrow(ctx, Task, taskId);
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: task.tenantId });
        return this.connection.getRepository(ctx, TaskComment).find({
            where: { taskId: task.id },
            order: { createdAt: 'ASC', id: 'ASC' },
        });
    }

    async add(ctx: RequestContext, taskId: ID, content: string): Promise<TaskComment> {
        const task = await this.connection.getEntityOrThrow(ctx, Task, taskId);
        await this.accessPolicy.assert(ctx, 'manageTasks', { tenantId: task.tenantId });
        const text = content.trim();
        if (!text) {
            throw new UserInputError('Comment must not be empty');
        }
        const comment = await this.connection.getRepository(ctx, TaskComment).save(
            new TaskComment({
                taskId: task.id,
                tenantId: task.tenantId,
                authorId: ctx.activeUserId ?? null,
                content: text,
                isEdited: false,
                editedAt: null,
            }),
        );
        await this.auditService.log(ctx, {
            action: 'TASK_COMMENTED',
            severity: 'INFO',
            tenantId: task.tenantId,
            entityType: 'TaskComment',
            entityId: comment.id,
            metadata: { taskId: String(task.id) },
        });
        return comment;
    }

    async update(ctx: RequestContext, id: ID, content: string): Promise<TaskComment> {
        const comment = await this.connection.getEntityOrThrow(ctx, TaskComment, id);
        if (!ctx.activeUserId || !comment.authorId || !idsAreEqual(comment.authorId, ctx.activeUserId)) {
            throw new ForbiddenError();
        }
        const text = content.trim();
        if (!text) {
            throw new UserInputError('Comment must not be empty');
        }
        comment.content = text;
        comment.isEdited = true;
        comment.editedAt = new Date();
        return this.connection.getRepository(ctx, TaskComment).save(comment);
    }

    async delete(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const comment = await this.connection.getEntityOrThrow(ctx, TaskComment, id);
        const isAuthor = !!ctx.activeUserId && !!comment.authorId && idsAreEqual(comment.authorId, ctx.activeUserId);
        if (!isAuthor) {
            await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: comment.tenantId });
        }
        await this.connection.getRepository(ctx, TaskComment).remove(comment);
        await this.auditService.log(ctx, {
            action: 'TASK_COMMENT_DELETED',
            severity: 'INFO',
            tenantId: comment.tenantId,
            entityType: 'TaskComment',
            entityId: id,
        });
        return { result: DeletionResult.DELETED };
    }
}
