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
import { In } from 'typeorm';

import { getCompletedAt, getTaskProgress, OPEN_TASK_STATUSES } from '../common/task-rules';
import { Task, TaskComment, TaskLabel, TaskPriority, TaskStatus, Team, Tenant, TenantMember } from '../entities';

import { AccessPolicyService } from './access-policy.service';
import { AuditAttempt, AuditService } from './audit.service';
import { WorkspaceListOptions } from './team.service';

export interface CreateTaskInput {
    tenantId: ID;
    title: string;
    description?: string | null;
    teamId?: ID | null;
    parentTaskId?: ID | null;
    status?: TaskStatus | null;
    priority?: TaskPriority | null;
    /** TenantMember the task is assigned to */
    assigneeId?: ID | null;
    startDate?: Date | null;
    dueDate?: Date | null;
    position?: number | null;
    estimatedHours?: number | null;
    labelIds?: ID[] | null;
}

export interface UpdateTaskInput {
    id: ID;
    title?: string | null;
    description?: string | null;
    teamId?: ID | null;
    status?: TaskStatus | null;
    priority?: TaskPriority | null;
    assigneeId?: ID | null;
    startDate?: Date | null;
    dueDate?: Date | null;
    position?: number | null;
    estimatedHours?: number | null;
    actualHours?: number | null;
    labelIds?: ID[] | null;
}

export interface TaskListOptions extends WorkspaceListOptions {
    status?: TaskStatus | null;
    priority?: TaskPriority | null;
    teamId?: ID | null;
    assigneeId?: ID | null;
    unassigned?: boolean | null;
    /** Matches title or description, case-insensitive */
    search?: string | null;
    overdue?: boolean | null;
    /** Only tasks without a parent */
    topLevel?: boolean | null;
}

export interface CreateTaskLabelInput {
    tenantId: ID;
    name: string;
    color?: string | null;
    description?: string | null;
}

/**
 * Tasks, subtasks and task labels of a tenant. Any member of the tenant may
 * work on its tasks; tasks do not count against plan limits.
 */
@Injectable()
export class TaskService {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        private accessPolicy: AccessPolicyService,
    ) {}

    async findAll(ctx: RequestContext, tenantId: ID, options?: TaskListOptions | null): Promise<PaginatedList<Task>> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        const qb = this.connection
            .getRepository(ctx, Task)
            .createQueryBuilder('task')
            .leftJoinAndSelect('task.labels', 'label')
            .where('task.tenantId = :tenantId', { tenantId });

        if (options?.status) {
            qb.andWhere('task.status = :status', { status: options.status });
        }
        if (options?.priority) {
            qb.andWhere('task.priority = :priority', { priority: options.priority });
        }
        if (options?.teamId != null) {
            qb.andWhere('task.teamId = :teamId', { teamId: options.teamId });
        }
        if (options?.assigneeId != null) {
            qb.andWhere('task.assigneeId = :assigneeId', { assigneeId: options.assigneeId });
        } else if (options?.unassigned) {
            qb.andWhere('task.assigneeId IS NULL');
        }
        if (options?.search?.trim()) {
            qb.andWhere('(LOWER(task.title) LIKE :search OR LOWER(task.description) LIKE :search)', {
                search: `%${options.search.trim().toLowerCase()}%`,
            });
        }
        if (options?.overdue) {
            qb.andWhere('task.dueDate < :now', { now: new Date() }).andWhere('task.status IN (:...open)', {
                open: [...OPEN_TASK_STATUSES],
            });
        }
        if (options?.topLevel) {
            qb.andWhere('task.parentTaskId IS NULL');
        }

        const [items, totalItems] = await qb
            .orderBy('task.position', 'ASC')
            .addOrderBy('task.id', 'ASC')
            .take(options?.take ?? 100)
            .skip(options?.skip ?? 0)
            .getManyAndCount();
        return { items, totalItems };
    }

    async findOne(ctx: RequestContext, id: ID): Promise<Task | undefined> {
        const task = await this.connection.getRepository(ctx, Task).findOne({ where: { id }, relations: ['labels'] });
        if (!task) {
            return undefined;
        }
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId: task.tenantId });
        return task;
    }

    async getSubtasks(ctx: RequestContext, taskId: ID): Promise<Task[]> {
        return this.connection.getRepository(ctx, Task).find({
            where: { parentTaskId: taskId },
            order: { position: 'ASC', id: 'ASC' },
        });
    }

    async getLabels(ctx: RequestContext, taskId: ID): Promise<TaskLabel[]> {
        const task = await this.connection.getRepository(ctx, Task).findOne({
            where: { id: taskId },
            relations: ['labels'],
        });
        return task?.labels ?? [];
    }

    async getProgress(ctx: RequestContext, task: Task): Promise<number> {
        const subtasks = await this.getSubtasks(ctx, task.id);
        return getTaskProgress(
            task.status,
            subtasks.map(subtask => subtask.status),
        );
    }

    async countComments(ctx: RequestContext, taskId: ID): Promise<number> {
        return this.connection.getRepository(ctx, TaskComment).count({ where: { taskId } });
    }

    async create(ctx: RequestContext, input: CreateTaskInput): Promise<Task> {
        const attempt: AuditAttempt = {
            action: 'TASK_CREATED',
            tenantId: input.tenantId,
            entityType: 'Task',
            metadata: { title: input.title },
        };
        return this.auditService.recordAttempt(ctx, attempt, async () => {
            await this.accessPolicy.assert(ctx, 'manageTasks', { tenantId: input.tenantId });
            const title = input.title.trim();
            if (!title) {
                throw new UserInputError('Task title must not be empty');
            }

            return this.connection.withTransaction(ctx, async txCtx => {
                const tenant = await this.connection.getEntityOrThrow(txCtx, Tenant, input.tenantId);
                const parent =
                    input.parentTaskId != null
                        ? await this.getTenantEntity(txCtx, Task, tenant.id, input.parentTaskId, 'parent task')
                        : undefined;
                const status = input.status ?? TaskStatus.TODO;
                const now = new Date();
                const task = await this.connection.getRepository(txCtx, Task).save(
                    new Task({
                        tenantId: tenant.id,
                        // Subtasks live in their parent's team unless told otherwise.
                        teamId: await this.resolveTeamId(txCtx, tenant.id, input.teamId ?? parent?.teamId),
                        parentTaskId: parent?.id ?? null,
                        title,
                        description: input.description ?? '',
                        status,
                        priority: input.priority ?? TaskPriority.MEDIUM,
                        createdById: txCtx.activeUserId ?? null,
                        assigneeId: await this.resolveAssigneeId(txCtx, tenant.id, input.assigneeId),
                        startDate: input.startDate ?? null,
                        dueDate: input.dueDate ?? null,
                        completedAt: getCompletedAt(TaskStatus.TODO, status, null, now),
                        position: input.position ?? 0,
                        estimatedHours: input.estimatedHours ?? null,
                        actualHours: null,
                        labels: await this.resolveLabels(txCtx, tenant.id, input.labelIds),
                    }),
                );
                await this.auditService.log(txCtx, {
                    ...attempt,
                    severity: 'INFO',
                    entityId: task.id,
                    toState: task.status,
                });
                return task;
            });
        });
    }

    async update(ctx: RequestContext, input: UpdateTaskInput): Promise<Task> {
        const task = await this.connection.getEntityOrThrow(ctx, Task, input.id, { relations: ['labels'] });
        await this.accessPolicy.assert(ctx, 'manageTasks', { tenantId: task.tenantId });
        const fromStatus = task.status;

        if (input.title != null) {
            const title = input.title.trim();
            if (!title) {
                throw new UserInputError('Task title must not be empty');
            }
            task.title = title;
        }
        if (input.description != null) task.description = input.description;
        if (input.priority != null) task.priority = input.priority;
        if (input.startDate !== undefined) task.startDate = input.startDate;
        if (input.dueDate !== undefined) task.dueDate = input.dueDate;
        if (input.position != null) task.position = input.position;
        if (input.estimatedHours !== undefined) task.estimatedHours = input.estimatedHours;
        if (input.actualHours !== undefined) task.actualHours = input.actualHours;
        if (input.teamId !== undefined) {
            task.teamId = await this.resolveTeamId(ctx, task.tenantId, input.teamId);
        }
        if (input.assigneeId !== undefined) {
            task.assigneeId = await this.resolveAssigneeId(ctx, task.tenantId, input.assigneeId);
        }
        if (input.labelIds != null) {
            task.labels = await this.resolveLabels(ctx, task.tenantId, input.labelIds);
        }
        if (input.status != null) {
            task.completedAt = getCompletedAt(fromStatus, input.status, task.completedAt, new Date());
            task.status = input.status;
        }

        const saved = await this.connection.getRepository(ctx, Task).save(task);
        await this.auditService.log(ctx, {
            action: fromStatus === saved.status ? 'TASK_UPDATED' : 'TASK_STATUS_CHANGED',
            severity: 'INFO',
            tenantId: saved.tenantId,
            entityType: 'Task',
            entityId: saved.id,
            fromState: fromStatus,
            toState: saved.status,
        });
        return saved;
    }

    async delete(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const task = await this.connection.getEntityOrThrow(ctx, Task, id);
        await this.accessPolicy.assert(ctx, 'manageTasks', { tenantId: task.tenantId });
        await this.connection.getRepository(ctx, Task).remove(task);
        await this.auditService.log(ctx, {
            action: 'TASK_DELETED',
            severity: 'INFO',
            tenantId: task.tenantId,
            entityType: 'Task',
            entityId: id,
            metadata: { title: task.title },
        });
        return { result: DeletionResult.DELETED };
    }

    async findLabels(ctx: RequestContext, tenantId: ID): Promise<TaskLabel[]> {
        await this.accessPolicy.assert(ctx, 'viewTenant', { tenantId });
        return this.connection.getRepository(ctx, TaskLabel).find({ where: { tenantId }, order: { name: 'ASC' } });
    }

    async createLabel(ctx: RequestContext, input: CreateTaskLabelInput): Promise<TaskLabel> {
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: input.tenantId });
        const name = input.name.trim();
        if (!name) {
            throw new UserInputError('Label name must not be empty');
        }
        const repo = this.connection.getRepository(ctx, TaskLabel);
        if (await repo.findOne({ where: { tenantId: input.tenantId, name } })) {
            throw new UserInputError(`A label named "${name}" already exists in this tenant`);
        }
        return repo.save(
            new TaskLabel({
                tenantId: input.tenantId,
                name,
                description: input.description ?? '',
                ...(input.color ? { color: input.color } : {}),
            }),
        );
    }

    async deleteLabel(ctx: RequestContext, id: ID): Promise<DeletionResponse> {
        const label = await this.connection.getEntityOrThrow(ctx, TaskLabel, id);
        await this.accessPolicy.assert(ctx, 'manageTeam', { tenantId: label.tenantId });
        await this.connection.getRepository(ctx, TaskLabel).remove(label);
        return { result: DeletionResult.DELETED };
    }

    private async getTenantEntity<T extends Task | Team | TenantMember>(
        ctx: RequestContext,
        entity: new () => T,
        tenantId: ID,
        id: ID,
        label: string,
    ): Promise<T> {
        const found = await this.connection.getEntityOrThrow(ctx, entity, id);
        if (!idsAreEqual(found.tenantId, tenantId)) {
            throw new UserInputError(`The ${label} belongs to a different tenant`);
        }
        return found;
    }

    private async resolveTeamId(ctx: RequestContext, tenantId: ID, teamId: ID | null | undefined): Promise<ID | null> {
        if (teamId == null) {
            return null;
        }
        return (await this.getTenantEntity(ctx, Team, tenantId, teamId, 'team')).id;
    }

    private async resolveAssigneeId(
        ctx: RequestContext,
        tenantId: ID,
        assigneeId: ID | null | undefined,
    ): Promise<ID | null> {
        if (assigneeId == null) {
            return null;
        }
        return (await this.getTenantEntity(ctx, TenantMember, tenantId, assigneeId, 'assignee')).id;
    }

    private async resolveLabels(ctx: RequestContext, tenantId: ID, labelIds: ID[] | null | undefined): Promise<TaskLabel[]> {
        if (!labelIds?.length) {
            return [];
        }
        const labels = await this.connection.getRepository(ctx, TaskLabel).find({
            where: { id: In(labelIds), tenantId },
        });
        if (labels.length !== new Set(labelIds.map(String)).size) {
            throw new UserInputError("Every label must belong to the task's tenant");
        }
        return labels;
    }
}
