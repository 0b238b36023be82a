import { Permission } from '@vendure/common/lib/generated-types';
import { mergeConfig } from '@vendure/core';
import { createTestEnvironment, testConfig as defaultTestConfig } from '@vendure/testing';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { TenancyPlugin } from '../src/tenancy.plugin';

import {
    ADD_MEMBER,
    ADD_TASK_COMMENT,
    ADD_TEAM_MEMBER,
    APPROVE_TENANT,
    CREATE_ADMINISTRATOR,
    CREATE_ROLE,
    CREATE_SUBSCRIPTION,
    CREATE_TASK,
    CREATE_TASK_LABEL,
    CREATE_TEAM,
    CREATE_TENANT,
    DELETE_TASK,
    DELETE_TASK_COMMENT,
    GET_AUDIT_LOGS,
    GET_PLANS,
    GET_TASK,
    GET_TASK_COMMENTS,
    GET_TASK_LABELS,
    GET_TASKS,
    GET_TEAM_MEMBERS,
    REMOVE_TEAM_MEMBER,
    UPDATE_TASK,
    UPDATE_TASK_COMMENT,
    UPDATE_TEAM_MEMBER,
} from './graphql/admin-definitions';
import { getDbConfig, TEST_SETUP_TIMEOUT_MS, testInitialData, testPlans } from './utils/test-config';

/**
 * E2E tests for team membership, tasks, labels and comments.
 */

const config = mergeConfig(defaultTestConfig, {
    apiOptions: {
        port: 3104,
    },
    dbConnectionOptions: getDbConfig(),
    plugins: [TenancyPlugin.init({ plans: testPlans })],
});

const FORBIDDEN = 'You are not currently authorized to perform this action';

describe('Tasks E2E', () => {
    const { server, adminClient } = createTestEnvironment(config);

    let taskCoId: string;
    let otherCoId: string;
    let teamId: string;
    let otherTeamId: string;
    let workerMemberId: string;
    let otherMemberId: string;
    let workerUserId: string;
    let launchLabelId: string;
    let parentTaskId: string;
    let subtaskIds: string[] = [];
    let overdueTaskId: string;

    async function createActiveTenant(name: string, slug: string): Promise<string> {
        const { createTenant } = await adminClient.query(CREATE_TENANT, {
            input: { name, companyName: name, companyEmail: `owner@${slug}.test` },
        });
        await adminClient.query(APPROVE_TENANT, { id: createTenant.id });
        const { subscriptionPlans } = await adminClient.query(GET_PLANS);
        const scale = subscriptionPlans.find((plan: { code: string }) => plan.code === 'scale');
        await adminClient.query(CREATE_SUBSCRIPTION, { input: { tenantId: createTenant.id, planId: scale.id } });
        return createTenant.id;
    }

    beforeAll(async () => {
        await server.init({
            initialData: testInitialData,
            customerCount: 0,
        });
        await adminClient.asSuperAdmin();

        taskCoId = await createActiveTenant('Task Co', 'task-co');
        otherCoId = await createActiveTenant('Other Co', 'other-co');

        const team = await adminClient.query(CREATE_TEAM, { input: { tenantId: taskCoId, name: 'Delivery' } });
        teamId = team.createTeam.id;
        const otherTeam = await adminClient.query(CREATE_TEAM, { input: { tenantId: otherCoId, name: 'Sales' } });
        otherTeamId = otherTeam.createTeam.id;

        const { createRole } = await adminClient.query(CREATE_ROLE, {
            input: { code: 'task-staff', description: 'Task staff', permissions: [Permission.ReadCustomer] },
        });
        const { createAdministrator } = await adminClient.query(CREATE_ADMINISTRATOR, {
            input: {
                firstName: 'Wren',
                lastName: 'Worker',
                emailAddress: 'worker@task-co.test',
                password: 'test-password',
                roleIds: [createRole.id],
            },
        });
        workerUserId = createAdministrator.user.id;

        const worker = await adminClient.query(ADD_MEMBER, {
            input: {
                tenantId: taskCoId,
                emailAddress: 'worker@task-co.test',
                role: 'MEMBER',
                userId: workerUserId,
            },
        });
        workerMemberId = worker.addTenantMember.id;
        const other = await adminClient.query(ADD_MEMBER, {
            input: { tenantId: otherCoId, emailAddress: 'seller@other-co.test' },
        });
        otherMemberId = other.addTenantMember.id;
    }, TEST_SETUP_TIMEOUT_MS);

    afterAll(async () => {
        await server.destroy();
    });

    describe('Team members', () => {
        let teamMemberId: string;

        it('adds a tenant member to a team', async () => {
            const result = await adminClient.query(ADD_TEAM_MEMBER, {
                input: { teamId, tenantMemberId: workerMemberId },
            });

            teamMemberId = result.addTeamMember.id;
            expect(result.addTeamMember.teamId).toBe(teamId);
            expect(result.addTeamMember.role).toBe('MEMBER');
            expect(result.addTeamMember.tenantMember.emailAddress).toBe('worker@task-co.test');
        });

        it('refuses the same member twice', async () => {
            await expect(
                adminClient.query(ADD_TEAM_MEMBER, { input: { teamId, tenantMemberId: workerMemberId } }),
            ).rejects.toThrow('worker@task-co.test is already in team "Delivery"');
        });

        it('refuses a member of another tenant', async () => {
            await expect(
                adminClient.query(ADD_TEAM_MEMBER, { input: { teamId, tenantMemberId: otherMemberId } }),
            ).rejects.toThrow('The member belongs to a different tenant');
        });

        it('changes the role of a team member', async () => {
            const result = await adminClient.query(UPDATE_TEAM_MEMBER, {
                input: { id: teamMemberId, role: 'ADMIN' },
            });

            expect(result.updateTeamMember.role).toBe('ADMIN');
        });

        it('lists the members of a team', async () => {
            const result = await adminClient.query(GET_TEAM_MEMBERS, { teamId });

            expect(result.teamMembers.totalItems).toBe(1);
            expect(result.teamMembers.items[0].role).toBe('ADMIN');
            expect(result.teamMembers.items[0].tenantMember.emailAddress).toBe('worker@task-co.test');
        });

        it('removes a team member', async () => {
            const result = await adminClient.query(REMOVE_TEAM_MEMBER, { id: teamMemberId });
            expect(result.removeTeamMember.result).toBe('DELETED');

            const after = await adminClient.query(GET_TEAM_MEMBERS, { teamId });
            expect(after.teamMembers.totalItems).toBe(0);
        });
    });

    describe('Labels', () => {
        it('creates a label with the default color', async () => {
            const result = await adminClient.query(CREATE_TASK_LABEL, {
                input: { tenantId: taskCoId, name: ' Launch ' },
            });

            launchLabelId = result.createTaskLabel.id;
            expect(result.createTaskLabel.name).toBe('Launch');
            expect(result.createTaskLabel.color).toBe('#6B7280');
        });

        it('refuses a duplicate name in the same tenant', async () => {
            await expect(
                adminClient.query(CREATE_TASK_LABEL, { input: { tenantId: taskCoId, name: 'Launch' } }),
            ).rejects.toThrow('A label named "Launch" already exists in this tenant');
        });

        it('allows the same name in another tenant', async () => {
            const result = await adminClient.query(CREATE_TASK_LABEL, {
                input: { tenantId: otherCoId, name: 'Launch', color: '#FF0000' },
            });

            expect(result.createTaskLabel.tenantId).toBe(otherCoId);
            const labels = await adminClient.query(GET_TASK_LABELS, { tenantId: taskCoId });
            expect(labels.taskLabels).toEqual([{ id: launchLabelId, name: 'Launch' }]);
        });
    });

    describe('Tasks', () => {
        it('creates a task', async () => {
            const result = await adminClient.query(CREATE_TASK, {
                input: {
                    tenantId: taskCoId,
                    title: '  Write launch plan  ',
                    teamId,
                    priority: 'HIGH',
                    labelIds: [launchLabelId],
                },
            });

            parentTaskId = result.createTask.id;
            expect(result.createTask).toEqual({
                id: parentTaskId,
                tenantId: taskCoId,
                teamId,
                parentTaskId: null,
                title: 'Write launch plan',
                status: 'TODO',
                priority: 'HIGH',
                assigneeId: null,
                dueDate: null,
                completedAt: null,
                position: 0,
                progress: 0,
                isOverdue: false,
                commentCount: 0,
                labels: [{ id: launchLabelId, name: 'Launch' }],
            });
        });

        it('refuses an empty title', async () => {
            await expect(
                adminClient.query(CREATE_TASK, { input: { tenantId: taskCoId, title: '   ' } }),
            ).rejects.toThrow('Task title must not be empty');
        });

        it('refuses a team of another tenant', async () => {
            await expect(
                adminClient.query(CREATE_TASK, {
                    input: { tenantId: taskCoId, title: 'Misplaced', teamId: otherTeamId },
                }),
            ).rejects.toThrow('The team belongs to a different tenant');
        });

        it('refuses a label of another tenant', async () => {
            const { taskLabels } = await adminClient.query(GET_TASK_LABELS, { tenantId: otherCoId });

            await expect(
                adminClient.query(CREATE_TASK, {
                    input: { tenantId: taskCoId, title: 'Mislabelled', labelIds: [taskLabels[0].id] },
                }),
            ).rejects.toThrow("Every label must belong to the task's tenant");
        });

        it('creates subtasks in the parent team', async () => {
            subtaskIds = [];
            for (const [position, title] of ['Draft outline', 'Collect feedback', 'Publish'].entries()) {
                const result = await adminClient.query(CREATE_TASK, {
                    input: { tenantId: taskCoId, title, parentTaskId, position },
                });
                expect(result.createTask.parentTaskId).toBe(parentTaskId);
                expect(result.createTask.teamId).toBe(teamId);
                subtaskIds.push(result.createTask.id);
            }
        });

        it('stamps completion when a task is completed', async () => {
            const result = await adminClient.query(UPDATE_TASK, {
                input: { id: subtaskIds[0], status: 'COMPLETED' },
            });

            expect(result.updateTask.status).toBe('COMPLETED');
            expect(result.updateTask.completedAt).not.toBeNull();
        });

        it('derives progress from the subtasks', async () => {
            const result = await adminClient.query(GET_TASK, { id: parentTaskId });

            expect(result.task.progress).toBe(33);
            expect(result.task.subtasks).toEqual([
                { id: subtaskIds[0], title: 'Draft outline', status: 'COMPLETED' },
                { id: subtaskIds[1], title: 'Collect feedback', status: 'TODO' },
                { id: subtaskIds[2], title: 'Publish', status: 'TODO' },
            ]);
        });

        it('clears the completion stamp when a task is reopened', async () => {
            const result = await adminClient.query(UPDATE_TASK, {
                input: { id: subtaskIds[0], status: 'IN_PROGRESS' },
            });

            expect(result.updateTask.status).toBe('IN_PROGRESS');
            expect(result.updateTask.completedAt).toBeNull();
            expect(result.updateTask.progress).toBe(0);
        });

        it('audits status changes', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: taskCoId, action: 'TASK_STATUS_CHANGED' },
            });

            expect(result.auditLogs.totalItems).toBe(2);
        });

        it('marks an open task past its due date as overdue', async () => {
            const result = await adminClient.query(CREATE_TASK, {
                input: {
                    tenantId: taskCoId,
                    title: 'Renew domain',
                    dueDate: '2020-01-01T00:00:00.000Z',
                    assigneeId: workerMemberId,
                    position: 5,
                },
            });

            overdueTaskId = result.createTask.id;
            expect(result.createTask.isOverdue).toBe(true);
            expect(result.createTask.assigneeId).toBe(workerMemberId);
        });

        it('refuses an assignee of another tenant', async () => {
            await expect(
                adminClient.query(UPDATE_TASK, { input: { id: overdueTaskId, assigneeId: otherMemberId } }),
            ).rejects.toThrow('The assignee belongs to a different tenant');
        });
    });

    describe('Task lists', () => {
        it.each([
            { name: 'all tasks', options: {}, titles: ['Write launch plan', 'Draft outline', 'Collect feedback', 'Publish', 'Renew domain'] },
            { name: 'top-level tasks', options: { topLevel: true }, titles: ['Write launch plan', 'Renew domain'] },
            { name: 'overdue tasks', options: { overdue: true }, titles: ['Renew domain'] },
            { name: 'a search', options: { search: 'LAUNCH' }, titles: ['Write launch plan'] },
            { name: 'a status', options: { status: 'IN_PROGRESS' }, titles: ['Draft outline'] },
            { name: 'a priority', options: { priority: 'HIGH' }, titles: ['Write launch plan'] },
            {
                name: 'unassigned tasks',
                options: { unassigned: true },
                titles: ['Write launch plan', 'Draft outline', 'Collect feedback', 'Publish'],
            },
        ])('filters by $name', async ({ options, titles }) => {
            const result = await adminClient.query(GET_TASKS, { tenantId: taskCoId, options });

            expect(result.tasks.items.map((task: { title: string }) => task.title)).toEqual(titles);
            expect(result.tasks.totalItems).toBe(titles.length);
        });

        it('filters by assignee', async () => {
            const result = await adminClient.query(GET_TASKS, {
                tenantId: taskCoId,
                options: { assigneeId: workerMemberId },
            });

            expect(result.tasks.items).toEqual([{ id: overdueTaskId, title: 'Renew domain', status: 'TODO' }]);
        });

        it('filters by team', async () => {
            const result = await adminClient.query(GET_TASKS, { tenantId: taskCoId, options: { teamId } });

            expect(result.tasks.totalItems).toBe(4);
        });

        it('keeps the tasks of other tenants apart', async () => {
            const result = await adminClient.query(GET_TASKS, { tenantId: otherCoId });

            expect(result.tasks.totalItems).toBe(0);
        });
    });

    describe('Comments', () => {
        let commentId: string;

        it('adds a comment', async () => {
            const result = await adminClient.query(ADD_TASK_COMMENT, {
                taskId: parentTaskId,
                content: ' Outline is ready for review ',
            });

            commentId = result.addTaskComment.id;
            expect(result.addTaskComment.taskId).toBe(parentTaskId);
            expect(result.addTaskComment.content).toBe('Outline is ready for review');
            expect(result.addTaskComment.isEdited).toBe(false);
        });

        it('refuses an empty comment', async () => {
            await expect(
                adminClient.query(ADD_TASK_COMMENT, { taskId: parentTaskId, content: '  ' }),
            ).rejects.toThrow('Comment must not be empty');
        });

        it('lets the author edit a comment', async () => {
            const result = await adminClient.query(UPDATE_TASK_COMMENT, {
                id: commentId,
                content: 'Outline is ready',
            });

            expect(result.updateTaskComment.content).toBe('Outline is ready');
            expect(result.updateTaskComment.isEdited).toBe(true);
            expect(result.updateTaskComment.editedAt).not.toBeNull();
        });

        it('counts comments on the task', async () => {
            const result = await adminClient.query(GET_TASK, { id: parentTaskId });

            expect(result.task.commentCount).toBe(1);
        });

        describe('as a tenant member', () => {
            beforeAll(async () => {
                await adminClient.asUserWithCredentials('worker@task-co.test', 'test-password');
            });

            afterAll(async () => {
                await adminClient.asSuperAdmin();
            });

            it('can create tasks in their own tenant', async () => {
                const result = await adminClient.query(CREATE_TASK, {
                    input: { tenantId: taskCoId, title: 'Book venue', teamId },
                });

                expect(result.createTask.tenantId).toBe(taskCoId);
                expect(result.createTask.status).toBe('TODO');
            });

            it('cannot create tasks in another tenant', async () => {
                await expect(
                    adminClient.query(CREATE_TASK, { input: { tenantId: otherCoId, title: 'Intrusion' } }),
                ).rejects.toThrow(FORBIDDEN);
            });

            it('cannot read the tasks of another tenant', async () => {
                await expect(adminClient.query(GET_TASKS, { tenantId: otherCoId })).rejects.toThrow(FORBIDDEN);
            });

            it('cannot create labels', async () => {
                await expect(
                    adminClient.query(CREATE_TASK_LABEL, { input: { tenantId: taskCoId, name: 'Urgent' } }),
                ).rejects.toThrow(FORBIDDEN);
            });

            it('cannot edit the comment of someone else', async () => {
                await expect(
                    adminClient.query(UPDATE_TASK_COMMENT, { id: commentId, content: 'Rewritten' }),
                ).rejects.toThrow(FORBIDDEN);
            });

            it('cannot delete the comment of someone else', async () => {
                await expect(adminClient.query(DELETE_TASK_COMMENT, { id: commentId })).rejects.toThrow(FORBIDDEN);
            });
        });

        it('lets the author delete a comment', async () => {
            const result = await adminClient.query(DELETE_TASK_COMMENT, { id: commentId });
            expect(result.deleteTaskComment.result).toBe('DELETED');

            const after = await adminClient.query(GET_TASK_COMMENTS, { taskId: parentTaskId });
            expect(after.taskComments).toEqual([]);
        });
    });

    describe('Deletion', () => {
        it('deletes a task', async () => {
            const result = await adminClient.query(DELETE_TASK, { id: overdueTaskId });
            expect(result.deleteTask.result).toBe('DELETED');

            const after = await adminClient.query(GET_TASK, { id: overdueTaskId });
            expect(after.task).toBeNull();
        });

        it('audits the deletion', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: taskCoId, action: 'TASK_DELETED' },
            });

            expect(result.auditLogs.totalItems).toBe(1);
        });
    });
});
