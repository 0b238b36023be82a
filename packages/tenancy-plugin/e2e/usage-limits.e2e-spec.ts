import { Permission } from '@vendure/common/lib/generated-types';
import { mergeConfig } from '@vendure/core';
import { createTestEnvironment, testConfig as defaultTestConfig } from '@vendure/testing';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { TenancyPlugin } from '../src/tenancy.plugin';

import {
    ADD_MEMBER,
    APPROVE_TENANT,
    CHECK_USAGE_LIMIT,
    CREATE_ADMINISTRATOR,
    CREATE_PROJECT,
    CREATE_ROLE,
    CREATE_SUBSCRIPTION,
    CREATE_TEAM,
    CREATE_TENANT,
    DELETE_TEAM,
    GET_AUDIT_LOGS,
    GET_PLANS,
    GET_TEAMS,
    GET_TENANT,
    GET_TENANT_USAGE,
    REACTIVATE_TENANT,
    RELEASE_STORAGE,
    RESERVE_STORAGE,
    SUSPEND_TENANT,
    TENANT_HAS_FEATURE,
} from './graphql/admin-definitions';
import { getDbConfig, TEST_SETUP_TIMEOUT_MS, testInitialData, testPlans } from './utils/test-config';

/**
 * E2E tests for plan limits on members, teams, projects and storage.
 */

const config = mergeConfig(defaultTestConfig, {
    apiOptions: {
        port: 3102,
    },
    dbConnectionOptions: getDbConfig(),
    plugins: [TenancyPlugin.init({ plans: testPlans })],
});

const FORBIDDEN = 'You are not currently authorized to perform this action';

describe('Usage limits E2E', () => {
    const { server, adminClient } = createTestEnvironment(config);

    const planIds: Record<string, string> = {};
    let teamFiveId: string;
    let openPlanId: string;
    let noPlanId: string;

    async function createActiveTenant(name: string): Promise<string> {
        const { createTenant } = await adminClient.query(CREATE_TENANT, {
            input: { name, companyName: name, companyEmail: `owner@${name.toLowerCase().replace(/\s+/g, '-')}.test` },
        });
        await adminClient.query(APPROVE_TENANT, { id: createTenant.id });
        return createTenant.id;
    }

    function createTeam(tenantId: string, name: string) {
        return adminClient.query(CREATE_TEAM, { input: { tenantId, name } });
    }

    beforeAll(async () => {
        await server.init({
            initialData: testInitialData,
            customerCount: 0,
        });
        await adminClient.asSuperAdmin();

        const { subscriptionPlans } = await adminClient.query(GET_PLANS);
        for (const plan of subscriptionPlans) {
            planIds[plan.code] = plan.id;
        }

        teamFiveId = await createActiveTenant('Team Five');
        await adminClient.query(CREATE_SUBSCRIPTION, {
            input: { tenantId: teamFiveId, planId: planIds.starter },
        });
        openPlanId = await createActiveTenant('Open Plan');
        await adminClient.query(CREATE_SUBSCRIPTION, {
            input: { tenantId: openPlanId, planId: planIds.scale },
        });
        noPlanId = await createActiveTenant('No Plan');
    }, TEST_SETUP_TIMEOUT_MS);

    afterAll(async () => {
        await server.destroy();
    });

    describe('Teams', () => {
        it('reports free capacity on a trial subscription', async () => {
            const result = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: teamFiveId, resource: 'TEAMS' });

            expect(result.checkUsageLimit).toEqual({
                allowed: true,
                reason: null,
                message: null,
                resource: 'TEAMS',
                used: 0,
                requested: 1,
                limit: 5,
            });
        });

        it('allows teams up to the plan limit', async () => {
            for (let i = 1; i <= 5; i++) {
                const result = await createTeam(teamFiveId, `Team ${i}`);
                expect(result.createTeam.slug).toBe(`team-${i}`);
            }
        });

        it('refuses the team over the limit', async () => {
            await expect(createTeam(teamFiveId, 'Team 6')).rejects.toThrow(
                'Plan limit reached for teams (5 of 5 used)',
            );
        });

        it('reports the limit as reached', async () => {
            const result = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: teamFiveId, resource: 'TEAMS' });

            expect(result.checkUsageLimit).toEqual({
                allowed: false,
                reason: 'LIMIT_REACHED',
                message: 'Plan limit reached for teams (5 of 5 used)',
                resource: 'TEAMS',
                used: 5,
                requested: 1,
                limit: 5,
            });
        });

        it('gives the last free slot to exactly one of two concurrent requests', async () => {
            const { teams } = await adminClient.query(GET_TEAMS, { tenantId: teamFiveId });
            const deleted = await adminClient.query(DELETE_TEAM, { id: teams.items[0].id });
            expect(deleted.deleteTeam.result).toBe('DELETED');

            const results = await Promise.allSettled([
                createTeam(teamFiveId, 'Race A'),
                createTeam(teamFiveId, 'Race B'),
            ]);

            expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
            expect(results.filter(r => r.status === 'rejected')).toHaveLength(1);
            const after = await adminClient.query(GET_TEAMS, { tenantId: teamFiveId });
            expect(after.teams.totalItems).toBe(5);
        });

        it('audits refused creations', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: teamFiveId, action: 'TEAM_CREATED', outcome: 'DENIED' },
            });

            expect(result.auditLogs.totalItems).toBe(2);
            expect(result.auditLogs.items[0].metadata.errorCode).toBe('LIMIT_EXCEEDED');
        });
    });

    describe('Members and tenant roles', () => {
        let managerUserId: string;

        beforeAll(async () => {
            const { createRole } = await adminClient.query(CREATE_ROLE, {
                input: { code: 'tenant-staff', description: 'Tenant staff', permissions: [Permission.ReadCustomer] },
            });
            const { createAdministrator } = await adminClient.query(CREATE_ADMINISTRATOR, {
                input: {
                    firstName: 'Morgan',
                    lastName: 'Manager',
                    emailAddress: 'manager@team-five.test',
                    password: 'test-password',
                    roleIds: [createRole.id],
                },
            });
            managerUserId = createAdministrator.user.id;
        });

        it('adds a member linked to an administrator', async () => {
            const result = await adminClient.query(ADD_MEMBER, {
                input: {
                    tenantId: teamFiveId,
                    emailAddress: 'Manager@Team-Five.test',
                    role: 'MANAGER',
                    userId: managerUserId,
                },
            });

            expect(result.addTenantMember.emailAddress).toBe('manager@team-five.test');
            expect(result.addTenantMember.role).toBe('MANAGER');
            expect(result.addTenantMember.userId).toBe(managerUserId);
        });

        it('refuses a duplicate email', async () => {
            await expect(
                adminClient.query(ADD_MEMBER, {
                    input: { tenantId: teamFiveId, emailAddress: 'manager@team-five.test' },
                }),
            ).rejects.toThrow('manager@team-five.test is already a member of this tenant');
        });

        it('enforces the user limit', async () => {
            await adminClient.query(ADD_MEMBER, { input: { tenantId: teamFiveId, emailAddress: 'dev1@team-five.test' } });
            await adminClient.query(ADD_MEMBER, { input: { tenantId: teamFiveId, emailAddress: 'dev2@team-five.test' } });

            await expect(
                adminClient.query(ADD_MEMBER, { input: { tenantId: teamFiveId, emailAddress: 'dev3@team-five.test' } }),
            ).rejects.toThrow('Plan limit reached for users (3 of 3 used)');
        });

        describe('as a tenant manager', () => {
            beforeAll(async () => {
                await adminClient.asUserWithCredentials('manager@team-five.test', 'test-password');
            });

            afterAll(async () => {
                await adminClient.asSuperAdmin();
            });

            it('can check usage of their own tenant', async () => {
                const result = await adminClient.query(CHECK_USAGE_LIMIT, {
                    tenantId: teamFiveId,
                    resource: 'PROJECTS',
                });

                expect(result.checkUsageLimit.allowed).toBe(true);
                expect(result.checkUsageLimit.limit).toBe(10);
            });

            it('can create projects in their own tenant', async () => {
                const result = await adminClient.query(CREATE_PROJECT, {
                    input: { tenantId: teamFiveId, name: 'Roadmap' },
                });

                expect(result.createProject.tenantId).toBe(teamFiveId);
                expect(result.createProject.teamId).toBeNull();
            });

            it('cannot create projects in another tenant', async () => {
                await expect(
                    adminClient.query(CREATE_PROJECT, { input: { tenantId: openPlanId, name: 'Intrusion' } }),
                ).rejects.toThrow(FORBIDDEN);
            });

            it('cannot read another tenant', async () => {
                await expect(adminClient.query(GET_TENANT, { id: openPlanId })).rejects.toThrow(FORBIDDEN);
            });

            it('cannot change the subscription of their own tenant', async () => {
                await expect(
                    adminClient.query(CREATE_SUBSCRIPTION, {
                        input: { tenantId: teamFiveId, planId: planIds.basic },
                    }),
                ).rejects.toThrow(FORBIDDEN);
            });
        });
    });

    describe('Storage', () => {
        it('reserves storage within the plan allowance', async () => {
            const result = await adminClient.query(RESERVE_STORAGE, { tenantId: teamFiveId, megabytes: 1000 });

            expect(result.reserveTenantStorage.storageUsedMb).toBe(1000);
        });

        it('refuses storage beyond the allowance', async () => {
            await expect(
                adminClient.query(RESERVE_STORAGE, { tenantId: teamFiveId, megabytes: 25 }),
            ).rejects.toThrow('Plan limit reached for storage (MB) (1000 of 1024 used)');
        });

        it('fills the allowance exactly', async () => {
            const result = await adminClient.query(RESERVE_STORAGE, { tenantId: teamFiveId, megabytes: 24 });

            expect(result.reserveTenantStorage.storageUsedMb).toBe(1024);
        });

        it('releases storage', async () => {
            const result = await adminClient.query(RELEASE_STORAGE, { tenantId: teamFiveId, megabytes: 100 });

            expect(result.releaseTenantStorage.storageUsedMb).toBe(924);
        });

        it('rejects a non-positive quantity', async () => {
            await expect(
                adminClient.query(RESERVE_STORAGE, { tenantId: teamFiveId, megabytes: 0 }),
            ).rejects.toThrow('Quantity must be a positive integer');
        });
    });

    describe('Tenant status and plans', () => {
        it('denies everything to a suspended tenant', async () => {
            await adminClient.query(SUSPEND_TENANT, { id: teamFiveId, reason: 'Abuse report' });

            const check = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: teamFiveId, resource: 'TEAMS' });
            expect(check.checkUsageLimit).toEqual({
                allowed: false,
                reason: 'TENANT_NOT_ACTIVE',
                message: 'Tenant "team-five" is SUSPENDED and cannot add teams',
                resource: 'TEAMS',
                used: 5,
                requested: 1,
                limit: 0,
            });
            await expect(
                adminClient.query(CREATE_PROJECT, { input: { tenantId: teamFiveId, name: 'Blocked' } }),
            ).rejects.toThrow('Tenant "team-five" is SUSPENDED and cannot add projects');

            await adminClient.query(REACTIVATE_TENANT, { id: teamFiveId });
        });

        it('never limits an unlimited plan', async () => {
            const result = await adminClient.query(CHECK_USAGE_LIMIT, {
                tenantId: openPlanId,
                resource: 'TEAMS',
                quantity: 50,
            });

            expect(result.checkUsageLimit.allowed).toBe(true);
            expect(result.checkUsageLimit.requested).toBe(50);
            expect(result.checkUsageLimit.limit).toBe(-1);
        });

        it('denies tenants without a live plan', async () => {
            const result = await adminClient.query(CHECK_USAGE_LIMIT, { tenantId: noPlanId, resource: 'PROJECTS' });

            expect(result.checkUsageLimit.reason).toBe('NO_ACTIVE_PLAN');
            expect(result.checkUsageLimit.message).toBe('Tenant "no-plan" has no active plan');
            await expect(createTeam(noPlanId, 'Anything')).rejects.toThrow('Tenant "no-plan" has no active plan');
        });

        it('answers feature checks from the live plan', async () => {
            const open = await adminClient.query(TENANT_HAS_FEATURE, { tenantId: openPlanId, feature: 'apiAccess' });
            const starter = await adminClient.query(TENANT_HAS_FEATURE, {
                tenantId: teamFiveId,
                feature: 'apiAccess',
            });

            expect(open.tenantHasFeature).toBe(true);
            expect(starter.tenantHasFeature).toBe(false);
        });

        it('summarises usage per resource', async () => {
            const result = await adminClient.query(GET_TENANT_USAGE, { tenantId: teamFiveId });

            expect(result.tenantUsage.tenantId).toBe(teamFiveId);
            expect(result.tenantUsage.planCode).toBe('starter');
            expect(result.tenantUsage.resources).toEqual([
                { resource: 'USERS', used: 3, limit: 3, unlimited: false },
                { resource: 'TEAMS', used: 5, limit: 5, unlimited: false },
                { resource: 'PROJECTS', used: 1, limit: 10, unlimited: false },
                { resource: 'STORAGE', used: 924, limit: 1024, unlimited: false },
            ]);
        });
    });
});
