import { Permission } from '@vendure/common/lib/generated-types';
import { mergeConfig } from '@vendure/core';
import { createTestEnvironment, testConfig as defaultTestConfig } from '@vendure/testing';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { TenancyPlugin } from '../src/tenancy.plugin';

import {
    APPROVE_TENANT,
    CREATE_ADMINISTRATOR,
    CREATE_ROLE,
    CREATE_TENANT,
    GET_AUDIT_LOGS,
    GET_TENANT,
    GET_TENANT_BY_SLUG,
    GET_TENANTS,
    REACTIVATE_TENANT,
    REJECT_TENANT,
    SUSPEND_TENANT,
} from './graphql/admin-definitions';
import { REGISTER_TENANT, SHOP_SUBSCRIPTION_PLANS } from './graphql/shop-definitions';
import {
    getDbConfig,
    RecordingNotificationStrategy,
    TEST_SETUP_TIMEOUT_MS,
    testInitialData,
    testPlans,
} from './utils/test-config';

/**
 * E2E tests for tenant signup and the approval lifecycle.
 */

const notifications = new RecordingNotificationStrategy();

const config = mergeConfig(defaultTestConfig, {
    apiOptions: {
        port: 3101,
    },
    dbConnectionOptions: getDbConfig(),
    plugins: [TenancyPlugin.init({ plans: testPlans, notificationStrategy: notifications })],
});

function sentTo(recipient: string) {
    return notifications.sent.filter(n => n.recipient === recipient);
}

describe('Tenant lifecycle E2E', () => {
    const { server, adminClient, shopClient } = createTestEnvironment(config);

    let acmeId: string;
    let globexId: string;

    beforeAll(async () => {
        await server.init({
            initialData: testInitialData,
            customerCount: 0,
        });
        await adminClient.asSuperAdmin();
    }, TEST_SETUP_TIMEOUT_MS);

    afterAll(async () => {
        await server.destroy();
    });

    describe('Signup', () => {
        it('lists the seeded plans in the Shop API', async () => {
            const result = await shopClient.query(SHOP_SUBSCRIPTION_PLANS);

            expect(result.subscriptionPlans.map((p: { code: string }) => p.code)).toEqual([
                'starter',
                'basic',
                'scale',
            ]);
            expect(result.subscriptionPlans[0].price).toBe(2900);
            expect(result.subscriptionPlans[2].features.apiAccess).toBe(true);
        });

        it('registers a PENDING tenant through the Shop API', async () => {
            const result = await shopClient.query(REGISTER_TENANT, {
                input: {
                    name: 'Acme Robotics',
                    companyName: 'Acme Robotics Ltd',
                    companyEmail: 'Billing@Acme.test',
                },
            });

            expect(result.registerTenant.slug).toBe('acme-robotics');
            expect(result.registerTenant.status).toBe('PENDING');
            expect(result.registerTenant.isApproved).toBe(false);
            expect(result.registerTenant.companyEmail).toBe('billing@acme.test');
            acmeId = result.registerTenant.id;
        });

        it('rejects a duplicate slug', async () => {
            await expect(
                shopClient.query(REGISTER_TENANT, {
                    input: {
                        name: 'Acme Robotics',
                        companyName: 'Another Acme',
                        companyEmail: 'ops@acme-two.test',
                    },
                }),
            ).rejects.toThrow('Tenant with slug "acme-robotics" already exists');
        });

        it('rejects a malformed slug', async () => {
            await expect(
                shopClient.query(REGISTER_TENANT, {
                    input: {
                        name: 'Acme Two',
                        slug: 'acme_robotics',
                        companyName: 'Acme Two',
                        companyEmail: 'ops@acme-two.test',
                    },
                }),
            ).rejects.toThrow('"acme_robotics" is not a valid tenant slug');
        });

        it('rejects an invalid company email', async () => {
            await expect(
                shopClient.query(REGISTER_TENANT, {
                    input: { name: 'Nomail', companyName: 'Nomail', companyEmail: 'nomail' },
                }),
            ).rejects.toThrow('"nomail" is not a valid email address');
        });

        it('creates a tenant through the Admin API', async () => {
            const result = await adminClient.query(CREATE_TENANT, {
                input: {
                    name: 'Globex',
                    companyName: 'Globex Corporation',
                    companyEmail: 'ops@globex.test',
                },
            });

            expect(result.createTenant.slug).toBe('globex');
            expect(result.createTenant.status).toBe('PENDING');
            globexId = result.createTenant.id;
        });

        it('sends a signup notification to the company email', async () => {
            await expect
                .poll(() => sentTo('billing@acme.test').map(n => n.subject))
                .toContain('We received your signup for Acme Robotics');
        });
    });

    describe('Queries', () => {
        it('filters tenants by status', async () => {
            const result = await adminClient.query(GET_TENANTS, { options: { status: 'PENDING' } });

            expect(result.tenants.totalItems).toBe(2);
            expect(result.tenants.items.map((t: { slug: string }) => t.slug)).toEqual(['globex', 'acme-robotics']);
        });

        it('finds a tenant by slug', async () => {
            const result = await adminClient.query(GET_TENANT_BY_SLUG, { slug: 'acme-robotics' });

            expect(result.tenantBySlug.id).toBe(acmeId);
        });

        it('returns null for an unknown slug', async () => {
            const result = await adminClient.query(GET_TENANT_BY_SLUG, { slug: 'nobody' });

            expect(result.tenantBySlug).toBeNull();
        });
    });

    describe('Lifecycle transitions', () => {
        it('approves a PENDING tenant', async () => {
            const result = await adminClient.query(APPROVE_TENANT, { id: acmeId, notes: 'Documents checked' });

            expect(result.approveTenant.status).toBe('ACTIVE');
            expect(result.approveTenant.isApproved).toBe(true);
            expect(result.approveTenant.approvedAt).not.toBeNull();
            expect(result.approveTenant.approvedById).toBeTruthy();
        });

        it('refuses to approve an ACTIVE tenant', async () => {
            await expect(adminClient.query(APPROVE_TENANT, { id: acmeId })).rejects.toThrow(
                'Invalid tenant transition from ACTIVE to ACTIVE. Allowed transitions are SUSPENDED',
            );
        });

        it('rejects a PENDING tenant with a reason', async () => {
            const result = await adminClient.query(REJECT_TENANT, {
                id: globexId,
                reason: 'Incomplete company details',
            });

            expect(result.rejectTenant.status).toBe('REJECTED');
            expect(result.rejectTenant.rejectedAt).not.toBeNull();
            expect(result.rejectTenant.statusReason).toBe('Incomplete company details');
        });

        it('treats REJECTED as final', async () => {
            await expect(adminClient.query(REACTIVATE_TENANT, { id: globexId })).rejects.toThrow(
                'Invalid tenant transition from REJECTED to ACTIVE. Allowed transitions are none',
            );
        });

        it('suspends an ACTIVE tenant', async () => {
            const result = await adminClient.query(SUSPEND_TENANT, { id: acmeId, reason: 'Unpaid invoices' });

            expect(result.suspendTenant.status).toBe('SUSPENDED');
            expect(result.suspendTenant.suspendedAt).not.toBeNull();
            expect(result.suspendTenant.statusReason).toBe('Unpaid invoices');
        });

        it('reactivates a SUSPENDED tenant', async () => {
            const result = await adminClient.query(REACTIVATE_TENANT, { id: acmeId });

            expect(result.reactivateTenant.status).toBe('ACTIVE');
            expect(result.reactivateTenant.suspendedAt).toBeNull();
            expect(result.reactivateTenant.statusReason).toBeNull();
            expect(result.reactivateTenant.isApproved).toBe(true);
        });

        it('fails with not found for an unknown tenant', async () => {
            await expect(adminClient.query(APPROVE_TENANT, { id: 'T_999' })).rejects.toThrow(
                'No Tenant with the id',
            );
        });
    });

    describe('Audit trail', () => {
        it('records every attempt on the tenant, newest first', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: acmeId, entityType: 'Tenant' },
            });

            expect(
                result.auditLogs.items.map((i: { action: string; outcome: string }) => `${i.action} ${i.outcome}`),
            ).toEqual([
                'TENANT_REACTIVATED SUCCESS',
                'TENANT_SUSPENDED SUCCESS',
                'TENANT_APPROVED DENIED',
                'TENANT_APPROVED SUCCESS',
                'TENANT_REGISTERED SUCCESS',
            ]);
        });

        it('stores the state change and notes of a transition', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: acmeId, action: 'TENANT_APPROVED', outcome: 'SUCCESS' },
            });
            const [entry] = result.auditLogs.items;

            expect(entry.fromState).toBe('PENDING');
            expect(entry.toState).toBe('ACTIVE');
            expect(entry.notes).toBe('Documents checked');
            expect(entry.severity).toBe('INFO');
            expect(entry.userId).toBeTruthy();
        });

        it('stores the error of a denied attempt', async () => {
            const result = await adminClient.query(GET_AUDIT_LOGS, {
                options: { tenantId: acmeId, action: 'TENANT_APPROVED', outcome: 'DENIED' },
            });
            const [entry] = result.auditLogs.items;

            expect(entry.severity).toBe('WARN');
            expect(entry.notes).toBe(
                'Invalid tenant transition from ACTIVE to ACTIVE. Allowed transitions are SUSPENDED',
            );
            expect(entry.metadata.errorCode).toBe('INVALID_TRANSITION');
        });
    });

    describe('Access control', () => {
        let supportUserId: string;

        beforeAll(async () => {
            await adminClient.asSuperAdmin();
            const { createRole } = await adminClient.query(CREATE_ROLE, {
                input: {
                    code: 'support',
                    description: 'Support desk',
                    permissions: [Permission.ReadCustomer],
                },
            });
            const { createAdministrator } = await adminClient.query(CREATE_ADMINISTRATOR, {
                input: {
                    firstName: 'Sam',
                    lastName: 'Support',
                    emailAddress: 'support@platform.test',
                    password: 'test-password',
                    roleIds: [createRole.id],
                },
            });
            supportUserId = createAdministrator.user.id;
            await adminClient.asUserWithCredentials('support@platform.test', 'test-password');
        });

        afterAll(async () => {
            await adminClient.asSuperAdmin();
        });

        it('denies lifecycle changes to staff without the approval permission', async () => {
            await expect(
                adminClient.query(SUSPEND_TENANT, { id: acmeId, reason: 'Testing access' }),
            ).rejects.toThrow('You are not currently authorized to perform this action');
        });

        it('denies reading tenants to staff without a tenancy permission', async () => {
            await expect(adminClient.query(GET_TENANT, { id: acmeId })).rejects.toThrow(
                'You are not currently authorized to perform this action',
            );
        });

        it('records the refused attempt and leaves the tenant unchanged', async () => {
            await adminClient.asSuperAdmin();
            const logs = await adminClient.query(GET_AUDIT_LOGS, {
                options: { action: 'TENANT_SUSPENDED', outcome: 'DENIED' },
            });
            const tenant = await adminClient.query(GET_TENANT, { id: acmeId });

            expect(logs.auditLogs.totalItems).toBe(1);
            expect(logs.auditLogs.items[0].userId).toBe(supportUserId);
            expect(logs.auditLogs.items[0].tenantId).toBe(acmeId);
            expect(logs.auditLogs.items[0].metadata.errorCode).toBe('FORBIDDEN');
            expect(logs.auditLogs.items[0].metadata.requestNotes).toBe('Testing access');
            expect(tenant.tenant.status).toBe('ACTIVE');
        });
    });

    describe('Notifications', () => {
        it('notifies approval and rejection with the rendered templates', async () => {
            await expect
                .poll(() => sentTo('billing@acme.test').map(n => n.type))
                .toEqual(['TENANT_REGISTERED', 'TENANT_APPROVED', 'TENANT_SUSPENDED', 'TENANT_REACTIVATED']);
            await expect.poll(() => sentTo('ops@globex.test').map(n => n.type)).toContain('TENANT_REJECTED');

            const rejection = sentTo('ops@globex.test').find(n => n.type === 'TENANT_REJECTED');
            expect(rejection?.subject).toBe('Your signup for Globex was not approved');
            expect(rejection?.body).toBe('Reason given: Incomplete company details');
            const suspension = sentTo('billing@acme.test').find(n => n.type === 'TENANT_SUSPENDED');
            expect(suspension?.body).toBe('Access to acme-robotics is suspended. Reason given: Unpaid invoices');
        });

        it('keeps the transition when delivery fails', async () => {
            const { createTenant } = await adminClient.query(CREATE_TENANT, {
                input: { name: 'Flaky Mail', companyName: 'Flaky Mail', companyEmail: 'ops@fail.test' },
            });
            const result = await adminClient.query(APPROVE_TENANT, { id: createTenant.id });

            expect(result.approveTenant.status).toBe('ACTIVE');
            await expect.poll(() => sentTo('ops@fail.test').map(n => n.type)).toContain('TENANT_APPROVED');

            const reloaded = await adminClient.query(GET_TENANT, { id: createTenant.id });
            expect(reloaded.tenant.status).toBe('ACTIVE');
        });
    });
});
