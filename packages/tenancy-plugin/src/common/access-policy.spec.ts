import { describe, expect, it } from 'vitest';

import { TenantMemberRole } from '../entities/tenant-member-role.enum';

import { Actor, can } from './access-policy';

function actor(partial: Partial<Actor>): Actor {
    return { userId: 1, isSuperAdmin: false, grants: [], memberships: [], ...partial };
}

describe('can()', () => {
    it('lets a superadmin do anything', () => {
        expect(can(actor({ isSuperAdmin: true }), 'approveTenant')).toBe(true);
        expect(can(actor({ isSuperAdmin: true }), 'verifyPayment')).toBe(true);
    });

    it('applies platform grants to every tenant', () => {
        const verifier = actor({ grants: ['verifyPayment'] });
        expect(can(verifier, 'verifyPayment', { tenantId: 7 })).toBe(true);
        expect(can(verifier, 'approveTenant')).toBe(false);
    });

    it('lets platform staff with any grant view tenants', () => {
        expect(can(actor({ grants: ['manageBilling'] }), 'viewTenant', { tenantId: 3 })).toBe(true);
        expect(can(actor({}), 'viewTenant', { tenantId: 3 })).toBe(false);
    });

    it('scopes member roles to their own tenant', () => {
        const manager = actor({ memberships: [{ tenantId: 3, role: TenantMemberRole.MANAGER }] });
        expect(can(manager, 'manageTeam', { tenantId: 3 })).toBe(true);
        expect(can(manager, 'manageTeam', { tenantId: '3' })).toBe(true);
        expect(can(manager, 'manageTeam', { tenantId: 4 })).toBe(false);
        expect(can(manager, 'manageTeam')).toBe(false);
    });

    it('gives tenant admins subscription management but not payment verification', () => {
        const admin = actor({ memberships: [{ tenantId: 3, role: TenantMemberRole.TENANT_ADMIN }] });
        expect(can(admin, 'manageSubscription', { tenantId: 3 })).toBe(true);
        expect(can(admin, 'verifyPayment', { tenantId: 3 })).toBe(false);
        expect(can(admin, 'approveTenant', { tenantId: 3 })).toBe(false);
    });

    it('lets plain members view but not manage', () => {
        const member = actor({ memberships: [{ tenantId: 3, role: TenantMemberRole.MEMBER }] });
        expect(can(member, 'viewTenant', { tenantId: 3 })).toBe(true);
        expect(can(member, 'manageTeam', { tenantId: 3 })).toBe(false);
    });

    it('lets every member work on tasks of their own tenant only', () => {
        const member = actor({ memberships: [{ tenantId: 3, role: TenantMemberRole.MEMBER }] });
        expect(can(member, 'manageTasks', { tenantId: 3 })).toBe(true);
        expect(can(member, 'manageTasks', { tenantId: 4 })).toBe(false);
        expect(can(actor({ grants: ['manageTasks'] }), 'manageTasks', { tenantId: 4 })).toBe(true);
    });
});
