import { ID } from '@vendure/common/lib/shared-types';
import { idsAreEqual } from '@vendure/core';

import { TenantMemberRole } from '../entities/tenant-member-role.enum';

export type Capability =
    | 'viewTenant'
    | 'approveTenant'
    | 'verifyPayment'
    | 'manageBilling'
    | 'manageSubscription'
    | 'manageTeam'
    | 'manageTasks';

export interface TenantMembership {
    tenantId: ID;
    role: TenantMemberRole;
}

/**
 * Who is acting. Platform staff hold capabilities through Vendure permissions
 * (`grants`); tenant staff hold them through their membership role, scoped to
 * that tenant.
 */
export interface Actor {
    userId?: ID;
    isSuperAdmin: boolean;
    grants: readonly Capability[];
    memberships: readonly TenantMembership[];
}

export interface AccessTarget {
    tenantId?: ID;
}

const roleCapabilities: Record<TenantMemberRole, readonly Capability[]> = {
    [TenantMemberRole.TENANT_ADMIN]: ['viewTenant', 'manageTeam', 'manageTasks', 'manageSubscription'],
    [TenantMemberRole.MANAGER]: ['viewTenant', 'manageTeam', 'manageTasks'],
    [TenantMemberRole.MEMBER]: ['viewTenant', 'manageTasks'],
};

export function can(actor: Actor, capability: Capability, target: AccessTarget = {}): boolean {
    if (actor.isSuperAdmin || actor.grants.includes(capability)) {
        return true;
    }
    // Any platform grant lets staff read tenant data.
    if (capability === 'viewTenant' && actor.grants.length > 0) {
        return true;
    }
    const { tenantId } = target;
    if (tenantId === undefined) {
        return false;
    }
    return actor.memberships.some(
        membership =>
            idsAreEqual(membership.tenantId, tenantId) && roleCapabilities[membership.role].includes(capability),
    );
}
