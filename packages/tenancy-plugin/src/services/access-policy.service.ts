import { Injectable } from '@nestjs/common';
import {
    ForbiddenError,
    Permission,
    PermissionDefinition,
    RequestContext,
    TransactionalConnection,
} from '@vendure/core';

import { AccessTarget, Actor, Capability, can } from '../common/access-policy';
import {
    approveTenantPermission,
    manageBillingPermission,
    manageSubscriptionsPermission,
    manageTeamsPermission,
    verifyPaymentPermission,
} from '../constants';
import { TenantMember } from '../entities/tenant-member.entity';

const platformGrants: Array<[Capability, PermissionDefinition]> = [
    ['approveTenant', approveTenantPermission],
    ['verifyPayment', verifyPaymentPermission],
    ['manageBilling', manageBillingPermission],
    ['manageSubscription', manageSubscriptionsPermission],
    ['manageTeam', manageTeamsPermission],
    ['manageTasks', manageTeamsPermission],
];

/**
 * Resolves the acting user from the request and applies the access policy.
 *
 * Services call `assert()` before every state change, so the policy also holds
 * for callers that bypass the GraphQL `@Allow()` checks.
 */
@Injectable()
export class AccessPolicyService {
    constructor(private connection: TransactionalConnection) {}

    async resolveActor(ctx: RequestContext): Promise<Actor> {
        const isSuperAdmin = ctx.userHasPermissions([Permission.SuperAdmin]);
        const grants = platformGrants
            .filter(([, definition]) => ctx.userHasPermissions([definition.Permission]))
            .map(([capability]) => capability);
        const userId = ctx.activeUserId;
        const memberships = userId
            ? await this.connection.getRepository(ctx, TenantMember).find({ where: { userId } })
            : [];
        return {
            userId,
            isSuperAdmin,
            grants,
            memberships: memberships.map(member => ({ tenantId: member.tenantId, role: member.role })),
        };
    }

    async can(ctx: RequestContext, capability: Capability, target?: AccessTarget): Promise<boolean> {
        return can(await this.resolveActor(ctx), capability, target);
    }

    async assert(ctx: RequestContext, capability: Capability, target?: AccessTarget): Promise<Actor> {
        const actor = await this.resolveActor(ctx);
        if (!can(actor, capability, target)) {
            throw new ForbiddenError();
        }
        return actor;
    }
}
