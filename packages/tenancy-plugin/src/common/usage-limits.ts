import { TenantStatus } from '../entities/tenant-status.enum';

/**
 * Limit value meaning "no limit". Any other number, however large, is enforced.
 */
export const UNLIMITED = -1;

export enum UsageResource {
    USERS = 'USERS',
    TEAMS = 'TEAMS',
    PROJECTS = 'PROJECTS',
    /** Measured in megabytes */
    STORAGE = 'STORAGE',
}

export type UsageDenialReason = 'TENANT_NOT_ACTIVE' | 'NO_ACTIVE_PLAN' | 'LIMIT_REACHED';

export interface PlanLimits {
    maxUsers: number;
    maxTeams: number;
    maxProjects: number;
    maxStorageGb: number;
}

interface UsageDecisionBase {
    resource: UsageResource;
    used: number;
    requested: number;
    /** `UNLIMITED`, or the effective limit (0 without a live plan) */
    limit: number;
}

export interface UsageAllowed extends UsageDecisionBase {
    allowed: true;
}

export interface UsageDenied extends UsageDecisionBase {
    allowed: false;
    reason: UsageDenialReason;
    message: string;
}

export type UsageDecision = UsageAllowed | UsageDenied;

export interface UsageEvaluationInput {
    tenantSlug: string;
    tenantStatus: TenantStatus;
    /** Limits of the live plan, undefined when the tenant has none */
    limits: PlanLimits | undefined;
    resource: UsageResource;
    used: number;
    requested: number;
}

const resourceLabels: Record<UsageResource, string> = {
    [UsageResource.USERS]: 'users',
    [UsageResource.TEAMS]: 'teams',
    [UsageResource.PROJECTS]: 'projects',
    [UsageResource.STORAGE]: 'storage (MB)',
};

/**
 * Storage limits are configured in GB and counted in MB.
 */
export function getResourceLimit(limits: PlanLimits, resource: UsageResource): number {
    switch (resource) {
        case UsageResource.USERS:
            return limits.maxUsers;
        case UsageResource.TEAMS:
            return limits.maxTeams;
        case UsageResource.PROJECTS:
            return limits.maxProjects;
        case UsageResource.STORAGE:
            return limits.maxStorageGb === UNLIMITED ? UNLIMITED : limits.maxStorageGb * 1024;
    }
}

/**
 * Decides whether `requested` more units of a resource fit.
 *
 * The tenant status is checked first, so a suspended tenant is denied even on
 * an unlimited plan.
 */
export function evaluateUsage(input: UsageEvaluationInput): UsageDecision {
    const { resource, used, requested } = input;
    const label = resourceLabels[resource];

    if (input.tenantStatus !== TenantStatus.ACTIVE) {
        return {
            allowed: false,
            reason: 'TENANT_NOT_ACTIVE',
            message: `Tenant "${input.tenantSlug}" is ${input.tenantStatus} and cannot add ${label}`,
            resource,
            used,
            requested,
            limit: 0,
        };
    }
    if (!input.limits) {
        return {
            allowed: false,
            reason: 'NO_ACTIVE_PLAN',
            message: `Tenant "${input.tenantSlug}" has no active plan`,
            resource,
            used,
            requested,
            limit: 0,
        };
    }
    const limit = getResourceLimit(input.limits, resource);
    if (limit === UNLIMITED || used + requested <= limit) {
        return { allowed: true, resource, used, requested, limit };
    }
    return {
        allowed: false,
        reason: 'LIMIT_REACHED',
        message: `Plan limit reached for ${label} (${used} of ${limit} used)`,
        resource,
        used,
        requested,
        limit,
    };
}
