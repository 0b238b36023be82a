import { describe, expect, it } from 'vitest';

import { TenantStatus } from '../entities/tenant-status.enum';

import { evaluateUsage, getResourceLimit, PlanLimits, UNLIMITED, UsageResource } from './usage-limits';

const starter: PlanLimits = { maxUsers: 5, maxTeams: 5, maxProjects: 10, maxStorageGb: 2 };

function check(resource: UsageResource, used: number, requested = 1, limits: PlanLimits | null = starter) {
    return evaluateUsage({
        tenantSlug: 'acme',
        tenantStatus: TenantStatus.ACTIVE,
        limits: limits ?? undefined,
        resource,
        used,
        requested,
    });
}

describe('evaluateUsage()', () => {
    it('allows the fifth team on a plan with maxTeams 5', () => {
        expect(check(UsageResource.TEAMS, 4)).toEqual({
            allowed: true,
            resource: UsageResource.TEAMS,
            used: 4,
            requested: 1,
            limit: 5,
        });
    });

    it('denies the sixth team', () => {
        expect(check(UsageResource.TEAMS, 5)).toEqual({
            allowed: false,
            reason: 'LIMIT_REACHED',
            message: 'Plan limit reached for teams (5 of 5 used)',
            resource: UsageResource.TEAMS,
            used: 5,
            requested: 1,
            limit: 5,
        });
    });

    it('denies a request that would overshoot the limit', () => {
        const decision = check(UsageResource.PROJECTS, 8, 3);
        expect(decision.allowed).toBe(false);
    });

    it('treats -1 as unlimited', () => {
        const decision = check(UsageResource.USERS, 10_000, 1, { ...starter, maxUsers: UNLIMITED });
        expect(decision.allowed).toBe(true);
        expect(decision.limit).toBe(UNLIMITED);
    });

    it('enforces 999 as a real limit', () => {
        const decision = check(UsageResource.PROJECTS, 999, 1, { ...starter, maxProjects: 999 });
        expect(decision.allowed).toBe(false);
    });

    it('denies everything without a live plan', () => {
        expect(check(UsageResource.USERS, 0, 1, null)).toEqual({
            allowed: false,
            reason: 'NO_ACTIVE_PLAN',
            message: 'Tenant "acme" has no active plan',
            resource: UsageResource.USERS,
            used: 0,
            requested: 1,
            limit: 0,
        });
    });

    it('denies a suspended tenant even on an unlimited plan', () => {
        const decision = evaluateUsage({
            tenantSlug: 'acme',
            tenantStatus: TenantStatus.SUSPENDED,
            limits: { maxUsers: UNLIMITED, maxTeams: UNLIMITED, maxProjects: UNLIMITED, maxStorageGb: UNLIMITED },
            resource: UsageResource.TEAMS,
            used: 0,
            requested: 1,
        });
        expect(decision.allowed).toBe(false);
        expect(!decision.allowed && decision.reason).toBe('TENANT_NOT_ACTIVE');
        expect(!decision.allowed && decision.message).toBe('Tenant "acme" is SUSPENDED and cannot add teams');
    });

    it('denies a pending tenant', () => {
        const decision = evaluateUsage({
            tenantSlug: 'acme',
            tenantStatus: TenantStatus.PENDING,
            limits: starter,
            resource: UsageResource.USERS,
            used: 0,
            requested: 1,
        });
        expect(!decision.allowed && decision.reason).toBe('TENANT_NOT_ACTIVE');
    });

    it('counts storage in megabytes', () => {
        expect(check(UsageResource.STORAGE, 2000, 48).allowed).toBe(true);
        const denied = check(UsageResource.STORAGE, 2000, 49);
        expect(!denied.allowed && denied.message).toBe('Plan limit reached for storage (MB) (2000 of 2048 used)');
    });
});

describe('getResourceLimit()', () => {
    it('converts the storage limit from GB to MB', () => {
        expect(getResourceLimit(starter, UsageResource.STORAGE)).toBe(2048);
    });

    it('keeps unlimited storage unlimited', () => {
        expect(getResourceLimit({ ...starter, maxStorageGb: UNLIMITED }, UsageResource.STORAGE)).toBe(UNLIMITED);
    });
});
