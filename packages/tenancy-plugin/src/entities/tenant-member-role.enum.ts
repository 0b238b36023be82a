/**
 * Role of a user inside a single tenant. Platform-wide roles come from
 * Vendure permissions instead.
 */
export enum TenantMemberRole {
    TENANT_ADMIN = 'TENANT_ADMIN',
    MANAGER = 'MANAGER',
    MEMBER = 'MEMBER',
}
