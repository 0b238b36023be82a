/**
 * Role of a tenant member inside one of the tenant's teams.
 */
export enum TeamMemberRole {
    OWNER = 'OWNER',
    ADMIN = 'ADMIN',
    MEMBER = 'MEMBER',
}
