/**
 * Tenant lifecycle states.
 *
 * PENDING → ACTIVE | REJECTED, ACTIVE ⇄ SUSPENDED. REJECTED is terminal.
 */
export enum TenantStatus {
    /** Signed up, waiting for a platform admin to review */
    PENDING = 'PENDING',
    /** Approved and operating */
    ACTIVE = 'ACTIVE',
    /** Access blocked by an admin, data preserved */
    SUSPENDED = 'SUSPENDED',
    /** Signup refused */
    REJECTED = 'REJECTED',
}
