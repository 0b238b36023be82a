import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index } from 'typeorm';

/**
 * Append-only record of every admin-triggered state change,
 * including attempts that were refused.
 *
 * Entries reference tenants and actors by id only, so they outlive the rows
 * they describe.
 */
@Entity()
export class AuditLog extends VendureEntity {
    constructor(input?: DeepPartial<AuditLog>) {
        super(input);
    }

    /**
     * Action type identifier.
     * e.g. 'TENANT_APPROVED', 'PAYMENT_REJECTED', 'SUBSCRIPTION_EXPIRED'
     */
    @Index()
    @Column()
    action!: string;

    /**
     * Severity level: INFO, WARN, CRITICAL
     */
    @Column({ default: 'INFO' })
    severity!: string;

    /**
     * SUCCESS, or DENIED when the attempted change was refused.
     */
    @Column({ default: 'SUCCESS' })
    outcome!: string;

    /**
     * User who triggered the change. Null for system jobs and anonymous signups.
     */
    @EntityId({ nullable: true })
    userId!: ID | null;

    @Index()
    @EntityId({ nullable: true })
    tenantId!: ID | null;

    @Column({ type: 'varchar', nullable: true })
    entityType!: string | null;

    @Column({ type: 'varchar', nullable: true })
    entityId!: string | null;

    @Column({ type: 'varchar', nullable: true })
    fromState!: string | null;

    @Column({ type: 'varchar', nullable: true })
    toState!: string | null;

    @Column({ type: 'text', nullable: true })
    notes!: string | null;

    @Column('simple-json')
    metadata!: Record<string, unknown>;

    @Column({ type: 'varchar', nullable: true })
    ipAddress!: string | null;
}
