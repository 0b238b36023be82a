import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index } from 'typeorm';

import { TenantStatus } from './tenant-status.enum';

/**
 * An organisation that signs up for the platform.
 *
 * A tenant moves through the approval lifecycle (see TenantService) and owns
 * subscriptions, teams, projects and members. Tenants are never hard-deleted;
 * a refused signup stays in the table as REJECTED.
 */
@Entity()
export class Tenant extends VendureEntity {
    constructor(input?: DeepPartial<Tenant>) {
        super(input);
    }

    @Column()
    name!: string;

    /**
     * URL-safe unique identifier, e.g. "acme-labs".
     */
    @Index({ unique: true })
    @Column()
    slug!: string;

    @Column()
    companyName!: string;

    @Column()
    companyEmail!: string;

    @Column({ type: 'varchar', nullable: true })
    companyPhone!: string | null;

    /**
     * Current lifecycle status. Stored as varchar so the same schema works on
     * every database Vendure supports.
     */
    @Index()
    @Column({ type: 'varchar', default: TenantStatus.PENDING })
    status!: TenantStatus;

    @Column({ default: false })
    isApproved!: boolean;

    /**
     * Administrator (Vendure User id) who approved the signup.
     */
    @EntityId({ nullable: true })
    approvedById!: ID | null;

    @Column({ type: Date, nullable: true })
    approvedAt!: Date | null;

    @Column({ type: Date, nullable: true })
    rejectedAt!: Date | null;

    @Column({ type: Date, nullable: true })
    suspendedAt!: Date | null;

    /**
     * Reason given with the most recent reject/suspend/reactivate decision.
     */
    @Column({ type: 'text', nullable: true })
    statusReason!: string | null;

    /**
     * Storage consumed by the tenant in megabytes, checked against the plan's
     * `maxStorageGb`.
     */
    @Column({ default: 0 })
    storageUsedMb!: number;

    /**
     * Tenant settings (notification preferences, branding and the like).
     */
    @Column('simple-json')
    config!: Record<string, unknown>;

    @Column({ type: 'text', nullable: true })
    notes!: string | null;
}
