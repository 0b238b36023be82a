import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { TenantMemberRole } from './tenant-member-role.enum';
import { Tenant } from './tenant.entity';

/**
 * A user seat inside a tenant. Counted against the
 * plan's `maxUsers`.
 *
 * `userId` links the seat to a Vendure User once that user has an account;
 * the access policy reads the member's role from here.
 */
@Entity()
@Index(['tenantId', 'emailAddress'], { unique: true })
export class TenantMember extends VendureEntity {
    constructor(input?: DeepPartial<TenantMember>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @EntityId()
    tenantId!: ID;

    @Index()
    @EntityId({ nullable: true })
    userId!: ID | null;

    @Column()
    emailAddress!: string;

    @Column({ default: '' })
    firstName!: string;

    @Column({ default: '' })
    lastName!: string;

    @Column({ type: 'varchar', default: TenantMemberRole.MEMBER })
    role!: TenantMemberRole;
}
