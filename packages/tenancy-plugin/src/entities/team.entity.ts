import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { Tenant } from './tenant.entity';

/**
 * A group of members inside a tenant. Counted against the
 * plan's `maxTeams`.
 */
@Entity()
@Index(['tenantId', 'slug'], { unique: true })
export class Team extends VendureEntity {
    constructor(input?: DeepPartial<Team>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @EntityId()
    tenantId!: ID;

    @Column()
    name!: string;

    @Column()
    slug!: string;

    @Column({ type: 'text', default: '' })
    description!: string;

    @Column({ default: false })
    isPrivate!: boolean;

    @Column({ default: '#3B82F6' })
    color!: string;
}
