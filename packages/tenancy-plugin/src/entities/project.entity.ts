import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, ManyToOne } from 'typeorm';

import { Team } from './team.entity';
import { Tenant } from './tenant.entity';

/**
 * A unit of work owned by a tenant and optionally a team.
 * Counted against the plan's `maxProjects`.
 */
@Entity()
export class Project extends VendureEntity {
    constructor(input?: DeepPartial<Project>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @EntityId()
    tenantId!: ID;

    @ManyToOne(() => Team, { nullable: true, onDelete: 'SET NULL' })
    team!: Team | null;

    @EntityId({ nullable: true })
    teamId!: ID | null;

    @Column()
    name!: string;

    @Column({ type: 'text', default: '' })
    description!: string;

    @Column({ default: false })
    isArchived!: boolean;
}
