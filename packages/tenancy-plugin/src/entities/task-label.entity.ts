import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { Tenant } from './tenant.entity';

@Entity()
@Index(['tenantId', 'name'], { unique: true })
export class TaskLabel extends VendureEntity {
    constructor(input?: DeepPartial<TaskLabel>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @EntityId()
    tenantId!: ID;

    @Column()
    name!: string;

    @Column({ default: '#6B7280' })
    color!: string;

    @Column({ type: 'text', default: '' })
    description!: string;
}
