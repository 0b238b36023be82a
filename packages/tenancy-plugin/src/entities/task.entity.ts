import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, JoinTable, ManyToMany, ManyToOne } from 'typeorm';

import { TaskPriority, TaskStatus } from './task.enums';
import { TaskLabel } from './task-label.entity';
import { Team } from './team.entity';
import { TenantMember } from './tenant-member.entity';
import { Tenant } from './tenant.entity';

/**
 * A piece of work inside a tenant, optionally owned by a team and
 * assigned to one of the tenant's members. Subtasks point at their
 * parent through `parentTaskId`.
 */
@Entity()
@Index(['tenantId', 'status'])
export class Task extends VendureEntity {
    constructor(input?: DeepPartial<Task>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @EntityId()
    tenantId!: ID;

    @ManyToOne(() => Team, { nullable: true, onDelete: 'CASCADE' })
    team!: Team | null;

    @EntityId({ nullable: true })
    teamId!: ID | null;

    @ManyToOne(() => Task, { nullable: true, onDelete: 'CASCADE' })
    parentTask!: Task | null;

    @EntityId({ nullable: true })
    parentTaskId!: ID | null;

    @Column()
    title!: string;

    @Column({ type: 'text', default: '' })
    description!: string;

    @Column({ type: 'varchar', default: TaskStatus.TODO })
    status!: TaskStatus;

    @Column({ type: 'varchar', default: TaskPriority.MEDIUM })
    priority!: TaskPriority;

    /** Vendure User who created the task */
    @EntityId({ nullable: true })
    createdById!: ID | null;

    @ManyToOne(() => TenantMember, { nullable: true, onDelete: 'SET NULL' })
    assignee!: TenantMember | null;

    @EntityId({ nullable: true })
    assigneeId!: ID | null;

    @Column({ type: Date, nullable: true })
    startDate!: Date | null;

    @Column({ type: Date, nullable: true })
    dueDate!: Date | null;

    @Column({ type: Date, nullable: true })
    completedAt!: Date | null;

    @Column({ default: 0 })
    position!: number;

    @Column({ type: 'float', nullable: true })
    estimatedHours!: number | null;

    @Column({ type: 'float', nullable: true })
    actualHours!: number | null;

    @ManyToMany(() => TaskLabel)
    @JoinTable()
    labels!: TaskLabel[];
}
