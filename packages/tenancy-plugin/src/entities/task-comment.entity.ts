import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { Task } from './task.entity';

@Entity()
@Index(['taskId', 'createdAt'])
export class TaskComment extends VendureEntity {
    constructor(input?: DeepPartial<TaskComment>) {
        super(input);
    }

    @ManyToOne(() => Task, { onDelete: 'CASCADE' })
    task!: Task;

    @EntityId()
    taskId!: ID;

    @EntityId()
    tenantId!: ID;

    /** Vendure User who wrote the comment */
    @EntityId({ nullable: true })
    authorId!: ID | null;

    @Column({ type: 'text' })
    content!: string;

    @Column({ default: false })
    isEdited!: boolean;

    @Column({ type: Date, nullable: true })
    editedAt!: Date | null;
}
