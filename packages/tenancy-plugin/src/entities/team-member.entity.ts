import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { TeamMemberRole } from './team-member-role.enum';
import { Team } from './team.entity';
import { TenantMember } from './tenant-member.entity';

/**
 * Places a tenant member in a team. Team members take no extra
 * seat; the seat is the TenantMember.
 */
@Entity()
@Index(['teamId', 'tenantMemberId'], { unique: true })
export class TeamMember extends VendureEntity {
    constructor(input?: DeepPartial<TeamMember>) {
        super(input);
    }

    @ManyToOne(() => Team, { onDelete: 'CASCADE' })
    team!: Team;

    @EntityId()
    teamId!: ID;

    @ManyToOne(() => TenantMember, { onDelete: 'CASCADE' })
    tenantMember!: TenantMember;

    @EntityId()
    tenantMemberId!: ID;

    @Index()
    @EntityId()
    tenantId!: ID;

    @Column({ type: 'varchar', default: TeamMemberRole.MEMBER })
    role!: TeamMemberRole;
}
