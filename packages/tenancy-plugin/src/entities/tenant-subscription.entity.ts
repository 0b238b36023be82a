import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import { SubscriptionPlan } from './subscription-plan.entity';
import { BillingInterval, SubscriptionStatus } from './subscription.enums';
import { Tenant } from './tenant.entity';

/**
 * Binds a tenant to a plan for a billing period.
 *
 * A tenant has at most one subscription in TRIAL or ACTIVE at any time;
 * earlier EXPIRED and CANCELLED rows are kept as history.
 */
@Entity()
export class TenantSubscription extends VendureEntity {
    constructor(input?: DeepPartial<TenantSubscription>) {
        super(input);
    }

    @ManyToOne(() => Tenant, { onDelete: 'CASCADE' })
    tenant!: Tenant;

    @Index()
    @EntityId()
    tenantId!: ID;

    @ManyToOne(() => SubscriptionPlan)
    plan!: SubscriptionPlan;

    @EntityId()
    planId!: ID;

    @Index()
    @Column({ type: 'varchar', default: SubscriptionStatus.TRIAL })
    status!: SubscriptionStatus;

    /**
     * Interval copied from the plan when the subscription was created, so a
     * later plan correction does not move an existing period.
     */
    @Column({ type: 'varchar' })
    billingInterval!: BillingInterval;

    @Column({ type: Date })
    startsAt!: Date;

    @Column({ type: Date })
    currentPeriodStart!: Date;

    @Column({ type: Date })
    endsAt!: Date;

    @Column({ type: Date, nullable: true })
    trialEndsAt!: Date | null;

    @Column({ default: true })
    autoRenew!: boolean;

    @Column({ type: Date, nullable: true })
    cancelledAt!: Date | null;

    @Column({ type: 'text', nullable: true })
    cancellationReason!: string | null;
}
