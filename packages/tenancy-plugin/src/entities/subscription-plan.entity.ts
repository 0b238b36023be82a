import { DeepPartial } from '@vendure/common/lib/shared-types';
import { Money, VendureEntity } from '@vendure/core';
import { Column, Entity, Index } from 'typeorm';

import { BillingInterval } from './subscription.enums';

/**
 * Feature switches a plan grants. Keys mirror the `PlanFeature` GraphQL enum.
 */
export interface PlanFeatures {
    advancedReports: boolean;
    prioritySupport: boolean;
    apiAccess: boolean;
    customBranding: boolean;
    sso: boolean;
    auditLogs: boolean;
}

/**
 * A product in the plan catalog.
 *
 * Limits use `-1` (see `UNLIMITED`) for "no limit"; every other value is
 * enforced as-is. Prices are stored in minor units like every Vendure price.
 */
@Entity()
export class SubscriptionPlan extends VendureEntity {
    constructor(input?: DeepPartial<SubscriptionPlan>) {
        super(input);
    }

    /**
     * Stable catalog key, e.g. "starter".
     */
    @Index({ unique: true })
    @Column()
    code!: string;

    @Column()
    name!: string;

    @Column({ type: 'text', default: '' })
    description!: string;

    @Money()
    price!: number;

    @Column({ default: 'USD' })
    currencyCode!: string;

    @Column({ type: 'varchar', default: BillingInterval.MONTHLY })
    billingInterval!: BillingInterval;

    @Column()
    maxUsers!: number;

    @Column()
    maxTeams!: number;

    @Column()
    maxProjects!: number;

    @Column()
    maxStorageGb!: number;

    @Column('simple-json')
    features!: PlanFeatures;

    @Column({ default: 0 })
    trialDays!: number;

    @Column({ default: true })
    isActive!: boolean;

    @Column({ default: 0 })
    sortOrder!: number;
}
