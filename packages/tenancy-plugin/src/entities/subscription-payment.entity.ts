import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, Money, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne } from 'typeorm';

import {
    PaymentStatus,
    PaymentVerificationStatus,
    SubscriptionPaymentMethod,
} from './payment.enums';
import { TenantSubscription } from './tenant-subscription.entity';

/**
 * A payment submitted against a subscription,
 * waiting for (or past) manual verification by a platform admin.
 *
 * Once `verificationStatus` leaves PENDING the row is never modified again.
 */
@Entity()
export class SubscriptionPayment extends VendureEntity {
    constructor(input?: DeepPartial<SubscriptionPayment>) {
        super(input);
    }

    @ManyToOne(() => TenantSubscription, { onDelete: 'CASCADE' })
    subscription!: TenantSubscription;

    @Index()
    @EntityId()
    subscriptionId!: ID;

    @Index()
    @EntityId()
    tenantId!: ID;

    /**
     * Invoice this payment settles, if any.
     */
    @EntityId({ nullable: true })
    invoiceId!: ID | null;

    @Money()
    amount!: number;

    @Column()
    currencyCode!: string;

    @Column({ type: 'varchar' })
    method!: SubscriptionPaymentMethod;

    /**
     * Transaction id, bank reference or receipt number supplied with the payment.
     */
    @Column({ type: 'varchar', nullable: true })
    proofReference!: string | null;

    @Column({ type: 'varchar', default: PaymentStatus.PENDING })
    status!: PaymentStatus;

    @Index()
    @Column({ type: 'varchar', default: PaymentVerificationStatus.PENDING })
    verificationStatus!: PaymentVerificationStatus;

    @EntityId({ nullable: true })
    verifiedById!: ID | null;

    @Column({ type: Date, nullable: true })
    verifiedAt!: Date | null;

    @Column({ type: 'text', nullable: true })
    verificationNotes!: string | null;

    @Column({ type: Date, nullable: true })
    paidAt!: Date | null;
}
