import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, Money, VendureEntity } from '@vendure/core';
import { Column, Entity, Index, ManyToOne, OneToMany } from 'typeorm';

import { InvoiceKind, InvoiceStatus } from './invoice.enums';
import { SubscriptionInvoiceItem } from './subscription-invoice-item.entity';
import { TenantSubscription } from './tenant-subscription.entity';

/**
 * A bill raised against a subscription.
 *
 * The sum of item amounts always equals `subtotal`, and
 * `total = subtotal + taxAmount - discountAmount`; see `calculateInvoiceTotals`.
 */
@Entity()
export class SubscriptionInvoice extends VendureEntity {
    constructor(input?: DeepPartial<SubscriptionInvoice>) {
        super(input);
    }

    /**
     * e.g. "INV-20260301120000-0042"
     */
    @Index({ unique: true })
    @Column()
    invoiceNumber!: string;

    @ManyToOne(() => TenantSubscription, { onDelete: 'CASCADE' })
    subscription!: TenantSubscription;

    @Index()
    @EntityId()
    subscriptionId!: ID;

    @Index()
    @EntityId()
    tenantId!: ID;

    @Column({ type: 'varchar', default: InvoiceKind.MANUAL })
    kind!: InvoiceKind;

    @Index()
    @Column({ type: 'varchar', default: InvoiceStatus.DRAFT })
    status!: InvoiceStatus;

    @Column()
    currencyCode!: string;

    @Money()
    subtotal!: number;

    /**
     * Tax rate in percent, e.g. 10 for 10%.
     */
    @Column({ type: 'float', default: 0 })
    taxRate!: number;

    @Money()
    taxAmount!: number;

    @Money()
    discountAmount!: number;

    @Money()
    total!: number;

    @Column({ type: Date })
    issuedAt!: Date;

    @Column({ type: Date })
    dueAt!: Date;

    @Column({ type: Date, nullable: true })
    paidAt!: Date | null;

    /**
     * Payment that settled the invoice.
     */
    @EntityId({ nullable: true })
    paymentId!: ID | null;

    @Column({ type: 'text', nullable: true })
    notes!: string | null;

    @OneToMany(() => SubscriptionInvoiceItem, item => item.invoice, { cascade: true })
    items!: SubscriptionInvoiceItem[];
}
