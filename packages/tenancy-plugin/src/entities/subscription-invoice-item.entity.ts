import { DeepPartial, ID } from '@vendure/common/lib/shared-types';
import { EntityId, Money, VendureEntity } from '@vendure/core';
import { Column, Entity, ManyToOne } from 'typeorm';

import { SubscriptionInvoice } from './subscription-invoice.entity';

@Entity()
export class SubscriptionInvoiceItem extends VendureEntity {
    constructor(input?: DeepPartial<SubscriptionInvoiceItem>) {
        super(input);
    }

    @ManyToOne(() => SubscriptionInvoice, invoice => invoice.items, { onDelete: 'CASCADE' })
    invoice!: SubscriptionInvoice;

    @EntityId()
    invoiceId!: ID;

    @Column()
    description!: string;

    @Column({ type: 'float', default: 1 })
    quantity!: number;

    @Money()
    unitPrice!: number;

    /**
     * `round(quantity * unitPrice)`
     */
    @Money()
    amount!: number;
}
