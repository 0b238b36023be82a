import { RequestContext, VendureEvent } from '@vendure/core';

import {
    SubscriptionInvoice,
    SubscriptionPayment,
    SubscriptionStatus,
    TenantSubscription,
    VerificationDecision,
} from '../entities';

/**
 * Emitted when a subscription is created (`fromStatus` undefined) or changes status.
 */
export class SubscriptionStatusChangedEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public subscription: TenantSubscription,
        public fromStatus: SubscriptionStatus | undefined,
        public toStatus: SubscriptionStatus,
    ) {
        super();
    }
}

export class PaymentSubmittedEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public payment: SubscriptionPayment,
    ) {
        super();
    }
}

/**
 * Emitted once per payment, when an admin approves or rejects it.
 */
export class PaymentVerifiedEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public payment: SubscriptionPayment,
        public decision: VerificationDecision,
    ) {
        super();
    }
}

/**
 * Emitted when an invoice is sent to the tenant (manual send or renewal).
 */
export class InvoiceIssuedEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public invoice: SubscriptionInvoice,
    ) {
        super();
    }
}
