/**
 * Settlement state of a submitted payment.
 */
export enum PaymentStatus {
    PENDING = 'PENDING',
    COMPLETED = 'COMPLETED',
    FAILED = 'FAILED',
}

/**
 * Review state of the proof attached to a payment. Only PENDING may change.
 */
export enum PaymentVerificationStatus {
    PENDING = 'PENDING',
    APPROVED = 'APPROVED',
    REJECTED = 'REJECTED',
}

export enum SubscriptionPaymentMethod {
    CARD = 'CARD',
    BANK_TRANSFER = 'BANK_TRANSFER',
    PAYPAL = 'PAYPAL',
    MANUAL = 'MANUAL',
    OTHER = 'OTHER',
}

export enum VerificationDecision {
    APPROVE = 'APPROVE',
    REJECT = 'REJECT',
}
