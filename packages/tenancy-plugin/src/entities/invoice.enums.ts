export enum InvoiceStatus {
    DRAFT = 'DRAFT',
    SENT = 'SENT',
    PAID = 'PAID',
    OVERDUE = 'OVERDUE',
    CANCELLED = 'CANCELLED',
}

/**
 * MANUAL invoices are raised by billing admins; RENEWAL invoices are issued by
 * a subscription renewal and extend the subscription period once paid.
 */
export enum InvoiceKind {
    MANUAL = 'MANUAL',
    RENEWAL = 'RENEWAL',
}
