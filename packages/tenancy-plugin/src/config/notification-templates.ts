export type NotificationType =
    | 'TENANT_REGISTERED'
    | 'TENANT_APPROVED'
    | 'TENANT_REJECTED'
    | 'TENANT_SUSPENDED'
    | 'TENANT_REACTIVATED'
    | 'SUBSCRIPTION_STARTED'
    | 'SUBSCRIPTION_ACTIVATED'
    | 'SUBSCRIPTION_CANCELLED'
    | 'SUBSCRIPTION_EXPIRED'
    | 'PAYMENT_APPROVED'
    | 'PAYMENT_REJECTED'
    | 'INVOICE_ISSUED';

export interface NotificationTemplate {
    subject: string;
    body: string;
}

export const defaultNotificationTemplates: Record<NotificationType, NotificationTemplate> = {
    TENANT_REGISTERED: {
        subject: 'We received your signup for {{ tenantName }}',
        body: 'Thanks for signing up. An administrator will review {{ tenantName }} shortly.',
    },
    TENANT_APPROVED: {
        subject: '{{ tenantName }} has been approved',
        body: 'Your workspace {{ tenantSlug }} is now active.',
    },
    TENANT_REJECTED: {
        subject: 'Your signup for {{ tenantName }} was not approved',
        body: 'Reason given: {{ reason }}',
    },
    TENANT_SUSPENDED: {
        subject: '{{ tenantName }} has been suspended',
        body: 'Access to {{ tenantSlug }} is suspended. Reason given: {{ reason }}',
    },
    TENANT_REACTIVATED: {
        subject: '{{ tenantName }} is active again',
        body: 'Access to {{ tenantSlug }} has been restored.',
    },
    SUBSCRIPTION_STARTED: {
        subject: 'Your {{ planName }} subscription has started',
        body: 'Status {{ status }}, current period ends on {{ endsAt }}.',
    },
    SUBSCRIPTION_ACTIVATED: {
        subject: 'Your {{ planName }} subscription is active',
        body: 'The current period ends on {{ endsAt }}.',
    },
    SUBSCRIPTION_CANCELLED: {
        subject: 'Your {{ planName }} subscription was cancelled',
        body: 'You keep access to the plan until {{ endsAt }}.',
    },
    SUBSCRIPTION_EXPIRED: {
        subject: 'Your {{ planName }} subscription has expired',
        body: 'Plan limits no longer apply to {{ tenantSlug }}. Submit a payment to reactivate it.',
    },
    PAYMENT_APPROVED: {
        subject: 'Payment of {{ amount }} {{ currencyCode }} approved',
        body: 'Your payment has been verified. Thank you.',
    },
    PAYMENT_REJECTED: {
        subject: 'Payment of {{ amount }} {{ currencyCode }} could not be verified',
        body: 'Notes from the reviewer: {{ notes }}',
    },
    INVOICE_ISSUED: {
        subject: 'Invoice {{ invoiceNumber }} for {{ tenantName }}',
        body: 'Amount due {{ total }} {{ currencyCode }} by {{ dueAt }}.',
    },
};

/**
 * Replaces `{{ name }}` placeholders. Unknown placeholders are left in place.
 */
export function renderTemplate(template: string, variables: Record<string, string | number>): string {
    return template.replace(/{{\s*(\w+)\s*}}/g, (placeholder, key: string) =>
        key in variables ? String(variables[key]) : placeholder,
    );
}
