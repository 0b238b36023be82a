import gql from 'graphql-tag';

export const TENANT_FRAGMENT = gql`
    fragment TenantFields on Tenant {
        id
        name
        slug
        companyName
        companyEmail
        status
        isApproved
        approvedAt
        rejectedAt
        suspendedAt
        statusReason
    }
`;

export const SUBSCRIPTION_FRAGMENT = gql`
    fragment SubscriptionFields on TenantSubscription {
        id
        tenantId
        planId
        status
        startsAt
        endsAt
        trialEndsAt
        autoRenew
        cancelledAt
        cancellationReason
        plan {
            code
        }
    }
`;

export const PAYMENT_FRAGMENT = gql`
    fragment PaymentFields on SubscriptionPayment {
        id
        subscriptionId
        invoiceId
        amount
        status
        verificationStatus
        verifiedById
        verificationNotes
        paidAt
    }
`;

export const INVOICE_FRAGMENT = gql`
    fragment InvoiceFields on SubscriptionInvoice {
        id
        invoiceNumber
        subscriptionId
        kind
        status
        subtotal
        taxAmount
        discountAmount
        total
        paymentId
        items {
            description
            quantity
            unitPrice
            amount
        }
    }
`;

export const TASK_FRAGMENT = gql`
    fragment TaskFields on Task {
        id
        tenantId
        teamId
        parentTaskId
        title
        status
        priority
        assigneeId
        dueDate
        completedAt
        position
        progress
        isOverdue
        commentCount
        labels {
            id
            name
        }
    }
`;
