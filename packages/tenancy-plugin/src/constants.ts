import { PermissionDefinition } from '@vendure/core';

export const TENANCY_PLUGIN_OPTIONS = Symbol('TENANCY_PLUGIN_OPTIONS');
export const loggerCtx = 'TenancyPlugin';
export const SUBSCRIPTION_EXPIRY_QUEUE = 'subscription-expiry';

export const approveTenantPermission = new PermissionDefinition({
    name: 'ApproveTenant',
    description: 'Allows approving, rejecting, suspending and reactivating tenants',
});

export const verifyPaymentPermission = new PermissionDefinition({
    name: 'VerifyPayment',
    description: 'Allows approving or rejecting submitted subscription payments',
});

export const manageBillingPermission = new PermissionDefinition({
    name: 'ManageBilling',
    description: 'Allows managing subscription plans and invoices and running the expiry sweep',
});

export const manageSubscriptionsPermission = new PermissionDefinition({
    name: 'ManageSubscriptions',
    description: 'Allows creating, cancelling and renewing subscriptions for any tenant',
});

export const manageTeamsPermission = new PermissionDefinition({
    name: 'ManageTeams',
    description: 'Allows managing teams, projects and members of any tenant',
});
