import { PluginCommonModule, Type, VendurePlugin } from '@vendure/core';

import {
    adminApiExtensions,
    BillingAdminResolver,
    PaymentAdminResolver,
    shopApiExtensions,
    SubscriptionInvoiceEntityResolver,
    TaskAdminResolver,
    TaskEntityResolver,
    TeamMemberEntityResolver,
    TenantAdminResolver,
    TenantShopResolver,
    TenantSubscriptionEntityResolver,
    WorkspaceAdminResolver,
} from './api';
import { resolveTenancyOptions } from './config/resolve-options';
import {
    approveTenantPermission,
    manageBillingPermission,
    manageSubscriptionsPermission,
    manageTeamsPermission,
    TENANCY_PLUGIN_OPTIONS,
    verifyPaymentPermission,
} from './constants';
import {
    AuditLog,
    Project,
    SubscriptionInvoice,
    SubscriptionInvoiceItem,
    SubscriptionPayment,
    SubscriptionPlan,
    Task,
    TaskComment,
    TaskLabel,
    Team,
    TeamMember,
    Tenant,
    TenantMember,
    TenantSubscription,
} from './entities';
import {
    AccessPolicyService,
    AuditService,
    InvoiceService,
    NotificationService,
    PaymentVerificationService,
    PlanService,
    ProjectService,
    SubscriptionExpiryJob,
    SubscriptionRenewalService,
    SubscriptionService,
    TaskCommentService,
    TaskService,
    TeamMemberService,
    TeamService,
    TenantLockService,
    TenantMemberService,
    TenantService,
    UsageLimitService,
} from './services';
import { TenancyPluginOptions } from './types';

/**
 * Multi-tenant SaaS administration on top of Vendure.
 *
 * Registers the tenant, subscription, billing, workspace and task entities, the
 * lifecycle services, Admin and Shop API extensions and five custom
 * permissions (ApproveTenant, VerifyPayment, ManageBilling,
 * ManageSubscriptions, ManageTeams).
 *
 * @example
 * ```ts
 * plugins: [
 *     TenancyPlugin.init({
 *         plans: [{ code: 'starter', name: 'Starter', price: 2900, billingInterval: BillingInterval.MONTHLY,
 *                   maxUsers: 5, maxTeams: 2, maxProjects: 5, maxStorageGb: 5, trialDays: 14 }],
 *         allowSelfSignup: true,
 *     }),
 * ]
 * ```
 */
@VendurePlugin({
    imports: [PluginCommonModule],
    entities: [
        Tenant,
        AuditLog,
        SubscriptionPlan,
        TenantSubscription,
        SubscriptionPayment,
        SubscriptionInvoice,
        SubscriptionInvoiceItem,
        Team,
        TeamMember,
        Project,
        TenantMember,
        Task,
        TaskLabel,
        TaskComment,
    ],
    adminApiExtensions: {
        schema: adminApiExtensions,
        resolvers: [
            TenantAdminResolver,
            BillingAdminResolver,
            PaymentAdminResolver,
            WorkspaceAdminResolver,
            TaskAdminResolver,
            TenantSubscriptionEntityResolver,
            SubscriptionInvoiceEntityResolver,
            TaskEntityResolver,
            TeamMemberEntityResolver,
        ],
    },
    shopApiExtensions: {
        schema: shopApiExtensions,
        resolvers: [TenantShopResolver],
    },
    providers: [
        { provide: TENANCY_PLUGIN_OPTIONS, useFactory: () => resolveTenancyOptions(TenancyPlugin.options) },
        AuditService,
        AccessPolicyService,
        TenantLockService,
        TenantService,
        PlanService,
        SubscriptionService,
        InvoiceService,
        SubscriptionRenewalService,
        PaymentVerificationService,
        UsageLimitService,
        TeamService,
        ProjectService,
        TenantMemberService,
        TeamMemberService,
        TaskService,
        TaskCommentService,
        NotificationService,
        SubscriptionExpiryJob,
    ],
    configuration: config => {
        config.authOptions.customPermissions.push(
            approveTenantPermission,
            verifyPaymentPermission,
            manageBillingPermission,
            manageSubscriptionsPermission,
            manageTeamsPermission,
        );
        return config;
    },
    compatibility: '^3.0.0',
})
export class TenancyPlugin {
    static options: TenancyPluginOptions = {};

    static init(options: TenancyPluginOptions): Type<TenancyPlugin> {
        this.options = options;
        return TenancyPlugin;
    }
}
