import { PlanFeatures } from './entities/subscription-plan.entity';
import { BillingInterval } from './entities/subscription.enums';
import { NotificationStrategy } from './config/notification-strategy';
import { NotificationTemplate, NotificationType } from './config/notification-templates';

/**
 * A catalog entry seeded into an empty plan table on bootstrap.
 */
export interface PlanDefinition {
    code: string;
    name: string;
    description?: string;
    /** Minor units */
    price: number;
    currencyCode?: string;
    billingInterval: BillingInterval;
    maxUsers: number;
    maxTeams: number;
    maxProjects: number;
    maxStorageGb: number;
    features?: Partial<PlanFeatures>;
    trialDays?: number;
    sortOrder?: number;
}

export interface InvoiceOptions {
    /**
     * @default 'INV'
     */
    numberPrefix?: string;
    /**
     * Percent applied when an invoice is created without an explicit rate.
     *
     * @default 0
     */
    taxRate?: number;
    /**
     * @default 14
     */
    dueInDays?: number;
}

/**
 * Options passed to `TenancyPlugin.init()`.
 */
export interface TenancyPluginOptions {
    /**
     * Plans created on bootstrap when the plan table is empty.
     */
    plans?: PlanDefinition[];
    /**
     * Whether the Shop API `registerTenant` mutation is open to the public.
     *
     * @default true
     */
    allowSelfSignup?: boolean;
    /**
     * Where status-change notifications go. Defaults to writing them to the log.
     */
    notificationStrategy?: NotificationStrategy;
    notificationTemplates?: Partial<Record<NotificationType, NotificationTemplate>>;
    invoice?: InvoiceOptions;
    /**
     * When set, the expiry sweep is queued on this interval.
     */
    expirySweepIntervalMs?: number;
}

/**
 * Options after defaults have been applied.
 */
export interface ResolvedTenancyPluginOptions {
    plans: PlanDefinition[];
    allowSelfSignup: boolean;
    notificationStrategy: NotificationStrategy;
    notificationTemplates: Record<NotificationType, NotificationTemplate>;
    invoice: Required<InvoiceOptions>;
    expirySweepIntervalMs?: number;
}
