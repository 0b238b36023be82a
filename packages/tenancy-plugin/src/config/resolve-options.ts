import { ResolvedTenancyPluginOptions, TenancyPluginOptions } from '../types';

import { LoggingNotificationStrategy } from './notification-strategy';
import { defaultNotificationTemplates } from './notification-templates';

export function resolveTenancyOptions(options: TenancyPluginOptions): ResolvedTenancyPluginOptions {
    return {
        plans: options.plans ?? [],
        allowSelfSignup: options.allowSelfSignup ?? true,
        notificationStrategy: options.notificationStrategy ?? new LoggingNotificationStrategy(),
        notificationTemplates: { ...defaultNotificationTemplates, ...options.notificationTemplates },
        invoice: {
            numberPrefix: options.invoice?.numberPrefix ?? 'INV',
            taxRate: options.invoice?.taxRate ?? 0,
            dueInDays: options.invoice?.dueInDays ?? 14,
        },
        expirySweepIntervalMs: options.expirySweepIntervalMs,
    };
}
