import { ID } from '@vendure/common/lib/shared-types';
import { InjectableStrategy, Logger, RequestContext } from '@vendure/core';

import { loggerCtx } from '../constants';

import { NotificationType } from './notification-templates';

export interface TenancyNotification {
    type: NotificationType;
    tenantId: ID;
    recipient: string;
    subject: string;
    body: string;
}

/**
 * Delivers tenant notifications. Delivery runs after the triggering change has
 * been committed; a failed `send()` is logged and never undoes that change.
 */
export interface NotificationStrategy extends InjectableStrategy {
    send(ctx: RequestContext, notification: TenancyNotification): Promise<void>;
}

export class LoggingNotificationStrategy implements NotificationStrategy {
    async send(ctx: RequestContext, notification: TenancyNotification): Promise<void> {
        Logger.info(
            `Notification ${notification.type} to ${notification.recipient} | ${notification.subject}`,
            loggerCtx,
        );
    }
}
