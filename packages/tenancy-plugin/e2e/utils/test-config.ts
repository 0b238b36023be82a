import { LanguageCode } from '@vendure/common/lib/generated-types';
import { RequestContext } from '@vendure/core';
import { InitialData } from '@vendure/core/dist/data-import/index';
import { PostgresInitializer, registerInitializer, SqljsInitializer } from '@vendure/testing';
import path from 'path';

import { NotificationStrategy, TenancyNotification } from '../../src/config/notification-strategy';
import { BillingInterval } from '../../src/entities/subscription.enums';
import { PlanDefinition } from '../../src/types';

export const TEST_SETUP_TIMEOUT_MS = 120_000;

// Minimal initial data for testing
export const testInitialData: InitialData = {
    defaultLanguage: LanguageCode.en,
    defaultZone: 'Europe',
    taxRates: [{ name: 'Standard Tax', percentage: 20 }],
    shippingMethods: [{ name: 'Standard Shipping', price: 500 }],
    paymentMethods: [],
    countries: [{ name: 'United Kingdom', code: 'GB', zone: 'Europe' }],
    collections: [],
};

export const testPlans: PlanDefinition[] = [
    {
        code: 'starter',
        name: 'Starter',
        price: 2900,
        billingInterval: BillingInterval.MONTHLY,
        maxUsers: 3,
        maxTeams: 5,
        maxProjects: 10,
        maxStorageGb: 1,
        trialDays: 14,
    },
    {
        code: 'basic',
        name: 'Basic',
        price: 1000,
        billingInterval: BillingInterval.MONTHLY,
        maxUsers: 10,
        maxTeams: 10,
        maxProjects: 20,
        maxStorageGb: 5,
        trialDays: 0,
    },
    {
        code: 'scale',
        name: 'Scale',
        price: 49900,
        billingInterval: BillingInterval.YEARLY,
        maxUsers: -1,
        maxTeams: -1,
        maxProjects: -1,
        maxStorageGb: -1,
        features: { apiAccess: true, sso: true },
        trialDays: 0,
    },
];

// --- DB initializer ---
const dbType = process.env.DB || 'sqljs';
if (dbType === 'postgres') {
    registerInitializer('postgres', new PostgresInitializer());
} else {
    registerInitializer('sqljs', new SqljsInitializer(path.join(__dirname, '..', '__data__')));
}

export function getDbConfig() {
    if (dbType === 'postgres') {
        return {
            type: 'postgres' as const,
            synchronize: true,
            host: process.env.DB_HOST || '127.0.0.1',
            port: +(process.env.DB_PORT || 5432),
            username: process.env.DB_USERNAME || 'vendure',
            password: process.env.DB_PASSWORD || 'password',
            database: process.env.DB_NAME || 'vendure-e2e-test',
        };
    }
    return {
        type: 'sqljs' as const,
        database: new Uint8Array([]),
        logging: false,
    };
}

/**
 * Keeps every notification it is asked to send. Recipients on the
 * `fail.test` domain make `send()` throw after recording.
 */
export class RecordingNotificationStrategy implements NotificationStrategy {
    readonly sent: TenancyNotification[] = [];

    async send(ctx: RequestContext, notification: TenancyNotification): Promise<void> {
        this.sent.push(notification);
        if (notification.recipient.endsWith('@fail.test')) {
            throw new Error(`Mailbox unavailable for ${notification.recipient}`);
        }
    }
}
