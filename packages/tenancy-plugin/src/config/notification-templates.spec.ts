import { describe, expect, it } from 'vitest';

import { defaultNotificationTemplates, renderTemplate } from './notification-templates';

describe('renderTemplate()', () => {
    it('fills in known placeholders', () => {
        const { subject, body } = defaultNotificationTemplates.TENANT_APPROVED;
        expect(renderTemplate(subject, { tenantName: 'Acme' })).toBe('Acme has been approved');
        expect(renderTemplate(body, { tenantSlug: 'acme' })).toBe('Your workspace acme is now active.');
    });

    it('accepts placeholders without inner spaces', () => {
        expect(renderTemplate('{{amount}} {{ currencyCode }}', { amount: 2900, currencyCode: 'USD' })).toBe(
            '2900 USD',
        );
    });

    it('leaves unknown placeholders in place', () => {
        expect(renderTemplate('Hello {{ name }}, plan {{ planName }}', { name: 'Ann' })).toBe(
            'Hello Ann, plan {{ planName }}',
        );
    });
});
