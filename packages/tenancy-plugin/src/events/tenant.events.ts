import { RequestContext, VendureEvent } from '@vendure/core';

import { Tenant, TenantStatus } from '../entities';

/**
 * Emitted when a tenant signs up and is waiting for approval.
 */
export class TenantRegisteredEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public tenant: Tenant,
    ) {
        super();
    }
}

/**
 * Emitted after a lifecycle transition (approve, reject, suspend, reactivate)
 * has been committed.
 */
export class TenantStatusChangedEvent extends VendureEvent {
    constructor(
        public ctx: RequestContext,
        public tenant: Tenant,
        public fromStatus: TenantStatus,
        public toStatus: TenantStatus,
        public reason?: string,
    ) {
        super();
    }
}
