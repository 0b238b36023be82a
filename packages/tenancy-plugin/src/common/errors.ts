import { I18nError, LogLevel } from '@vendure/core';

/**
 * Thrown when an entity is asked to move to a state its lifecycle does not allow,
 * e.g. approving a tenant that is already ACTIVE or verifying a payment twice.
 */
export class InvalidTransitionError extends I18nError {
    constructor(entityName: string, from: string, to: string, allowed: readonly string[]) {
        super(
            `Invalid ${entityName} transition from ${from} to ${to}. Allowed transitions are ${allowed.join(', ') || 'none'}`,
            { entityName, from, to },
            'INVALID_TRANSITION',
            LogLevel.Warn,
        );
    }
}

/**
 * Thrown when a change would break a uniqueness rule, such as a second live
 * subscription for the same tenant.
 */
export class ConflictError extends I18nError {
    constructor(message: string, variables: { [key: string]: string | number } = {}) {
        super(message, variables, 'CONFLICT', LogLevel.Warn);
    }
}

export class RenewalError extends I18nError {
    constructor(message: string, variables: { [key: string]: string | number } = {}) {
        super(message, variables, 'RENEWAL_ERROR', LogLevel.Warn);
    }
}

/**
 * Raised by resource-creating mutations when the usage check denies the request.
 * The check itself reports denials as values (see `UsageDecision`).
 */
export class LimitExceededError extends I18nError {
    constructor(message: string, variables: { [key: string]: string | number } = {}) {
        super(message, variables, 'LIMIT_EXCEEDED', LogLevel.Info);
    }
}
