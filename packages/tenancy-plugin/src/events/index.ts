export * from './billing.events';
export * from './tenant.events';
