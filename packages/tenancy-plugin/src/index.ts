import 'reflect-metadata';

export { TenancyPlugin } from './tenancy.plugin';
export * from './api';
export * from './common/access-policy';
export * from './common/billing-period';
export * from './common/errors';
export * from './common/invoice-calculations';
export * from './common/state-transitions';
export * from './common/usage-limits';
export * from './config/notification-strategy';
export * from './config/notification-templates';
export * from './constants';
export * from './entities';
export * from './events';
export * from './services';
export * from './types';
