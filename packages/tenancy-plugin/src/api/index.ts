export * from './api-extensions';
export * from './billing-admin.resolver';
export * from './entity-field.resolvers';
export * from './payment-admin.resolver';
export * from './task-admin.resolver';
export * from './tenant-admin.resolver';
export * from './tenant-shop.resolver';
export * from './workspace-admin.resolver';
