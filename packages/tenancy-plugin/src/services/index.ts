export * from './access-policy.service';
export * from './audit.service';
export * from './invoice.service';
export * from './notification.service';
export * from './payment-verification.service';
export * from './plan.service';
export * from './project.service';
export * from './subscription-expiry.job';
export * from './subscription-renewal.service';
export * from './subscription.service';
export * from './task-comment.service';
export * from './task.service';
export * from './team-member.service';
export * from './team.service';
export * from './tenant-lock.service';
export * from './tenant-member.service';
export * from './tenant.service';
export * from './usage-limit.service';
