export * from './audit-log.entity';
export * from './invoice.enums';
export * from './payment.enums';
export * from './project.entity';
export * from './subscription-invoice-item.entity';
export * from './subscription-invoice.entity';
export * from './subscription-payment.entity';
export * from './subscription-plan.entity';
export * from './subscription.enums';
export * from './task-comment.entity';
export * from './task-label.entity';
export * from './task.entity';
export * from './task.enums';
export * from './team-member-role.enum';
export * from './team-member.entity';
export * from './team.entity';
export * from './tenant-member-role.enum';
export * from './tenant-member.entity';
export * from './tenant-status.enum';
export * from './tenant-subscription.entity';
export * from './tenant.entity';
