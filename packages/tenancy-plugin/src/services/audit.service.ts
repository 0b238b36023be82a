import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    I18nError,
    Logger,
    PaginatedList,
    RequestContext,
    TransactionalConnection,
} from '@vendure/core';

import { AuditLog } from '../entities/audit-log.entity';

const loggerCtx = 'AuditService';

export type AuditSeverity = 'INFO' | 'WARN' | 'CRITICAL';
export type AuditOutcome = 'SUCCESS' | 'DENIED';

/**
 * Input for creating an audit log entry.
 */
export interface AuditLogInput {
    action: string;
    severity: AuditSeverity;
    outcome?: AuditOutcome;
    tenantId?: ID | null;
    entityType?: string;
    entityId?: ID;
    fromState?: string | null;
    toState?: string | null;
    notes?: string | null;
    metadata?: Record<string, unknown>;
}

/**
 * Describes a change about to be attempted. Fields may be filled in by the
 * work itself (e.g. `tenantId` once the target has been loaded).
 */
export type AuditAttempt = Omit<AuditLogInput, 'severity' | 'outcome'>;

export interface AuditLogListOptions {
    take?: number;
    skip?: number;
    action?: string;
    severity?: string;
    outcome?: string;
    tenantId?: ID;
    entityType?: string;
    entityId?: ID;
}

/**
 * Append-only activity log for tenant, billing and workspace changes.
 *
 * Successful changes are logged by the services inside the same transaction as
 * the change itself. Refused attempts are logged by `recordAttempt()` after the
 * transaction has rolled back, so the DENIED entry survives.
 */
@Injectable()
export class AuditService {
    constructor(private connection: TransactionalConnection) {}

    /**
     * Write an audit log entry.
     */
    async log(ctx: RequestContext, input: AuditLogInput): Promise<AuditLog> {
        const entry = new AuditLog({
            action: input.action,
            severity: input.severity,
            outcome: input.outcome ?? 'SUCCESS',
            userId: ctx.activeUserId ?? null,
            tenantId: input.tenantId ?? null,
            entityType: input.entityType ?? null,
            entityId: input.entityId != null ? String(input.entityId) : null,
            fromState: input.fromState ?? null,
            toState: input.toState ?? null,
            notes: input.notes ?? null,
            metadata: input.metadata ?? {},
            ipAddress: ctx.req?.ip ?? null,
        });

        const saved = await this.connection.getRepository(ctx, AuditLog).save(entry);

        const level = input.severity === 'CRITICAL' ? 'error' : input.severity === 'WARN' ? 'warn' : 'info';
        const transition = input.toState ? ` | ${input.fromState ?? '-'} -> ${input.toState}` : '';
        Logger[level](
            `[AUDIT] ${input.action} ${entry.outcome} | user=${String(ctx.activeUserId ?? 'system')} | tenant=${String(input.tenantId ?? '-')}${transition}`,
            loggerCtx,
        );

        return saved;
    }

    /**
     * Runs `work` and, if it throws, records a DENIED entry for the attempt before
     * rethrowing. `ctx` must be the caller's context, not the one of a
     * transaction opened inside `work`.
     */
    async recordAttempt<T>(ctx: RequestContext, attempt: AuditAttempt, work: () => Promise<T>): Promise<T> {
        try {
            return await work();
        } catch (e) {
            await this.log(ctx, {
                ...attempt,
                severity: 'WARN',
                outcome: 'DENIED',
                notes: describeError(e),
                metadata: {
                    ...attempt.metadata,
                    ...(attempt.notes ? { requestNotes: attempt.notes } : {}),
                    ...(e instanceof I18nError && e.code ? { errorCode: e.code } : {}),
                },
            }).catch(auditError =>
                Logger.error(`Failed to record denied ${attempt.action}: ${String(auditError)}`, loggerCtx),
            );
            throw e;
        }
    }

    /**
     * Query audit logs with pagination, newest first.
     */
    async findAll(ctx: RequestContext, options?: AuditLogListOptions): Promise<PaginatedList<AuditLog>> {
        const qb = this.connection.getRepository(ctx, AuditLog).createQueryBuilder('audit');

        if (options?.action) {
            qb.andWhere('audit.action = :action', { action: options.action });
        }
        if (options?.severity) {
            qb.andWhere('audit.severity = :severity', { severity: options.severity });
        }
        if (options?.outcome) {
            qb.andWhere('audit.outcome = :outcome', { outcome: options.outcome });
        }
        if (options?.tenantId != null) {
            qb.andWhere('audit.tenantId = :tenantId', { tenantId: options.tenantId });
        }
        if (options?.entityType) {
            qb.andWhere('audit.entityType = :entityType', { entityType: options.entityType });
        }
        if (options?.entityId != null) {
            qb.andWhere('audit.entityId = :entityId', { entityId: String(options.entityId) });
        }

        qb.orderBy('audit.createdAt', 'DESC').addOrderBy('audit.id', 'DESC');
        qb.take(options?.take ?? 25).skip(options?.skip ?? 0);

        const [items, totalItems] = await qb.getManyAndCount();
        return { items, totalItems };
    }
}

function describeError(e: unknown): string {
    if (e instanceof Error) {
        return e.message;
    }
    return String(e);
}
