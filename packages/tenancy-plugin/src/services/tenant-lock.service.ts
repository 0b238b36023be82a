import { Injectable } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    EntityNotFoundError,
    RequestContext,
    TransactionalConnection,
    Type,
    VendureEntity,
} from '@vendure/core';

import { KeyedLock } from '../common/keyed-lock';
import { Tenant } from '../entities/tenant.entity';

/**
 * Drivers that support `SELECT ... FOR UPDATE`. sql.js and sqlite run on a
 * single connection and are serialised by the in-process lock alone.
 */
const rowLockingDrivers: string[] = ['postgres', 'cockroachdb', 'mysql', 'mariadb', 'mssql', 'oracle'];

export type TenantLockScope = 'tenant' | 'subscription';

/**
 * Makes check-then-write sequences atomic.
 *
 * Work runs inside a transaction while holding an in-process lock for the key
 * and, where the database supports it, a `pessimistic_write` lock on the row.
 * The transaction commits before the in-process lock is released.
 *
 * Scopes may nest in the order entity → subscription → tenant; never take the
 * same scope twice for one tenant.
 */
@Injectable()
export class TenantLockService {
    private readonly lock = new KeyedLock();

    constructor(private connection: TransactionalConnection) {}

    async withTenantLock<T>(
        ctx: RequestContext,
        tenantId: ID,
        scope: TenantLockScope,
        work: (txCtx: RequestContext, tenant: Tenant) => Promise<T>,
    ): Promise<T> {
        return this.withEntityLock(ctx, Tenant, tenantId, scope, work);
    }

    async withEntityLock<E extends VendureEntity, T>(
        ctx: RequestContext,
        entityType: Type<E>,
        id: ID,
        scope: string,
        work: (txCtx: RequestContext, entity: E) => Promise<T>,
    ): Promise<T> {
        return this.lock.run(`${entityType.name}:${scope}:${String(id)}`, () =>
            this.connection.withTransaction(ctx, async txCtx => {
                const entity = await this.lockRow(txCtx, entityType, id);
                return work(txCtx, entity);
            }),
        );
    }

    supportsRowLocks(): boolean {
        return rowLockingDrivers.includes(this.connection.rawConnection.options.type);
    }

    private async lockRow<E extends VendureEntity>(ctx: RequestContext, entityType: Type<E>, id: ID): Promise<E> {
        if (!this.supportsRowLocks()) {
            return this.connection.getEntityOrThrow(ctx, entityType, id);
        }
        const entity = await this.connection
            .getRepository<E>(ctx, entityType)
            .createQueryBuilder('locked')
            .setLock('pessimistic_write')
            .where('locked.id = :id', { id })
            .getOne();
        if (!entity) {
            throw new EntityNotFoundError(entityType.name, id);
        }
        return entity;
    }
}
