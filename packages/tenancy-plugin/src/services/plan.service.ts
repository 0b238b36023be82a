import { Inject, Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ID } from '@vendure/common/lib/shared-types';
import {
    Logger,
    RequestContext,
    TransactionalConnection,
    UserInputError,
} from '@vendure/core';
import { In } from 'typeorm';

import { ConflictError } from '../common/errors';
import { UNLIMITED } from '../common/usage-limits';
import { TENANCY_PLUGIN_OPTIONS } from '../constants';
import {
    BillingInterval,
    PlanFeatures,
    SubscriptionPlan,
    SubscriptionStatus,
    TenantSubscription,
} from '../entities';
import { PlanDefinition, ResolvedTenancyPluginOptions } from '../types';

import { AuditService } from './audit.service';

const loggerCtx = 'PlanService';

export const defaultPlanFeatures: PlanFeatures = {
    advancedReports: false,
    prioritySupport: false,
    apiAccess: false,
    customBranding: false,
    sso: false,
    auditLogs: false,
};

export function isPlanFeature(value: string): value is keyof PlanFeatures {
    return value in defaultPlanFeatures;
}

export interface CreatePlanInput extends PlanDefinition {
    isActive?: boolean | null;
}

export interface UpdatePlanInput {
    id: ID;
    name?: string | null;
    description?: string | null;
    price?: number | null;
    currencyCode?: string | null;
    billingInterval?: BillingInterval | null;
    maxUsers?: number | null;
    maxTeams?: number | null;
    maxProjects?: number | null;
    maxStorageGb?: number | null;
    features?: Partial<PlanFeatures> | null;
    trialDays?: number | null;
    isActive?: boolean | null;
    sortOrder?: number | null;
    /**
     * Required to change pricing or limits of a plan that live subscriptions use.
     */
    administrativeCorrection?: boolean | null;
}

/**
 * Fields that define what a subscriber pays for. Changing them on a plan in use
 * is an administrative correction.
 */
const termsFields = [
    'price',
    'currencyCode',
    'billingInterval',
    'maxUsers',
    'maxTeams',
    'maxProjects',
    'maxStorageGb',
    'trialDays',
] as const;

/**
 * The subscription plan catalog.
 *
 * Plans listed in the plugin options are inserted on bootstrap when the table
 * is empty; after that the catalog is managed through the Admin API.
 */
@Injectable()
export class PlanService implements OnApplicationBootstrap {
    constructor(
        private connection: TransactionalConnection,
        private auditService: AuditService,
        @Inject(TENANCY_PLUGIN_OPTIONS) private options: ResolvedTenancyPluginOptions,
    ) {}

    async onApplicationBootstrap() {
        await this.seedPlans();
    }

    async seedPlans(): Promise<number> {
        const repo = this.connection.rawConnection.getRepository(SubscriptionPlan);
        if (!this.options.plans.length || (await repo.count()) > 0) {
            return 0;
        }
        for (const [index, definition] of this.options.plans.entries()) {
            validatePlanNumbers(definition);
            await repo.save(this.buildPlan({ sortOrder: index, ...definition }));
        }
        Logger.info(`Seeded ${this.options.plans.length} subscription plans`, loggerCtx);
        return this.options.plans.length;
    }

    async findAll(ctx: RequestContext, options?: { includeInactive?: boolean }): Promise<SubscriptionPlan[]> {
        return this.connection.getRepository(ctx, SubscriptionPlan).find({
            where: options?.includeInactive ? {} : { isActive: true },
            order: { sortOrder: 'ASC', price: 'ASC' },
        });
    }

    async findOne(ctx: RequestContext, id: ID): Promise<SubscriptionPlan | undefined> {
        const plan = await this.connection.getRepository(ctx, SubscriptionPlan).findOne({ where: { id } });
        return plan ?? undefined;
    }

    async findByCode(ctx: RequestContext, code: string): Promise<SubscriptionPlan | undefined> {
        const plan = await this.connection.getRepository(ctx, SubscriptionPlan).findOne({ where: { code } });
        return plan ?? undefined;
    }

    async create(ctx: RequestContext, input: CreatePlanInput): Promise<SubscriptionPlan> {
        validatePlanNumbers(input);
        if (await this.findByCode(ctx, input.code)) {
            throw new UserInputError(`Subscription plan with code "${input.code}" already exists`);
        }
        const plan = await this.connection.getRepository(ctx, SubscriptionPlan).save(this.buildPlan(input));
        await this.auditService.log(ctx, {
            action: 'PLAN_CREATED',
            severity: 'INFO',
            entityType: 'SubscriptionPlan',
            entityId: plan.id,
            metadata: { code: plan.code, price: plan.price, billingInterval: plan.billingInterval },
        });
        return plan;
    }

    /**
     * Pricing and limits of a plan referenced by a TRIAL or ACTIVE subscription
     * can only change with `administrativeCorrection` set.
     */
    async update(ctx: RequestContext, input: UpdatePlanInput): Promise<SubscriptionPlan> {
        const plan = await this.connection.getEntityOrThrow(ctx, SubscriptionPlan, input.id);
        const changedTerms = termsFields.filter(field => input[field] != null && input[field] !== plan[field]);

        if (changedTerms.length && !input.administrativeCorrection) {
            const inUse = await this.countLiveSubscriptions(ctx, plan.id);
            if (inUse > 0) {
                throw new ConflictError(
                    `Plan "${plan.code}" is used by ${inUse} live subscriptions. Changing ${changedTerms.join(', ')} requires an administrative correction`,
                    { code: plan.code, inUse },
                );
            }
        }

        if (input.name != null) plan.name = input.name;
        if (input.description != null) plan.description = input.description;
        if (input.price != null) plan.price = input.price;
        if (input.currencyCode != null) plan.currencyCode = input.currencyCode;
        if (input.billingInterval != null) plan.billingInterval = input.billingInterval;
        if (input.maxUsers != null) plan.maxUsers = input.maxUsers;
        if (input.maxTeams != null) plan.maxTeams = input.maxTeams;
        if (input.maxProjects != null) plan.maxProjects = input.maxProjects;
        if (input.maxStorageGb != null) plan.maxStorageGb = input.maxStorageGb;
        if (input.features != null) plan.features = { ...plan.features, ...input.features };
        if (input.trialDays != null) plan.trialDays = input.trialDays;
        if (input.isActive != null) plan.isActive = input.isActive;
        if (input.sortOrder != null) plan.sortOrder = input.sortOrder;
        validatePlanNumbers(plan);

        const saved = await this.connection.getRepository(ctx, SubscriptionPlan).save(plan);
        await this.auditService.log(ctx, {
            action: input.administrativeCorrection ? 'PLAN_CORRECTED' : 'PLAN_UPDATED',
            severity: input.administrativeCorrection ? 'WARN' : 'INFO',
            entityType: 'SubscriptionPlan',
            entityId: saved.id,
            metadata: { code: saved.code, changedTerms: [...changedTerms] },
        });
        return saved;
    }

    async countLiveSubscriptions(ctx: RequestContext, planId: ID): Promise<number> {
        return this.connection.getRepository(ctx, TenantSubscription).count({
            where: { planId, status: In([SubscriptionStatus.TRIAL, SubscriptionStatus.ACTIVE]) },
        });
    }

    private buildPlan(input: CreatePlanInput): SubscriptionPlan {
        return new SubscriptionPlan({
            code: input.code,
            name: input.name,
            description: input.description ?? '',
            price: input.price,
            currencyCode: input.currencyCode ?? 'USD',
            billingInterval: input.billingInterval,
            maxUsers: input.maxUsers,
            maxTeams: input.maxTeams,
            maxProjects: input.maxProjects,
            maxStorageGb: input.maxStorageGb,
            features: { ...defaultPlanFeatures, ...input.features },
            trialDays: input.trialDays ?? 0,
            isActive: input.isActive ?? true,
            sortOrder: input.sortOrder ?? 0,
        });
    }
}

function validatePlanNumbers(plan: {
    code: string;
    price: number;
    maxUsers: number;
    maxTeams: number;
    maxProjects: number;
    maxStorageGb: number;
    trialDays?: number | null;
}): void {
    if (!Number.isInteger(plan.price) || plan.price < 0) {
        throw new UserInputError(`Price of plan "${plan.code}" must be a non-negative integer`);
    }
    const limits = {
        maxUsers: plan.maxUsers,
        maxTeams: plan.maxTeams,
        maxProjects: plan.maxProjects,
        maxStorageGb: plan.maxStorageGb,
    };
    for (const [name, value] of Object.entries(limits)) {
        if (!Number.isInteger(value) || (value < 0 && value !== UNLIMITED)) {
            throw new UserInputError(`${name} of plan "${plan.code}" must be ${UNLIMITED} or a non-negative integer`);
        }
    }
    if (plan.trialDays != null && (!Number.isInteger(plan.trialDays) || plan.trialDays < 0)) {
        throw new UserInputError(`trialDays of plan "${plan.code}" must be a non-negative integer`);
    }
}
