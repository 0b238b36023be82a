import { Args, Mutation, Query, Resolver } from '@nestjs/graphql';
import { ID } from '@vendure/common/lib/shared-types';
import { Allow, Ctx, Permission, RequestContext } from '@vendure/core';

import { manageBillingPermission, verifyPaymentPermission } from '../constants';
import { VerificationDecision } from '../entities';
import { CreateInvoiceInput, InvoiceListOptions, InvoiceService } from '../services/invoice.service';
import {
    PaymentListOptions,
    PaymentVerificationService,
    SubmitPaymentInput,
} from '../services/payment-verification.service';
import { SubscriptionRenewalService } from '../services/subscription-renewal.service';

/**
 * Admin API resolver for subscription payments and invoices.
 */
@Resolver()
export class PaymentAdminResolver {
    constructor(
        private paymentService: PaymentVerificationService,
        private invoiceService: InvoiceService,
        private renewalService: SubscriptionRenewalService,
    ) {}

    @Query()
    @Allow(verifyPaymentPermission.Permission, manageBillingPermission.Permission)
    async subscriptionPayments(@Ctx() ctx: RequestContext, @Args() args: { options?: PaymentListOptions | null }) {
        return this.paymentService.findAll(ctx, args.options);
    }

    @Query()
    @Allow(verifyPaymentPermission.Permission, manageBillingPermission.Permission)
    async subscriptionPayment(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.paymentService.findOne(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async submitSubscriptionPayment(@Ctx() ctx: RequestContext, @Args() args: { input: SubmitPaymentInput }) {
        return this.paymentService.submit(ctx, args.input);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async verifySubscriptionPayment(
        @Ctx() ctx: RequestContext,
        @Args() args: { id: ID; decision: VerificationDecision; notes?: string | null },
    ) {
        return this.paymentService.verify(ctx, args.id, args.decision, args.notes);
    }

    @Query()
    @Allow(manageBillingPermission.Permission, verifyPaymentPermission.Permission)
    async subscriptionInvoices(@Ctx() ctx: RequestContext, @Args() args: { options?: InvoiceListOptions | null }) {
        return this.invoiceService.findAll(ctx, args.options);
    }

    @Query()
    @Allow(manageBillingPermission.Permission, verifyPaymentPermission.Permission)
    async subscriptionInvoice(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.invoiceService.findOne(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async createSubscriptionInvoice(@Ctx() ctx: RequestContext, @Args() args: { input: CreateInvoiceInput }) {
        return this.invoiceService.create(ctx, args.input);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async sendSubscriptionInvoice(@Ctx() ctx: RequestContext, @Args() args: { id: ID }) {
        return this.invoiceService.send(ctx, args.id);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async cancelSubscriptionInvoice(@Ctx() ctx: RequestContext, @Args() args: { id: ID; reason?: string | null }) {
        return this.invoiceService.cancel(ctx, args.id, args.reason);
    }

    @Mutation()
    @Allow(Permission.Authenticated)
    async settleSubscriptionInvoice(@Ctx() ctx: RequestContext, @Args() args: { id: ID; notes?: string | null }) {
        return this.renewalService.settleInvoice(ctx, args.id, args.notes);
    }
}
