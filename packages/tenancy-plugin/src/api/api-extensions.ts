import { gql } from 'graphql-tag';

/**
 * Types shared between the Admin and Shop APIs.
 */
const commonApiExtensions = gql`
    enum TenantStatus {
        PENDING
        ACTIVE
        SUSPENDED
        REJECTED
    }

    enum BillingInterval {
        MONTHLY
        QUARTERLY
        YEARLY
    }

    type PlanFeatures {
        advancedReports: Boolean!
        prioritySupport: Boolean!
        apiAccess: Boolean!
        customBranding: Boolean!
        sso: Boolean!
        auditLogs: Boolean!
    }

    type SubscriptionPlan implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        code: String!
        name: String!
        description: String!
        price: Money!
        currencyCode: String!
        billingInterval: BillingInterval!
        "-1 means unlimited"
        maxUsers: Int!
        maxTeams: Int!
        maxProjects: Int!
        maxStorageGb: Int!
        features: PlanFeatures!
        trialDays: Int!
        isActive: Boolean!
        sortOrder: Int!
    }

    type Tenant implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        name: String!
        slug: String!
        companyName: String!
        companyEmail: String!
        companyPhone: String
        status: TenantStatus!
        isApproved: Boolean!
        approvedAt: DateTime
        rejectedAt: DateTime
        suspendedAt: DateTime
        statusReason: String
    }

    input RegisterTenantInput {
        name: String!
        slug: String
        companyName: String!
        companyEmail: String!
        companyPhone: String
    }
`;

/**
 * Admin API extensions: tenant lifecycle, billing, workspace resources and audit.
 */
export const adminApiExtensions = gql`
    ${commonApiExtensions}

    enum SubscriptionStatus {
        TRIAL
        ACTIVE
        EXPIRED
        CANCELLED
    }

    enum SubscriptionPaymentMethod {
        CARD
        BANK_TRANSFER
        PAYPAL
        MANUAL
        OTHER
    }

    enum SubscriptionPaymentStatus {
        PENDING
        COMPLETED
        FAILED
    }

    enum PaymentVerificationStatus {
        PENDING
        APPROVED
        REJECTED
    }

    enum VerificationDecision {
        APPROVE
        REJECT
    }

    enum InvoiceStatus {
        DRAFT
        SENT
        PAID
        OVERDUE
        CANCELLED
    }

    enum InvoiceKind {
        MANUAL
        RENEWAL
    }

    enum TenantMemberRole {
        TENANT_ADMIN
        MANAGER
        MEMBER
    }

    enum UsageResource {
        USERS
        TEAMS
        PROJECTS
        "Counted in MB"
        STORAGE
    }

    enum UsageDenialReason {
        TENANT_NOT_ACTIVE
        NO_ACTIVE_PLAN
        LIMIT_REACHED
    }

    enum PlanFeature {
        advancedReports
        prioritySupport
        apiAccess
        customBranding
        sso
        auditLogs
    }

    extend type Tenant {
        approvedById: ID
        storageUsedMb: Int!
        config: JSON!
        notes: String
    }

    type TenantList implements PaginatedList {
        items: [Tenant!]!
        totalItems: Int!
    }

    input TenantListOptions {
        take: Int
        skip: Int
        status: TenantStatus
    }

    input UpdateTenantInput {
        id: ID!
        name: String
        companyName: String
        companyEmail: String
        companyPhone: String
        config: JSON
        notes: String
    }

    input PlanFeaturesInput {
        advancedReports: Boolean
        prioritySupport: Boolean
        apiAccess: Boolean
        customBranding: Boolean
        sso: Boolean
        auditLogs: Boolean
    }

    input CreateSubscriptionPlanInput {
        code: String!
        name: String!
        description: String
        price: Money!
        currencyCode: String
        billingInterval: BillingInterval!
        maxUsers: Int!
        maxTeams: Int!
        maxProjects: Int!
        maxStorageGb: Int!
        features: PlanFeaturesInput
        trialDays: Int
        isActive: Boolean
        sortOrder: Int
    }

    input UpdateSubscriptionPlanInput {
        id: ID!
        name: String
        description: String
        price: Money
        currencyCode: String
        billingInterval: BillingInterval
        maxUsers: Int
        maxTeams: Int
        maxProjects: Int
        maxStorageGb: Int
        features: PlanFeaturesInput
        trialDays: Int
        isActive: Boolean
        sortOrder: Int
        "Required to change pricing or limits of a plan with live subscriptions"
        administrativeCorrection: Boolean
    }

    type TenantSubscription implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        tenant: Tenant!
        planId: ID!
        plan: SubscriptionPlan!
        status: SubscriptionStatus!
        billingInterval: BillingInterval!
        startsAt: DateTime!
        currentPeriodStart: DateTime!
        endsAt: DateTime!
        trialEndsAt: DateTime
        autoRenew: Boolean!
        cancelledAt: DateTime
        cancellationReason: String
    }

    type TenantSubscriptionList implements PaginatedList {
        items: [TenantSubscription!]!
        totalItems: Int!
    }

    input TenantSubscriptionListOptions {
        take: Int
        skip: Int
        tenantId: ID
        status: SubscriptionStatus
    }

    input CreateTenantSubscriptionInput {
        tenantId: ID!
        planId: ID!
        autoRenew: Boolean
    }

    type SubscriptionPayment implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        subscriptionId: ID!
        tenantId: ID!
        invoiceId: ID
        amount: Money!
        currencyCode: String!
        method: SubscriptionPaymentMethod!
        proofReference: String
        status: SubscriptionPaymentStatus!
        verificationStatus: PaymentVerificationStatus!
        verifiedById: ID
        verifiedAt: DateTime
        verificationNotes: String
        paidAt: DateTime
    }

    type SubscriptionPaymentList implements PaginatedList {
        items: [SubscriptionPayment!]!
        totalItems: Int!
    }

    input SubscriptionPaymentListOptions {
        take: Int
        skip: Int
        tenantId: ID
        subscriptionId: ID
        verificationStatus: PaymentVerificationStatus
    }

    input SubmitSubscriptionPaymentInput {
        subscriptionId: ID!
        amount: Money!
        method: SubscriptionPaymentMethod!
        proofReference: String
        invoiceId: ID
    }

    type SubscriptionInvoiceItem implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        description: String!
        quantity: Float!
        unitPrice: Money!
        amount: Money!
    }

    type SubscriptionInvoice implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        invoiceNumber: String!
        subscriptionId: ID!
        tenantId: ID!
        kind: InvoiceKind!
        status: InvoiceStatus!
        currencyCode: String!
        subtotal: Money!
        taxRate: Float!
        taxAmount: Money!
        discountAmount: Money!
        total: Money!
        issuedAt: DateTime!
        dueAt: DateTime!
        paidAt: DateTime
        paymentId: ID
        notes: String
        items: [SubscriptionInvoiceItem!]!
    }

    type SubscriptionInvoiceList implements PaginatedList {
        items: [SubscriptionInvoice!]!
        totalItems: Int!
    }

    input SubscriptionInvoiceListOptions {
        take: Int
        skip: Int
        tenantId: ID
        subscriptionId: ID
        status: InvoiceStatus
    }

    input SubscriptionInvoiceItemInput {
        description: String!
        quantity: Float!
        unitPrice: Money!
    }

    input CreateSubscriptionInvoiceInput {
        subscriptionId: ID!
        items: [SubscriptionInvoiceItemInput!]!
        taxRate: Float
        discountAmount: Money
        dueInDays: Int
        notes: String
    }

    type Team implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        name: String!
        slug: String!
        description: String!
        isPrivate: Boolean!
        color: String!
    }

    type TeamList implements PaginatedList {
        items: [Team!]!
        totalItems: Int!
    }

    input CreateTeamInput {
        tenantId: ID!
        name: String!
        slug: String
        description: String
        isPrivate: Boolean
        color: String
    }

    input UpdateTeamInput {
        id: ID!
        name: String
        description: String
        isPrivate: Boolean
        color: String
    }

    type Project implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        teamId: ID
        name: String!
        description: String!
        isArchived: Boolean!
    }

    type ProjectList implements PaginatedList {
        items: [Project!]!
        totalItems: Int!
    }

    input CreateProjectInput {
        tenantId: ID!
        name: String!
        description: String
        teamId: ID
    }

    input UpdateProjectInput {
        id: ID!
        name: String
        description: String
        teamId: ID
        isArchived: Boolean
    }

    type TenantMember implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        userId: ID
        emailAddress: String!
        firstName: String!
        lastName: String!
        role: TenantMemberRole!
    }

    type TenantMemberList implements PaginatedList {
        items: [TenantMember!]!
        totalItems: Int!
    }

    input AddTenantMemberInput {
        tenantId: ID!
        emailAddress: String!
        firstName: String
        lastName: String
        role: TenantMemberRole
        userId: ID
    }

    input UpdateTenantMemberInput {
        id: ID!
        firstName: String
        lastName: String
        role: TenantMemberRole
        userId: ID
    }

    input WorkspaceListOptions {
        take: Int
        skip: Int
    }

    enum TeamMemberRole {
        OWNER
        ADMIN
        MEMBER
    }

    type TeamMember implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        teamId: ID!
        tenantId: ID!
        tenantMemberId: ID!
        tenantMember: TenantMember!
        role: TeamMemberRole!
    }

    type TeamMemberList implements PaginatedList {
        items: [TeamMember!]!
        totalItems: Int!
    }

    input AddTeamMemberInput {
        teamId: ID!
        tenantMemberId: ID!
        role: TeamMemberRole
    }

    input UpdateTeamMemberInput {
        id: ID!
        role: TeamMemberRole!
    }

    enum TaskStatus {
        TODO
        IN_PROGRESS
        IN_REVIEW
        COMPLETED
        CANCELLED
    }

    enum TaskPriority {
        LOW
        MEDIUM
        HIGH
        URGENT
    }

    type TaskLabel implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        name: String!
        color: String!
        description: String!
    }

    type Task implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        tenantId: ID!
        teamId: ID
        parentTaskId: ID
        title: String!
        description: String!
        status: TaskStatus!
        priority: TaskPriority!
        createdById: ID
        assigneeId: ID
        startDate: DateTime
        dueDate: DateTime
        completedAt: DateTime
        position: Int!
        estimatedHours: Float
        actualHours: Float
        labels: [TaskLabel!]!
        subtasks: [Task!]!
        "Share of completed subtasks, or 0/100 from the task's own status when it has none"
        progress: Int!
        isOverdue: Boolean!
        commentCount: Int!
    }

    type TaskList implements PaginatedList {
        items: [Task!]!
        totalItems: Int!
    }

    input TaskListOptions {
        take: Int
        skip: Int
        status: TaskStatus
        priority: TaskPriority
        teamId: ID
        assigneeId: ID
        unassigned: Boolean
        search: String
        overdue: Boolean
        topLevel: Boolean
    }

    input CreateTaskInput {
        tenantId: ID!
        title: String!
        description: String
        teamId: ID
        parentTaskId: ID
        status: TaskStatus
        priority: TaskPriority
        assigneeId: ID
        startDate: DateTime
        dueDate: DateTime
        position: Int
        estimatedHours: Float
        labelIds: [ID!]
    }

    input UpdateTaskInput {
        id: ID!
        title: String
        description: String
        teamId: ID
        status: TaskStatus
        priority: TaskPriority
        assigneeId: ID
        startDate: DateTime
        dueDate: DateTime
        position: Int
        estimatedHours: Float
        actualHours: Float
        labelIds: [ID!]
    }

    input CreateTaskLabelInput {
        tenantId: ID!
        name: String!
        color: String
        description: String
    }

    type TaskComment implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        taskId: ID!
        authorId: ID
        content: String!
        isEdited: Boolean!
        editedAt: DateTime
    }

    type UsageCheckResult {
        allowed: Boolean!
        reason: UsageDenialReason
        message: String
        resource: UsageResource!
        used: Int!
        requested: Int!
        "-1 means unlimited, 0 when the tenant is not active or has no live plan"
        limit: Int!
    }

    type ResourceUsage {
        resource: UsageResource!
        used: Int!
        limit: Int!
        unlimited: Boolean!
    }

    type TenantUsage {
        tenantId: ID!
        planCode: String
        subscriptionId: ID
        resources: [ResourceUsage!]!
    }

    type AuditLog implements Node {
        id: ID!
        createdAt: DateTime!
        updatedAt: DateTime!
        action: String!
        severity: String!
        outcome: String!
        userId: ID
        tenantId: ID
        entityType: String
        entityId: String
        fromState: String
        toState: String
        notes: String
        metadata: JSON!
        ipAddress: String
    }

    type AuditLogList implements PaginatedList {
        items: [AuditLog!]!
        totalItems: Int!
    }

    input AuditLogListOptions {
        take: Int
        skip: Int
        action: String
        severity: String
        outcome: String
        tenantId: ID
        entityType: String
        entityId: ID
    }

    type ExpirySweepResult {
        asOf: DateTime!
        expiredSubscriptionIds: [ID!]!
        overdueInvoiceIds: [ID!]!
    }

    extend type Query {
        tenants(options: TenantListOptions): TenantList!
        tenant(id: ID!): Tenant
        tenantBySlug(slug: String!): Tenant
        auditLogs(options: AuditLogListOptions): AuditLogList!

        subscriptionPlans(includeInactive: Boolean): [SubscriptionPlan!]!
        subscriptionPlan(id: ID!): SubscriptionPlan
        tenantSubscriptions(options: TenantSubscriptionListOptions): TenantSubscriptionList!
        tenantSubscription(id: ID!): TenantSubscription
        "The subscription whose plan currently applies to the tenant"
        activeTenantSubscription(tenantId: ID!): TenantSubscription

        subscriptionPayments(options: SubscriptionPaymentListOptions): SubscriptionPaymentList!
        subscriptionPayment(id: ID!): SubscriptionPayment
        subscriptionInvoices(options: SubscriptionInvoiceListOptions): SubscriptionInvoiceList!
        subscriptionInvoice(id: ID!): SubscriptionInvoice

        teams(tenantId: ID!, options: WorkspaceListOptions): TeamList!
        projects(tenantId: ID!, options: WorkspaceListOptions): ProjectList!
        tenantMembers(tenantId: ID!, options: WorkspaceListOptions): TenantMemberList!
        teamMembers(teamId: ID!, options: WorkspaceListOptions): TeamMemberList!
        tasks(tenantId: ID!, options: TaskListOptions): TaskList!
        task(id: ID!): Task
        taskLabels(tenantId: ID!): [TaskLabel!]!
        taskComments(taskId: ID!): [TaskComment!]!
        checkUsageLimit(tenantId: ID!, resource: UsageResource!, quantity: Int): UsageCheckResult!
        tenantUsage(tenantId: ID!): TenantUsage!
        tenantHasFeature(tenantId: ID!, feature: PlanFeature!): Boolean!
    }

    extend type Mutation {
        createTenant(input: RegisterTenantInput!): Tenant!
        updateTenant(input: UpdateTenantInput!): Tenant!
        approveTenant(id: ID!, notes: String): Tenant!
        rejectTenant(id: ID!, reason: String!): Tenant!
        suspendTenant(id: ID!, reason: String!): Tenant!
        reactivateTenant(id: ID!, notes: String): Tenant!

        createSubscriptionPlan(input: CreateSubscriptionPlanInput!): SubscriptionPlan!
        updateSubscriptionPlan(input: UpdateSubscriptionPlanInput!): SubscriptionPlan!
        createTenantSubscription(input: CreateTenantSubscriptionInput!): TenantSubscription!
        cancelTenantSubscription(id: ID!, reason: String): TenantSubscription!
        setTenantSubscriptionAutoRenew(id: ID!, autoRenew: Boolean!): TenantSubscription!
        "Issues the renewal invoice; the period is extended once it is paid"
        renewTenantSubscription(id: ID!): SubscriptionInvoice!

        submitSubscriptionPayment(input: SubmitSubscriptionPaymentInput!): SubscriptionPayment!
        verifySubscriptionPayment(id: ID!, decision: VerificationDecision!, notes: String): SubscriptionPayment!
        createSubscriptionInvoice(input: CreateSubscriptionInvoiceInput!): SubscriptionInvoice!
        sendSubscriptionInvoice(id: ID!): SubscriptionInvoice!
        cancelSubscriptionInvoice(id: ID!, reason: String): SubscriptionInvoice!
        settleSubscriptionInvoice(id: ID!, notes: String): SubscriptionInvoice!

        createTeam(input: CreateTeamInput!): Team!
        updateTeam(input: UpdateTeamInput!): Team!
        deleteTeam(id: ID!): DeletionResponse!
        createProject(input: CreateProjectInput!): Project!
        updateProject(input: UpdateProjectInput!): Project!
        deleteProject(id: ID!): DeletionResponse!
        addTenantMember(input: AddTenantMemberInput!): TenantMember!
        updateTenantMember(input: UpdateTenantMemberInput!): TenantMember!
        removeTenantMember(id: ID!): DeletionResponse!
        addTeamMember(input: AddTeamMemberInput!): TeamMember!
        updateTeamMember(input: UpdateTeamMemberInput!): TeamMember!
        removeTeamMember(id: ID!): DeletionResponse!
        createTask(input: CreateTaskInput!): Task!
        updateTask(input: UpdateTaskInput!): Task!
        deleteTask(id: ID!): DeletionResponse!
        createTaskLabel(input: CreateTaskLabelInput!): TaskLabel!
        deleteTaskLabel(id: ID!): DeletionResponse!
        addTaskComment(taskId: ID!, content: String!): TaskComment!
        updateTaskComment(id: ID!, content: String!): TaskComment!
        deleteTaskComment(id: ID!): DeletionResponse!
        reserveTenantStorage(tenantId: ID!, megabytes: Int!): Tenant!
        releaseTenantStorage(tenantId: ID!, megabytes: Int!): Tenant!

        "Runs the expiry sweep now. asOf defaults to the current time."
        runSubscriptionExpirySweep(asOf: DateTime): ExpirySweepResult!
        queueSubscriptionExpirySweep(asOf: DateTime): Boolean!
    }
`;

/**
 * Shop API extensions: public plan catalog and tenant signup.
 */
export const shopApiExtensions = gql`
    ${commonApiExtensions}

    extend type Query {
        subscriptionPlans: [SubscriptionPlan!]!
    }

    extend type Mutation {
        "Creates a PENDING tenant. Disabled when allowSelfSignup is false."
        registerTenant(input: RegisterTenantInput!): Tenant!
    }
`;
