import gql from 'graphql-tag';

import {
    INVOICE_FRAGMENT,
    PAYMENT_FRAGMENT,
    SUBSCRIPTION_FRAGMENT,
    TASK_FRAGMENT,
    TENANT_FRAGMENT,
} from './fragments';

// --- Tenants ---

export const CREATE_TENANT = gql`
    mutation CreateTenant($input: RegisterTenantInput!) {
        createTenant(input: $input) {
            ...TenantFields
        }
    }
    ${TENANT_FRAGMENT}
`;

export const GET_TENANTS = gql`
    query GetTenants($options: TenantListOptions) {
        tenants(options: $options) {
            items {
                id
                slug
                status
            }
            totalItems
        }
    }
`;

export const GET_TENANT = gql`
    query GetTenant($id: ID!) {
        tenant(id: $id) {
            ...TenantFields
            storageUsedMb
        }
    }
    ${TENANT_FRAGMENT}
`;

export const GET_TENANT_BY_SLUG = gql`
    query GetTenantBySlug($slug: String!) {
        tenantBySlug(slug: $slug) {
            id
            slug
        }
    }
`;

export const APPROVE_TENANT = gql`
    mutation ApproveTenant($id: ID!, $notes: String) {
        approveTenant(id: $id, notes: $notes) {
            ...TenantFields
            approvedById
        }
    }
    ${TENANT_FRAGMENT}
`;

export const REJECT_TENANT = gql`
    mutation RejectTenant($id: ID!, $reason: String!) {
        rejectTenant(id: $id, reason: $reason) {
            ...TenantFields
        }
    }
    ${TENANT_FRAGMENT}
`;

export const SUSPEND_TENANT = gql`
    mutation SuspendTenant($id: ID!, $reason: String!) {
        suspendTenant(id: $id, reason: $reason) {
            ...TenantFields
        }
    }
    ${TENANT_FRAGMENT}
`;

export const REACTIVATE_TENANT = gql`
    mutation ReactivateTenant($id: ID!, $notes: String) {
        reactivateTenant(id: $id, notes: $notes) {
            ...TenantFields
        }
    }
    ${TENANT_FRAGMENT}
`;

export const GET_AUDIT_LOGS = gql`
    query GetAuditLogs($options: AuditLogListOptions) {
        auditLogs(options: $options) {
            items {
                id
                action
                severity
                outcome
                userId
                tenantId
                entityType
                fromState
                toState
                notes
                metadata
            }
            totalItems
        }
    }
`;

// --- Billing ---

export const CREATE_SUBSCRIPTION = gql`
    mutation CreateTenantSubscription($input: CreateTenantSubscriptionInput!) {
        createTenantSubscription(input: $input) {
            ...SubscriptionFields
        }
    }
    ${SUBSCRIPTION_FRAGMENT}
`;

export const GET_SUBSCRIPTION = gql`
    query GetTenantSubscription($id: ID!) {
        tenantSubscription(id: $id) {
            ...SubscriptionFields
        }
    }
    ${SUBSCRIPTION_FRAGMENT}
`;

export const GET_ACTIVE_SUBSCRIPTION = gql`
    query GetActiveTenantSubscription($tenantId: ID!) {
        activeTenantSubscription(tenantId: $tenantId) {
            ...SubscriptionFields
        }
    }
    ${SUBSCRIPTION_FRAGMENT}
`;

export const CANCEL_SUBSCRIPTION = gql`
    mutation CancelTenantSubscription($id: ID!, $reason: String) {
        cancelTenantSubscription(id: $id, reason: $reason) {
            ...SubscriptionFields
        }
    }
    ${SUBSCRIPTION_FRAGMENT}
`;

export const RENEW_SUBSCRIPTION = gql`
    mutation RenewTenantSubscription($id: ID!) {
        renewTenantSubscription(id: $id) {
            ...InvoiceFields
        }
    }
    ${INVOICE_FRAGMENT}
`;

export const SUBMIT_PAYMENT = gql`
    mutation SubmitSubscriptionPayment($input: SubmitSubscriptionPaymentInput!) {
        submitSubscriptionPayment(input: $input) {
            ...PaymentFields
        }
    }
    ${PAYMENT_FRAGMENT}
`;

export const VERIFY_PAYMENT = gql`
    mutation VerifySubscriptionPayment($id: ID!, $decision: VerificationDecision!, $notes: String) {
        verifySubscriptionPayment(id: $id, decision: $decision, notes: $notes) {
            ...PaymentFields
        }
    }
    ${PAYMENT_FRAGMENT}
`;

export const GET_PAYMENT = gql`
    query GetSubscriptionPayment($id: ID!) {
        subscriptionPayment(id: $id) {
            ...PaymentFields
        }
    }
    ${PAYMENT_FRAGMENT}
`;

export const CREATE_INVOICE = gql`
    mutation CreateSubscriptionInvoice($input: CreateSubscriptionInvoiceInput!) {
        createSubscriptionInvoice(input: $input) {
            ...InvoiceFields
        }
    }
    ${INVOICE_FRAGMENT}
`;

export const SEND_INVOICE = gql`
    mutation SendSubscriptionInvoice($id: ID!) {
        sendSubscriptionInvoice(id: $id) {
            ...InvoiceFields
        }
    }
    ${INVOICE_FRAGMENT}
`;

export const CANCEL_INVOICE = gql`
    mutation CancelSubscriptionInvoice($id: ID!, $reason: String) {
        cancelSubscriptionInvoice(id: $id, reason: $reason) {
            ...InvoiceFields
        }
    }
    ${INVOICE_FRAGMENT}
`;

export const GET_INVOICE = gql`
    query GetSubscriptionInvoice($id: ID!) {
        subscriptionInvoice(id: $id) {
            ...InvoiceFields
        }
    }
    ${INVOICE_FRAGMENT}
`;

export const RUN_EXPIRY_SWEEP = gql`
    mutation RunSubscriptionExpirySweep($asOf: DateTime) {
        runSubscriptionExpirySweep(asOf: $asOf) {
            asOf
            expiredSubscriptionIds
            overdueInvoiceIds
        }
    }
`;

export const GET_PLANS = gql`
    query GetSubscriptionPlans {
        subscriptionPlans {
            id
            code
        }
    }
`;

// --- Workspace & usage ---

export const CREATE_TEAM = gql`
    mutation CreateTeam($input: CreateTeamInput!) {
        createTeam(input: $input) {
            id
            tenantId
            name
            slug
        }
    }
`;

export const DELETE_TEAM = gql`
    mutation DeleteTeam($id: ID!) {
        deleteTeam(id: $id) {
            result
        }
    }
`;

export const GET_TEAMS = gql`
    query GetTeams($tenantId: ID!) {
        teams(tenantId: $tenantId) {
            items {
                id
                slug
            }
            totalItems
        }
    }
`;

export const CREATE_PROJECT = gql`
    mutation CreateProject($input: CreateProjectInput!) {
        createProject(input: $input) {
            id
            tenantId
            teamId
            name
        }
    }
`;

export const ADD_MEMBER = gql`
    mutation AddTenantMember($input: AddTenantMemberInput!) {
        addTenantMember(input: $input) {
            id
            tenantId
            userId
            emailAddress
            role
        }
    }
`;

export const CHECK_USAGE_LIMIT = gql`
    query CheckUsageLimit($tenantId: ID!, $resource: UsageResource!, $quantity: Int) {
        checkUsageLimit(tenantId: $tenantId, resource: $resource, quantity: $quantity) {
            allowed
            reason
            message
            resource
            used
            requested
            limit
        }
    }
`;

export const GET_TENANT_USAGE = gql`
    query GetTenantUsage($tenantId: ID!) {
        tenantUsage(tenantId: $tenantId) {
            tenantId
            planCode
            resources {
                resource
                used
                limit
                unlimited
            }
        }
    }
`;

export const TENANT_HAS_FEATURE = gql`
    query TenantHasFeature($tenantId: ID!, $feature: PlanFeature!) {
        tenantHasFeature(tenantId: $tenantId, feature: $feature)
    }
`;

export const RESERVE_STORAGE = gql`
    mutation ReserveTenantStorage($tenantId: ID!, $megabytes: Int!) {
        reserveTenantStorage(tenantId: $tenantId, megabytes: $megabytes) {
            id
            storageUsedMb
        }
    }
`;

export const RELEASE_STORAGE = gql`
    mutation ReleaseTenantStorage($tenantId: ID!, $megabytes: Int!) {
        releaseTenantStorage(tenantId: $tenantId, megabytes: $megabytes) {
            id
            storageUsedMb
        }
    }
`;

// --- Tasks ---

export const ADD_TEAM_MEMBER = gql`
    mutation AddTeamMember($input: AddTeamMemberInput!) {
        addTeamMember(input: $input) {
            id
            teamId
            tenantMemberId
            role
            tenantMember {
                emailAddress
            }
        }
    }
`;

export const UPDATE_TEAM_MEMBER = gql`
    mutation UpdateTeamMember($input: UpdateTeamMemberInput!) {
        updateTeamMember(input: $input) {
            id
            role
        }
    }
`;

export const REMOVE_TEAM_MEMBER = gql`
    mutation RemoveTeamMember($id: ID!) {
        removeTeamMember(id: $id) {
            result
        }
    }
`;

export const GET_TEAM_MEMBERS = gql`
    query GetTeamMembers($teamId: ID!) {
        teamMembers(teamId: $teamId) {
            items {
                id
                role
                tenantMember {
                    emailAddress
                }
            }
            totalItems
        }
    }
`;

export const CREATE_TASK = gql`
    mutation CreateTask($input: CreateTaskInput!) {
        createTask(input: $input) {
            ...TaskFields
        }
    }
    ${TASK_FRAGMENT}
`;

export const UPDATE_TASK = gql`
    mutation UpdateTask($input: UpdateTaskInput!) {
        updateTask(input: $input) {
            ...TaskFields
        }
    }
    ${TASK_FRAGMENT}
`;

export const DELETE_TASK = gql`
    mutation DeleteTask($id: ID!) {
        deleteTask(id: $id) {
            result
        }
    }
`;

export const GET_TASK = gql`
    query GetTask($id: ID!) {
        task(id: $id) {
            ...TaskFields
            subtasks {
                id
                title
                status
            }
        }
    }
    ${TASK_FRAGMENT}
`;

export const GET_TASKS = gql`
    query GetTasks($tenantId: ID!, $options: TaskListOptions) {
        tasks(tenantId: $tenantId, options: $options) {
            items {
                id
                title
                status
            }
            totalItems
        }
    }
`;

export const CREATE_TASK_LABEL = gql`
    mutation CreateTaskLabel($input: CreateTaskLabelInput!) {
        createTaskLabel(input: $input) {
            id
            tenantId
            name
            color
        }
    }
`;

export const GET_TASK_LABELS = gql`
    query GetTaskLabels($tenantId: ID!) {
        taskLabels(tenantId: $tenantId) {
            id
            name
        }
    }
`;

export const ADD_TASK_COMMENT = gql`
    mutation AddTaskComment($taskId: ID!, $content: String!) {
        addTaskComment(taskId: $taskId, content: $content) {
            id
            taskId
            authorId
            content
            isEdited
        }
    }
`;

export const UPDATE_TASK_COMMENT = gql`
    mutation UpdateTaskComment($id: ID!, $content: String!) {
        updateTaskComment(id: $id, content: $content) {
            id
            content
            isEdited
            editedAt
        }
    }
`;

export const DELETE_TASK_COMMENT = gql`
    mutation DeleteTaskComment($id: ID!) {
        deleteTaskComment(id: $id) {
            result
        }
    }
`;

export const GET_TASK_COMMENTS = gql`
    query GetTaskComments($taskId: ID!) {
        taskComments(taskId: $taskId) {
            id
            content
        }
    }
`;

// --- Vendure admin helpers ---

export const CREATE_ROLE = gql`
    mutation CreateRole($input: CreateRoleInput!) {
        createRole(input: $input) {
            id
            code
        }
    }
`;

export const CREATE_ADMINISTRATOR = gql`
    mutation CreateAdministrator($input: CreateAdministratorInput!) {
        createAdministrator(input: $input) {
            id
            user {
                id
                identifier
            }
        }
    }
`;
