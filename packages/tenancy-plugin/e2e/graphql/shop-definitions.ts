import gql from 'graphql-tag';

import { TENANT_FRAGMENT } from './fragments';

export const REGISTER_TENANT = gql`
    mutation RegisterTenant($input: RegisterTenantInput!) {
        registerTenant(input: $input) {
            ...TenantFields
        }
    }
    ${TENANT_FRAGMENT}
`;

export const SHOP_SUBSCRIPTION_PLANS = gql`
    query ShopSubscriptionPlans {
        subscriptionPlans {
            id
            code
            price
            maxTeams
            features {
                apiAccess
            }
        }
    }
`;
