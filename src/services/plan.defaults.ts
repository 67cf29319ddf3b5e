/**
 * Default plan tiers, inserted in this order into an empty catalog
 */

import type { CreatePlanParams } from '@/types/index.js';

export const DEFAULT_PLANS: readonly Required<CreatePlanParams>[] = [
  {
    name: 'Sandbox',
    price: 0,
    description: 'Basic access with limited features',
    features: [
      'Access to basic content',
      '500 API calls per day',
      'No premium features',
    ],
  },
  {
    name: 'Startup',
    price: 15,
    description: 'Standard access with more features',
    features: [
      'All Free features',
      '1 Million API calls',
      'Standard support',
    ],
  },
  {
    name: 'Pro',
    price: 100,
    description: 'Full access with all features',
    features: [
      'All Startup features',
      'Unlimited API calls',
      'Standard support',
      'Advanced analytics',
    ],
  },
  {
    name: 'Enterprise',
    price: 300,
    description: 'Full access with all features',
    features: [
      'All Pro features',
      'Unlimited API calls',
      'Priority support',
      'Advanced analytics',
      'BYOC',
    ],
  },
];
