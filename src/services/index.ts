/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// PlanService
export type {
  PlanService,
  PlanServiceDb,
  PlanServiceAudit,
  PlanInsertResult,
} from './plan.service.js';
export { createPlanService } from './plan.service.js';
export { createPlanServiceDb } from './plan.db.js';
export { DEFAULT_PLANS } from './plan.defaults.js';

// SubscriptionService
export type {
  SubscriptionService,
  SubscriptionServiceDb,
  SubscriptionServiceAudit,
  UpgradeOutcome,
} from './subscription.service.js';
export {
  createSubscriptionService,
  selectActiveSubscription,
  MAX_WRITE_ATTEMPTS,
} from './subscription.service.js';
export {
  createSubscriptionServiceDb,
  createHistoryServiceDb,
} from './subscription.db.js';

// HistoryService
export type { HistoryService, HistoryServiceDb } from './history.service.js';
export { createHistoryService } from './history.service.js';

// UserService
export type {
  UserService,
  UserServiceDb,
  UserServiceIdentity,
  UserServiceAudit,
} from './user.service.js';
export { createUserService } from './user.service.js';
export { createUserServiceDb, createUserServiceIdentity } from './user.db.js';
