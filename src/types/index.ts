/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { ActorContext, UserRole } from './auth.js';
export { SYSTEM_ACTOR, USER_ROLES } from './auth.js';
export type { PageParams } from './pagination.js';
export {
  DEFAULT_PER_PAGE,
  MAX_PER_PAGE,
  MAX_PAGE,
  MAX_PAGE_OFFSET,
  normalizePageParams,
  pageOffset,
  countPages,
} from './pagination.js';
export type { AuditEvent, AuditLogEntry } from './audit.js';
export type {
  User,
  RegisterUserParams,
  LoginParams,
  AuthSession,
  EnsureAdminParams,
} from './user.js';
export type { Plan, CreatePlanParams } from './plan.js';
export {
  FEATURE_SEPARATOR,
  MAX_PLAN_PRICE,
  hasCentPrecision,
  parseFeatureList,
  serializeFeatureList,
} from './plan.js';
export type {
  LedgerEntry,
  SubscriptionDetail,
  SubscriptionHistoryItem,
  SubscriptionHistoryPage,
  SubscriptionReceipt,
  SubscribeParams,
  LedgerInsertParams,
  LedgerWriteResult,
} from './subscription.js';
export {
  SUBSCRIPTION_BLOCK_DAYS,
  DEFAULT_DURATION_MONTHS,
  MAX_DURATION_MONTHS,
  computeEndDate,
  isSubscriptionExpired,
  isSubscriptionActive,
} from './subscription.js';
