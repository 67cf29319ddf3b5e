/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type {
  HistoryService,
  PlanService,
  SubscriptionService,
  UserService,
} from '@/services/index.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500;

/**
 * Error code to HTTP status mapping.
 * The single-active conflicts are business rejections of the request (400);
 * uniqueness conflicts are 409.
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  ALREADY_EXISTS: 409,
  ACTIVE_SUBSCRIPTION_EXISTS: 400,
  ALREADY_SUBSCRIBED: 400,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: ErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}

/**
 * Services the HTTP layer dispatches to
 */
export interface ApiServices {
  planService: PlanService;
  subscriptionService: SubscriptionService;
  historyService: HistoryService;
  userService: UserService;
}
