/**
 * Actor Types
 * Who is performing an action, as resolved from the bearer token
 */

/**
 * Role claim carried in the access token (app_metadata.role)
 */
export const USER_ROLES = ['user', 'admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];

/**
 * Actor Context - every service method receives this
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'anonymous';
  userId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}

/**
 * System actor for startup tasks (plan seeding, admin bootstrap)
 */
export const SYSTEM_ACTOR: ActorContext = {
  type: 'system',
  requestId: 'system',
};
