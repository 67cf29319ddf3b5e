/**
 * Admin Middleware
 * Runs after the auth middleware; rejects actors without the admin role claim
 */

import type { Context, Next } from 'hono';

import type { ActorContext } from '@/types/index.js';

/**
 * Admin middleware - verifies the actor is an admin
 */
export function createAdminMiddleware() {
  return async function adminMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId: string = actor?.requestId ?? c.get('requestId') ?? 'unknown';

    if (actor === undefined || actor.userId === undefined) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required',
            requestId,
          },
        },
        401
      );
    }

    if (actor.type !== 'admin') {
      return c.json(
        {
          error: {
            code: 'FORBIDDEN',
            message: 'Admin access required',
            requestId,
          },
        },
        403
      );
    }

    await next();
  };
}
