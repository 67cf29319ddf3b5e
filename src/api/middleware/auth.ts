/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase access token
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type { ActorContext, UserRole } from '@/types/index.js';
import { USER_ROLES } from '@/types/index.js';

/**
 * The slice of the Supabase client the middleware needs
 */
export interface TokenVerifier {
  auth: {
    getUser(jwt: string): Promise<{
      data: {
        user: { id: string; app_metadata?: Record<string, unknown> } | null;
      };
      error: { message: string } | null;
    }>;
  };
}

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  supabaseClient: TokenVerifier;
  logger?: Logger;
}

const roleClaimSchema = z.enum(USER_ROLES);

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Role claim from app_metadata.role; anything unrecognised is a plain user
 */
export function resolveRole(
  appMetadata: Record<string, unknown> | undefined
): UserRole {
  const parsed = roleClaimSchema.safeParse(appMetadata?.['role']);
  return parsed.success ? parsed.data : 'user';
}

function requestOrigin(c: Context): { ip?: string; userAgent?: string } {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

function unauthorized(c: Context, message: string, requestId: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 * Extracts the bearer token, verifies it with Supabase, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;
  const logger = deps.logger ?? createLogger();

  return async function authMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    const token = authHeader.slice(7).trim();
    if (token === '') {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    let verified: Awaited<ReturnType<TokenVerifier['auth']['getUser']>>;
    try {
      // 2. Verify JWT with Supabase
      verified = await supabaseClient.auth.getUser(token);
    } catch (err) {
      logger.error('Token verification failed', err, { requestId });
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }

    const { user } = verified.data;
    if (verified.error !== null || user === null) {
      return unauthorized(c, 'Invalid or expired token', requestId);
    }

    // 3. Construct ActorContext
    const role = resolveRole(user.app_metadata);
    const actor: ActorContext = {
      type: role === 'admin' ? 'admin' : 'user',
      userId: user.id,
      requestId,
      ...requestOrigin(c),
    };

    // 4. Attach to context
    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return async function publicMiddleware(
    c: Context,
    next: Next
  ): Promise<void> {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      ...requestOrigin(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    await next();
  };
}
