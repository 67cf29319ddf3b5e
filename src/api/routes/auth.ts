/**
 * Auth Routes
 * Registration and password login
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { UserService } from '@/services/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface AuthRoutesDeps {
  userService: Pick<UserService, 'register' | 'login'>;
}

// Zod Schemas
const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(50, 'Username must be at most 50 characters'),
  email: z.string().trim().email('Invalid email address'),
  password: z.string().min(8, 'Password must be at least 8 characters'),
});

const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
});

/**
 * Create auth routes
 */
export function createAuthRoutes(deps: AuthRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  /**
   * POST /auth/register
   */
  app.post('/auth/register', async (c) => {
    const requestId = getRequestId(c);

    const validation = registerSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await userService.register(getActor(c), validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const user = result.data;
    return successResponse(
      c,
      {
        id: user.id,
        username: user.username,
        email: user.email,
        role: user.role,
        createdAt: user.createdAt.toISOString(),
      },
      requestId,
      201
    );
  });

  /**
   * POST /auth/login
   */
  app.post('/auth/login', async (c) => {
    const requestId = getRequestId(c);

    const validation = loginSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await userService.login(getActor(c), validation.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
