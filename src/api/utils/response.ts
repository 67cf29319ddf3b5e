/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import type { ActorContext, Failure } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Read a JSON body; a missing or malformed body reads as {}
 * and is left to the schema to reject
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: Failure['error'],
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create a 400 response from a failed schema parse
 */
export function validationErrorResponse(
  c: Context,
  error: z.ZodError,
  requestId: string
): Response {
  return errorResponse(
    c,
    {
      code: 'VALIDATION_ERROR',
      message: error.issues[0]?.message ?? 'Invalid request',
      details: { fields: error.flatten().fieldErrors },
    },
    requestId
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}
