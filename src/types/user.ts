/**
 * Account Types
 */

import type { UserRole } from './auth.js';

/**
 * Application user row. The credential itself lives in Supabase Auth.
 */
export interface User {
  id: string;
  username: string;
  email: string;
  role: UserRole;
  createdAt: Date;
}

export interface RegisterUserParams {
  username: string;
  email: string;
  password: string;
}

export interface LoginParams {
  username: string;
  password: string;
}

/**
 * Session handed back on login
 */
export interface AuthSession {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  userId: string;
  role: UserRole;
}

export interface EnsureAdminParams {
  username: string;
  email: string;
  password: string;
}
