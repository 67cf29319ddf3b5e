/**
 * UserService Database Adapters
 * Users table via the query builder, identities via Supabase Auth
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { isUniqueViolation, storageError } from '@/lib/errors.js';
import { parseRow } from '@/lib/rows.js';
import type { User, UserRole } from '@/types/index.js';
import { USER_ROLES } from '@/types/index.js';

import type {
  IdentityCreateResult,
  IdentitySession,
  UserInsertResult,
  UserServiceDb,
  UserServiceIdentity,
} from './user.service.js';

const USER_COLUMNS = 'id, username, email, role, created_at';

/**
 * Database row types
 */
const userRowSchema = z.object({
  id: z.string(),
  username: z.string(),
  email: z.string(),
  role: z.enum(USER_ROLES),
  created_at: z.string(),
});

type UserRow = z.infer<typeof userRowSchema>;

function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  async function findUserBy(
    column: 'username' | 'email',
    value: string
  ): Promise<User | null> {
    const { data, error } = await supabase
      .from('users')
      .select(USER_COLUMNS)
      .eq(column, value)
      .maybeSingle();

    if (error !== null) {
      throw storageError(`find user by ${column}`, error);
    }
    if (data === null) {
      return null;
    }

    return mapRowToUser(parseRow(userRowSchema, data, 'user row'));
  }

  return {
    findUserByUsername(username: string): Promise<User | null> {
      return findUserBy('username', username);
    },

    findUserByEmail(email: string): Promise<User | null> {
      return findUserBy('email', email);
    },

    async insertUser(params: {
      id: string;
      username: string;
      email: string;
      role: UserRole;
    }): Promise<UserInsertResult> {
      const { data, error } = await supabase
        .from('users')
        .insert(params)
        .select(USER_COLUMNS)
        .single();

      if (error !== null) {
        if (isUniqueViolation(error)) {
          return { status: 'conflict' };
        }
        throw storageError('create user', error);
      }

      return {
        status: 'created',
        user: mapRowToUser(parseRow(userRowSchema, data, 'user row')),
      };
    },
  };
}

/**
 * Supabase Auth error fields we branch on
 */
interface AuthErrorLike {
  message: string;
  code?: string;
  status?: number;
}

function isEmailTaken(error: AuthErrorLike): boolean {
  return (
    error.code === 'email_exists' ||
    error.message.includes('already been registered')
  );
}

function isRejectedCredential(error: AuthErrorLike): boolean {
  return error.code === 'invalid_credentials' || error.status === 400;
}

/**
 * Create UserServiceIdentity implementation using Supabase Auth.
 * admin holds the service key; auth is an anon-key client used only for
 * password sign-in so the admin client's session is never replaced.
 */
export function createUserServiceIdentity(clients: {
  admin: SupabaseClient;
  auth: SupabaseClient;
}): UserServiceIdentity {
  const { admin, auth } = clients;

  return {
    async createIdentity(params: {
      email: string;
      password: string;
      role: UserRole;
    }): Promise<IdentityCreateResult> {
      const { data, error } = await admin.auth.admin.createUser({
        email: params.email,
        password: params.password,
        email_confirm: true,
        app_metadata: { role: params.role },
      });

      if (error !== null) {
        if (isEmailTaken(error)) {
          return { status: 'conflict' };
        }
        throw storageError('create identity', error);
      }
      if (data.user === null) {
        throw storageError('create identity', { message: 'no user returned' });
      }

      return { status: 'created', id: data.user.id };
    },

    async deleteIdentity(id: string): Promise<void> {
      const { error } = await admin.auth.admin.deleteUser(id);
      if (error !== null) {
        throw storageError('delete identity', error);
      }
    },

    async signInWithPassword(
      email: string,
      password: string
    ): Promise<IdentitySession | null> {
      const { data, error } = await auth.auth.signInWithPassword({
        email,
        password,
      });

      if (error !== null) {
        if (isRejectedCredential(error)) {
          return null;
        }
        throw storageError('sign in', error);
      }
      if (data.session === null) {
        return null;
      }

      return {
        accessToken: data.session.access_token,
        expiresIn: data.session.expires_in,
      };
    },
  };
}
