/**
 * UserService Implementation
 *
 * SCOPE: Accounts - registration, password login, admin bootstrap
 *
 * GUARDRAILS:
 * - Credentials never touch our tables; Supabase Auth owns them
 * - The role lives on the identity (app_metadata.role) and the users row
 * - A users row is only written after its identity exists; a row insert that
 *   fails or loses a uniqueness race removes the identity again
 *
 * Dependencies: AuditService
 */

import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  AuthSession,
  EnsureAdminParams,
  Failure,
  LoginParams,
  RegisterUserParams,
  Result,
  User,
  UserRole,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';

/**
 * Outcome of a users row insert
 */
export type UserInsertResult =
  | { status: 'created'; user: User }
  | { status: 'conflict' };

/**
 * Outcome of creating an identity
 */
export type IdentityCreateResult =
  | { status: 'created'; id: string }
  | { status: 'conflict' };

export interface IdentitySession {
  accessToken: string;
  expiresIn: number;
}

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  findUserByUsername: (username: string) => Promise<User | null>;
  findUserByEmail: (email: string) => Promise<User | null>;
  insertUser: (params: {
    id: string;
    username: string;
    email: string;
    role: UserRole;
  }) => Promise<UserInsertResult>;
}

/**
 * Identity provider abstraction (Supabase Auth)
 */
export interface UserServiceIdentity {
  createIdentity: (params: {
    email: string;
    password: string;
    role: UserRole;
  }) => Promise<IdentityCreateResult>;
  deleteIdentity: (id: string) => Promise<void>;
  /**
   * Null when the credentials are rejected
   */
  signInWithPassword: (
    email: string,
    password: string
  ) => Promise<IdentitySession | null>;
}

/**
 * Minimal AuditService interface
 */
export interface UserServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * UserService interface
 */
export interface UserService {
  register(
    actor: ActorContext,
    params: RegisterUserParams
  ): Promise<Result<User>>;
  login(actor: ActorContext, params: LoginParams): Promise<Result<AuthSession>>;
  ensureAdminUser(
    actor: ActorContext,
    params: EnsureAdminParams
  ): Promise<Result<{ user: User; created: boolean }>>;
}

const INVALID_CREDENTIALS = 'Invalid username or password';

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  identity: UserServiceIdentity;
  auditService: UserServiceAudit;
  logger?: Logger;
}): UserService {
  const { db, identity, auditService } = deps;
  const logger = deps.logger ?? createLogger();

  function alreadyExists(field: 'username' | 'email'): Failure {
    return failure('ALREADY_EXISTS', `A user with this ${field} already exists`, {
      field,
    });
  }

  async function checkAvailable(
    username: string,
    email: string
  ): Promise<Failure | null> {
    if ((await db.findUserByUsername(username)) !== null) {
      return alreadyExists('username');
    }
    if ((await db.findUserByEmail(email)) !== null) {
      return alreadyExists('email');
    }
    return null;
  }

  async function removeIdentity(identityId: string): Promise<void> {
    try {
      await identity.deleteIdentity(identityId);
    } catch (error) {
      logger.error(
        'Failed to remove identity after user row insert failed',
        error,
        { identityId }
      );
    }
  }

  async function createAccount(
    params: RegisterUserParams,
    role: UserRole
  ): Promise<Result<User>> {
    const created = await identity.createIdentity({
      email: params.email,
      password: params.password,
      role,
    });
    if (created.status === 'conflict') {
      return alreadyExists('email');
    }

    let inserted: UserInsertResult;
    try {
      inserted = await db.insertUser({
        id: created.id,
        username: params.username,
        email: params.email,
        role,
      });
    } catch (error) {
      await removeIdentity(created.id);
      throw error;
    }
    if (inserted.status === 'conflict') {
      logger.info('User row insert lost a race; removing identity', {
        identityId: created.id,
      });
      await identity.deleteIdentity(created.id);
      return alreadyExists('username');
    }

    return success(inserted.user);
  }

  async function audit(actor: ActorContext, event: AuditEvent): Promise<void> {
    const result = await auditService.log(actor, event);
    if (!result.success) {
      logger.warn('Audit log write failed', {
        action: event.action,
        error: result.error,
      });
    }
  }

  return {
    async register(
      actor: ActorContext,
      params: RegisterUserParams
    ): Promise<Result<User>> {
      const taken = await checkAvailable(params.username, params.email);
      if (taken !== null) {
        return taken;
      }

      const result = await createAccount(params, 'user');
      if (!result.success) {
        return result;
      }

      await audit(actor, {
        action: 'user.registered',
        resourceType: 'user',
        resourceId: result.data.id,
        details: { username: result.data.username },
      });
      return result;
    },

    async login(
      _actor: ActorContext,
      params: LoginParams
    ): Promise<Result<AuthSession>> {
      const user = await db.findUserByUsername(params.username);
      if (user === null) {
        return failure('UNAUTHORIZED', INVALID_CREDENTIALS);
      }

      const session = await identity.signInWithPassword(
        user.email,
        params.password
      );
      if (session === null) {
        return failure('UNAUTHORIZED', INVALID_CREDENTIALS);
      }

      return success({
        accessToken: session.accessToken,
        tokenType: 'bearer',
        expiresIn: session.expiresIn,
        userId: user.id,
        role: user.role,
      });
    },

    async ensureAdminUser(
      actor: ActorContext,
      params: EnsureAdminParams
    ): Promise<Result<{ user: User; created: boolean }>> {
      const existing = await db.findUserByUsername(params.username);
      if (existing !== null) {
        if (existing.role !== 'admin') {
          logger.warn('Configured admin username belongs to a non-admin user', {
            username: params.username,
          });
        }
        return success({ user: existing, created: false });
      }

      const result = await createAccount(params, 'admin');
      if (!result.success) {
        return result;
      }

      logger.info('Created admin user', { username: params.username });
      await audit(actor, {
        action: 'user.admin_created',
        resourceType: 'user',
        resourceId: result.data.id,
        details: { username: result.data.username },
      });
      return success({ user: result.data, created: true });
    },
  };
}
