/**
 * Caller authorization.
 *
 * The caller identifies itself with a `user_id` query parameter; its role
 * level comes from the user store and is compared against a minimum.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { hasRoleLevel } from '@casevault/domain';
import { CallerQuerySchema } from '@casevault/contract';
import type { IUserRepository } from '../repositories/index.js';
import { fail } from '../utils/reply.js';

/**
 * Resolve the caller's role level and check it. Returns false when the
 * caller is unknown or below `minimumLevel`.
 */
export async function callerHasRoleLevel(
  users: IUserRepository,
  userId: string,
  minimumLevel: number,
): Promise<boolean> {
  const level = await users.getRoleLevel(userId);
  return hasRoleLevel(level, minimumLevel);
}

/**
 * preHandler that rejects callers below `minimumLevel` with 403.
 */
export function requireRoleLevel(users: IUserRepository, minimumLevel: number) {
  return async function roleLevelGuard(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const caller = CallerQuerySchema.safeParse(request.query);
    if (!caller.success) {
      return fail(reply, 'VALIDATION_ERROR', 'Invalid query parameters', 400, caller.error.flatten());
    }

    const userId = caller.data.user_id;
    if (!(await callerHasRoleLevel(users, userId, minimumLevel))) {
      request.log.warn({ code: 'AUTHZ_DENIED', userId, requiredLevel: minimumLevel }, 'Authorization denied: role level too low');
      return fail(reply, 'FORBIDDEN', 'User does not have permission to perform this action.', 403);
    }
  };
}
