/**
 * User lookups for Confluence
 */

import { Effect, pipe } from 'effect';
import { ApiError, type NetworkError } from '../errors.js';
import { requestJsonEffect, type RequestContext } from './request.js';
import { UserSchema } from './types.js';

/**
 * Find the user key of a username (Effect version)
 * Uses GET user?username=; an unknown user (404 or no key) maps to null
 */
export function findUserKeyEffect(
  context: RequestContext,
  username: string,
): Effect.Effect<string | null, ApiError | NetworkError> {
  return pipe(
    requestJsonEffect(context, 'user', UserSchema, { query: { username } }),
    Effect.map((user) => user.userKey ?? null),
    Effect.catchIf(
      (error) => error instanceof ApiError && error.statusCode === 404,
      () => Effect.succeed(null),
    ),
  );
}
