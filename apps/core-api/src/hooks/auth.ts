import { timingSafeEqual } from 'crypto';
import type { FastifyRequest, onRequestAsyncHookHandler } from 'fastify';
import { AuthenticationError, OwnerAllowList, UnauthorizedOwnerError } from 'storefront-core';

declare module 'fastify' {
  interface FastifyRequest {
    ownerId: string | null;
  }
}

export function secretsMatch(presented: string | string[] | undefined, expected: string): boolean {
  if (typeof presented !== 'string') return false;
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Administrator routes need the shared admin token and an owner id from the
 * allow-list; the owner id is attached to the request.
 */
export function adminAuthHook(adminToken: string, owners: OwnerAllowList): onRequestAsyncHookHandler {
  return async (request) => {
    if (!secretsMatch(request.headers['x-admin-token'], adminToken)) {
      throw new AuthenticationError('Missing or invalid admin token');
    }

    const ownerId = request.headers['x-owner-id'];
    if (typeof ownerId !== 'string' || ownerId.length === 0) {
      throw new AuthenticationError('x-owner-id header is required');
    }
    if (!owners.isOwner(ownerId)) {
      throw new UnauthorizedOwnerError(ownerId);
    }

    request.ownerId = ownerId;
  };
}

export function requireOwner(request: FastifyRequest): string {
  if (!request.ownerId) {
    throw new AuthenticationError('Owner identity missing');
  }
  return request.ownerId;
}
