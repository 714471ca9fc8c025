/**
 * Caller identity. Authentication itself happens upstream; the proxy in front
 * of this service forwards the user id (and admin flag) as request headers.
 */

import type { IncomingHttpHeaders } from 'node:http';

export interface Actor {
  id: string;
  isAdmin: boolean;
}

export interface ActorHeaders {
  userHeader: string;
  adminHeader: string;
}

function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function resolveActor(headers: IncomingHttpHeaders, config: ActorHeaders): Actor | null {
  const id = headerValue(headers, config.userHeader)?.trim();
  if (!id) {
    return null;
  }

  const admin = headerValue(headers, config.adminHeader)?.trim().toLowerCase();
  return { id, isAdmin: admin === 'true' || admin === '1' };
}
