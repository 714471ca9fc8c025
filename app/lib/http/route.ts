/**
 * Route modules export a `loader` (GET) and/or an `action` (any other method)
 * that receives the matched params, the parsed JSON body and the caller, and
 * returns a web `Response`. `app/routes.ts` maps paths to modules.
 */

import type { Actor } from '~/lib/auth/actor';
import { AuthorizationError, ValidationError } from '~/lib/errors';
import type { TaskRuntime } from '~/lib/task-queue/startup';

export interface RouteArgs {
  params: Record<string, string>;
  body: unknown;
  actor: Actor;
  runtime: TaskRuntime;
}

export type RouteHandler = (args: RouteArgs) => Promise<Response>;

export type HttpMethod = 'get' | 'post' | 'delete';

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  handler: RouteHandler;
}

export function route(method: HttpMethod, path: string, handler: RouteHandler): RouteDefinition {
  return { method, path, handler };
}

export type RouteConfig = RouteDefinition[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request body as a JSON object; a missing body reads as `{}`
 */
export function readJsonObject(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) {
    return {};
  }
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function requireAdmin(actor: Actor): void {
  if (!actor.isAdmin) {
    throw new AuthorizationError('Administrator access required');
  }
}
