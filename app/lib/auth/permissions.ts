/**
 * Hierarchical permissions
 *
 * 1. Admin -> read-write on everything
 * 2. Storage permission (none / read / read-write) -> default for every bucket of the account
 * 3. Bucket permission -> overrides the storage default for one bucket
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError } from '~/lib/config/settings';
import { AuthorizationError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { Actor } from './actor';

const log = getLogger({ module: 'Permissions' });

const PermissionLevelSchema = z.enum(['none', 'read', 'read-write']);

export type PermissionLevel = z.infer<typeof PermissionLevelSchema>;

export type AccessLevel = Exclude<PermissionLevel, 'none'>;

const UserGrantsSchema = z.object({
  admin: z.boolean().default(false),
  storage: z.record(PermissionLevelSchema).default({}),
  /** Keyed by "<account id>/<bucket name>" */
  buckets: z.record(PermissionLevelSchema).default({}),
});

const PermissionsFileSchema = z.object({
  users: z.record(UserGrantsSchema),
});

export type PermissionTable = z.infer<typeof PermissionsFileSchema>;

export interface Authorizer {
  /** Throws AuthorizationError when the actor lacks `level` on the bucket */
  authorize(actor: Actor, accountId: string, bucket: string, level: AccessLevel): Promise<void>;
}

function satisfies(granted: PermissionLevel, required: AccessLevel): boolean {
  if (granted === 'read-write') return true;
  return granted === 'read' && required === 'read';
}

export class PermissionTableAuthorizer implements Authorizer {
  constructor(private readonly table: PermissionTable) {}

  effectivePermission(actor: Actor, accountId: string, bucket: string): PermissionLevel {
    const grants = this.table.users[actor.id];
    if (actor.isAdmin || grants?.admin) {
      return 'read-write';
    }
    if (!grants) {
      return 'none';
    }

    const storagePermission = grants.storage[accountId] ?? 'none';
    if (storagePermission === 'none') {
      return 'none';
    }
    return grants.buckets[`${accountId}/${bucket}`] ?? storagePermission;
  }

  async authorize(actor: Actor, accountId: string, bucket: string, level: AccessLevel): Promise<void> {
    const granted = this.effectivePermission(actor, accountId, bucket);
    if (!satisfies(granted, level)) {
      log.info({ userId: actor.id, accountId, bucket, required: level, granted }, 'access denied');
      throw new AuthorizationError(`You do not have ${level} access to bucket "${bucket}"`, {
        bucket,
        storage_account: accountId,
        required: level,
      });
    }
  }
}

/**
 * Used when no permissions file is configured: every authenticated caller has read-write.
 */
export class OpenAuthorizer implements Authorizer {
  async authorize(): Promise<void> {}
}

export function loadAuthorizer(permissionsFile?: string): Authorizer {
  if (!permissionsFile) {
    log.warn({}, 'no permissions file configured; all authenticated users have read-write access');
    return new OpenAuthorizer();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(permissionsFile, 'utf-8'));
  } catch (error) {
    throw new ConfigError([`cannot read permissions file ${permissionsFile}: ${String(error)}`]);
  }

  const parsed = PermissionsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => `permissions.${issue.path.join('.')}: ${issue.message}`));
  }
  return new PermissionTableAuthorizer(parsed.data);
}
