/**
 * Storage accounts - the S3-compatible endpoints tasks can run against
 */

import { readFileSync } from 'node:fs';
import { S3Client } from '@aws-sdk/client-s3';
import { z } from 'zod';
import type { AppSettings } from '~/lib/config/settings';
import { ConfigError } from '~/lib/config/settings';
import { getLogger } from '~/lib/log/logger';
import type { ObjectStore } from './object-store';
import { S3ObjectStore } from './s3-object-store';

const log = getLogger({ module: 'StorageAccounts' });

const StorageAccountSchema = z.object({
  id: z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, 'Account id may only contain letters, digits, dot, dash and underscore'),
  name: z.string().optional(),
  endpoint: z.string().url().optional(),
  region: z.string().default('us-east-1'),
  access_key_id: z.string().min(1),
  secret_access_key: z.string().min(1),
  force_path_style: z.boolean().default(true),
  default: z.boolean().default(false),
});

const StorageAccountsFileSchema = z.object({
  accounts: z.array(StorageAccountSchema).min(1),
});

export type StorageAccountConfig = z.infer<typeof StorageAccountSchema>;

export interface StorageAccountSummary {
  id: string;
  name: string;
  endpoint: string | null;
  isDefault: boolean;
}

export type ObjectStoreFactory = (account: StorageAccountConfig) => ObjectStore;

export const createS3ObjectStore: ObjectStoreFactory = account =>
  new S3ObjectStore(
    new S3Client({
      region: account.region,
      endpoint: account.endpoint,
      forcePathStyle: account.force_path_style,
      credentials: {
        accessKeyId: account.access_key_id,
        secretAccessKey: account.secret_access_key,
      },
    })
  );

/**
 * Resolves an account reference to an ObjectStore. Stores are created lazily and cached per account.
 */
export class StorageAccountRegistry {
  private readonly accounts = new Map<string, StorageAccountConfig>();
  private readonly stores = new Map<string, ObjectStore>();
  private readonly defaultId: string | null;

  constructor(
    accounts: StorageAccountConfig[],
    private readonly factory: ObjectStoreFactory = createS3ObjectStore
  ) {
    for (const account of accounts) {
      if (this.accounts.has(account.id)) {
        throw new ConfigError([`duplicate storage account id "${account.id}"`]);
      }
      this.accounts.set(account.id, account);
    }

    const flagged = accounts.filter(account => account.default);
    if (flagged.length > 1) {
      throw new ConfigError([`more than one default storage account: ${flagged.map(a => a.id).join(', ')}`]);
    }
    this.defaultId = flagged[0]?.id ?? accounts[0]?.id ?? null;
  }

  /**
   * Resolve an account id (or the default account) to its canonical id
   * @returns null when the reference does not name a configured account
   */
  resolveId(reference?: string): string | null {
    const id = reference ?? this.defaultId;
    return id !== null && this.accounts.has(id) ? id : null;
  }

  getStore(accountId: string): ObjectStore | null {
    const cached = this.stores.get(accountId);
    if (cached) return cached;

    const account = this.accounts.get(accountId);
    if (!account) return null;

    const store = this.factory(account);
    this.stores.set(accountId, store);
    log.debug({ accountId }, 'object store client created');
    return store;
  }

  list(): StorageAccountSummary[] {
    return Array.from(this.accounts.values()).map(account => ({
      id: account.id,
      name: account.name ?? account.id,
      endpoint: account.endpoint ?? null,
      isDefault: account.id === this.defaultId,
    }));
  }
}

/**
 * Build the account list from STORAGE_ACCOUNTS_FILE, or from the S3_* variables when no file is set
 */
export function loadStorageAccounts(settings: AppSettings['storage']): StorageAccountConfig[] {
  if (settings.accountsFile) {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(settings.accountsFile, 'utf-8'));
    } catch (error) {
      throw new ConfigError([`cannot read storage accounts file ${settings.accountsFile}: ${String(error)}`]);
    }

    const parsed = StorageAccountsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(parsed.error.issues.map(issue => `accounts.${issue.path.join('.')}: ${issue.message}`));
    }
    return parsed.data.accounts;
  }

  if (settings.defaultAccount) {
    return [
      {
        id: 'default',
        name: 'Default storage',
        endpoint: settings.defaultAccount.endpoint,
        region: settings.defaultAccount.region,
        access_key_id: settings.defaultAccount.accessKeyId,
        secret_access_key: settings.defaultAccount.secretAccessKey,
        force_path_style: settings.defaultAccount.forcePathStyle,
        default: true,
      },
    ];
  }

  log.warn({}, 'no storage accounts configured; every task start will be rejected');
  return [];
}
