/**
 * Account index record formats
 *
 * Two shapes are accepted from a backing source:
 *
 * 1. A list of camelCase records:
 *    [{ id, name, regions, tags?, orgUnits?, accountType?, arn? }]
 *
 * 2. The generated index document keyed by account ID:
 *    { "<id>": { Name, Regions, Parents?, Tags?, Arn?, AccountType? } }
 *    `Parents` is listed nearest-first (the immediate parent OU, up to the root)
 *    and is reversed into a root-first path.
 */

import { z } from 'zod';
import {
  accountIdSchema,
  regionSchema,
  deepFreeze,
  formatZodError,
  unique,
  type Account,
  type OrgUnit,
} from '@starfleet/common';

export const DEFAULT_ACCOUNT_TYPE = 'member';

const tagValueSchema = z.union([z.string(), z.array(z.string())]);

const orgUnitSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const accountRecordSchema = z.object({
  id: accountIdSchema,
  name: z.string().min(1),
  regions: z.array(regionSchema),
  tags: z.record(tagValueSchema).optional().default({}),
  orgUnits: z.array(orgUnitSchema).optional().default([]),
  accountType: z.string().min(1).optional().default(DEFAULT_ACCOUNT_TYPE),
  arn: z.string().optional(),
});

export const generatedAccountSchema = z.object({
  Name: z.string().min(1),
  Regions: z.array(regionSchema),
  Parents: z.array(z.object({
    Id: z.string().min(1),
    Name: z.string().min(1),
    Type: z.string().optional(),
  })).optional().default([]),
  Tags: z.record(tagValueSchema).optional().default({}),
  Arn: z.string().optional(),
  AccountType: z.string().min(1).optional(),
}).passthrough();

export const accountListSchema = z.array(accountRecordSchema);

export const generatedIndexSchema = z.record(accountIdSchema, generatedAccountSchema);

export type AccountRecord = z.infer<typeof accountRecordSchema>;
export type GeneratedAccount = z.infer<typeof generatedAccountSchema>;

function normalizeTags(tags: Record<string, string | string[]>): Record<string, string[]> {
  const normalized: Record<string, string[]> = {};
  for (const [name, value] of Object.entries(tags)) {
    normalized[name] = unique(Array.isArray(value) ? value : [value]);
  }
  return normalized;
}

function freezeAccount(account: Account): Account {
  return deepFreeze(account);
}

export function fromAccountRecord(record: AccountRecord): Account {
  return freezeAccount({
    id: record.id,
    name: record.name,
    tags: normalizeTags(record.tags),
    orgUnits: record.orgUnits.map(ou => ({ id: ou.id, name: ou.name })),
    accountType: record.accountType,
    regions: unique(record.regions),
    arn: record.arn,
  });
}

export function fromGeneratedAccount(id: string, account: GeneratedAccount): Account {
  const orgUnits: OrgUnit[] = account.Parents
    .map(parent => ({ id: parent.Id, name: parent.Name }))
    .reverse();

  return freezeAccount({
    id,
    name: account.Name,
    tags: normalizeTags(account.Tags),
    orgUnits,
    accountType: account.AccountType ?? DEFAULT_ACCOUNT_TYPE,
    regions: unique(account.Regions),
    arn: account.Arn,
  });
}

export type ParsedIndex =
  | { success: true; accounts: Account[] }
  | { success: false; error: string };

/**
 * Detect the record shape and normalize into accounts
 */
export function parseIndexDocument(document: unknown): ParsedIndex {
  if (Array.isArray(document)) {
    const result = accountListSchema.safeParse(document);
    if (!result.success) {
      return { success: false, error: formatZodError(result.error) };
    }
    return { success: true, accounts: result.data.map(fromAccountRecord) };
  }

  const result = generatedIndexSchema.safeParse(document);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error) };
  }
  return {
    success: true,
    accounts: Object.entries(result.data).map(([id, account]) => fromGeneratedAccount(id, account)),
  };
}
