/**
 * Target Resolver
 *
 * Turns a worker's targeting rule into the ordered (account, region) pairs it
 * must run against:
 *
 *   candidates = include(all accounts)
 *   removals   = exclude(candidates) + org roots (unless operateInOrgRoot)
 *   targets    = (candidates - removals) x applicable regions
 *
 * Exclusion always wins. Output is sorted by account ID, then region, so
 * resolving the same rule against the same index is reproducible.
 */

import type { AccountIndex } from '@starfleet/account-index';
import {
  ALL_REGIONS,
  compareStrings,
  type Account,
  type AccountFilter,
  type Target,
  type TargetRef,
  type TargetingRule,
} from '@starfleet/common';

export interface TargetOverrides {
  /** Account IDs or names (case-insensitive) */
  accounts?: string[];
  regions?: string[];
}

export function toTargetRef(target: Target): TargetRef {
  return {
    accountId: target.account.id,
    accountName: target.account.name,
    region: target.region,
  };
}

/** Canonical `<accountId>/<region>` identity */
export function targetKey(target: Target | TargetRef): string {
  return 'account' in target
    ? `${target.account.id}/${target.region}`
    : `${target.accountId}/${target.region}`;
}

export function compareTargetRefs(a: TargetRef, b: TargetRef): number {
  return compareStrings(a.accountId, b.accountId) || compareStrings(a.region, b.region);
}

/**
 * Account IDs selected by a filter (union of every selector present)
 */
export function selectAccountIds(filter: AccountFilter, index: AccountIndex): Set<string> {
  const selected: Account[] = [];

  if (filter.allAccounts) {
    selected.push(...index.all());
  }
  if (filter.byIds?.length) {
    selected.push(...index.byIds(filter.byIds));
  }
  if (filter.byNames?.length) {
    selected.push(...index.byNames(filter.byNames));
  }
  for (const tag of filter.byTags ?? []) {
    selected.push(...index.byTag(tag.name, tag.value));
  }
  for (const orgUnit of filter.byOrgUnits ?? []) {
    selected.push(...index.byOrgUnit(orgUnit));
  }
  for (const accountType of filter.byAccountTypes ?? []) {
    selected.push(...index.byAccountType(accountType));
  }

  return new Set(selected.map(account => account.id));
}

export function resolveTargets(rule: TargetingRule, index: AccountIndex): Target[] {
  const included = selectAccountIds(rule.include, index);
  const excluded = selectAccountIds(rule.exclude ?? {}, index);
  const orgRoots: ReadonlySet<string> = rule.operateInOrgRoot ? new Set() : index.orgRoots();

  const candidates = index.query(account => included.has(account.id));
  const accounts = candidates.filter(account => !excluded.has(account.id) && !orgRoots.has(account.id));

  const allRegions = rule.includeRegions.includes(ALL_REGIONS);
  const requested = new Set(rule.includeRegions);
  const excludedRegions = new Set(rule.excludeRegions ?? []);

  const targets: Target[] = [];
  for (const account of accounts) {
    const regions = account.regions
      .filter(region => (allRegions || requested.has(region)) && !excludedRegions.has(region))
      .sort(compareStrings);
    for (const region of regions) {
      targets.push({ account, region });
    }
  }
  return targets;
}

/**
 * Restrict resolved targets to the given accounts and regions. Overrides can
 * only narrow: a target the rule did not resolve is never added.
 */
export function narrowTargets(targets: Target[], overrides: TargetOverrides): Target[] {
  const accounts = overrides.accounts?.length
    ? new Set(overrides.accounts.map(a => a.toLowerCase()))
    : undefined;
  const regions = overrides.regions?.length ? new Set(overrides.regions) : undefined;

  return targets.filter(({ account, region }) => {
    if (accounts && !accounts.has(account.id.toLowerCase()) && !accounts.has(account.name.toLowerCase())) {
      return false;
    }
    return !regions || regions.has(region);
  });
}
