/**
 * Account Index
 *
 * Read-only snapshot of the accounts Starfleet can target. The snapshot is
 * replaced wholesale on load(); there are no incremental updates, so a reader
 * never sees a half-built index. A failed load keeps the previous snapshot.
 *
 * All query results are ordered by account ID ascending.
 */

import {
  IndexUnavailableError,
  compareStrings,
  createLogger,
  errorMessage,
  type Account,
  type AccountPredicate,
} from '@starfleet/common';
import { parseIndexDocument } from './records.js';
import type { IndexSource } from './sources.js';

const log = createLogger('AccountIndex');

/** Account type that marks an organization management (root) account */
export const MANAGEMENT_ACCOUNT_TYPE = 'management';

const ORG_ARN_PREFIX = 'arn:aws:organizations::';

interface Snapshot {
  accounts: Account[];
  byId: Map<string, Account>;
  byName: Map<string, string>;
  byTag: Map<string, Map<string, Set<string>>>;
  byOrgUnit: Map<string, Set<string>>;
  byRegion: Map<string, Set<string>>;
  orgRoots: Set<string>;
  loadedAt: number;
}

/**
 * Pull the management account ID out of an Organizations account ARN:
 * arn:aws:organizations::ROOT-ACCOUNT-ID:account/o-xxxx/ACCOUNT-ID
 */
export function parseOrgRootFromArn(arn: string | undefined): string | undefined {
  if (!arn?.startsWith(ORG_ARN_PREFIX)) return undefined;
  const rootId = arn.slice(ORG_ARN_PREFIX.length).split(':')[0];
  return rootId || undefined;
}

function addTo<K>(map: Map<K, Set<string>>, key: K, id: string): void {
  const set = map.get(key);
  if (set) {
    set.add(id);
  } else {
    map.set(key, new Set([id]));
  }
}

function buildSnapshot(accounts: Account[]): Snapshot {
  const sorted = [...accounts].sort((a, b) => compareStrings(a.id, b.id));
  const snapshot: Snapshot = {
    accounts: sorted,
    byId: new Map(),
    byName: new Map(),
    byTag: new Map(),
    byOrgUnit: new Map(),
    byRegion: new Map(),
    orgRoots: new Set(),
    loadedAt: Date.now(),
  };

  for (const account of sorted) {
    if (snapshot.byId.has(account.id)) {
      throw new Error(`Duplicate account ID in index: ${account.id}`);
    }
    snapshot.byId.set(account.id, account);
    snapshot.byName.set(account.name.toLowerCase(), account.id);

    for (const region of account.regions) {
      addTo(snapshot.byRegion, region, account.id);
    }

    for (const ou of account.orgUnits) {
      addTo(snapshot.byOrgUnit, ou.id.toLowerCase(), account.id);
      addTo(snapshot.byOrgUnit, ou.name.toLowerCase(), account.id);
    }

    for (const [name, values] of Object.entries(account.tags)) {
      const tagName = name.toLowerCase();
      let valueMap = snapshot.byTag.get(tagName);
      if (!valueMap) {
        valueMap = new Map();
        snapshot.byTag.set(tagName, valueMap);
      }
      for (const value of values) {
        addTo(valueMap, value.toLowerCase(), account.id);
      }
    }

    if (account.accountType === MANAGEMENT_ACCOUNT_TYPE) {
      snapshot.orgRoots.add(account.id);
    }
    const arnRoot = parseOrgRootFromArn(account.arn);
    if (arnRoot) {
      snapshot.orgRoots.add(arnRoot);
    }
  }

  return snapshot;
}

function orgUnitPath(account: Account, key: 'id' | 'name'): string {
  return account.orgUnits.map(ou => ou[key].toLowerCase()).join('/');
}

function hasPathPrefix(fullPath: string, prefix: string): boolean {
  return fullPath === prefix || fullPath.startsWith(`${prefix}/`);
}

export class AccountIndex {
  private snapshot: Snapshot | null = null;

  constructor(private readonly source: IndexSource) {}

  /**
   * Load (or fully reload) the index from its backing source
   */
  async load(): Promise<ReadonlySet<Account>> {
    const location = this.source.describe();
    log.debug(`Loading account index from ${location}...`);

    let document: unknown;
    try {
      document = await this.source.read();
    } catch (error) {
      log.error(`Unable to read the account index from ${location}`, { error: errorMessage(error) });
      throw new IndexUnavailableError(`Unable to read account index: ${errorMessage(error)}`, {
        source: location,
      });
    }

    const parsed = parseIndexDocument(document);
    if (!parsed.success) {
      log.error(`Invalid account index at ${location}`, { error: parsed.error });
      throw new IndexUnavailableError(`Invalid account index: ${parsed.error}`, {
        source: location,
      });
    }

    let snapshot: Snapshot;
    try {
      snapshot = buildSnapshot(parsed.accounts);
    } catch (error) {
      throw new IndexUnavailableError(errorMessage(error), { source: location });
    }

    this.snapshot = snapshot;
    log.debug('Index loaded', { accounts: snapshot.accounts.length });
    return new Set(snapshot.accounts);
  }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  get size(): number {
    return this.snapshot?.accounts.length ?? 0;
  }

  get loadedAt(): number | undefined {
    return this.snapshot?.loadedAt;
  }

  private current(): Snapshot {
    if (!this.snapshot) {
      throw new IndexUnavailableError('Account index has not been loaded', {
        source: this.source.describe(),
      });
    }
    return this.snapshot;
  }

  private resolveIds(ids: Iterable<string>): Account[] {
    const snapshot = this.current();
    const found: Account[] = [];
    for (const id of new Set(ids)) {
      const account = snapshot.byId.get(id);
      if (account) found.push(account);
    }
    return found.sort((a, b) => compareStrings(a.id, b.id));
  }

  query(predicate: AccountPredicate): Account[] {
    return this.current().accounts.filter(predicate);
  }

  all(): Account[] {
    return [...this.current().accounts];
  }

  get(id: string): Account | undefined {
    return this.current().byId.get(id);
  }

  /** Only IDs present in the index are returned */
  byIds(ids: Iterable<string>): Account[] {
    return this.resolveIds(ids);
  }

  /** Case-insensitive alias lookup */
  byNames(names: Iterable<string>): Account[] {
    const byName = this.current().byName;
    const ids: string[] = [];
    for (const name of names) {
      const id = byName.get(name.toLowerCase());
      if (id) ids.push(id);
    }
    return this.resolveIds(ids);
  }

  /** Case-insensitive tag name and value */
  byTag(name: string, value: string): Account[] {
    const ids = this.current().byTag.get(name.toLowerCase())?.get(value.toLowerCase());
    return this.resolveIds(ids ?? []);
  }

  /**
   * Match an OU by ID or name anywhere in the path, or a path prefix
   * written root-first with `/` separators (IDs or names).
   */
  byOrgUnit(orgUnit: string): Account[] {
    const needle = orgUnit.toLowerCase();
    if (!needle.includes('/')) {
      return this.resolveIds(this.current().byOrgUnit.get(needle) ?? []);
    }
    return this.query(account =>
      hasPathPrefix(orgUnitPath(account, 'id'), needle) ||
      hasPathPrefix(orgUnitPath(account, 'name'), needle)
    );
  }

  byAccountType(accountType: string): Account[] {
    const needle = accountType.toLowerCase();
    return this.query(account => account.accountType.toLowerCase() === needle);
  }

  /**
   * Region -> account IDs, for the given regions or every region in the index
   */
  accountsByRegion(regions?: Iterable<string>): Map<string, string[]> {
    const byRegion = this.current().byRegion;
    const keys = regions ? [...new Set(regions)] : [...byRegion.keys()];
    const result = new Map<string, string[]>();
    for (const region of keys.sort(compareStrings)) {
      result.set(region, [...(byRegion.get(region) ?? [])].sort(compareStrings));
    }
    return result;
  }

  /** Every region any indexed account is active in */
  regions(): string[] {
    return [...this.current().byRegion.keys()].sort(compareStrings);
  }

  /** Organization management account IDs */
  orgRoots(): ReadonlySet<string> {
    return this.current().orgRoots;
  }
}
