/**
 * @starfleet/account-index - Account snapshot and backing sources
 */

export { AccountIndex, MANAGEMENT_ACCOUNT_TYPE, parseOrgRootFromArn } from './account-index.js';
export { FileIndexSource, StaticIndexSource } from './sources.js';
export type { IndexSource } from './sources.js';
export {
  accountRecordSchema,
  generatedAccountSchema,
  parseIndexDocument,
  fromAccountRecord,
  fromGeneratedAccount,
  DEFAULT_ACCOUNT_TYPE,
} from './records.js';
export type { AccountRecord, GeneratedAccount, ParsedIndex } from './records.js';
