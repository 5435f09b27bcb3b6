/**
 * Extension ledger module.
 */

export { ExtensionLedger } from './extension-ledger';
export type { PlayerTimeBank, RegisterPlayerOptions, ExtensionGrant } from './types';
