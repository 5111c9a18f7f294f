/**
 * Confidential Wallet Store
 *
 * Wallet synchronization and confidential UTXO store for Elements-based
 * sidechains.
 */

// Types
export * from './types/index';
export * from './errors';

// Configuration
export { NETWORKS, getNetworkParams, isNetwork } from './config/networks';
export type { AddressParams, NetworkParams } from './config/networks';
export { configureLogging, createLogger } from './utils/logger';
export type { LogLevel, Logger } from './utils/logger';

// Descriptors & addresses
export { parseDescriptor } from './descriptor/descriptor';
export type { BlindingKey, ConfidentialDescriptor, DescriptorKey, ScriptKind } from './descriptor/descriptor';
export { AddressDeriver, deriveAddress, deriveBlindingPrivateKey, deriveScript } from './descriptor/deriver';
export type { DerivedAddress } from './descriptor/deriver';
export {
  decodeConfidentialAddress,
  toConfidentialAddress,
  toUnconfidentialAddress
} from './address/confidentialAddress';

// Transactions
export {
  computeTxid,
  decodeTransaction,
  encodeTransaction,
  transactionToHex,
  explicitAsset,
  explicitValue
} from './transactions/serialization';
export { decodeBlockHeader, parseBlockHeader } from './transactions/header';
export type { Transaction, TxInput, TxOutput } from './transactions/types';

// Confidential outputs
export { ConfidentialUnblinder } from './confidential/unblinder';
export type { Unblinder, UnblindResult } from './confidential/unblinder';
export { OutputBlinder, explicitOutput } from './confidential/blinder';
export { loadZkp } from './confidential/zkp';
export type { Zkp } from './confidential/zkp';
export type { BlindOutputParams } from './confidential/blinder';

// Backends
export type { BlockchainBackend } from './backend/types';
export { ElectrumClient, ElectrumServerError } from './backend/electrumClient';
export type { ElectrumOptions } from './backend/electrumClient';
export { ElectrumUrl } from './backend/electrumUrl';
export { ElementsRpcClient, ElementsRpcError } from './backend/elementsRpcClient';
export type { ElementsRpcConfig } from './backend/elementsRpcClient';
export { MemoryBackend } from './backend/memoryBackend';
export type { BackendMethod, MemoryBackendOptions } from './backend/memoryBackend';

// Persistence
export { FileStorage, MemoryStorage } from './store/storage';
export type { StateStorage } from './store/storage';
export { Store, walletId } from './store/store';
export type { Snapshot } from './store/cache';

// Sync & wallet
export { Syncer } from './sync/syncer';
export type { SyncResult, SyncState, SyncerOptions } from './sync/syncer';
export { Wallet, DEFAULT_GAP_LIMIT, DEFAULT_HEADER_WINDOW } from './wallet/wallet';
export type { SyncOptions, WalletConfig } from './wallet/wallet';
