export * from './kernel-core/Errors.js';
export * from './kernel-core/L0/Crypto.js';
export * from './kernel-core/L0/Geometry.js';
export * from './kernel-core/L0/Guards.js';
export * from './kernel-core/L0/Invariants.js';
export * from './kernel-core/L0/Mutex.js';
export * from './kernel-core/L0/Ontology.js';
export * from './kernel-core/L0/Random.js';
export * from './kernel-core/L0/Tiers.js';
export * from './kernel-core/L1/AccountStore.js';
export * from './kernel-core/L1/Transactions.js';
export * from './kernel-core/L2/Evolution.js';
export * from './kernel-core/L3/Validation.js';
export * from './kernel-core/L3/HeuristicOracle.js';
export * from './kernel-core/L4/Block.js';
export * from './kernel-core/L4/Consensus.js';
export * from './kernel-core/L4/Miner.js';
export * from './kernel-core/L5/BlockStore.js';
export * from './kernel-core/L5/ChainTail.js';
export * from './kernel-core/L5/Ledger.js';
export * from './kernel-core/Node.js';
export * from './infrastructure/config/Config.js';
export * from './infrastructure/persistence/SQLiteAccountStore.js';
export * from './infrastructure/persistence/SQLiteBlockStore.js';
export * from './Platform/NodePlatform.js';
