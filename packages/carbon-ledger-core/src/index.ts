/**
 * Carbon Ledger Core
 *
 * Pure building blocks shared by the store, the ledger and the CLI:
 * - canonical payload serialization
 * - record hashing and salts
 * - Merkle roots and inclusion proofs
 * - UTC day periods
 * - error taxonomy and structured logging
 */

export * from './types';
export * from './errors';
export * from './canonical';
export * from './hasher';
export * from './merkle';
export * from './period';
export * from './partition';
export * from './logger';
