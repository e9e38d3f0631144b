/**
 * Carbon Ledger
 *
 * Hash-chained, Merkle-anchored integrity ledger for carbon emission
 * records. Re-exports the core primitives and storage so consumers need a
 * single import.
 */

export * from './ledger';
export * from './chain-builder';
export * from './partition-lock';
export * from './anchorer';
export * from './anchor-scheduler';
export * from './verifier';
export * from 'carbon-ledger-core';
export * from 'carbon-ledger-storage';
