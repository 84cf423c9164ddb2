/**
 * Ledger Module
 *
 * Simulated chain state and the asset / swap collaborators that live on it.
 */

export * from './types';
export * from './address';
export * from './ledger';
export * from './asset-contract';
export * from './swap-venue';
