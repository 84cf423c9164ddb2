export * from './types';
export * from './errors';
export * from './fee-policy';
export * from './marketplace-config';
export * from './event-log';
export * from './fee-vault';
export * from './listing-registry';
export * from './local-settlement';
export * from './marketplace';
