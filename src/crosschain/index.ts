export * from './payload-codec';
export * from './outbound-initiator';
export * from './inbound-finalizer';
