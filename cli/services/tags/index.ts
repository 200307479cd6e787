export * from './normalize';
export * from './tag-ledger';
export * from './tag-registry';
