export * from './migrate';
export * from './pg-store';
export * from './store';
