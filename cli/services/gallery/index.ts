export * from './containers';
export * from './pictures';
