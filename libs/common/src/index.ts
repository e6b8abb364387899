export * from './constants';
export * from './errors';
export * from './publish-message';
export * from './retry-policy';
export * from './utils';
