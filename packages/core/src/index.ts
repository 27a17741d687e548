export * from './types';
export * from './progress-info';
export * from './http-utils';
export * from './logger';
export * from './scheduler';
export * from './listener-registry';
export * from './counting-body';
export * from './progress-manager';
export * from './progress-store';
