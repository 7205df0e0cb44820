export * from './errors';
export * from './types';
export * from './utils';
export * from './constants/ordering';
