export * from './types';
export * from './errors';
export * from './constants';
export * from './context';
export * from './config';
export * from './logging';
export * from './utils';
export * from './transaction';
