export * from './constants';
export * from './errors';
export * from './logging.utils';
export * from './message-patterns';
export * from './message-types';
export * from './effective-batch';
