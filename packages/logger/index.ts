export * from './src/logger';
export * from './src/helpers';
export * from './src/interfaces';
export * from './src/types';
export * from './src/transports/console';
