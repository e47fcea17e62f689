/**
 * Types barrel export
 */

export * from './base';
export * from './api';
export * from './database';
export * from './logging';
export * from './services';
export * from './entities';
