/**
 * Domain model exports.
 */

export * from './artifact';
export * from './checkout';
export * from './errors';
export * from './events';
export * from './outcome';
export * from './request';
export * from './run';
export * from './workspace';
