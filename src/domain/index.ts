/**
 * Domain model exports.
 */

export * from './approval';
export * from './audit';
export * from './errors';
export * from './group';
export * from './mitigation';
export * from './principal';
export * from './result';
export * from './risk';
