/**
 * Domain model exports.
 */

export * from './artifact';
export * from './async-polling';
export * from './credentials';
export * from './descriptor';
export * from './diagnostics';
export * from './errors';
export * from './events';
export * from './rollout';
export * from './run';
