/**
 * Offline (optical-code) frame exports.
 */

export * from './container';
export * from './fragments';
export * from './frames';
