/**
 * Protocol layer exports for ScanPad communication.
 */

export * from './constants';
export * from './actions';
export * from './commands';
export * from './responses';
