/**
 * Models layer exports for ScanPad structures.
 */

export * from './actions';
export * from './enums';
export * from './firmware';
