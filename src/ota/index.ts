export * from './firmware';
export * from './session';
