export * from './mock-bearer';
