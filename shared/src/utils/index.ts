export * from './geo';
export * from './date';
