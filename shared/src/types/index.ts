export * from './location';
export * from './trip';
export * from './user';
export * from './record';
