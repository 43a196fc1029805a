export * from './record.schema';
