export * from './ingestion.types';
