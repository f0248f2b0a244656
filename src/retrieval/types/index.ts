export * from './retrieval.types';
