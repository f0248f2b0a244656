export * from './ingest-request.dto';
export * from './ingest-request.mapper';
