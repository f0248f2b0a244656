export * from './strategy-selector.service';
export * from './text-chunker.service';
export * from './chunk-id-generator.service';
export * from './token-counter.service';
export * from './chunk-builder.service';
export * from './chunker-config';
