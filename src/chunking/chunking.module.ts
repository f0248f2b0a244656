import { Module } from '@nestjs/common';
import { ChunkStage } from './chunk.stage';
import {
  ChunkBuilderService,
  ChunkIdGeneratorService,
  StrategySelectorService,
  TextChunkerService,
  TokenCounterService,
} from './services';

@Module({
  providers: [
    ChunkStage,
    StrategySelectorService,
    TextChunkerService,
    ChunkIdGeneratorService,
    TokenCounterService,
    ChunkBuilderService,
  ],
  exports: [ChunkStage, ChunkIdGeneratorService, TextChunkerService],
})
export class ChunkingModule {}
