import { Global, Module } from '@nestjs/common';
import { RagConfigService } from './rag-config.service';

@Global()
@Module({
  providers: [RagConfigService],
  exports: [RagConfigService],
})
export class RagConfigModule {}
