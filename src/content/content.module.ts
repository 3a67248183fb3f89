import { Global, Module } from '@nestjs/common';
import { EngineConfigService } from '../engine/engine-config.service.js';
import { ContentLoaderService } from './content-loader.service.js';

@Global()
@Module({
  providers: [EngineConfigService, ContentLoaderService],
  exports: [EngineConfigService, ContentLoaderService],
})
export class ContentModule {}
