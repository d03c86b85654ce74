import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MicrosoftApisModule } from '../microsoft-apis/microsoft-apis.module';
import { SharepointDataExtractorService } from './sharepoint-data-extractor.service';
import { TextExtractionService } from './text-extraction.service';

@Module({
  imports: [ConfigModule, MicrosoftApisModule],
  providers: [TextExtractionService, SharepointDataExtractorService],
  exports: [SharepointDataExtractorService],
})
export class ExtractionModule {}
