import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { optimizerConfig } from '../config/config';
import { SeoOptimizerController } from './seo-optimizer.controller';
import { SeoOptimizerService } from './seo-optimizer.service';

@Module({
  imports: [ConfigModule.forFeature(optimizerConfig)],
  controllers: [SeoOptimizerController],
  providers: [SeoOptimizerService],
  exports: [SeoOptimizerService],
})
export class SeoOptimizerModule {}
