import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CacheModule } from '@nestjs/cache-manager';
import { optimizerConfig, validateEnvironment } from './config/config';
import { SeoOptimizerModule } from './seo-optimizer/seo-optimizer.module';
import { AppController } from './app.controller';
import { AppService } from './app.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [optimizerConfig],
      validate: validateEnvironment,
    }),
    CacheModule.register({
      isGlobal: true,
      ttl: 3_600_000,
    }),
    SeoOptimizerModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
