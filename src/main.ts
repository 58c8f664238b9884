import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { SERVICE_NAME, SERVICE_VERSION } from './app.service';

// ======== Load .env file =========
const envPath = path.resolve(
  process.cwd(),
  `.env${process.env.NODE_ENV ? `.${process.env.NODE_ENV}` : ''}`,
);
dotenv.config({ path: envPath, override: true });

const logger = new Logger('Bootstrap');

async function bootstrap() {
  try {
    logger.log(`Loading environment from: ${envPath}`);
    logger.log('🚀 Starting NestJS application...');
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
      bufferLogs: true,
      abortOnError: false,
    });

    const configService = app.get(ConfigService);
    const port = Number(configService.get<string>('PORT', '3000'));
    const environment = configService.get<string>('NODE_ENV', 'development');
    const apiPrefix = configService.get<string>('API_PREFIX', 'api');
    const corsOrigins = configService
      .get<string>('CORS_ORIGINS', '*')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean);
    const bodyLimit = configService.get<string>('BODY_LIMIT', '1mb');

    logger.log(`📌 Environment: ${environment}`);
    logger.log(`📌 PORT: ${port}`);
    logger.log(`📌 API Prefix: ${apiPrefix}`);
    logger.log(`🛡️ CORS Origins: ${corsOrigins.join(', ')}`);

    configureApp(app, { apiPrefix, environment, corsOrigins, bodyLimit });

    // ======== Swagger =========
    if (environment !== 'production') {
      const swaggerConfig = new DocumentBuilder()
        .setTitle(configService.get<string>('SWAGGER_TITLE', SERVICE_NAME))
        .setDescription(
          configService.get<string>(
            'SWAGGER_DESCRIPTION',
            'Rewrites blog HTML around a focus keyword and rescores it for on-page SEO',
          ),
        )
        .setVersion(SERVICE_VERSION)
        .addServer(
          configService.get<string>('SWAGGER_LOCAL_SERVER', `http://localhost:${port}`),
          'Local Development',
        )
        .build();

      const document = SwaggerModule.createDocument(app, swaggerConfig);
      SwaggerModule.setup(`${apiPrefix}/docs`, app, document, {
        explorer: true,
        swaggerOptions: {
          filter: true,
          showRequestDuration: true,
        },
      });

      logger.log(`📚 Swagger UI: http://localhost:${port}/${apiPrefix}/docs`);
    }

    await app.listen(port);
    logger.log(`✅ Application running in ${environment}`);
    logger.log(`✅ Server listening on http://localhost:${port}`);
    logger.log(`✅ API available at /${apiPrefix}`);
  } catch (err) {
    logger.error(
      '❌ Application startup failed',
      err instanceof Error ? err.stack : String(err),
    );
    process.exit(1);
  }
}
void bootstrap();
