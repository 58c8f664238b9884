import { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { ApiExceptionFilter } from './common/api-exception.filter';
import { createValidationPipe } from './common/validation.pipe';

export interface AppSetupOptions {
  apiPrefix: string;
  environment: string;
  corsOrigins: string[];
  bodyLimit: string;
}

export const DEFAULT_SETUP_OPTIONS: AppSetupOptions = {
  apiPrefix: 'api',
  environment: 'development',
  corsOrigins: ['*'],
  bodyLimit: '1mb',
};

/** Global middleware, pipes and filters shared by the server and the e2e tests. */
export function configureApp(app: NestExpressApplication, options: AppSetupOptions): void {
  app.useBodyParser('json', { limit: options.bodyLimit });

  // ======== Helmet CSP =========
  app.use(
    helmet({
      contentSecurityPolicy:
        options.environment === 'production'
          ? {
              directives: {
                defaultSrc: [`'self'`],
                scriptSrc: [`'self'`, `'unsafe-inline'`, 'cdn.jsdelivr.net'],
                styleSrc: [`'self'`, 'data:', 'validator.swagger.io'],
              },
            }
          : false,
    }),
  );

  // ======== Global Setup =========
  app.setGlobalPrefix(options.apiPrefix);
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApiExceptionFilter());

  // ======== CORS =========
  app.enableCors({
    origin: options.corsOrigins.includes('*') ? '*' : options.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'X-Requested-With'],
    maxAge: 86400,
  });
}
