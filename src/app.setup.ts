import { INestApplication } from '@nestjs/common';
import { appConfig } from './config/app.config';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { createValidationPipe } from './common/validation/validation.pipe';

/** Global pipes, filters and HTTP settings shared by main and the HTTP tests. */
export function configureApp(app: INestApplication): INestApplication {
  if (appConfig.apiPrefix) {
    app.setGlobalPrefix(appConfig.apiPrefix);
  }
  app.enableCors({ origin: appConfig.corsOrigin, credentials: true });
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApiExceptionFilter());
  return app;
}
