import { INestApplication, ValidationPipe } from '@nestjs/common';
import { RebalanceExceptionFilter } from './common/filters/rebalance-exception.filter';

// Request validation and error mapping shared by the server and its HTTP tests
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true }));
  app.useGlobalFilters(new RebalanceExceptionFilter());
  return app;
}
