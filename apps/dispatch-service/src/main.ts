import 'reflect-metadata';
import { DispatchConfigService } from '@app/common/config/config.service';
import { ErrorFilter } from '@app/common/filters/error.filter';
import { ResponseInterceptor } from '@app/common/interceptors/response.interceptor';
import { Logger as NestLogger, ValidationPipe } from '@nestjs/common';
import { NestFactory, Reflector } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { Logger } from 'nestjs-pino';
import { DispatchModule } from './dispatch.module';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(DispatchModule, { bufferLogs: true });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );

  const logger = app.get(Logger);
  app.useLogger(logger);

  app.enableCors({
    origin: true,
    credentials: true,
  });

  app.use(helmet.hidePoweredBy());

  const reflector = app.get(Reflector);
  app.useGlobalInterceptors(new ResponseInterceptor(reflector, ['/health']));
  app.useGlobalFilters(new ErrorFilter());
  app.enableShutdownHooks();

  const config = app.get(DispatchConfigService);
  await app.listen(config.port);
  logger.log(`Dispatch service is running on port ${config.port}`);
}

bootstrap().catch(error => {
  new NestLogger('Bootstrap').error('Failed to start dispatch service', error);
  process.exit(1);
});
