import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { DispatchConfigModule } from '../config/config.module';
import { DispatchConfigService } from '../config/config.service';

@Module({
  imports: [
    LoggerModule.forRootAsync({
      imports: [DispatchConfigModule],
      inject: [DispatchConfigService],
      useFactory: (config: DispatchConfigService) => ({
        pinoHttp: {
          level: config.logLevel,
          transport: config.isProduction
            ? undefined
            : {
                target: 'pino-pretty',
                options: { singleLine: true, translateTime: 'SYS:standard' },
              },
          redact: ['req.headers["x-auth-signature"]', 'req.headers["x-auth-signature-data"]'],
          customProps: () => ({ service: 'dispatch-service' }),
          autoLogging: {
            ignore: req => req.url === '/health',
          },
        },
      }),
    }),
  ],
  exports: [LoggerModule],
})
export class LoggingModule {}
