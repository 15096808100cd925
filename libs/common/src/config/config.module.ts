import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DispatchConfigService } from './config.service';
import { validateEnvironment } from './env.validation';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnvironment,
    }),
  ],
  providers: [DispatchConfigService],
  exports: [DispatchConfigService],
})
export class DispatchConfigModule {}
