import { DynamicModule, FactoryProvider, Module, ModuleMetadata } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { MESSAGING_OPTIONS, MessagingOptions, MessagingService } from './messaging.service';

export interface MessagingModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<MessagingOptions | Promise<MessagingOptions>>['useFactory'];
  inject?: FactoryProvider['inject'];
}

@Module({})
export class MessagingModule {
  static forRoot(options: MessagingOptions = { serviceName: 'default' }): DynamicModule {
    return {
      module: MessagingModule,
      imports: [EventEmitterModule.forRoot({ wildcard: false, maxListeners: 20 })],
      providers: [{ provide: MESSAGING_OPTIONS, useValue: options }, MessagingService],
      exports: [MessagingService],
      global: true,
    };
  }

  static forRootAsync(options: MessagingModuleAsyncOptions): DynamicModule {
    return {
      module: MessagingModule,
      imports: [EventEmitterModule.forRoot({ wildcard: false, maxListeners: 20 }), ...(options.imports ?? [])],
      providers: [
        {
          provide: MESSAGING_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        MessagingService,
      ],
      exports: [MessagingService],
      global: true,
    };
  }
}
