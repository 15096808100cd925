import { REDIS_CLIENT } from '@app/database/redis/redis.module';
import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomUUID } from 'crypto';
import Redis from 'ioredis';
import { ALL_MESSAGING_EVENTS, EventPayloadMap, MessagingEvent } from './events/event-types';

export const MESSAGING_OPTIONS = 'MESSAGING_OPTIONS';

export interface MessagingOptions {
  serviceName: string;
  // Channels relayed from other instances; defaults to every known event
  channels?: readonly MessagingEvent[];
  channelPrefix?: string;
}

interface RelayedMessage {
  event: string;
  payload: unknown;
  source: string;
}

/**
 * Typed event bus. Every publish is delivered to local listeners first; when a
 * Redis client is configured the event is also relayed to the other
 * instances, which re-emit it locally.
 */
@Injectable()
export class MessagingService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MessagingService.name);
  private readonly instanceId = randomUUID();
  private readonly channelPrefix: string;
  private subscriberClient: Redis | null = null;
  private isInitialized = false;

  constructor(
    private readonly eventEmitter: EventEmitter2,
    @Inject(MESSAGING_OPTIONS) private readonly options: MessagingOptions,
    @Optional() @Inject(REDIS_CLIENT) private readonly publisherClient: Redis | null = null,
  ) {
    this.channelPrefix = options.channelPrefix ?? 'dispatch:';
  }

  async onModuleInit(): Promise<void> {
    if (!this.publisherClient) {
      this.logger.log('Messaging running in local-only mode');
      return;
    }

    try {
      this.subscriberClient = this.publisherClient.duplicate();
      await Promise.all([this.publisherClient.connect(), this.subscriberClient.connect()]);

      const channels = (this.options.channels ?? ALL_MESSAGING_EVENTS).map(event => this.toChannel(event));
      this.subscriberClient.on('message', (channel: string, message: string) => this.processRelayedMessage(channel, message));
      await this.subscriberClient.subscribe(...channels);

      this.isInitialized = true;
      this.logger.log(`Messaging relay ready for ${channels.length} channels (instance ${this.instanceId})`);
    } catch (error) {
      this.logger.error(`Messaging Redis connection failed: ${error instanceof Error ? error.message : 'Unknown error'}`);
      this.isInitialized = false;
    }
  }

  async onModuleDestroy(): Promise<void> {
    const clients = [this.publisherClient, this.subscriberClient].filter((client): client is Redis => client !== null);
    try {
      await Promise.all(clients.map(client => client.quit()));
    } catch (error) {
      this.logger.error(`Error closing Redis connections: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  emitLocal<T extends MessagingEvent>(event: T, payload: EventPayloadMap[T]): void {
    this.logger.debug(`[LOCAL] Emitting event: ${event}`);
    this.eventEmitter.emit(event, payload);
  }

  onLocal<T extends MessagingEvent>(event: T, callback: (payload: EventPayloadMap[T]) => void): void {
    this.logger.debug(`[LOCAL] Subscribing to event: ${event}`);
    this.eventEmitter.on(event, callback);
  }

  async publish<T extends MessagingEvent>(event: T, payload: EventPayloadMap[T]): Promise<void> {
    this.emitLocal(event, payload);

    if (!this.isInitialized || !this.publisherClient) {
      return;
    }

    try {
      const message: RelayedMessage = { event, payload, source: this.instanceId };
      await this.publisherClient.publish(this.toChannel(event), JSON.stringify(message));
      this.logger.debug(`[GLOBAL] Relayed event: ${event}`);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to relay event ${event}: ${errorMessage}`);
      throw error;
    }
  }

  isRelayReady(): boolean {
    return this.isInitialized;
  }

  private processRelayedMessage(channel: string, message: string): void {
    try {
      const data: unknown = JSON.parse(message);
      if (!this.isRelayedMessage(data)) {
        this.logger.warn(`Discarding malformed message on ${channel}`);
        return;
      }
      if (data.source === this.instanceId || this.toChannel(data.event) !== channel) {
        return;
      }

      this.logger.debug(`[GLOBAL] Received ${data.event} from instance ${data.source}`);
      this.eventEmitter.emit(data.event, data.payload);
    } catch (error) {
      this.logger.error(`Error processing message on ${channel}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private isRelayedMessage(value: unknown): value is RelayedMessage {
    if (typeof value !== 'object' || value === null) {
      return false;
    }
    const event: unknown = Reflect.get(value, 'event');
    const source: unknown = Reflect.get(value, 'source');
    return (
      typeof event === 'string' &&
      ALL_MESSAGING_EVENTS.some(known => known === event) &&
      typeof source === 'string' &&
      Reflect.has(value, 'payload')
    );
  }

  private toChannel(event: string): string {
    return `${this.channelPrefix}${event}`;
  }
}
