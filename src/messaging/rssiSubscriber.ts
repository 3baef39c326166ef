import defaultLogger, { type ComponentLogger } from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { RssiPayloadError, toError } from '../errors.js';
import type { RssiSnapshot } from '../types.js';
import type { MqttChannel } from './channel.js';
import { RssiCache } from './rssi.js';

export const DEFAULT_RSSI_TOPIC = 'RSSI';

export type RssiChannel = Pick<MqttChannel, 'connect' | 'subscribe' | 'unsubscribe' | 'close'>;

export type RssiSubscriberOptions = {
  topic?: string;
  createChannel: () => RssiChannel;
  cache?: RssiCache;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  now?: () => number;
};

export class RssiSubscriber {
  readonly topic: string;
  private readonly cache: RssiCache;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsRegistry;
  private readonly now: () => number;
  private channel: RssiChannel | null = null;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: RssiSubscriberOptions) {
    this.topic = options.topic ?? DEFAULT_RSSI_TOPIC;
    this.cache = options.cache ?? new RssiCache();
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? metrics;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.channel !== null;
  }

  snapshot(): RssiSnapshot | null {
    return this.cache.snapshot();
  }

  start(): Promise<void> {
    if (this.starting) {
      return this.starting;
    }
    if (this.channel) {
      return Promise.resolve();
    }

    this.starting = this.open().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch(error => {
        this.logger.debug({ err: error }, 'RSSI subscriber start failed before stop');
      });
    }
    if (this.stopping) {
      return this.stopping;
    }
    const channel = this.channel;
    if (!channel) {
      return;
    }

    this.stopping = (async () => {
      this.channel = null;
      try {
        await channel.unsubscribe(this.topic);
      } finally {
        await channel.close();
        this.logger.info({ topic: this.topic }, 'RSSI subscriber stopped');
      }
    })().finally(() => {
      this.stopping = null;
    });

    return this.stopping;
  }

  handleMessage(payload: string) {
    try {
      const snapshot = this.cache.update(payload, this.now());
      this.metrics.recordRssiUpdate(snapshot.receivedAt);
      this.logger.debug({ rssi: snapshot.rssi, timestamp: snapshot.timestamp }, 'RSSI updated');
    } catch (error) {
      this.metrics.recordRssiRejected();
      const err = toError(error);
      const context = error instanceof RssiPayloadError ? { payload: error.payload } : {};
      this.logger.warn({ err, topic: this.topic, ...context }, 'Discarded malformed RSSI payload');
    }
  }

  private async open() {
    const channel = this.options.createChannel();
    try {
      await channel.connect();
      await channel.subscribe(this.topic, payload => this.handleMessage(payload));
    } catch (error) {
      await channel.close().catch(closeError => {
        this.logger.debug({ err: closeError }, 'Failed to close RSSI channel after start failure');
      });
      throw error;
    }
    this.channel = channel;
    this.logger.info({ topic: this.topic }, 'RSSI subscriber started');
  }
}
