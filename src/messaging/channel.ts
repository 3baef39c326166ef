import { connect as mqttConnect, type IClientOptions } from 'mqtt';
import defaultLogger, { type ComponentLogger } from '../logger.js';
import { MessagingError, toError } from '../errors.js';

const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
const DEFAULT_KEEPALIVE_SECONDS = 60;

/** The slice of an MQTT client the channel drives. */
export interface MqttTransport {
  readonly connected: boolean;
  onConnect(listener: () => void): void;
  onClose(listener: () => void): void;
  onError(listener: (error: Error) => void): void;
  onMessage(listener: (topic: string, payload: Buffer) => void): void;
  publish(topic: string, payload: string, options: { qos: 0 | 1 | 2; retain: boolean }): Promise<void>;
  subscribe(topic: string): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  end(force: boolean): Promise<void>;
}

export type TransportFactory = (url: string, options: IClientOptions) => MqttTransport;

export type MessageHandler = (payload: string, topic: string) => void;

export type MqttChannelOptions = {
  url: string;
  clientId?: string;
  keepaliveSeconds?: number;
  connectTimeoutMs?: number;
  connect?: TransportFactory;
  logger?: ComponentLogger;
};

export function createMqttTransport(url: string, options: IClientOptions): MqttTransport {
  const client = mqttConnect(url, options);
  return {
    get connected() {
      return client.connected;
    },
    onConnect: listener => {
      client.on('connect', () => listener());
    },
    onClose: listener => {
      client.on('close', () => listener());
    },
    onError: listener => {
      client.on('error', error => listener(error));
    },
    onMessage: listener => {
      client.on('message', (topic, payload) => listener(topic, payload));
    },
    publish: async (topic, payload, publishOptions) => {
      await client.publishAsync(topic, payload, publishOptions);
    },
    subscribe: async topic => {
      await client.subscribeAsync(topic, { qos: 0 });
    },
    unsubscribe: async topic => {
      await client.unsubscribeAsync(topic);
    },
    end: async force => {
      await client.endAsync(force);
    }
  };
}

export class MqttChannel {
  private transport: MqttTransport | null = null;
  private connecting: Promise<void> | null = null;
  private readonly handlers = new Map<string, Set<MessageHandler>>();
  private closed = false;
  private readonly logger: ComponentLogger;

  constructor(private readonly options: MqttChannelOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  get url() {
    return this.options.url;
  }

  get connected(): boolean {
    return Boolean(this.transport?.connected) && !this.closed;
  }

  connect(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new MessagingError('MQTT channel has been closed'));
    }
    if (this.connecting) {
      return this.connecting;
    }

    const timeoutMs = this.options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    const factory = this.options.connect ?? createMqttTransport;
    const clientOptions: IClientOptions = {
      keepalive: this.options.keepaliveSeconds ?? DEFAULT_KEEPALIVE_SECONDS,
      connectTimeout: timeoutMs,
      reconnectPeriod: 1000
    };
    if (this.options.clientId) {
      clientOptions.clientId = this.options.clientId;
    }

    this.connecting = new Promise<void>((resolve, reject) => {
      let transport: MqttTransport;
      try {
        transport = factory(this.options.url, clientOptions);
      } catch (error) {
        this.connecting = null;
        const err = toError(error);
        reject(new MessagingError(`Failed to create MQTT client: ${err.message}`, { cause: err }));
        return;
      }
      this.transport = transport;

      let settled = false;
      const fail = (error: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.connecting = null;
        this.transport = null;
        transport.end(true).catch(endError => {
          this.logger.debug({ err: endError }, 'Failed to end MQTT client after connect failure');
        });
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(
          new MessagingError(
            `Timed out connecting to MQTT broker at ${this.options.url} after ${timeoutMs}ms`
          )
        );
      }, timeoutMs);

      transport.onConnect(() => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          this.logger.info({ url: this.options.url }, 'Connected to MQTT broker');
          resolve();
        } else {
          this.logger.info({ url: this.options.url }, 'Reconnected to MQTT broker');
        }
        this.resubscribe();
      });

      transport.onError(error => {
        if (!settled) {
          fail(
            new MessagingError(
              `Failed to connect to MQTT broker at ${this.options.url}: ${error.message}`,
              { cause: error }
            )
          );
          return;
        }
        this.logger.warn({ err: error }, 'MQTT client error');
      });

      transport.onClose(() => {
        if (settled && !this.closed) {
          this.logger.warn({ url: this.options.url }, 'MQTT connection closed');
        }
      });

      transport.onMessage((topic, payload) => {
        this.dispatch(topic, payload);
      });
    });

    return this.connecting;
  }

  async publish(topic: string, payload: string): Promise<void> {
    const transport = this.transport;
    if (!transport || !this.connected) {
      throw new MessagingError(`Cannot publish to ${topic}: MQTT client is not connected`);
    }

    try {
      await transport.publish(topic, payload, { qos: 0, retain: false });
    } catch (error) {
      const err = toError(error);
      throw new MessagingError(`Failed to publish to ${topic}: ${err.message}`, { cause: err });
    }
  }

  async subscribe(topic: string, handler: MessageHandler): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.add(handler);
      return;
    }

    this.handlers.set(topic, new Set([handler]));
    if (this.transport && this.connected) {
      await this.subscribeTopic(this.transport, topic);
    }
  }

  async unsubscribe(topic: string): Promise<void> {
    if (!this.handlers.delete(topic)) {
      return;
    }
    const transport = this.transport;
    if (transport && this.connected) {
      try {
        await transport.unsubscribe(topic);
      } catch (error) {
        this.logger.warn({ err: error, topic }, 'Failed to unsubscribe from MQTT topic');
      }
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.handlers.clear();

    const transport = this.transport;
    this.transport = null;
    this.connecting = null;
    if (!transport) {
      return;
    }

    try {
      await transport.end(false);
      this.logger.info({ url: this.options.url }, 'Disconnected from MQTT broker');
    } catch (error) {
      const err = toError(error);
      throw new MessagingError(`Failed to disconnect from MQTT broker: ${err.message}`, { cause: err });
    }
  }

  private resubscribe() {
    const transport = this.transport;
    if (!transport) {
      return;
    }
    for (const topic of this.handlers.keys()) {
      this.subscribeTopic(transport, topic).catch(error => {
        this.logger.warn({ err: error, topic }, 'Failed to subscribe to MQTT topic');
      });
    }
  }

  private async subscribeTopic(transport: MqttTransport, topic: string) {
    try {
      await transport.subscribe(topic);
      this.logger.debug({ topic }, 'Subscribed to MQTT topic');
    } catch (error) {
      const err = toError(error);
      throw new MessagingError(`Failed to subscribe to ${topic}: ${err.message}`, { cause: err });
    }
  }

  private dispatch(topic: string, payload: Buffer) {
    const handlers = this.handlers.get(topic);
    if (!handlers) {
      return;
    }
    const text = payload.toString('utf8');
    for (const handler of handlers) {
      try {
        handler(text, topic);
      } catch (error) {
        this.logger.error({ err: error, topic }, 'MQTT message handler failed');
      }
    }
  }
}
