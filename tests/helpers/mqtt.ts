import { EventEmitter } from 'node:events';
import type { IClientOptions } from 'mqtt';
import type { MqttTransport, TransportFactory } from '../../src/messaging/channel.js';

export type PublishedMessage = {
  topic: string;
  payload: string;
  options: { qos: 0 | 1 | 2; retain: boolean };
};

/** In-process stand-in for an MQTT client connection. */
export class FakeMqttTransport extends EventEmitter implements MqttTransport {
  connected = false;
  readonly published: PublishedMessage[] = [];
  readonly subscribeCalls: string[] = [];
  readonly unsubscribeCalls: string[] = [];
  readonly endCalls: boolean[] = [];
  publishError: Error | null = null;

  constructor(
    readonly url: string,
    readonly clientOptions: IClientOptions
  ) {
    super();
  }

  onConnect(listener: () => void) {
    this.on('connect', listener);
  }

  onClose(listener: () => void) {
    this.on('close', listener);
  }

  onError(listener: (error: Error) => void) {
    this.on('error', listener);
  }

  onMessage(listener: (topic: string, payload: Buffer) => void) {
    this.on('message', listener);
  }

  async publish(topic: string, payload: string, options: { qos: 0 | 1 | 2; retain: boolean }) {
    if (this.publishError) {
      throw this.publishError;
    }
    this.published.push({ topic, payload, options });
  }

  async subscribe(topic: string) {
    this.subscribeCalls.push(topic);
  }

  async unsubscribe(topic: string) {
    this.unsubscribeCalls.push(topic);
  }

  async end(force: boolean) {
    this.endCalls.push(force);
    this.connected = false;
  }

  simulateConnect() {
    this.connected = true;
    this.emit('connect');
  }

  simulateDisconnect() {
    this.connected = false;
    this.emit('close');
  }

  simulateError(error: Error) {
    this.emit('error', error);
  }

  simulateMessage(topic: string, payload: string) {
    this.emit('message', topic, Buffer.from(payload, 'utf8'));
  }
}

export function createFakeBroker(options: { autoConnect?: boolean } = {}) {
  const transports: FakeMqttTransport[] = [];
  const connect: TransportFactory = (url, clientOptions) => {
    const transport = new FakeMqttTransport(url, clientOptions);
    transports.push(transport);
    if (options.autoConnect ?? true) {
      queueMicrotask(() => transport.simulateConnect());
    }
    return transport;
  };
  return { connect, transports };
}
