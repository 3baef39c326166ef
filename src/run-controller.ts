import loggerModule, { setLogLevel, type ComponentLogger } from './logger.js';
import defaultMetrics, { type MetricsRegistry } from './metrics/index.js';
import {
  applyOverrides,
  type CameraConfig,
  type ConfigManager,
  type ConfigOverrides,
  type ConfigReloadEvent,
  type MicrophoneConfig,
  type MqttConfig,
  type RoomsenseConfig
} from './config/index.js';
import { ControlLoop, type BrightnessSensor, type ControllerState, type VolumeSensor } from './control/loop.js';
import { PublishThrottle } from './control/throttle.js';
import { createDefaultPolicies } from './control/thresholdPolicy.js';
import { CameraSource } from './sensors/camera.js';
import { MicrophoneSource } from './sensors/microphone.js';
import { MqttChannel } from './messaging/channel.js';
import { RssiSubscriber } from './messaging/rssiSubscriber.js';
import { LogBuffer } from './server/logBuffer.js';
import { startHttpServer, type HttpServerOptions, type HttpServerRuntime } from './server/http.js';
import { COMMAND_PAYLOADS, type Destination } from './types.js';
import { toError } from './errors.js';

export type ControllerCamera = BrightnessSensor & {
  open(): Promise<void>;
  release(): Promise<void>;
};

export type ControllerMicrophone = VolumeSensor & {
  open(): Promise<void>;
};

export type ControllerChannel = Pick<
  MqttChannel,
  'connect' | 'publish' | 'subscribe' | 'unsubscribe' | 'close'
>;

export type ChannelRole = 'commands' | 'rssi';

export interface ControllerFactories {
  createCamera: (config: CameraConfig) => ControllerCamera;
  createMicrophone: (config: MicrophoneConfig) => ControllerMicrophone;
  createChannel: (config: MqttConfig, role: ChannelRole) => ControllerChannel;
  startHttpServer: (options: HttpServerOptions) => Promise<HttpServerRuntime>;
}

export interface ControllerStartOptions {
  config: RoomsenseConfig;
  configManager?: ConfigManager;
  overrides?: ConfigOverrides;
  factories?: Partial<ControllerFactories>;
  logger?: ComponentLogger;
  metrics?: MetricsRegistry;
  now?: () => number;
}

export type ControllerRuntime = {
  loop: ControlLoop;
  logBuffer: LogBuffer;
  http: HttpServerRuntime | null;
  rssi: RssiSubscriber | null;
  /** Settles once the loop has exited and every collaborator is released. */
  done: Promise<void>;
  state: () => ControllerState;
  stop: () => Promise<void>;
};

type Resource = {
  name: string;
  release: () => Promise<void>;
};

function channelClientId(config: MqttConfig, role: ChannelRole): string | undefined {
  if (!config.clientId) {
    return undefined;
  }
  return role === 'commands' ? config.clientId : `${config.clientId}-${role}`;
}

const DEFAULT_FACTORIES: ControllerFactories = {
  createCamera: config => new CameraSource({ ...config }),
  createMicrophone: config => new MicrophoneSource({ ...config }),
  createChannel: (config, role) =>
    new MqttChannel({
      url: config.url,
      clientId: channelClientId(config, role),
      keepaliveSeconds: config.keepaliveSeconds,
      connectTimeoutMs: config.connectTimeoutMs
    }),
  startHttpServer
};

async function releaseAll(resources: Resource[], logger: ComponentLogger): Promise<void> {
  let firstError: Error | null = null;
  for (const resource of resources) {
    try {
      await resource.release();
      logger.debug({ resource: resource.name }, 'Released resource');
    } catch (error) {
      const err = toError(error);
      firstError ??= err;
      logger.error({ err, resource: resource.name }, 'Failed to release resource');
    }
  }
  resources.length = 0;
  if (firstError) {
    throw firstError;
  }
}

export async function startController(options: ControllerStartOptions): Promise<ControllerRuntime> {
  const logger = options.logger ?? loggerModule;
  const metrics = options.metrics ?? defaultMetrics;
  const factories: ControllerFactories = { ...DEFAULT_FACTORIES, ...options.factories };
  const config = options.config;

  const logBuffer = new LogBuffer(config.web.maxLogEntries);
  const resources: Resource[] = [];
  let loop: ControlLoop | null = null;
  let rssi: RssiSubscriber | null = null;
  let http: HttpServerRuntime | null = null;

  try {
    const camera = factories.createCamera(config.camera);
    await camera.open();
    resources.push({ name: 'camera', release: () => camera.release() });

    const microphone = factories.createMicrophone(config.microphone);
    await microphone.open();

    const commandChannel = factories.createChannel(config.mqtt, 'commands');
    await commandChannel.connect();
    resources.push({ name: 'mqtt', release: () => commandChannel.close() });

    if (config.rssi.enabled) {
      const subscriber = new RssiSubscriber({
        topic: config.mqtt.topics.rssi,
        createChannel: () => factories.createChannel(config.mqtt, 'rssi'),
        logger,
        metrics,
        now: options.now
      });
      await subscriber.start();
      resources.push({ name: 'rssi', release: () => subscriber.stop() });
      rssi = subscriber;
    }

    if (config.web.enabled) {
      // The log mirror is optional; the loop runs without it.
      try {
        const server = await factories.startHttpServer({
          buffer: logBuffer,
          host: config.web.host,
          port: config.web.port,
          metrics,
          getState: () => loop?.state ?? 'initializing'
        });
        resources.push({ name: 'http', release: () => server.close() });
        http = server;
      } catch (error) {
        logger.error(
          { err: toError(error), host: config.web.host, port: config.web.port },
          'Web log mirror failed to start'
        );
      }
    }

    const throttle = new PublishThrottle({
      minIntervalMs: config.control.minCommandIntervalMs,
      logger,
      metrics,
      send: (destination: Destination, command) =>
        commandChannel.publish(config.mqtt.topics[destination], COMMAND_PAYLOADS[command])
    });

    loop = new ControlLoop({
      camera,
      microphone,
      throttle,
      rssi,
      logBuffer,
      policies: createDefaultPolicies(config.control.brightness, config.control.volume),
      historyLength: config.control.historyLength,
      tickPeriodMs: config.control.tickPeriodMs,
      logger,
      metrics,
      now: options.now,
      onShutdown: async () => {
        detachConfig();
        await releaseAll(resources, logger);
        logger.info('Controller stopped');
      }
    });
  } catch (error) {
    logger.error({ err: error }, 'Controller startup failed');
    await releaseAll(resources.reverse(), logger).catch(releaseError => {
      logger.warn({ err: releaseError }, 'Cleanup after failed startup was incomplete');
    });
    throw error;
  }

  const activeLoop = loop;
  const manager = options.configManager;
  let stopWatching: (() => void) | null = null;

  const handleReload = ({ next }: ConfigReloadEvent) => {
    try {
      const effective = applyOverrides(next, options.overrides ?? {});
      setLogLevel(effective.logging.level);
      activeLoop.updateOptions({
        tickPeriodMs: effective.control.tickPeriodMs,
        minCommandIntervalMs: effective.control.minCommandIntervalMs,
        brightness: effective.control.brightness,
        volume: effective.control.volume
      });
      logger.info({ configPath: manager?.getPath() }, 'Configuration reloaded');
    } catch (error) {
      logger.warn({ err: error }, 'Failed to apply reloaded configuration');
    }
  };

  const handleConfigError = (error: unknown) => {
    logger.warn(
      { err: error, configPath: manager?.getPath(), restored: true },
      'Configuration reload failed'
    );
  };

  function detachConfig() {
    if (!manager) {
      return;
    }
    manager.off('reload', handleReload);
    manager.off('error', handleConfigError);
    stopWatching?.();
    stopWatching = null;
  }

  if (manager) {
    manager.on('reload', handleReload);
    manager.on('error', handleConfigError);
    stopWatching = manager.watch();
  }

  logger.info(
    {
      commandTopics: { light: config.mqtt.topics.light, speaker: config.mqtt.topics.speaker },
      rssiTopic: rssi ? rssi.topic : null,
      web: http ? { host: config.web.host, port: http.port } : null,
      tickPeriodMs: config.control.tickPeriodMs
    },
    'Controller started'
  );

  const done = activeLoop.run();

  return {
    loop: activeLoop,
    logBuffer,
    http,
    rssi,
    done,
    state: () => activeLoop.state,
    stop: async () => {
      activeLoop.stop();
      await done;
    }
  };
}
