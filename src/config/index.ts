import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { ThresholdBounds } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type MqttTopicsConfig = {
  light: string;
  speaker: string;
  rssi: string;
};

export type MqttConfig = {
  url: string;
  clientId?: string;
  keepaliveSeconds: number;
  connectTimeoutMs: number;
  topics: MqttTopicsConfig;
};

export type CameraConfig = {
  index: number;
  input?: string;
  format?: string;
  framesPerSecond: number;
  startTimeoutMs: number;
  staleFrameMs: number;
  restartDelayMs: number;
};

export type MicrophoneConfig = {
  sampleRate: number;
  blockDurationMs: number;
  channels: number;
  device?: string;
  format?: string;
};

export type ControlConfig = {
  tickPeriodMs: number;
  historyLength: number;
  minCommandIntervalMs: number;
  brightness: ThresholdBounds;
  volume: ThresholdBounds;
};

export type RssiConfig = {
  enabled: boolean;
};

export type WebConfig = {
  enabled: boolean;
  host: string;
  port: number;
  maxLogEntries: number;
};

export type RoomsenseConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  mqtt: MqttConfig;
  camera: CameraConfig;
  microphone: MicrophoneConfig;
  control: ControlConfig;
  rssi: RssiConfig;
  web: WebConfig;
};

export type ConfigOverrides = {
  cameraIndex?: number;
  listenRssi?: boolean;
  rssiTopic?: string;
  logLevel?: string;
};

type NumberField = { type: 'number'; minimum?: number; maximum?: number; integer?: boolean };
type StringField = { type: 'string'; enum?: readonly string[] };
type BooleanField = { type: 'boolean' };
/** Objects are closed: keys outside `properties` are rejected. */
type ObjectField = { type: 'object'; required: readonly string[]; properties: Record<string, ConfigField> };
type ConfigField = ObjectField | NumberField | StringField | BooleanField;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const boundsSchema: ObjectField = {
  type: 'object',
  required: ['low', 'high'],
  properties: {
    low: { type: 'number' },
    high: { type: 'number' }
  }
};

const roomsenseConfigSchema: ObjectField = {
  type: 'object',
  required: ['app', 'logging', 'mqtt', 'camera', 'microphone', 'control', 'rssi', 'web'],
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: {
        level: { type: 'string', enum: LOG_LEVELS }
      }
    },
    mqtt: {
      type: 'object',
      required: ['url', 'keepaliveSeconds', 'connectTimeoutMs', 'topics'],
      properties: {
        url: { type: 'string' },
        clientId: { type: 'string' },
        keepaliveSeconds: { type: 'number', minimum: 0 },
        connectTimeoutMs: { type: 'number', minimum: 1 },
        topics: {
          type: 'object',
          required: ['light', 'speaker', 'rssi'],
              properties: {
            light: { type: 'string' },
            speaker: { type: 'string' },
            rssi: { type: 'string' }
          }
        }
      }
    },
    camera: {
      type: 'object',
      required: ['index', 'framesPerSecond', 'startTimeoutMs', 'staleFrameMs', 'restartDelayMs'],
      properties: {
        index: { type: 'number', minimum: 0, integer: true },
        input: { type: 'string' },
        format: { type: 'string' },
        framesPerSecond: { type: 'number', minimum: 0.1, maximum: 60 },
        startTimeoutMs: { type: 'number', minimum: 1 },
        staleFrameMs: { type: 'number', minimum: 1 },
        restartDelayMs: { type: 'number', minimum: 0 }
      }
    },
    microphone: {
      type: 'object',
      required: ['sampleRate', 'blockDurationMs', 'channels'],
      properties: {
        sampleRate: { type: 'number', minimum: 1000, integer: true },
        blockDurationMs: { type: 'number', minimum: 10 },
        channels: { type: 'number', minimum: 1, maximum: 8, integer: true },
        device: { type: 'string' },
        format: { type: 'string' }
      }
    },
    control: {
      type: 'object',
      required: ['tickPeriodMs', 'historyLength', 'minCommandIntervalMs', 'brightness', 'volume'],
      properties: {
        tickPeriodMs: { type: 'number', minimum: 1 },
        historyLength: { type: 'number', minimum: 1, integer: true },
        minCommandIntervalMs: { type: 'number', minimum: 0 },
        brightness: boundsSchema,
        volume: boundsSchema
      }
    },
    rssi: {
      type: 'object',
      required: ['enabled'],
      properties: {
        enabled: { type: 'boolean' }
      }
    },
    web: {
      type: 'object',
      required: ['enabled', 'host', 'port', 'maxLogEntries'],
      properties: {
        enabled: { type: 'boolean' },
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535, integer: true },
        maxLogEntries: { type: 'number', minimum: 1, integer: true }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateObject(schema: ObjectField, value: unknown, pathLabel: string): string[] {
  if (!isRecord(value)) {
    return [`${pathLabel} must be an object`];
  }

  const errors: string[] = [];
  for (const key of schema.required) {
    if (!(key in value)) {
      errors.push(`${pathLabel}.${key} is required`);
    }
  }

  for (const key of Object.keys(value)) {
    if (!Object.hasOwn(schema.properties, key)) {
      errors.push(`${pathLabel}.${key} is not allowed`);
    }
  }

  for (const [key, field] of Object.entries(schema.properties)) {
    if (key in value) {
      errors.push(...validateField(field, value[key], `${pathLabel}.${key}`));
    }
  }

  return errors;
}

function validateNumber(schema: NumberField, value: unknown, pathLabel: string): string[] {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return [`${pathLabel} must be a number`];
  }

  const errors: string[] = [];
  if (schema.integer && !Number.isInteger(value)) {
    errors.push(`${pathLabel} must be an integer`);
  }
  if (typeof schema.minimum === 'number' && value < schema.minimum) {
    errors.push(`${pathLabel} must be >= ${schema.minimum}`);
  }
  if (typeof schema.maximum === 'number' && value > schema.maximum) {
    errors.push(`${pathLabel} must be <= ${schema.maximum}`);
  }
  return errors;
}

function validateField(schema: ConfigField, value: unknown, pathLabel: string): string[] {
  switch (schema.type) {
    case 'object':
      return validateObject(schema, value, pathLabel);
    case 'number':
      return validateNumber(schema, value, pathLabel);
    case 'string':
      if (typeof value !== 'string') {
        return [`${pathLabel} must be a string`];
      }
      if (schema.enum && !schema.enum.includes(value)) {
        return [`${pathLabel} must be one of ${schema.enum.join(', ')}`];
      }
      return [];
    case 'boolean':
      return typeof value === 'boolean' ? [] : [`${pathLabel} must be a boolean`];
  }
}

function matchesSchema(config: unknown, errors: string[]): config is RoomsenseConfig {
  errors.push(...validateObject(roomsenseConfigSchema, config, 'config'));
  return errors.length === 0;
}

export function validateConfig(config: unknown): asserts config is RoomsenseConfig {
  const errors: string[] = [];
  if (!matchesSchema(config, errors)) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): RoomsenseConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): RoomsenseConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: RoomsenseConfig) {
  const messages: string[] = [];

  for (const signal of ['brightness', 'volume'] as const) {
    const bounds = config.control[signal];
    if (bounds.low > bounds.high) {
      messages.push(
        `config.control.${signal}.low (${bounds.low}) must be <= config.control.${signal}.high (${bounds.high})`
      );
    }
  }

  const topics = config.mqtt.topics;
  for (const [key, topic] of Object.entries(topics)) {
    if (topic.trim().length === 0) {
      messages.push(`config.mqtt.topics.${key} must not be empty`);
    }
  }
  if (topics.light === topics.speaker) {
    messages.push('config.mqtt.topics.light and config.mqtt.topics.speaker must be distinct');
  }
  if (topics.rssi === topics.light || topics.rssi === topics.speaker) {
    messages.push('config.mqtt.topics.rssi must not reuse a command topic');
  }

  if (config.mqtt.url.trim().length === 0) {
    messages.push('config.mqtt.url must not be empty');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function applyOverrides(config: RoomsenseConfig, overrides: ConfigOverrides): RoomsenseConfig {
  const next: RoomsenseConfig = {
    ...config,
    logging: { ...config.logging },
    camera: { ...config.camera },
    rssi: { ...config.rssi },
    mqtt: { ...config.mqtt, topics: { ...config.mqtt.topics } }
  };

  if (typeof overrides.cameraIndex === 'number') {
    next.camera.index = overrides.cameraIndex;
  }
  if (overrides.listenRssi) {
    next.rssi.enabled = true;
  }
  if (typeof overrides.rssiTopic === 'string') {
    next.mqtt.topics.rssi = overrides.rssiTopic;
  }
  if (typeof overrides.logLevel === 'string') {
    next.logging.level = overrides.logLevel;
  }

  validateConfig(next);
  return next;
}

export const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config/default.json');

export type ConfigReloadEvent = {
  previous: RoomsenseConfig;
  next: RoomsenseConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: RoomsenseConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = DEFAULT_CONFIG_PATH, private readonly reloadDebounceMs = 100) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): RoomsenseConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): RoomsenseConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, this.reloadDebounceMs);
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher(): fs.FSWatcher {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.closeWatcher();
        this.watcher = this.createWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: RoomsenseConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

