#!/usr/bin/env node
import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  applyOverrides,
  type ConfigOverrides,
  type RoomsenseConfig
} from './config/index.js';
import { startController, type ControllerRuntime, type ControllerStartOptions } from './run-controller.js';
import { toError } from './errors.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

export type CliDependencies = {
  startController: (options: ControllerStartOptions) => Promise<ControllerRuntime>;
  createConfigManager: (filePath: string) => ConfigManager;
  /** Resolves with the first termination signal received. */
  waitForSignal: () => Promise<NodeJS.Signals>;
};

export type CliArgs = {
  help: boolean;
  configPath: string;
  overrides: ConfigOverrides;
  errors: string[];
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: roomsense [options]',
  '',
  'Options:',
  '  --camera-index <n>    Camera device index (default from config)',
  '  --verbose             Log at debug level',
  '  --listen-rssi         Subscribe to RSSI reports',
  '  --rssi-topic <topic>  Topic for RSSI reports (default from config)',
  '  --config <path>       Configuration file (default config/default.json)',
  '  -h, --help            Show this help'
];

const USAGE = USAGE_LINES.join('\n');

function waitForTerminationSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    const handleSignal = (signal: NodeJS.Signals) => {
      for (const other of signals) {
        process.off(other, handleSignal);
      }
      resolve(signal);
    };
    for (const signal of signals) {
      process.once(signal, handleSignal);
    }
  });
}

const DEFAULT_DEPENDENCIES: CliDependencies = {
  startController,
  createConfigManager: filePath => new ConfigManager(filePath),
  waitForSignal: waitForTerminationSignal
};

function readValue(args: string[], index: number, flag: string, errors: string[]): string | null {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    errors.push(`Missing value for ${flag}`);
    return null;
  }
  return value;
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    help: false,
    configPath: DEFAULT_CONFIG_PATH,
    overrides: {},
    errors: []
  };

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (!token) {
      continue;
    }

    switch (token) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }
      case '--verbose': {
        result.overrides.logLevel = 'debug';
        break;
      }
      case '--listen-rssi': {
        result.overrides.listenRssi = true;
        break;
      }
      case '--camera-index': {
        const value = readValue(args, index, token, result.errors);
        if (value === null) {
          break;
        }
        index += 1;
        const parsed = Number(value);
        if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
          result.errors.push(`Invalid camera index "${value}"`);
        } else {
          result.overrides.cameraIndex = parsed;
        }
        break;
      }
      case '--rssi-topic': {
        const value = readValue(args, index, token, result.errors);
        if (value === null) {
          break;
        }
        index += 1;
        if (value.trim().length === 0) {
          result.errors.push('RSSI topic must not be empty');
        } else {
          result.overrides.rssiTopic = value;
        }
        break;
      }
      case '--config': {
        const value = readValue(args, index, token, result.errors);
        if (value === null) {
          break;
        }
        index += 1;
        result.configPath = path.resolve(value);
        break;
      }
      default: {
        result.errors.push(`Unknown option: ${token}`);
      }
    }
  }

  return result;
}

export async function runCli(
  argv = process.argv.slice(2),
  io: CliIo = DEFAULT_IO,
  dependencies: Partial<CliDependencies> = {}
): Promise<number> {
  const deps: CliDependencies = { ...DEFAULT_DEPENDENCIES, ...dependencies };
  const parsed = parseCliArgs(argv);

  if (parsed.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  if (parsed.errors.length > 0) {
    for (const message of parsed.errors) {
      io.stderr.write(`${message}\n`);
    }
    io.stderr.write(`${USAGE}\n`);
    return 1;
  }

  let manager: ConfigManager;
  let config: RoomsenseConfig;
  try {
    manager = deps.createConfigManager(parsed.configPath);
    config = applyOverrides(manager.getConfig(), parsed.overrides);
    setLogLevel(config.logging.level);
  } catch (error) {
    const err = toError(error);
    logger.error({ err, configPath: parsed.configPath }, 'Invalid configuration');
    io.stderr.write(`Invalid configuration: ${err.message}\n`);
    return 1;
  }

  const signal = deps.waitForSignal();

  let runtime: ControllerRuntime;
  try {
    runtime = await deps.startController({
      config,
      configManager: manager,
      overrides: parsed.overrides
    });
  } catch (error) {
    const err = toError(error);
    logger.error({ err }, 'roomsense failed to start');
    io.stderr.write(`roomsense failed to start: ${err.message}\n`);
    return 1;
  }

  io.stdout.write('roomsense started\n');

  const outcome = await Promise.race([
    signal.then(received => ({ kind: 'signal' as const, signal: received })),
    runtime.done.then(
      () => ({ kind: 'exited' as const }),
      (error: unknown) => ({ kind: 'failed' as const, error: toError(error) })
    )
  ]);

  if (outcome.kind === 'failed') {
    logger.error({ err: outcome.error }, 'Controller stopped with an error');
    io.stderr.write(`roomsense stopped with an error: ${outcome.error.message}\n`);
    return 1;
  }

  if (outcome.kind === 'signal') {
    logger.info({ signal: outcome.signal }, 'Shutting down');
    try {
      await runtime.stop();
    } catch (error) {
      const err = toError(error);
      logger.error({ err }, 'Error during shutdown');
      io.stderr.write(`Error during shutdown: ${err.message}\n`);
      return 1;
    }
  }

  io.stdout.write('roomsense stopped\n');
  return 0;
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'roomsense CLI failed');
      process.exit(1);
    }
  );
}

export { USAGE };
