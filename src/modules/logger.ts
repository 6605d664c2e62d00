// src/modules/logger.ts
/**
 * Process-wide pino logger.
 * - JSON to stdout by default, pino-pretty when LOG_PRETTY=true and the module resolves.
 * - Silent under mocha unless LOG_LEVEL asks otherwise.
 * - Components log through children so every line carries `component`.
 */

import pino from 'pino';

const IS_TEST =
  process.env.NODE_ENV === 'test' ||
  process.env.MOCHA === 'true' ||
  process.argv.some((arg) => arg.includes('mocha'));

const LOG_LEVEL = process.env.LOG_LEVEL || (IS_TEST ? 'silent' : 'info');

export type LogComponent = 'config' | 'route' | 'pair' | 'weth' | 'swap-data' | 'sim';

function prettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function createLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: LOG_LEVEL,
    base: { service: 'swap-route-engine' },
  };

  const wantPretty = String(process.env.LOG_PRETTY || '').toLowerCase() === 'true';
  if (IS_TEST || !wantPretty || !prettyAvailable()) {
    return pino(options);
  }

  return pino(
    options,
    pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        singleLine: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
      },
    })
  );
}

const logger = createLogger();

export function componentLogger(component: LogComponent): pino.Logger {
  return logger.child({ component });
}

export default logger;
