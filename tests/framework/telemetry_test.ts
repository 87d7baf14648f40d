/**
 * Telemetry Tests
 */

import assert from 'node:assert/strict';
import { mock, test } from 'node:test';

import { trace } from '@opentelemetry/api';

import { isLogLevel, Logger, type LogEntry } from '../../framework/telemetry/logger.ts';
import {
  getActiveSpan,
  getOTELConfig,
  isOTELEnabled,
  setRouteAttribute,
  withSpan,
} from '../../framework/telemetry/otel.ts';

function withEnv(name: string, value: string | undefined, fn: () => void): void {
  const original = process.env[name];
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
  try {
    fn();
  } finally {
    if (original === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = original;
    }
  }
}

// Logger Tests

test('Logger - filters entries below its level', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'warn', output: (entry) => entries.push(entry) });

  logger.debug('debug message');
  logger.info('info message');
  logger.warn('warn message');

  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['warn message']
  );
  assert.equal(logger.isLevelEnabled('error'), true);
  assert.equal(logger.isLevelEnabled('info'), false);
});

test('Logger - child merges context', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ context: { service: 'routes' }, output: (entry) => entries.push(entry) });

  logger.child({ component: 'router' }).info('ready', { routes: 3 });

  assert.deepEqual(entries[0].context, { service: 'routes', component: 'router', routes: 3 });
});

test('Logger - error entries carry the error', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ output: (entry) => entries.push(entry) });

  logger.error('failed', new TypeError('bad input'));

  assert.equal(entries[0].level, 'error');
  assert.equal(entries[0].error?.name, 'TypeError');
  assert.equal(entries[0].error?.message, 'bad input');
});

test('Logger.setLevel - changes filtering', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'error', output: (entry) => entries.push(entry) });

  logger.info('dropped');
  logger.setLevel('debug');
  logger.debug('kept');

  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['kept']
  );
});

test('isLogLevel - recognizes levels', () => {
  assert.equal(isLogLevel('debug'), true);
  assert.equal(isLogLevel('trace'), false);
  assert.equal(isLogLevel(3), false);
});

// OpenTelemetry Tests

test('isOTELEnabled - follows OTEL_ENABLED', () => {
  withEnv('OTEL_ENABLED', undefined, () => assert.equal(isOTELEnabled(), false));
  withEnv('OTEL_ENABLED', 'true', () => assert.equal(isOTELEnabled(), true));
});

test('getOTELConfig - reads the service name', () => {
  withEnv('OTEL_SERVICE_NAME', 'test-service', () => {
    assert.equal(getOTELConfig().serviceName, 'test-service');
  });
  withEnv('OTEL_SERVICE_NAME', undefined, () => {
    assert.equal(getOTELConfig().serviceName, 'route-table');
  });
});

test('getActiveSpan - undefined when disabled', () => {
  withEnv('OTEL_ENABLED', undefined, () => assert.equal(getActiveSpan(), undefined));
});

test('setRouteAttribute - no-op without an active span', () => {
  withEnv('OTEL_ENABLED', 'true', () => {
    assert.doesNotThrow(() => setRouteAttribute('/user/{id}', 'get'));
  });
});

test('withSpan - returns the result', async () => {
  const result = await withSpan('test', async () => 42);

  assert.equal(result, 42);
});

test('withSpan - rethrows errors', async () => {
  await assert.rejects(
    withSpan('test', async () => {
      throw new Error('boom');
    }),
    { message: 'boom' }
  );
});

test('withSpan - names the tracer after OTEL_SERVICE_NAME', async () => {
  const enabled = process.env.OTEL_ENABLED;
  const serviceName = process.env.OTEL_SERVICE_NAME;
  process.env.OTEL_ENABLED = 'true';
  process.env.OTEL_SERVICE_NAME = 'orders-service';
  const getTracer = mock.method(trace, 'getTracer');

  try {
    assert.equal(await withSpan('test', async () => 'done'), 'done');
    assert.deepEqual(
      getTracer.mock.calls.map((call) => call.arguments[0]),
      ['orders-service']
    );
  } finally {
    getTracer.mock.restore();
    if (enabled === undefined) delete process.env.OTEL_ENABLED;
    else process.env.OTEL_ENABLED = enabled;
    if (serviceName === undefined) delete process.env.OTEL_SERVICE_NAME;
    else process.env.OTEL_SERVICE_NAME = serviceName;
  }
});
