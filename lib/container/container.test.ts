/**
 * Container Tests
 *
 * Tests for the dependency injection container and the service registry
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { Container } from './container.ts';
import { initializeContainer, ServiceKeys } from './registry.ts';
import { parseServerConfig } from '../config/app-config.ts';
import { StructuredLogger } from '../observability/logging/structured-logger.ts';
import { CorrelationContext } from '../observability/tracing/trace-context.ts';
import { createTestConfig } from '../../tests/test-utils.ts';

// Test interfaces
interface TestService {
  getValue(): string;
}

class TestServiceImpl implements TestService {
  constructor(private value: string) {}

  getValue(): string {
    return this.value;
  }
}

interface TestServices {
  testService: TestService;
  service1: TestService;
  service2: TestService;
}

test('Container - basic registration and resolution', () => {
  const container = new Container<TestServices>();

  container.register('testService', () => new TestServiceImpl('test-value'));

  assert.equal(container.get('testService').getValue(), 'test-value');
});

test('Container - singleton pattern', () => {
  const container = new Container<TestServices>();
  let created = 0;
  container.register('testService', () => {
    created++;
    return new TestServiceImpl('singleton-test');
  });

  const service1 = container.get('testService');
  const service2 = container.get('testService');

  assert.equal(service1, service2);
  assert.equal(created, 1);
});

test('Container - service not found error', () => {
  const container = new Container<TestServices>();

  assert.throws(() => container.get('testService'), { message: 'Service testService not registered' });
});

test('Container - duplicate registration error', () => {
  const container = new Container<TestServices>();
  container.register('testService', () => new TestServiceImpl('test'));

  assert.throws(
    () => container.register('testService', () => new TestServiceImpl('test2')),
    { message: 'Service testService is already registered' },
  );
});

test('Container - factory failures name the service and keep the cause', () => {
  const container = new Container<TestServices>();
  const cause = new Error('boom');
  container.register('testService', () => {
    throw cause;
  });

  assert.throws(
    () => container.get('testService'),
    (error: unknown) =>
      error instanceof Error &&
      error.message === 'Failed to create service testService: boom' &&
      error.cause === cause,
  );
});

test('Container - has, clear and getRegisteredKeys', () => {
  const container = new Container<TestServices>();
  assert.equal(container.has('testService'), false);
  assert.deepEqual(container.getRegisteredKeys(), []);

  container.register('service1', () => new TestServiceImpl('test1'));
  container.register('service2', () => new TestServiceImpl('test2'));

  assert.equal(container.has('service1'), true);
  assert.deepEqual(container.getRegisteredKeys(), ['service1', 'service2']);

  container.clear();
  assert.equal(container.has('service1'), false);
  assert.deepEqual(container.getRegisteredKeys(), []);
});

test('initializeContainer - wires telemetry, metrics and the repository', async () => {
  const observabilityConfig = createTestConfig();
  observabilityConfig.performance.sdkDisabled = true;
  const silent = { enableConsole: false, enableStructured: false };

  const container = initializeContainer({
    config: { server: parseServerConfig({}), observability: observabilityConfig, logger: silent },
    startupLogger: new StructuredLogger(silent),
  });

  const repository = container.get(ServiceKeys.TASK_REPOSITORY);
  await repository.create(CorrelationContext.background(), { title: 'wired', description: '' });

  assert.equal(container.get(ServiceKeys.METRICS_COLLECTOR).getCollectorHealth().initialized, true);
  assert.equal(container.get(ServiceKeys.OBSERVABILITY).getHealth().initialized, true);
  assert.equal(container.get(ServiceKeys.SPAN_EMITTER), container.get(ServiceKeys.SPAN_EMITTER));
  assert.equal(repository.count(), 1);

  await container.get(ServiceKeys.OBSERVABILITY).shutdown();
});
