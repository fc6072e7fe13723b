/**
 * @file ServiceContainer.test.ts - Unit tests for the DI container and service registration
 * @depends ServiceContainer, ServiceRegistry, tests/setup
 */

import { describe, expect, it, vi } from 'vitest';
import { ServiceContainer } from '../../src/services/ServiceContainer';
import {
  ServiceNames,
  createServiceContainer,
  registerServices,
} from '../../src/services/ServiceRegistry';
import type { SyncBridgeConfig } from '../../src/services/ConfigManager';
import { InMemoryViewerTransport, RecordingProcessLauncher } from '../setup';

interface TestServices {
  counter: { id: number };
  resource: { dispose: () => void };
  other: { dispose: () => void };
}

const config: SyncBridgeConfig = {
  viewer: { command: ['evince'], launch: 'process', startupTimeoutMs: 1000, pollIntervalMs: 50 },
  editor: { command: ['vim', '%f', '+%l'], wait: false, columnFallback: 'error' },
  build: { command: ['latexmk', '-pvc', '%f'] },
  log: { level: 'info' },
};

describe('ServiceContainer', () => {
  it('creates singletons once and transients every time', () => {
    let next = 0;
    const container = new ServiceContainer<TestServices>();
    container.registerSingleton('counter', () => ({ id: next++ }));

    expect(container.get('counter')).toBe(container.get('counter'));

    container.registerTransient('counter', () => ({ id: next++ }));
    expect(container.get('counter').id).not.toBe(container.get('counter').id);
  });

  it('throws for unregistered services', () => {
    const container = new ServiceContainer<TestServices>();
    expect(container.has('counter')).toBe(false);
    expect(() => container.get('counter')).toThrow('Service not registered: counter');
  });

  it('lets a registered instance replace a factory', () => {
    const container = new ServiceContainer<TestServices>();
    const factory = vi.fn(() => ({ id: 1 }));
    container.registerSingleton('counter', factory);
    container.registerInstance('counter', { id: 99 });

    expect(container.get('counter').id).toBe(99);
    expect(factory).not.toHaveBeenCalled();
  });

  it('disposes created services in reverse order', () => {
    const order: string[] = [];
    const container = new ServiceContainer<TestServices>();
    container.registerInstance('resource', { dispose: () => order.push('instance') });
    container.registerSingleton('other', () => ({ dispose: () => order.push('created') }));
    container.registerSingleton('counter', () => ({ id: 1 }));
    container.get('other');
    container.get('counter');

    container.dispose();

    expect(order).toEqual(['created', 'instance']);
    expect(container.getRegisteredServices()).toEqual([]);
  });

  it('disposes everything even when one dispose throws', () => {
    const container = new ServiceContainer<TestServices>();
    const later = vi.fn();
    container.registerSingleton('resource', () => ({ dispose: later }));
    container.get('resource');
    container.registerInstance('resource', {
      dispose: () => {
        throw new Error('close failed');
      },
    });

    expect(() => container.dispose()).toThrow('close failed');
    expect(later).toHaveBeenCalledTimes(1);
  });
});

describe('registerServices', () => {
  function wire() {
    const transport = new InMemoryViewerTransport();
    const launcher = new RecordingProcessLauncher();
    const container = registerServices(createServiceContainer(), config);
    container.registerInstance(ServiceNames.VIEWER_TRANSPORT, transport);
    container.registerInstance(ServiceNames.LAUNCHER, launcher);
    return { container, transport, launcher };
  }

  it('registers every coordinator service', () => {
    const { container } = wire();
    expect(container.getRegisteredServices().sort()).toEqual([
      'bridge',
      'buildSupervisor',
      'config',
      'launcher',
      'sessionManager',
      'templater',
      'viewerTransport',
    ]);
  });

  it('shares the session manager and hands out a fresh bridge each time', () => {
    const { container } = wire();

    expect(container.get(ServiceNames.SESSION_MANAGER)).toBe(
      container.get(ServiceNames.SESSION_MANAGER)
    );
    expect(container.get(ServiceNames.BRIDGE)).not.toBe(container.get(ServiceNames.BRIDGE));
  });

  it('builds through the configured template and the injected launcher', async () => {
    const { container, launcher } = wire();

    await container.get(ServiceNames.BUILD_SUPERVISOR).startContinuousBuild('/work/main.tex');

    expect(launcher.commands()).toEqual([['latexmk', '-pvc', '/work/main.tex']]);
  });

  it('disposes the viewer transport with the container', () => {
    const { container, transport } = wire();
    container.get(ServiceNames.BRIDGE);

    container.dispose();

    expect(transport.disposed).toBe(true);
  });
});
