/**
 * @file ServiceRegistry - Coordinator service registration
 * @description Wires the templater, launcher, viewer transport, session manager, bridge and build hook from a loaded config.
 * @depends ServiceContainer, all service factories
 */

import { createBuildSupervisor } from './BuildSupervisor';
import { createCommandTemplater } from './CommandTemplater';
import type { SyncBridgeConfig } from './ConfigManager';
import type {
  IBuildSupervisor,
  ICommandTemplater,
  IProcessLauncher,
  IViewerSessionManager,
  IViewerTransport,
} from './interfaces';
import { createLogger } from './LoggerService';
import { createProcessLauncher } from './ProcessLauncher';
import { ServiceContainer } from './ServiceContainer';
import { type SyncSignalBridge, createSyncSignalBridge } from './SyncSignalBridge';
import { createViewerSessionManager } from './ViewerSessionManager';
import { createEvinceDBusTransport } from './viewer/EvinceDBusTransport';

const logger = createLogger('ServiceRegistry');

// ====== Service Map ======

export interface SyncBridgeServices {
  config: SyncBridgeConfig;
  templater: ICommandTemplater;
  launcher: IProcessLauncher;
  viewerTransport: IViewerTransport;
  sessionManager: IViewerSessionManager;
  /** Single-use; each get() returns a fresh bridge. */
  bridge: SyncSignalBridge;
  buildSupervisor: IBuildSupervisor;
}

export const ServiceNames = {
  CONFIG: 'config',
  TEMPLATER: 'templater',
  LAUNCHER: 'launcher',
  VIEWER_TRANSPORT: 'viewerTransport',
  SESSION_MANAGER: 'sessionManager',
  BRIDGE: 'bridge',
  BUILD_SUPERVISOR: 'buildSupervisor',
} as const satisfies Record<string, keyof SyncBridgeServices>;

export type SyncBridgeContainer = ServiceContainer<SyncBridgeServices>;

export function createServiceContainer(): SyncBridgeContainer {
  return new ServiceContainer<SyncBridgeServices>();
}

// ====== Service Registration ======

/**
 * Register every coordinator service. Callers may replace any of them with
 * registerInstance() before first use.
 */
export function registerServices(
  container: SyncBridgeContainer,
  config: SyncBridgeConfig
): SyncBridgeContainer {
  container.registerInstance(ServiceNames.CONFIG, config);

  container.registerSingleton(ServiceNames.TEMPLATER, (c) =>
    createCommandTemplater({ columnFallback: c.get(ServiceNames.CONFIG).editor.columnFallback })
  );
  container.registerSingleton(ServiceNames.LAUNCHER, () => createProcessLauncher());
  container.registerSingleton(ServiceNames.VIEWER_TRANSPORT, () => createEvinceDBusTransport());

  container.registerSingleton(ServiceNames.SESSION_MANAGER, (c) => {
    const { viewer } = c.get(ServiceNames.CONFIG);
    return createViewerSessionManager(
      c.get(ServiceNames.VIEWER_TRANSPORT),
      c.get(ServiceNames.LAUNCHER),
      {
        viewerCommand: viewer.command,
        launchStrategy: viewer.launch,
        timeoutMs: viewer.startupTimeoutMs,
        pollIntervalMs: viewer.pollIntervalMs,
      }
    );
  });

  container.registerTransient(ServiceNames.BRIDGE, (c) =>
    createSyncSignalBridge(
      c.get(ServiceNames.SESSION_MANAGER),
      c.get(ServiceNames.VIEWER_TRANSPORT),
      c.get(ServiceNames.TEMPLATER),
      c.get(ServiceNames.LAUNCHER)
    )
  );

  container.registerSingleton(ServiceNames.BUILD_SUPERVISOR, (c) =>
    createBuildSupervisor(
      c.get(ServiceNames.TEMPLATER),
      c.get(ServiceNames.LAUNCHER),
      c.get(ServiceNames.CONFIG).build.command
    )
  );

  logger.debug(`Services registered: ${container.getRegisteredServices().join(', ')}`);
  return container;
}
