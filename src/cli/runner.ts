/**
 * @file runner.ts - Main coordinator flow behind the CLI
 * @description Loads configuration, wires services, starts the optional build and runs one forward or backward search session
 * @depends ConfigManager, ServiceRegistry, SyncSignalBridge, logger
 */

import * as path from 'path';
import { CancellationToken, isCancellationError } from '../../shared/utils';
import { parseCommandTemplate } from '../services/CommandTemplater';
import { ConfigManager, type SyncBridgeConfig } from '../services/ConfigManager';
import { ConfigError, ExitCode, isSyncBridgeError } from '../services/errors';
import type { ViewerLaunchStrategy } from '../services/interfaces';
import { LoggerService, createLogger } from '../services/LoggerService';
import {
  ServiceNames,
  type SyncBridgeContainer,
  createServiceContainer,
  registerServices,
} from '../services/ServiceRegistry';
import { formatSourceLocation, type SourceLocation } from '../services/SourceLocation';
import type { SyncRequest } from '../services/SyncSignalBridge';
import { Logger } from './logger';

const logger = createLogger('Runner');

// ====== Types ======

/** Parsed command-line flags. */
export interface SyncCommandOptions {
  forward?: number;
  column?: number;
  source?: string;
  build?: string;
  viewer?: string;
  launch?: ViewerLaunchStrategy;
  timeout?: number;
  pollInterval?: number;
  wait?: boolean;
  config?: string;
  verbose?: boolean;
}

export interface RunContext {
  token?: CancellationToken;
  env?: NodeJS.ProcessEnv;
  /** Called after registration, before any service is created. */
  configureServices?: (container: SyncBridgeContainer) => void;
}

// ====== Helpers ======

/** paper.pdf -> paper.tex, next to the PDF. */
export function defaultSourceFor(pdfPath: string): string {
  const parsed = path.parse(path.resolve(pdfPath));
  return path.join(parsed.dir, `${parsed.name}.tex`);
}

/** Flags win over environment and file. */
export function applyCliOverrides(
  config: SyncBridgeConfig,
  options: SyncCommandOptions,
  editorCommand: string | undefined
): SyncBridgeConfig {
  return {
    viewer: {
      command: options.viewer ? parseCommandTemplate(options.viewer) : config.viewer.command,
      launch: options.launch ?? config.viewer.launch,
      startupTimeoutMs: options.timeout ?? config.viewer.startupTimeoutMs,
      pollIntervalMs: options.pollInterval ?? config.viewer.pollIntervalMs,
    },
    editor: {
      ...config.editor,
      command: editorCommand ? parseCommandTemplate(editorCommand) : config.editor.command,
      wait: options.wait ?? config.editor.wait,
    },
    build: config.build,
    log: {
      ...config.log,
      level: options.verbose ? 'debug' : config.log.level,
    },
  };
}

function buildRequest(
  pdfPath: string,
  config: SyncBridgeConfig,
  options: SyncCommandOptions
): SyncRequest {
  const documentPath = path.resolve(pdfPath);

  if (options.forward !== undefined) {
    const location: SourceLocation = {
      file: path.resolve(options.source ?? defaultSourceFor(pdfPath)),
      line: options.forward,
      column: options.column,
    };
    return { mode: 'forward', documentPath, location };
  }

  if (!config.editor.command) {
    throw new ConfigError(
      `No editor command given; pass one after the PDF or set editor.command (or SYNCTEX_BRIDGE_EDITOR)`
    );
  }

  return {
    mode: 'backward',
    documentPath,
    editorCommand: config.editor.command,
    waitForEditor: config.editor.wait,
  };
}

// ====== Runner ======

/**
 * Run one coordinator session and map its outcome to a process exit code.
 * Backward search returns only after `context.token` is cancelled.
 */
export async function runSyncBridge(
  pdfPath: string,
  editorCommand: string | undefined,
  options: SyncCommandOptions,
  context: RunContext = {}
): Promise<ExitCode> {
  const token = context.token ?? CancellationToken.None;
  let container: SyncBridgeContainer | undefined;

  try {
    const loaded = new ConfigManager({ configPath: options.config, env: context.env }).load();
    const config = applyCliOverrides(loaded, options, editorCommand);
    LoggerService.configure({ level: config.log.level, file: config.log.file });

    const request = buildRequest(pdfPath, config, options);

    container = registerServices(createServiceContainer(), config);
    context.configureServices?.(container);

    if (options.build) {
      const build = await container
        .get(ServiceNames.BUILD_SUPERVISOR)
        .startContinuousBuild(options.build);
      if (!build.ok) {
        Logger.warning(`Continuous build not started: ${build.error.message}`);
      } else if (build.value) {
        Logger.info(`Continuous build started (pid ${build.value.pid})`);
      }
    }

    const bridge = container.get(ServiceNames.BRIDGE);
    bridge.onDidChangeState((state) => {
      if (state === 'listening') {
        Logger.info(`Waiting for Ctrl+Click in ${request.documentPath} (Ctrl+C to stop)`);
      }
    });
    bridge.onDidDispatch(({ location }) => {
      Logger.success(`Opened ${formatSourceLocation(location)}`);
    });
    bridge.onDidDropNotification(({ error }) => {
      Logger.warning(error.message);
    });
    bridge.onDidFollowSession(({ sessionId }) => {
      Logger.info(`Viewer reopened ${request.documentPath}; following session ${sessionId}`);
    });

    const outcome = await bridge.run(request, token);

    if (outcome.state === 'done' && request.mode === 'forward') {
      Logger.success(`Synced ${request.documentPath} to ${formatSourceLocation(request.location)}`);
    } else {
      Logger.info(`Stopped (${outcome.dispatched} opened, ${outcome.dropped} dropped)`);
    }
    return ExitCode.Success;
  } catch (error) {
    if (isCancellationError(error)) {
      Logger.info('Cancelled');
      return ExitCode.Success;
    }
    if (isSyncBridgeError(error)) {
      logger.debug(`${error.name} (${error.code})`, error.cause);
      Logger.error(error.message);
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Unexpected failure', error);
    Logger.error(`Unexpected error: ${message}`);
    return ExitCode.Unexpected;
  } finally {
    if (container) {
      try {
        container.dispose();
      } catch (error) {
        logger.error('Failed to dispose services', error);
      }
    }
  }
}
