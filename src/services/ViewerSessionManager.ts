/**
 * @file ViewerSessionManager - One viewer session per document
 * @description Reuses a viewer already showing the PDF, otherwise launches one and waits for it to register
 * @depends IViewerTransport, IProcessLauncher, LoggerService
 */

// ====== Design Notes ======
// The registry is shared with every other client of the viewer: a session we
// find may belong to a window the user opened by hand. We only ever look
// sessions up; we never close or reconfigure them.
//
// Lookups are cached per exact document path, including the in-flight
// promise, so two concurrent callers share one launch.

import path from 'path';
import { CancellationToken, pollUntil } from '../../shared/utils';
import { toFileUri } from '../utils/fileUri';
import { SessionTimeoutError, SyncBridgeError, ViewerUnavailableError } from './errors';
import type {
  IProcessLauncher,
  IViewerSessionManager,
  IViewerTransport,
  ProcessRecord,
  ViewerLaunchStrategy,
  ViewerSessionHandle,
} from './interfaces';
import { createLogger } from './LoggerService';

const logger = createLogger('ViewerSessionManager');

export interface ViewerSessionManagerOptions {
  /** Viewer executable and leading arguments; the PDF path is appended. */
  viewerCommand: readonly string[];
  launchStrategy?: ViewerLaunchStrategy;
  /** How long a launched viewer has to register. */
  timeoutMs: number;
  pollIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class ViewerSessionManager implements IViewerSessionManager {
  private readonly sessions = new Map<string, Promise<ViewerSessionHandle>>();

  constructor(
    private readonly transport: IViewerTransport,
    private readonly launcher: IProcessLauncher,
    private readonly options: ViewerSessionManagerOptions
  ) {}

  ensureSession(
    documentPath: string,
    token: CancellationToken = CancellationToken.None
  ): Promise<ViewerSessionHandle> {
    const key = path.resolve(documentPath);
    const cached = this.sessions.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.establish(key, token);
    this.sessions.set(key, pending);
    pending.catch(() => {
      // Failed lookups are not cached; the next call starts over
      if (this.sessions.get(key) === pending) {
        this.sessions.delete(key);
      }
    });
    return pending;
  }

  private async establish(
    documentPath: string,
    token: CancellationToken
  ): Promise<ViewerSessionHandle> {
    const documentUri = toFileUri(documentPath);

    const existing = await this.lookup(documentUri);
    if (existing) {
      logger.info(`Reusing viewer session ${existing} for ${documentPath}`);
      return { documentPath, documentUri, sessionId: existing, origin: 'reused', process: null };
    }

    const viewerProcess = await this.launch(documentPath, documentUri);

    logger.debug('Waiting for viewer registration', {
      timeoutMs: this.options.timeoutMs,
      pollIntervalMs: this.options.pollIntervalMs,
    });

    const sessionId = await pollUntil(() => this.lookup(documentUri), {
      intervalMs: this.options.pollIntervalMs,
      timeoutMs: this.options.timeoutMs,
      token,
      now: this.options.now,
      sleep: this.options.sleep,
    });

    if (!sessionId) {
      throw new SessionTimeoutError(documentPath, this.options.timeoutMs);
    }

    logger.info(`Viewer session ${sessionId} registered for ${documentPath}`);
    return { documentPath, documentUri, sessionId, origin: 'launched', process: viewerProcess };
  }

  private async launch(documentPath: string, documentUri: string): Promise<ProcessRecord | null> {
    if (this.options.launchStrategy === 'daemon') {
      logger.info(`Asking the viewer daemon to open ${documentPath}`);
      await this.callTransport(() => this.transport.openDocument(documentUri));
      return null;
    }

    logger.info(`Launching viewer for ${documentPath}`);
    return this.launcher.spawn([...this.options.viewerCommand, documentPath], { detach: true });
  }

  private lookup(documentUri: string): Promise<string | null> {
    return this.callTransport(() => this.transport.findSession(documentUri));
  }

  private async callTransport<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof SyncBridgeError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ViewerUnavailableError(`Viewer IPC call failed: ${reason}`, { cause: error });
    }
  }

  /** Forget cached handles. Viewer processes are left running. */
  dispose(): void {
    this.sessions.clear();
  }
}

export function createViewerSessionManager(
  transport: IViewerTransport,
  launcher: IProcessLauncher,
  options: ViewerSessionManagerOptions
): IViewerSessionManager {
  return new ViewerSessionManager(transport, launcher, options);
}
