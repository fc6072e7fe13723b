/**
 * @file IViewerSessionManager - Viewer session contract
 * @description One viewer session per document, reused when already open
 */

import type { CancellationToken, IDisposable } from '../../../shared/utils';
import type { ProcessRecord } from './IProcessLauncher';

export interface ViewerSessionHandle {
  /** Absolute PDF path as given (no symlink resolution). */
  readonly documentPath: string;
  readonly documentUri: string;
  /** Viewer IPC name the session answers on. */
  readonly sessionId: string;
  /** 'reused' when the document was already open before we looked. */
  readonly origin: 'reused' | 'launched';
  /** The viewer process we started, if we started one ourselves. */
  readonly process: ProcessRecord | null;
}

/**
 * - 'process': spawn the viewer command with the PDF path appended
 * - 'daemon': ask the viewer's registry daemon to open the document
 */
export type ViewerLaunchStrategy = 'process' | 'daemon';

export interface IViewerSessionManager extends IDisposable {
  /**
   * @throws {SessionTimeoutError} when a launched viewer never registers
   * @throws {LaunchError} when the viewer process cannot be started
   * @throws {ViewerUnavailableError} when the viewer's IPC cannot be reached
   * @throws {CancellationError} when cancelled while waiting
   */
  ensureSession(documentPath: string, token?: CancellationToken): Promise<ViewerSessionHandle>;
}
