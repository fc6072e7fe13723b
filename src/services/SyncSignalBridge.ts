/**
 * @file SyncSignalBridge - Forward and backward search coordination
 * @description Ensures the viewer session, then either issues one SyncView call or serves backward-search clicks until cancelled
 * @depends IViewerSessionManager, IViewerTransport, ICommandTemplater, IProcessLauncher, LoggerService
 */

// ====== Design Notes ======
// States: idle -> awaitingSession -> done                      (forward)
//                                 -> listening <-> dispatching (backward)
//         listening -> terminated                              (cancellation only)
//
// The subscription is long-lived: the viewer may signal any time after the
// session is up, and the user may click many times. Clicks are queued on a
// Sequencer so they are handled one at a time in arrival order.
//
// Per-click failures (bad payload, missing template value, editor that fails
// to start) are logged and the click dropped; the subscription stays up.
// Failures before listening starts propagate to the caller.
//
// Once cancelled, clicks still waiting in the queue are discarded; only an
// editor that is already running is waited for.
//
// A viewer closed and reopened on the same document comes back under a new
// session id. The bridge watches for that and moves its subscription to the
// new session, through the same queue as the clicks.

import {
  CancellationToken,
  Disposable,
  Emitter,
  type IDisposable,
  MutableDisposable,
  Sequencer,
  whenCancelled,
} from '../../shared/utils';
import { NotificationParseError } from './errors';
import type {
  CommandTemplate,
  ICommandTemplater,
  IProcessLauncher,
  IViewerSessionManager,
  IViewerTransport,
  ProcessRecord,
  SyncSourceListener,
  SyncSourceNotification,
  ViewerSessionHandle,
} from './interfaces';
import { createLogger } from './LoggerService';
import { type SourceLocation, formatSourceLocation, parseSourceLocation } from './SourceLocation';

const logger = createLogger('SyncSignalBridge');

// ====== Types ======

export type BridgeState =
  | 'idle'
  | 'awaitingSession'
  | 'listening'
  | 'dispatching'
  | 'done'
  | 'terminated';

export interface ForwardSearchRequest {
  mode: 'forward';
  documentPath: string;
  location: SourceLocation;
}

export interface BackwardSearchRequest {
  mode: 'backward';
  documentPath: string;
  editorCommand: CommandTemplate;
  /** Wait for the editor to exit before handling the next click. */
  waitForEditor?: boolean;
}

export type SyncRequest = ForwardSearchRequest | BackwardSearchRequest;

export interface BridgeOutcome {
  state: 'done' | 'terminated';
  session: ViewerSessionHandle;
  /** Editor launches that succeeded. */
  dispatched: number;
  /** Notifications that did not lead to an editor launch. */
  dropped: number;
}

export interface DispatchEvent {
  location: SourceLocation;
  command: string[];
  process: ProcessRecord;
}

export interface DropEvent {
  notification: SyncSourceNotification;
  error: Error;
}

export interface FollowEvent {
  previousSessionId: string;
  sessionId: string;
}

// ====== Implementation ======

export class SyncSignalBridge extends Disposable {
  private _state: BridgeState = 'idle';
  private readonly subscription = this._register(new MutableDisposable<IDisposable>());
  private readonly documentWatch = this._register(new MutableDisposable<IDisposable>());
  private listeningTo: string | null = null;
  private readonly sequencer = new Sequencer();
  private dispatched = 0;
  private dropped = 0;
  private stopping = false;

  private readonly _onDidChangeState = this._register(new Emitter<BridgeState>());
  readonly onDidChangeState = this._onDidChangeState.event;

  private readonly _onDidDispatch = this._register(new Emitter<DispatchEvent>());
  readonly onDidDispatch = this._onDidDispatch.event;

  private readonly _onDidDropNotification = this._register(new Emitter<DropEvent>());
  readonly onDidDropNotification = this._onDidDropNotification.event;

  private readonly _onDidFollowSession = this._register(new Emitter<FollowEvent>());
  readonly onDidFollowSession = this._onDidFollowSession.event;

  constructor(
    private readonly sessions: IViewerSessionManager,
    private readonly transport: IViewerTransport,
    private readonly templater: ICommandTemplater,
    private readonly launcher: IProcessLauncher
  ) {
    super();
  }

  get state(): BridgeState {
    return this._state;
  }

  /**
   * Forward requests resolve after the single SyncView call. Backward
   * requests resolve only once `token` is cancelled.
   *
   * @throws {SessionTimeoutError | LaunchError | ViewerUnavailableError} while establishing the session
   * @throws {TemplateError} when the editor template is invalid
   */
  async run(request: SyncRequest, token: CancellationToken = CancellationToken.None): Promise<BridgeOutcome> {
    if (this._state !== 'idle') {
      throw new Error(`SyncSignalBridge.run called in state ${this._state}`);
    }

    if (request.mode === 'backward') {
      // Configuration errors are reported before anything is spawned
      this.templater.validate(request.editorCommand);
    }

    this.setState('awaitingSession');
    const session = await this.sessions.ensureSession(request.documentPath, token);

    if (request.mode === 'forward') {
      return this.forwardSearch(session, request.location);
    }
    return this.listen(session, request, token);
  }

  private async forwardSearch(
    session: ViewerSessionHandle,
    location: SourceLocation
  ): Promise<BridgeOutcome> {
    logger.info(`Forward search to ${formatSourceLocation(location)}`);
    await this.transport.syncView(session.sessionId, location);
    this.setState('done');
    return { state: 'done', session, dispatched: 0, dropped: 0 };
  }

  private async listen(
    session: ViewerSessionHandle,
    request: BackwardSearchRequest,
    token: CancellationToken
  ): Promise<BridgeOutcome> {
    const onClick: SyncSourceListener = (notification) => {
      void this.sequencer.queue(() => this.handleNotification(notification, request));
    };
    const subscription = await this.transport.onSyncSource(session.sessionId, onClick);

    if (token.isCancellationRequested) {
      subscription.dispose();
    } else {
      this.subscription.value = subscription;
      this.listeningTo = session.sessionId;
      await this.watchDocument(session, onClick);
      this.setState('listening');
      logger.info(`Listening for backward search on ${session.documentPath}`);
    }

    await whenCancelled(token);

    this.stopping = true;
    this.documentWatch.clear();
    this.subscription.clear();
    await this.sequencer.drain();
    this.setState('terminated');
    logger.info(`Stopped listening (${this.dispatched} dispatched, ${this.dropped} dropped)`);

    return {
      state: 'terminated',
      session,
      dispatched: this.dispatched,
      dropped: this.dropped,
    };
  }

  private async watchDocument(session: ViewerSessionHandle, onClick: SyncSourceListener): Promise<void> {
    try {
      this.documentWatch.value = await this.transport.onDocumentLoaded(session.documentUri, (sessionId) => {
        void this.sequencer.queue(() => this.follow(sessionId, onClick));
      });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      logger.warn(`Not watching for ${session.documentPath} being reopened: ${message}`);
    }
  }

  private async follow(sessionId: string, onClick: SyncSourceListener): Promise<void> {
    const previousSessionId = this.listeningTo;
    if (this.stopping || previousSessionId === null || sessionId === previousSessionId) {
      return;
    }

    try {
      const subscription = await this.transport.onSyncSource(sessionId, onClick);
      if (this.stopping) {
        subscription.dispose();
        return;
      }
      this.subscription.value = subscription;
      this.listeningTo = sessionId;
      logger.info(`Document reopened in viewer session ${sessionId}, following it`);
      this._onDidFollowSession.fire({ previousSessionId, sessionId });
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      logger.error(`Cannot follow viewer session ${sessionId}: ${message}`);
    }
  }

  private async handleNotification(
    notification: SyncSourceNotification,
    request: BackwardSearchRequest
  ): Promise<void> {
    if (this.stopping) {
      this.dropped++;
      logger.info(`Discarded click on ${String(notification.file)} queued before shutdown`);
      return;
    }
    if (this._state !== 'listening') {
      return;
    }

    this.setState('dispatching');
    try {
      const location = parseSourceLocation(notification);
      const command = this.templater.expand(request.editorCommand, location);

      logger.info(`Go to ${formatSourceLocation(location)}`);
      const editor = await this.launcher.spawn(command, { detach: !request.waitForEditor });
      this.dispatched++;
      this._onDidDispatch.fire({ location, command, process: editor });

      if (editor.exited) {
        const code = await editor.exited;
        logger.debug(`Editor exited with code ${code}`);
      }
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.dropped++;
      if (error instanceof NotificationParseError) {
        logger.warn(`Dropped notification: ${error.message}`, notification);
      } else {
        logger.error(`Dropped notification: ${error.message}`);
      }
      this._onDidDropNotification.fire({ notification, error });
    } finally {
      if (this.state === 'dispatching') {
        this.setState('listening');
      }
    }
  }

  private setState(state: BridgeState): void {
    if (this._state === state) return;
    logger.debug(`${this._state} -> ${state}`);
    this._state = state;
    this._onDidChangeState.fire(state);
  }
}

export function createSyncSignalBridge(
  sessions: IViewerSessionManager,
  transport: IViewerTransport,
  templater: ICommandTemplater,
  launcher: IProcessLauncher
): SyncSignalBridge {
  return new SyncSignalBridge(sessions, transport, templater, launcher);
}
