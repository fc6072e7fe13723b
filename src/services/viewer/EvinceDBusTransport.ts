/**
 * @file EvinceDBusTransport - Evince remote interface over the D-Bus session bus
 * @description Registry lookup through the Evince daemon, SyncView calls and SyncSource signals per window
 * @depends dbus-next, fileUri, LoggerService
 */

// ====== Design Notes ======
// Evince exposes three objects:
// - the daemon, which maps document URIs to the bus name of the Evince
//   process showing them (FindDocument), optionally starting one;
// - the application object of that process, listing its windows;
// - each window, which takes SyncView (forward search) and emits SyncSource
//   (backward search, Ctrl+Click).
// A session id is the bus name FindDocument returns.
//
// When the user closes Evince and reopens the document, the new process
// announces itself with a DocumentLoaded signal from its window. That signal
// is broadcast, so it is caught with a bus-wide match rule on the document
// URI rather than through a proxy object.

import * as dbus from 'dbus-next';
import type { IDisposable } from '../../../shared/utils';
import { toDisposable } from '../../../shared/utils';
import { fromFileUri } from '../../utils/fileUri';
import { ViewerUnavailableError } from '../errors';
import type { IViewerTransport, SyncSourceListener, SyncSourceNotification } from '../interfaces';
import { createLogger } from '../LoggerService';
import type { SourceLocation } from '../SourceLocation';

const logger = createLogger('EvinceDBusTransport');

export const EV_DAEMON_NAME = 'org.gnome.evince.Daemon';
export const EV_DAEMON_PATH = '/org/gnome/evince/Daemon';
export const EV_DAEMON_IFACE = 'org.gnome.evince.Daemon';

export const EVINCE_PATH = '/org/gnome/evince/Evince';
export const EVINCE_IFACE = 'org.gnome.evince.Application';

export const EV_WINDOW_IFACE = 'org.gnome.evince.Window';
export const EV_WINDOW_PATH = '/org/gnome/evince/Window/0';

const SYNC_SOURCE_SIGNAL = 'SyncSource';
const DOCUMENT_LOADED_SIGNAL = 'DocumentLoaded';

const DBUS_NAME = 'org.freedesktop.DBus';
const DBUS_PATH = '/org/freedesktop/DBus';

// ====== Bus Surface ======
// The slice of dbus-next this transport uses. dbus-next's MessageBus and
// ClientInterface satisfy it; tests pass plain objects.

export interface DBusProxyInterface {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
  removeListener(event: string, listener: (...args: unknown[]) => void): unknown;
}

/** The fields of an incoming message the DocumentLoaded watch reads. */
export interface DBusIncomingMessage {
  type: number;
  interface?: string;
  member?: string;
  sender?: string;
  body: unknown[];
}

export interface DBusConnection {
  getProxyObject(name: string, path: string): Promise<{ getInterface(name: string): DBusProxyInterface }>;
  call(message: dbus.Message): Promise<unknown>;
  disconnect(): void;
  on(event: 'error', listener: (error: unknown) => void): unknown;
  on(event: 'message', listener: (message: DBusIncomingMessage) => void): unknown;
  removeListener(event: 'message', listener: (message: DBusIncomingMessage) => void): unknown;
}

export class EvinceDBusTransport implements IViewerTransport {
  private bus: DBusConnection | null = null;

  constructor(private readonly connect: () => DBusConnection = () => dbus.sessionBus()) {}

  async findSession(documentUri: string): Promise<string | null> {
    const owner = await this.findDocument(documentUri, false);
    return typeof owner === 'string' && owner !== '' ? owner : null;
  }

  async openDocument(documentUri: string): Promise<void> {
    await this.findDocument(documentUri, true);
  }

  async syncView(sessionId: string, location: SourceLocation): Promise<void> {
    await this.call(`SyncView on ${sessionId}`, async () => {
      const window = await this.getWindow(sessionId);
      await invoke(window, 'SyncView', location.file, [location.line, location.column ?? 1], 0);
    });
  }

  async onSyncSource(sessionId: string, listener: SyncSourceListener): Promise<IDisposable> {
    const window = await this.call(`window lookup on ${sessionId}`, () =>
      this.getWindow(sessionId)
    );

    const handler = (sourceFile: unknown, sourcePoint: unknown) => {
      listener(decodeSyncSource(sourceFile, sourcePoint));
    };
    window.on(SYNC_SOURCE_SIGNAL, handler);
    logger.debug(`Subscribed to ${SYNC_SOURCE_SIGNAL} on ${sessionId}`);

    return toDisposable(() => {
      window.removeListener(SYNC_SOURCE_SIGNAL, handler);
      logger.debug(`Unsubscribed from ${SYNC_SOURCE_SIGNAL} on ${sessionId}`);
    });
  }

  async onDocumentLoaded(
    documentUri: string,
    listener: (sessionId: string) => void
  ): Promise<IDisposable> {
    const rule = documentLoadedRule(documentUri);
    const bus = this.getBus();
    await this.call('DocumentLoaded watch', () => addressBus(bus, 'AddMatch', rule));

    const handler = (message: DBusIncomingMessage) => {
      if (
        message.type === dbus.MessageType.SIGNAL &&
        message.interface === EV_WINDOW_IFACE &&
        message.member === DOCUMENT_LOADED_SIGNAL &&
        message.body[0] === documentUri &&
        message.sender
      ) {
        logger.debug(`${DOCUMENT_LOADED_SIGNAL} for ${documentUri} from ${message.sender}`);
        listener(message.sender);
      }
    };
    bus.on('message', handler);

    return toDisposable(() => {
      bus.removeListener('message', handler);
      if (this.bus === bus) {
        addressBus(bus, 'RemoveMatch', rule).catch((error: unknown) => {
          logger.warn(`Failed to remove match rule for ${documentUri}`, error);
        });
      }
    });
  }

  dispose(): void {
    if (this.bus) {
      this.bus.disconnect();
      this.bus = null;
    }
  }

  // ====== Internals ======

  private getBus(): DBusConnection {
    if (!this.bus) {
      const bus = this.connect();
      bus.on('error', (error: unknown) => {
        logger.error('D-Bus connection error', error);
      });
      this.bus = bus;
    }
    return this.bus;
  }

  private findDocument(documentUri: string, spawn: boolean): Promise<unknown> {
    return this.call('FindDocument', async () => {
      const daemon = await this.getBus().getProxyObject(EV_DAEMON_NAME, EV_DAEMON_PATH);
      return invoke(daemon.getInterface(EV_DAEMON_IFACE), 'FindDocument', documentUri, spawn);
    });
  }

  private async getWindow(sessionId: string): Promise<DBusProxyInterface> {
    const bus = this.getBus();
    const application = await bus.getProxyObject(sessionId, EVINCE_PATH);
    const windows = await invoke(application.getInterface(EVINCE_IFACE), 'GetWindowList');

    let windowPath = EV_WINDOW_PATH;
    if (Array.isArray(windows) && typeof windows[0] === 'string') {
      windowPath = windows[0];
    } else {
      logger.debug(`GetWindowList returned no windows, falling back to ${EV_WINDOW_PATH}`);
    }

    const window = await bus.getProxyObject(sessionId, windowPath);
    return window.getInterface(EV_WINDOW_IFACE);
  }

  private async call<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ViewerUnavailableError(`Evince D-Bus ${what} failed: ${reason}`, { cause: error });
    }
  }
}

function documentLoadedRule(documentUri: string): string {
  const quoted = documentUri.replace(/'/g, `'\\''`);
  return `type='signal',interface='${EV_WINDOW_IFACE}',member='${DOCUMENT_LOADED_SIGNAL}',arg0='${quoted}'`;
}

function addressBus(bus: DBusConnection, member: 'AddMatch' | 'RemoveMatch', rule: string): Promise<unknown> {
  return bus.call(
    new dbus.Message({
      destination: DBUS_NAME,
      path: DBUS_PATH,
      interface: DBUS_NAME,
      member,
      signature: 's',
      body: [rule],
    })
  );
}

async function invoke(
  target: DBusProxyInterface,
  member: string,
  ...args: unknown[]
): Promise<unknown> {
  // Methods are generated from introspection data at run time
  const method: unknown = Reflect.get(target, member);
  if (typeof method !== 'function') {
    throw new Error(`interface has no method ${member}`);
  }
  const result: unknown = await Reflect.apply(method, target, args);
  return result;
}

/**
 * Evince sends (uri, (line, column), timestamp); column is -1 when unknown.
 */
export function decodeSyncSource(sourceFile: unknown, sourcePoint: unknown): SyncSourceNotification {
  const [line, column]: unknown[] = Array.isArray(sourcePoint) ? sourcePoint : [];
  return {
    file: typeof sourceFile === 'string' ? fromFileUri(sourceFile) : sourceFile,
    line,
    column: typeof column === 'number' && column > 0 ? column : undefined,
  };
}

export function createEvinceDBusTransport(connect?: () => DBusConnection): IViewerTransport {
  return new EvinceDBusTransport(connect);
}
