/**
 * @file IViewerTransport - Viewer remote-call capability
 * @description Registry lookup, open, forward search and backward-search signal of a PDF viewer
 */

import type { IDisposable } from '../../../shared/utils';
import type { SourceLocation } from '../SourceLocation';

/**
 * Backward-search payload as it came off the wire, before validation.
 * The transport only decodes wire formats (URIs, structs); it does not
 * judge whether the values make sense.
 */
export interface SyncSourceNotification {
  file: unknown;
  line: unknown;
  column: unknown;
}

export type SyncSourceListener = (notification: SyncSourceNotification) => void;

export interface IViewerTransport extends IDisposable {
  /**
   * Registry lookup keyed by the document's file URI (exact string match).
   * @returns session id of the viewer showing the document, or null
   * @throws {ViewerUnavailableError} when the registry cannot be reached
   */
  findSession(documentUri: string): Promise<string | null>;

  /** Ask the viewer's registry to open the document in a new session. */
  openDocument(documentUri: string): Promise<void>;

  /** Forward search: scroll the session to the output of `location`. */
  syncView(sessionId: string, location: SourceLocation): Promise<void>;

  /**
   * Subscribe to the backward-search signal of one session.
   * Disposing the result ends the subscription.
   */
  onSyncSource(sessionId: string, listener: SyncSourceListener): Promise<IDisposable>;

  /**
   * Watch for any viewer session (re)loading the document, e.g. after the
   * user closed the viewer and opened the PDF again.
   */
  onDocumentLoaded(documentUri: string, listener: (sessionId: string) => void): Promise<IDisposable>;
}
