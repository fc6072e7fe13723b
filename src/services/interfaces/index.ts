/**
 * @file Service interfaces - Unified exports
 */

export type { ColumnFallback, CommandTemplate, ICommandTemplater, TemplateValues } from './ICommandTemplater';
export type { IProcessLauncher, LaunchOptions, ProcessRecord } from './IProcessLauncher';
export type {
  IViewerTransport,
  SyncSourceListener,
  SyncSourceNotification,
} from './IViewerTransport';
export type {
  IViewerSessionManager,
  ViewerLaunchStrategy,
  ViewerSessionHandle,
} from './IViewerSessionManager';
export type { IBuildSupervisor } from './IBuildSupervisor';
