/**
 * @file ViewerSessionManager.test.ts - Unit tests for viewer session lookup and launch
 * @description Runs against the in-memory transport and a recording launcher with a simulated clock
 * @depends ViewerSessionManager, tests/setup
 */

import path from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import { CancellationError, CancellationTokenSource } from '../../shared/utils';
import {
  LaunchError,
  SessionTimeoutError,
  ViewerUnavailableError,
} from '../../src/services/errors';
import {
  ViewerSessionManager,
  type ViewerSessionManagerOptions,
} from '../../src/services/ViewerSessionManager';
import { InMemoryViewerTransport, RecordingProcessLauncher } from '../setup';

const PDF = '/work/paper.pdf';

describe('ViewerSessionManager', () => {
  let transport: InMemoryViewerTransport;
  let launcher: RecordingProcessLauncher;
  let clock: number;
  let sleeps: number[];

  function createManager(overrides: Partial<ViewerSessionManagerOptions> = {}) {
    return new ViewerSessionManager(transport, launcher, {
      viewerCommand: ['evince'],
      timeoutMs: 300,
      pollIntervalMs: 100,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
      ...overrides,
    });
  }

  beforeEach(() => {
    transport = new InMemoryViewerTransport();
    launcher = new RecordingProcessLauncher();
    clock = 0;
    sleeps = [];
  });

  it('reuses a session the viewer already has', async () => {
    transport.registerSession(PDF, ':1.7');

    const handle = await createManager().ensureSession(PDF);

    expect(handle).toEqual({
      documentPath: PDF,
      documentUri: 'file:///work/paper.pdf',
      sessionId: ':1.7',
      origin: 'reused',
      process: null,
    });
    expect(launcher.calls).toHaveLength(0);
  });

  it('launches the viewer detached and waits for it to register', async () => {
    transport.registerAfter(PDF, ':1.8', 2);

    const handle = await createManager().ensureSession(PDF);

    expect(launcher.calls).toEqual([{ command: ['evince', PDF], options: { detach: true } }]);
    expect(handle.origin).toBe('launched');
    expect(handle.sessionId).toBe(':1.8');
    expect(handle.process?.pid).toBe(4200);
    expect(transport.findSessionCalls).toHaveLength(3);
    expect(sleeps).toEqual([100]);
  });

  it('appends the document to a multi-word viewer command', async () => {
    transport.registerAfter(PDF, ':1.9', 1);

    await createManager({ viewerCommand: ['evince', '--fullscreen'] }).ensureSession(PDF);

    expect(launcher.commands()).toEqual([['evince', '--fullscreen', PDF]]);
  });

  it('times out when the viewer never registers', async () => {
    const attempt = createManager().ensureSession(PDF);

    await expect(attempt).rejects.toBeInstanceOf(SessionTimeoutError);
    await expect(attempt).rejects.toThrow('Viewer did not open /work/paper.pdf within 300ms');
    expect(launcher.calls).toHaveLength(1);
    expect(transport.findSessionCalls).toHaveLength(5);
    expect(sleeps).toEqual([100, 100, 100]);
  });

  it('asks the viewer daemon to open the document in daemon mode', async () => {
    transport.registerOnOpen = ':1.10';

    const handle = await createManager({ launchStrategy: 'daemon' }).ensureSession(PDF);

    expect(transport.openDocumentCalls).toEqual(['file:///work/paper.pdf']);
    expect(launcher.calls).toHaveLength(0);
    expect(handle).toMatchObject({ sessionId: ':1.10', origin: 'launched', process: null });
  });

  it('shares one launch between concurrent callers', async () => {
    transport.registerAfter(PDF, ':1.11', 1);
    const manager = createManager();

    const [first, second] = await Promise.all([
      manager.ensureSession(PDF),
      manager.ensureSession(PDF),
    ]);

    expect(first).toBe(second);
    expect(launcher.calls).toHaveLength(1);
  });

  it('keys sessions by resolved path', async () => {
    transport.registerSession(path.resolve('paper.pdf'), ':1.12');
    const manager = createManager();

    const relative = await manager.ensureSession('paper.pdf');
    const absolute = await manager.ensureSession(path.resolve('paper.pdf'));

    expect(relative).toBe(absolute);
    expect(transport.findSessionCalls).toHaveLength(1);
  });

  it('does not cache failures', async () => {
    const manager = createManager();
    launcher.failWhen = (command) => new LaunchError(command, 'executable not found');

    await expect(manager.ensureSession(PDF)).rejects.toBeInstanceOf(LaunchError);

    launcher.failWhen = null;
    launcher.onSpawn = () => transport.registerSession(PDF, ':1.13');
    const handle = await manager.ensureSession(PDF);

    expect(handle.sessionId).toBe(':1.13');
    expect(launcher.calls).toHaveLength(2);
  });

  it('wraps transport failures as ViewerUnavailableError', async () => {
    transport.failure = new Error('no session bus');

    await expect(createManager().ensureSession(PDF)).rejects.toThrow(
      new ViewerUnavailableError('Viewer IPC call failed: no session bus')
    );
    expect(launcher.calls).toHaveLength(0);
  });

  it('stops waiting when cancelled', async () => {
    const source = new CancellationTokenSource();
    const manager = createManager({
      sleep: async () => {
        source.cancel();
      },
    });

    await expect(manager.ensureSession(PDF, source.token)).rejects.toBeInstanceOf(
      CancellationError
    );
    expect(launcher.calls).toHaveLength(1);
  });
});
