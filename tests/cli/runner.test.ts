/**
 * @file runner.test.ts - End-to-end tests of the coordinator flow
 * @description Runs the CLI runner against a temporary config file, the in-memory viewer transport and a recording launcher
 * @depends cli/runner, tests/setup
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CancellationToken, CancellationTokenSource } from '../../shared/utils';
import {
  applyCliOverrides,
  defaultSourceFor,
  runSyncBridge,
  type SyncCommandOptions,
} from '../../src/cli/runner';
import { LaunchError } from '../../src/services/errors';
import { ServiceNames, type SyncBridgeContainer } from '../../src/services/ServiceRegistry';
import type { SyncBridgeConfig } from '../../src/services/ConfigManager';
import { InMemoryViewerTransport, RecordingProcessLauncher } from '../setup';

const PDF = '/work/paper.pdf';
const TEX = '/work/paper.tex';
const SESSION = ':1.5';

describe('runSyncBridge', () => {
  let tempDir: string;
  let configPath: string;
  let transport: InMemoryViewerTransport;
  let launcher: RecordingProcessLauncher;

  const configureServices = (container: SyncBridgeContainer) => {
    container.registerInstance(ServiceNames.VIEWER_TRANSPORT, transport);
    container.registerInstance(ServiceNames.LAUNCHER, launcher);
  };

  function run(
    editorCommand: string | undefined,
    options: SyncCommandOptions = {},
    token: CancellationToken = CancellationToken.None
  ) {
    return runSyncBridge(PDF, editorCommand, { config: configPath, ...options }, {
      token,
      env: {},
      configureServices,
    });
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'synctex-bridge-run-'));
    configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({ viewer: { startupTimeoutMs: 200, pollIntervalMs: 10 } }),
      'utf-8'
    );

    transport = new InMemoryViewerTransport();
    launcher = new RecordingProcessLauncher();

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('opens the editor at the clicked line and exits 0 when interrupted', async () => {
    transport.registerSession(PDF, SESSION);
    const source = new CancellationTokenSource();

    const running = run('vim %f +%l', {}, source.token);
    await vi.waitFor(() => expect(transport.listenerCount(SESSION)).toBe(1));

    transport.emitSyncSource(SESSION, { file: TEX, line: 42, column: undefined });
    await vi.waitFor(() => expect(launcher.calls).toHaveLength(1));

    source.cancel();

    await expect(running).resolves.toBe(0);
    expect(launcher.commands()).toEqual([['vim', TEX, '+42']]);
    expect(transport.disposed).toBe(true);
  });

  it('forward search sends one SyncView and exits 0', async () => {
    transport.registerSession(PDF, SESSION);

    await expect(run(undefined, { forward: 10 })).resolves.toBe(0);

    expect(transport.syncViewCalls).toEqual([
      { sessionId: SESSION, location: { file: TEX, line: 10 } },
    ]);
    expect(transport.subscribeCalls).toEqual([]);
  });

  it('uses --source and --column for forward search', async () => {
    transport.registerSession(PDF, SESSION);

    await run(undefined, { forward: 3, column: 7, source: '/work/chapters/intro.tex' });

    expect(transport.syncViewCalls).toEqual([
      { sessionId: SESSION, location: { file: '/work/chapters/intro.tex', line: 3, column: 7 } },
    ]);
  });

  it('exits 4 when the viewer never registers, without starting an editor', async () => {
    await expect(run('vim %f +%l')).resolves.toBe(4);

    expect(launcher.commands()).toEqual([['evince', PDF]]);
    expect(transport.subscribeCalls).toEqual([]);
    expect(console.error).toHaveBeenCalledWith(
      expect.anything(),
      'Viewer did not open /work/paper.pdf within 200ms'
    );
  });

  it('exits 2 when backward search has no editor command', async () => {
    await expect(run(undefined)).resolves.toBe(2);
    expect(transport.findSessionCalls).toEqual([]);
  });

  it('exits 5 for an unparsable editor command before contacting the viewer', async () => {
    await expect(run("vim '%f")).resolves.toBe(5);
    expect(transport.findSessionCalls).toEqual([]);
    expect(launcher.calls).toEqual([]);
  });

  it('exits 6 when the viewer IPC is unavailable', async () => {
    transport.failure = new Error('no session bus');
    await expect(run(undefined, { forward: 1 })).resolves.toBe(6);
  });

  it('exits 3 when the viewer cannot be launched', async () => {
    launcher.failWhen = (command) => new LaunchError(command, 'executable not found');
    await expect(run(undefined, { forward: 1 })).resolves.toBe(3);
  });

  it('exits 2 for a malformed configuration file', async () => {
    fs.writeFileSync(configPath, '{', 'utf-8');
    await expect(run('vim %f')).resolves.toBe(2);
  });

  it('exits 0 when cancelled while waiting for the viewer', async () => {
    await expect(run('vim %f', {}, CancellationToken.Cancelled)).resolves.toBe(0);
    expect(launcher.commands()).toEqual([['evince', PDF]]);
  });

  it('starts the continuous build before the viewer session', async () => {
    launcher.onSpawn = (command) => {
      if (command[0] === 'evince') {
        transport.registerSession(PDF, SESSION);
      }
    };

    await expect(run(undefined, { forward: 1, build: TEX })).resolves.toBe(0);

    expect(launcher.calls.map((call) => call.command[0])).toEqual(['latexmk', 'evince']);
    expect(launcher.calls[0]).toEqual({
      command: ['latexmk', '-pdf', '-pvc', '-view=none', '-synctex=1', '-interaction=nonstopmode', TEX],
      options: { detach: true, cwd: '/work' },
    });
  });

  it('warns and carries on when the build cannot start', async () => {
    transport.registerSession(PDF, SESSION);
    launcher.failWhen = (command) =>
      command[0] === 'latexmk' ? new LaunchError(command, 'executable not found') : undefined;

    await expect(run(undefined, { forward: 1, build: TEX })).resolves.toBe(0);

    expect(console.warn).toHaveBeenCalledWith(
      expect.anything(),
      `Continuous build not started: Failed to launch "latexmk -pdf -pvc -view=none -synctex=1 -interaction=nonstopmode ${TEX}": executable not found`
    );
    expect(transport.syncViewCalls).toHaveLength(1);
  });
});

describe('defaultSourceFor', () => {
  it('swaps the extension for .tex', () => {
    expect(defaultSourceFor('/work/paper.pdf')).toBe('/work/paper.tex');
    expect(defaultSourceFor('/work/notes')).toBe('/work/notes.tex');
  });
});

describe('applyCliOverrides', () => {
  const base: SyncBridgeConfig = {
    viewer: { command: ['evince'], launch: 'process', startupTimeoutMs: 10000, pollIntervalMs: 100 },
    editor: { command: ['vim', '%f'], wait: false, columnFallback: 'error' },
    build: { command: ['latexmk', '%f'] },
    log: { level: 'info' },
  };

  it('keeps the configuration when no flags are given', () => {
    expect(applyCliOverrides(base, {}, undefined)).toEqual(base);
  });

  it('lets flags win', () => {
    const config = applyCliOverrides(
      base,
      { viewer: 'evince --fullscreen', launch: 'daemon', timeout: 500, pollInterval: 20, wait: true, verbose: true },
      'code -g %f:%l'
    );

    expect(config).toEqual({
      viewer: {
        command: ['evince', '--fullscreen'],
        launch: 'daemon',
        startupTimeoutMs: 500,
        pollIntervalMs: 20,
      },
      editor: { command: ['code', '-g', '%f:%l'], wait: true, columnFallback: 'error' },
      build: { command: ['latexmk', '%f'] },
      log: { level: 'debug' },
    });
  });
});
