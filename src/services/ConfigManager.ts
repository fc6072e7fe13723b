/**
 * @file ConfigManager - Coordinator configuration
 * @description Reads ~/.synctex-bridge/config.json, applies environment overrides and validates with zod
 * @depends fs, path, os, zod, CommandTemplater
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { parseCommandTemplate } from './CommandTemplater';
import { ConfigError } from './errors';
import type { ColumnFallback, ViewerLaunchStrategy } from './interfaces';
import type { LogLevel } from './LoggerService';

// ====== Defaults ======

export const DEFAULT_VIEWER_COMMAND = 'evince';
export const DEFAULT_BUILD_COMMAND =
  'latexmk -pdf -pvc -view=none -synctex=1 -interaction=nonstopmode %f';
export const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
export const DEFAULT_POLL_INTERVAL_MS = 100;

export const ENV_CONFIG_PATH = 'SYNCTEX_BRIDGE_CONFIG';
export const ENV_EDITOR = 'SYNCTEX_BRIDGE_EDITOR';
export const ENV_LOG_LEVEL = 'SYNCTEX_BRIDGE_LOG_LEVEL';

export function getConfigHomeDir(): string {
  return path.join(os.homedir(), '.synctex-bridge');
}

export function getDefaultConfigPath(): string {
  return path.join(getConfigHomeDir(), 'config.json');
}

// ====== Schema ======

/** A command is either one shell-like string or an explicit argument array. */
const CommandSchema = z.union([z.string().trim().min(1), z.array(z.string()).min(1)]);

export const ConfigSchema = z.object({
  viewer: z
    .object({
      command: CommandSchema.default(DEFAULT_VIEWER_COMMAND),
      launch: z.enum(['process', 'daemon']).default('process'),
      startupTimeoutMs: z.number().int().positive().default(DEFAULT_STARTUP_TIMEOUT_MS),
      pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
    })
    .default({}),
  editor: z
    .object({
      command: CommandSchema.optional(),
      wait: z.boolean().default(false),
      columnFallback: z
        .union([z.enum(['error', 'omit']), z.number().int().min(0)])
        .default('error'),
    })
    .default({}),
  build: z
    .object({
      command: CommandSchema.default(DEFAULT_BUILD_COMMAND),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      file: z.string().min(1).optional(),
    })
    .default({}),
});

export type RawConfig = z.input<typeof ConfigSchema>;

export interface SyncBridgeConfig {
  viewer: {
    command: string[];
    launch: ViewerLaunchStrategy;
    startupTimeoutMs: number;
    pollIntervalMs: number;
  };
  editor: {
    command?: string[];
    wait: boolean;
    columnFallback: ColumnFallback;
  };
  build: {
    command: string[];
  };
  log: {
    level: LogLevel;
    file?: string;
  };
}

export interface LoadConfigOptions {
  /** Explicit file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

// ====== Loading ======

export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;
  private readonly explicitPath?: string;

  constructor(options: LoadConfigOptions = {}) {
    this.env = options.env ?? process.env;
    this.explicitPath = options.configPath ?? this.env[ENV_CONFIG_PATH];
  }

  getConfigPath(): string {
    return this.explicitPath ? path.resolve(this.explicitPath) : getDefaultConfigPath();
  }

  /**
   * Defaults <- config file <- environment.
   * @throws {ConfigError} for an unreadable, malformed or invalid file
   * @throws {TemplateError} for a command string that cannot be split
   */
  load(): SyncBridgeConfig {
    const raw = this.readFile();

    const editorFromEnv = this.env[ENV_EDITOR];
    const levelFromEnv = this.env[ENV_LOG_LEVEL];
    const merged = {
      ...raw,
      editor: { ...asRecord(raw.editor), ...(editorFromEnv ? { command: editorFromEnv } : {}) },
      log: { ...asRecord(raw.log), ...(levelFromEnv ? { level: levelFromEnv } : {}) },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration in ${this.getConfigPath()}: ${details}`);
    }

    const config = parsed.data;
    return {
      viewer: { ...config.viewer, command: toArgv(config.viewer.command) },
      editor: {
        ...config.editor,
        command: config.editor.command === undefined ? undefined : toArgv(config.editor.command),
      },
      build: { command: toArgv(config.build.command) },
      log: config.log,
    };
  }

  /**
   * Write a default config file unless one exists.
   * @returns whether a file was created
   * @sideeffect Creates the config directory and file
   */
  ensureConfig(): boolean {
    const configPath = this.getConfigPath();
    if (fs.existsSync(configPath)) {
      return false;
    }

    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    const defaults: RawConfig = {
      viewer: {
        command: DEFAULT_VIEWER_COMMAND,
        launch: 'process',
        startupTimeoutMs: DEFAULT_STARTUP_TIMEOUT_MS,
        pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      },
      // vim needs the terminal, so it runs attached and clicks wait for it
      editor: { command: 'vim %f +%l', wait: true, columnFallback: 'error' },
      build: { command: DEFAULT_BUILD_COMMAND },
      log: { level: 'info' },
    };
    fs.writeFileSync(configPath, `${JSON.stringify(defaults, null, 2)}\n`, 'utf-8');
    return true;
  }

  private readFile(): Record<string, unknown> {
    const configPath = this.getConfigPath();

    if (!fs.existsSync(configPath)) {
      if (this.explicitPath) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      return {};
    }

    let content: string;
    try {
      content = fs.readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read ${configPath}: ${describe(error)}`, {
        cause: error,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Malformed JSON in ${configPath}: ${describe(error)}`, {
        cause: error,
      });
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
    }
    return asRecord(data);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toArgv(command: string | string[]): string[] {
  return typeof command === 'string' ? parseCommandTemplate(command) : [...command];
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

export function createConfigManager(options?: LoadConfigOptions): ConfigManager {
  return new ConfigManager(options);
}
