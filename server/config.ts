import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { error as logError } from './logging/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const ROOT_DIR = join(__dirname, '..');
const DEFAULT_CONFIG_PATH = join(ROOT_DIR, 'config', 'config.json');

export interface RunnerOptions {
  /** Pause between two queue items */
  interProfileDelayMs: number;
  /** Upper bound for a single step attempt */
  stepTimeoutMs: number;
  /** Upper bound for opening a browser session */
  sessionTimeoutMs: number;
  maxRounds: number;
  maxLogLines: number;
  screenshotOnFailure: boolean;
}

export interface BrowserOptions {
  /** Playwright channel of an installed browser: msedge, chrome, chromium */
  channel?: string;
  executablePath?: string;
  headless: boolean;
}

/**
 * Login detection contract. A session counts as logged in when
 * `loggedOutSelector` is not visible and `loggedInSelector` becomes visible.
 */
export interface LoginCheckOptions {
  url: string;
  loggedInSelector: string;
  loggedOutSelector?: string;
  timeoutMs: number;
}

export interface AppConfig {
  dataDir: string;
  profilesFile: string;
  runner: RunnerOptions;
  browser: BrowserOptions;
  loginCheck: LoginCheckOptions;
}

let configCache: AppConfig | null = null;
let configPathCache: string | null = null;

export function getConfigPath(): string {
  return process.env.CONFIG_PATH ? resolve(process.env.CONFIG_PATH) : DEFAULT_CONFIG_PATH;
}

function ensureDir(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

export function getDefaultRunnerOptions(): RunnerOptions {
  return {
    interProfileDelayMs: 5000,
    stepTimeoutMs: 120000,
    sessionTimeoutMs: 60000,
    maxRounds: 100,
    maxLogLines: 200,
    screenshotOnFailure: true,
  };
}

export function getDefaultConfig(): AppConfig {
  const dataDir = join(ROOT_DIR, 'data');
  return {
    dataDir,
    profilesFile: join(dataDir, 'profiles.json'),
    runner: getDefaultRunnerOptions(),
    browser: {
      channel: 'msedge',
      headless: false,
    },
    loginCheck: {
      url: '',
      loggedInSelector: '',
      timeoutMs: 15000,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

/** Numbers below `min`, and fractions where `integer` is set, read as absent */
function readNumber(
  source: Record<string, unknown>,
  key: string,
  { min = 0, integer = false }: { min?: number; integer?: boolean } = {}
): number | undefined {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min) {
    return undefined;
  }
  return integer && !Number.isInteger(value) ? undefined : value;
}

function readBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Merges a parsed config file over the defaults, key by key. Values of the
 * wrong type or out of range fall back to the default. Relative directories resolve against
 * `baseDir` (the config file's folder).
 */
export function mergeConfig(loaded: unknown, baseDir: string): AppConfig {
  const defaults = getDefaultConfig();
  const source = isRecord(loaded) ? loaded : {};
  const runner = section(source, 'runner');
  const browser = section(source, 'browser');
  const loginCheck = section(source, 'loginCheck');

  const dataDirSetting = readString(source, 'dataDir');
  const dataDir = dataDirSetting ? resolve(baseDir, dataDirSetting) : defaults.dataDir;
  const profilesFileSetting = readString(source, 'profilesFile');

  return {
    dataDir,
    profilesFile: profilesFileSetting
      ? resolve(baseDir, profilesFileSetting)
      : join(dataDir, 'profiles.json'),
    runner: {
      interProfileDelayMs:
        readNumber(runner, 'interProfileDelayMs') ?? defaults.runner.interProfileDelayMs,
      stepTimeoutMs: readNumber(runner, 'stepTimeoutMs') ?? defaults.runner.stepTimeoutMs,
      sessionTimeoutMs: readNumber(runner, 'sessionTimeoutMs') ?? defaults.runner.sessionTimeoutMs,
      maxRounds: readNumber(runner, 'maxRounds', { min: 1, integer: true }) ?? defaults.runner.maxRounds,
      maxLogLines: readNumber(runner, 'maxLogLines', { min: 1, integer: true }) ?? defaults.runner.maxLogLines,
      screenshotOnFailure:
        readBoolean(runner, 'screenshotOnFailure') ?? defaults.runner.screenshotOnFailure,
    },
    browser: {
      channel: readString(browser, 'channel') ?? defaults.browser.channel,
      executablePath: readString(browser, 'executablePath'),
      headless: readBoolean(browser, 'headless') ?? defaults.browser.headless,
    },
    loginCheck: {
      url: readString(loginCheck, 'url') ?? defaults.loginCheck.url,
      loggedInSelector:
        readString(loginCheck, 'loggedInSelector') ?? defaults.loginCheck.loggedInSelector,
      loggedOutSelector: readString(loginCheck, 'loggedOutSelector'),
      timeoutMs: readNumber(loginCheck, 'timeoutMs') ?? defaults.loginCheck.timeoutMs,
    },
  };
}

export function loadConfig(configPath: string = getConfigPath()): AppConfig {
  if (configCache && configPathCache === configPath) {
    return configCache;
  }

  ensureDir(dirname(configPath));
  configPathCache = configPath;

  if (!existsSync(configPath)) {
    const defaultConfig = getDefaultConfig();
    writeFileSync(configPath, JSON.stringify(defaultConfig, null, 2));
    configCache = defaultConfig;
    return configCache;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    configCache = mergeConfig(parsed, dirname(configPath));
    return configCache;
  } catch (error) {
    logError(`Error loading config from ${configPath}, using defaults: ${error}`, 'Config');
    configCache = getDefaultConfig();
    return configCache;
  }
}

export function saveConfig(): void {
  if (!configCache || !configPathCache) return;
  ensureDir(dirname(configPathCache));
  writeFileSync(configPathCache, JSON.stringify(configCache, null, 2));
}

export function resetConfigCache(): void {
  configCache = null;
  configPathCache = null;
}

export function getRunnerOptions(): RunnerOptions {
  return loadConfig().runner;
}

export function setRunnerOptions(options: Partial<RunnerOptions>): RunnerOptions {
  const config = loadConfig();
  config.runner = { ...config.runner, ...options };
  saveConfig();
  return config.runner;
}
