import type { LogLevel } from './logger';

/**
 * Runtime settings for connections and command execution
 */
export interface RemoteSettings {
  /** Milliseconds to wait for the SSH handshake */
  connectionTimeout: number;
  /** Milliseconds between SSH keepalive packets */
  keepaliveInterval: number;
  /** Milliseconds to sleep between unready exit-status polls */
  pollInterval: number;
  /** Bytes requested per stdout/stderr read */
  readChunkSize: number;
  /** ssh config file; empty means ~/.ssh/config */
  sshConfigPath: string;
  /** Whether host strings are resolved through the ssh config file */
  loadSshConfig: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.REMOTE_EXEC_LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === fromEnv) ?? 'warn';
}

function defaults(): RemoteSettings {
  return {
    connectionTimeout: 10000,
    keepaliveInterval: 30000,
    pollInterval: 10,
    readChunkSize: 1000,
    sshConfigPath: '',
    loadSshConfig: true,
    logLevel: defaultLogLevel(),
  };
}

let current: RemoteSettings = defaults();

export function getSettings(): Readonly<RemoteSettings> {
  return current;
}

/**
 * Override some settings, keeping the rest
 */
export function updateSettings(patch: Partial<RemoteSettings>): void {
  if (patch.readChunkSize !== undefined && patch.readChunkSize < 1) {
    throw new RangeError(`readChunkSize must be positive, got ${patch.readChunkSize}`);
  }
  if (patch.pollInterval !== undefined && patch.pollInterval < 0) {
    throw new RangeError(`pollInterval must not be negative, got ${patch.pollInterval}`);
  }
  current = { ...current, ...patch };
}

export function resetSettings(): void {
  current = defaults();
}
