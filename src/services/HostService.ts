import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import SSHConfig from 'ssh-config';
import { IHostConfig } from '../types';
import { expandPath, parseHostString } from '../utils/helpers';
import { getSettings } from '../utils/settings';
import { Logger } from '../utils/logger';

const DEFAULT_PORT = 22;

/**
 * Explicit values that win over both the host string and ssh config
 */
export interface HostOverrides {
  user?: string;
  port?: number;
}

function firstValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Resolves "user@host:port" strings into connection targets,
 * applying ~/.ssh/config (HostName, User, Port, IdentityFile)
 */
export class HostService {
  private static _instance: HostService;
  private readonly logger = new Logger('HostService');

  // Cache for the parsed config file (invalidated on mtime change)
  private parsedCache: SSHConfig | null = null;
  private cacheMtime = 0;

  /**
   * @param configContent - ssh config text to use instead of the file on disk
   */
  constructor(private readonly configContent?: string) {}

  /**
   * Get the shared instance, which reads the config file from disk
   */
  static getInstance(): HostService {
    if (!HostService._instance) {
      HostService._instance = new HostService();
    }
    return HostService._instance;
  }

  /**
   * Get the SSH config file path
   */
  getSSHConfigPath(): string {
    const configPath = getSettings().sshConfigPath;
    if (configPath) {
      return expandPath(configPath);
    }
    return path.join(os.homedir(), '.ssh', 'config');
  }

  resolve(hostString: string, overrides: HostOverrides = {}): IHostConfig {
    const parsed = parseHostString(hostString);
    const config = this.loadConfig();
    const computed: Record<string, string | string[] | undefined> = config ? config.compute(parsed.host) : {};

    const hostName = firstValue(computed.HostName);
    const configUser = firstValue(computed.User);
    const configPort = firstValue(computed.Port);
    const identityFile = firstValue(computed.IdentityFile);

    const port = overrides.port ?? parsed.port ?? (configPort ? parseInt(configPort, 10) : undefined) ?? DEFAULT_PORT;
    const fromConfig = Boolean(hostName || configUser || configPort || identityFile);

    return {
      name: hostString,
      host: hostName ? hostName.replace(/%h/g, parsed.host) : parsed.host,
      port: Number.isNaN(port) ? DEFAULT_PORT : port,
      username: overrides.user ?? parsed.user ?? configUser ?? os.userInfo().username,
      privateKeyPath: identityFile ? expandPath(identityFile) : undefined,
      source: fromConfig ? 'ssh-config' : 'explicit',
    };
  }

  private loadConfig(): SSHConfig | null {
    if (this.configContent !== undefined) {
      this.parsedCache ??= SSHConfig.parse(this.configContent);
      return this.parsedCache;
    }

    if (!getSettings().loadSshConfig) {
      return null;
    }

    const configPath = this.getSSHConfigPath();
    if (!fs.existsSync(configPath)) {
      this.parsedCache = null;
      return null;
    }

    try {
      const stats = fs.statSync(configPath);
      if (this.parsedCache !== null && stats.mtimeMs === this.cacheMtime) {
        return this.parsedCache;
      }
      this.parsedCache = SSHConfig.parse(fs.readFileSync(configPath, 'utf-8'));
      this.cacheMtime = stats.mtimeMs;
      return this.parsedCache;
    } catch (error) {
      this.logger.warn(`Failed to parse SSH config ${configPath}:`, error);
      this.parsedCache = null;
      return null;
    }
  }
}
