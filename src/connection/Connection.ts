import * as fs from 'fs';
import {
  ClientFactory,
  CommandError,
  ConnectOptions,
  ConnectionError,
  ConnectionState,
  ExecChannel,
  IHostConfig,
  RemoteClient,
  RemoteError,
  RemoteTransport,
  Result,
  SftpEndpoint,
} from '../types';
import { HostService } from '../services/HostService';
import { delay } from '../utils/helpers';
import { getSettings } from '../utils/settings';
import { Logger } from '../utils/logger';
import { getClientFactory } from './clientFactory';

/**
 * Credentials passed through to the client's connect call
 */
export type AuthOptions = Pick<ConnectOptions, 'password' | 'privateKey' | 'passphrase' | 'agent'>;

export interface ConnectionOptions {
  /** Login user; wins over the host string and ssh config */
  user?: string;
  /** Port; wins over the host string and ssh config */
  port?: number;
  /** Creates the underlying client; defaults to the process-wide factory */
  clientFactory?: ClientFactory;
  hostService?: HostService;
  auth?: AuthOptions;
}

export interface RunOptions {
  /** Data written to the command's stdin, followed by EOF */
  in?: Buffer | string;
  /** Return a failed result instead of throwing CommandError */
  warn?: boolean;
  encoding?: BufferEncoding;
}

function drain(read: (count: number) => Buffer, chunkSize: number, into: Buffer[]): void {
  for (;;) {
    const chunk = read(chunkSize);
    if (chunk.length === 0) {
      return;
    }
    into.push(chunk);
  }
}

/**
 * A connection to one remote host.
 *
 * The underlying client is created up front; the network connection is
 * opened lazily by the first `run` or `sftp` call (or an explicit `open`).
 */
export class Connection {
  public readonly id: string;
  public readonly host: IHostConfig;
  public state: ConnectionState = ConnectionState.Disconnected;

  private readonly _client: RemoteClient;
  private readonly _auth: AuthOptions | undefined;
  private _transport: RemoteTransport | null = null;
  private _sftp: SftpEndpoint | null = null;
  private _opening: Promise<void> | null = null;
  private readonly logger = new Logger('Connection');

  constructor(host: string, options: ConnectionOptions = {}) {
    const hostService = options.hostService ?? HostService.getInstance();
    this.host = hostService.resolve(host, { user: options.user, port: options.port });
    this.id = `${this.host.host}:${this.host.port}:${this.host.username}`;
    this._auth = options.auth;
    this._client = (options.clientFactory ?? getClientFactory())();
  }

  get client(): RemoteClient {
    return this._client;
  }

  get isConnected(): boolean {
    return this._transport?.isActive() ?? false;
  }

  /**
   * Connect to the host unless already connected
   */
  async open(): Promise<void> {
    if (this.isConnected) {
      return;
    }
    if (!this._opening) {
      this._opening = this.doOpen().finally(() => {
        this._opening = null;
      });
    }
    return this._opening;
  }

  private async doOpen(): Promise<void> {
    const { connectionTimeout, keepaliveInterval } = getSettings();
    this.setState(ConnectionState.Connecting);

    try {
      await this._client.connect({
        host: this.host.host,
        port: this.host.port,
        username: this.host.username,
        readyTimeout: connectionTimeout,
        keepaliveInterval,
        ...this.buildAuthConfig(),
      });
    } catch (error) {
      this.setState(ConnectionState.Error);
      this._client.close();
      if (error instanceof RemoteError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ConnectionError(`Failed to connect to ${this.id}: ${cause.message}`, cause);
    }

    const transport = this._client.getTransport();
    if (!transport) {
      this.setState(ConnectionState.Error);
      this._client.close();
      throw new ConnectionError(`Connected to ${this.id} but no transport is available`);
    }
    this._transport = transport;
    this.setState(ConnectionState.Connected);
    this.logger.debug(`Connected to ${this.id}`);
  }

  /**
   * Explicit credentials first, then the identity file from ssh config,
   * then the running ssh-agent
   */
  private buildAuthConfig(): AuthOptions {
    if (this._auth) {
      return this._auth;
    }
    const auth: AuthOptions = {};
    if (this.host.privateKeyPath && fs.existsSync(this.host.privateKeyPath)) {
      auth.privateKey = fs.readFileSync(this.host.privateKeyPath);
    }
    if (process.env.SSH_AUTH_SOCK) {
      auth.agent = process.env.SSH_AUTH_SOCK;
    }
    return auth;
  }

  /**
   * Open a new execution channel on the connected transport
   */
  async createSession(): Promise<ExecChannel> {
    await this.open();
    const transport = this._transport;
    if (!transport) {
      throw new ConnectionError('Not connected');
    }
    return transport.openSession();
  }

  /**
   * Execute a command on the remote host
   */
  async run(command: string, options: RunOptions = {}): Promise<Result> {
    const { readChunkSize, pollInterval } = getSettings();
    const encoding = options.encoding ?? 'utf8';
    const channel = await this.createSession();

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const collect = () => {
      drain((n) => channel.recv(n), readChunkSize, stdout);
      drain((n) => channel.recvStderr(n), readChunkSize, stderr);
    };

    try {
      await channel.exec(command);
      if (options.in !== undefined) {
        channel.sendall(options.in);
        channel.shutdownWrite();
      }

      collect();
      while (!channel.exitStatusReady()) {
        await delay(pollInterval);
        collect();
      }
      collect();
    } finally {
      channel.close();
    }

    const exited = channel.recvExitStatus();
    const result: Result = {
      command,
      stdout: Buffer.concat(stdout).toString(encoding),
      stderr: Buffer.concat(stderr).toString(encoding),
      exited,
      ok: exited === 0,
      connectionId: this.id,
    };
    this.logger.debug(`'${command}' on ${this.id} exited with ${exited}`);

    if (!result.ok && !options.warn) {
      throw new CommandError(result);
    }
    return result;
  }

  /**
   * Get or create the SFTP endpoint
   */
  async sftp(): Promise<SftpEndpoint> {
    if (this._sftp) {
      return this._sftp;
    }
    await this.open();
    const sftp = await this._client.openSftp();
    this._sftp = sftp;
    return sftp;
  }

  /**
   * Disconnect from the host. Safe to call when not connected.
   */
  close(): void {
    if (!this._transport) {
      return;
    }
    if (this._sftp) {
      this._sftp.close();
      this._sftp = null;
    }
    this._client.close();
    this._transport = null;
    this.setState(ConnectionState.Disconnected);
    this.logger.debug(`Disconnected from ${this.id}`);
  }

  private setState(state: ConnectionState): void {
    this.state = state;
  }
}
