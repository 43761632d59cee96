import { Client, ClientChannel, ConnectConfig, SFTPWrapper } from 'ssh2';
import {
  ConnectOptions,
  ConnectionError,
  ExecChannel,
  RemoteClient,
  RemoteStats,
  RemoteTransport,
  SFTPError,
  SftpEndpoint,
} from '../types';
import { Logger } from '../utils/logger';

const EMPTY = Buffer.alloc(0);

function takeBytes(buffer: Buffer, count: number): [Buffer, Buffer] {
  if (buffer.length === 0) {
    return [EMPTY, buffer];
  }
  return [buffer.subarray(0, count), buffer.subarray(count)];
}

/**
 * One `exec` request on an ssh2 connection.
 *
 * ssh2 pushes data through stream events; this buffers it so callers can
 * pull it with non-blocking reads and poll for completion.
 */
export class Ssh2ExecChannel implements ExecChannel {
  private _stream: ClientChannel | null = null;
  private _stdout: Buffer = EMPTY;
  private _stderr: Buffer = EMPTY;
  private _exitCode: number | null = null;
  private _error: ConnectionError | null = null;
  private _closed = false;

  constructor(private readonly client: Client) {}

  exec(command: string): Promise<void> {
    if (this._stream) {
      return Promise.reject(new ConnectionError('Channel is already running a command'));
    }
    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, stream) => {
        if (err) {
          reject(new ConnectionError(`Failed to execute command: ${err.message}`, err));
          return;
        }
        this._stream = stream;

        stream.on('data', (data: Buffer) => {
          this._stdout = Buffer.concat([this._stdout, data]);
        });
        stream.stderr.on('data', (data: Buffer) => {
          this._stderr = Buffer.concat([this._stderr, data]);
        });
        stream.on('exit', (code: number | null) => {
          this._exitCode = code;
        });
        stream.on('error', (streamErr: Error) => {
          this._error = new ConnectionError(`Channel error: ${streamErr.message}`, streamErr);
          this._closed = true;
        });
        // 'close' follows the last data event, so nothing is left in flight
        stream.on('close', () => {
          this._closed = true;
        });
        resolve();
      });
    });
  }

  recv(count: number): Buffer {
    const [chunk, rest] = takeBytes(this._stdout, count);
    this._stdout = rest;
    return chunk;
  }

  recvStderr(count: number): Buffer {
    const [chunk, rest] = takeBytes(this._stderr, count);
    this._stderr = rest;
    return chunk;
  }

  sendall(data: Buffer | string): number {
    if (!this._stream) {
      throw new ConnectionError('Cannot write stdin before exec');
    }
    const bytes = typeof data === 'string' ? Buffer.from(data) : data;
    this._stream.write(bytes);
    return bytes.length;
  }

  shutdownWrite(): void {
    this._stream?.end();
  }

  exitStatusReady(): boolean {
    return this._closed;
  }

  /**
   * Exit code, or -1 when the process died from a signal.
   * Throws the channel's error if the stream failed.
   */
  recvExitStatus(): number {
    if (this._error) {
      throw this._error;
    }
    return this._exitCode ?? -1;
  }

  close(): void {
    if (this._stream && !this._closed) {
      this._stream.close();
    }
  }
}

class Ssh2Transport implements RemoteTransport {
  constructor(
    private readonly client: Client,
    private readonly isReady: () => boolean
  ) {}

  isActive(): boolean {
    return this.isReady();
  }

  async openSession(): Promise<ExecChannel> {
    if (!this.isReady()) {
      throw new ConnectionError('Not connected');
    }
    return new Ssh2ExecChannel(this.client);
  }
}

/**
 * SFTP endpoint over an ssh2 SFTP session
 */
export class Ssh2Sftp implements SftpEndpoint {
  constructor(private readonly sftp: SFTPWrapper) {}

  getcwd(): string | null {
    // ssh2 has no chdir; relative paths resolve against the login directory
    return null;
  }

  normalize(remotePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      this.sftp.realpath(remotePath, (err, absPath) => {
        if (err) {
          reject(new SFTPError(`Failed to resolve ${remotePath}: ${err.message}`, err));
          return;
        }
        resolve(absPath);
      });
    });
  }

  stat(remotePath: string): Promise<RemoteStats> {
    return new Promise((resolve, reject) => {
      this.sftp.stat(remotePath, (err, stats) => {
        if (err) {
          reject(new SFTPError(`Failed to stat ${remotePath}: ${err.message}`, err));
          return;
        }
        resolve({ mode: stats.mode, size: stats.size });
      });
    });
  }

  get(remotePath: string, localPath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastGet(remotePath, localPath, (err) => {
        if (err) {
          reject(new SFTPError(`Failed to download ${remotePath}: ${err.message}`, err));
          return;
        }
        resolve();
      });
    });
  }

  put(localPath: string, remotePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.fastPut(localPath, remotePath, (err) => {
        if (err) {
          reject(new SFTPError(`Failed to upload ${localPath}: ${err.message}`, err));
          return;
        }
        resolve();
      });
    });
  }

  chmod(remotePath: string, mode: number): Promise<void> {
    return new Promise((resolve, reject) => {
      this.sftp.chmod(remotePath, mode, (err) => {
        if (err) {
          reject(new SFTPError(`Failed to chmod ${remotePath}: ${err.message}`, err));
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    this.sftp.end();
  }
}

interface PendingConnect {
  resolve: () => void;
  reject: (error: Error) => void;
  timeoutId: NodeJS.Timeout;
}

/**
 * RemoteClient implementation using ssh2 library
 */
export class Ssh2Client implements RemoteClient {
  private readonly _client = new Client();
  private _ready = false;
  private _pending: PendingConnect | null = null;
  private readonly _transport: Ssh2Transport;
  private readonly logger = new Logger('Ssh2Client');

  constructor() {
    this._transport = new Ssh2Transport(this._client, () => this._ready);

    this._client.on('ready', () => {
      const pending = this.takePending();
      if (!pending) {
        // Late ready after a timeout; the client was already ended
        return;
      }
      this._ready = true;
      pending.resolve();
    });

    this._client.on('error', (err: Error) => {
      this._ready = false;
      const pending = this.takePending();
      if (pending) {
        pending.reject(new ConnectionError(`Connection error: ${err.message}`, err));
        return;
      }
      this.logger.warn(`Connection error: ${err.message}`);
    });

    this._client.on('close', () => {
      this._ready = false;
    });
  }

  connect(options: ConnectOptions): Promise<void> {
    if (this._pending) {
      return Promise.reject(new ConnectionError('Connection already in progress'));
    }
    const timeout = options.readyTimeout ?? 10000;
    const config: ConnectConfig = {
      host: options.host,
      port: options.port,
      username: options.username,
      readyTimeout: timeout,
      keepaliveInterval: options.keepaliveInterval,
      password: options.password,
      privateKey: options.privateKey,
      passphrase: options.passphrase,
      agent: options.agent,
    };

    return new Promise<void>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this._pending = null;
        this._client.end();
        reject(new ConnectionError(`Connection timeout after ${timeout}ms`));
      }, timeout);
      this._pending = { resolve, reject, timeoutId };

      this._client.connect(config);
    });
  }

  private takePending(): PendingConnect | null {
    const pending = this._pending;
    if (pending) {
      clearTimeout(pending.timeoutId);
      this._pending = null;
    }
    return pending;
  }

  getTransport(): RemoteTransport | null {
    return this._ready ? this._transport : null;
  }

  openSftp(): Promise<SftpEndpoint> {
    if (!this._ready) {
      return Promise.reject(new ConnectionError('Not connected'));
    }
    return new Promise((resolve, reject) => {
      this._client.sftp((err, sftp) => {
        if (err) {
          reject(new SFTPError(`Failed to create SFTP session: ${err.message}`, err));
          return;
        }
        resolve(new Ssh2Sftp(sftp));
      });
    });
  }

  close(): void {
    this._ready = false;
    this._client.end();
  }
}
