/**
 * Resolved connection target
 */
export interface IHostConfig {
  /** Name as given by the caller (may be an ssh config alias) */
  name: string;
  /** Hostname or IP address */
  host: string;
  /** SSH port (default: 22) */
  port: number;
  /** Username for authentication */
  username: string;
  /** Path to private key file */
  privateKeyPath?: string;
  /** Source of the resolved values */
  source: 'ssh-config' | 'explicit';
}

/**
 * Connection state
 */
export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Error = 'error',
}

/**
 * Options handed to RemoteClient.connect
 */
export interface ConnectOptions {
  host: string;
  port: number;
  username: string;
  readyTimeout?: number;
  keepaliveInterval?: number;
  password?: string;
  privateKey?: Buffer;
  passphrase?: string;
  agent?: string;
}

/**
 * A single command execution stream.
 *
 * Reads are non-blocking: they return whatever has arrived so far, and an
 * empty buffer when nothing is pending. Callers poll `exitStatusReady()` to
 * learn when the remote process has finished.
 */
export interface ExecChannel {
  exec(command: string): Promise<void>;
  recv(count: number): Buffer;
  recvStderr(count: number): Buffer;
  sendall(data: Buffer | string): number;
  /** Signal EOF on stdin */
  shutdownWrite(): void;
  exitStatusReady(): boolean;
  /** Throws ConnectionError when the channel failed instead of exiting */
  recvExitStatus(): number;
  close(): void;
}

/**
 * Per-connection multiplexer that yields execution channels
 */
export interface RemoteTransport {
  isActive(): boolean;
  openSession(): Promise<ExecChannel>;
}

/**
 * Remote file attributes
 */
export interface RemoteStats {
  /** Full st_mode, including file type bits */
  mode: number;
  size?: number;
}

/**
 * File-transfer endpoint of a connection
 */
export interface SftpEndpoint {
  /** Working directory set via chdir, or null if none was set */
  getcwd(): string | null;
  normalize(remotePath: string): Promise<string>;
  stat(remotePath: string): Promise<RemoteStats>;
  get(remotePath: string, localPath: string): Promise<void>;
  put(localPath: string, remotePath: string): Promise<void>;
  chmod(remotePath: string, mode: number): Promise<void>;
  close(): void;
}

/**
 * Low-level SSH client, one per connection
 */
export interface RemoteClient {
  connect(options: ConnectOptions): Promise<void>;
  /** Returns null until connected */
  getTransport(): RemoteTransport | null;
  openSftp(): Promise<SftpEndpoint>;
  close(): void;
}

/**
 * Creates a fresh client for each new connection
 */
export type ClientFactory = () => RemoteClient;

/**
 * Outcome of a remote command
 */
export interface Result {
  command: string;
  stdout: string;
  stderr: string;
  exited: number;
  ok: boolean;
  connectionId: string;
}

/**
 * Remote execution errors
 */
export class RemoteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RemoteError';
  }
}

export class ConnectionError extends RemoteError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_FAILED', cause);
    this.name = 'ConnectionError';
  }
}

export class CommandError extends RemoteError {
  constructor(public readonly result: Result) {
    super(
      `Command '${result.command}' exited with code ${result.exited}` +
        (result.stderr ? `: ${result.stderr.trim()}` : ''),
      'COMMAND_FAILED'
    );
    this.name = 'CommandError';
  }
}

export class SFTPError extends RemoteError {
  constructor(message: string, cause?: Error) {
    super(message, 'SFTP_ERROR', cause);
    this.name = 'SFTPError';
  }
}

export class TransferError extends RemoteError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSFER_ERROR', cause);
    this.name = 'TransferError';
  }
}

export class SubstitutionError extends RemoteError {
  constructor(message: string) {
    super(message, 'SUBSTITUTION_ACTIVE');
    this.name = 'SubstitutionError';
  }
}
