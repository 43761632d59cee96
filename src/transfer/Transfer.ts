import * as path from 'path';
import { Connection } from '../connection/Connection';
import { RemoteError, SftpEndpoint, TransferError } from '../types';
import { isDirectoryMode, permissionBits } from '../utils/helpers';
import { Logger } from '../utils/logger';
import { LocalFs, getLocalFs } from './localFs';

export interface TransferOptions {
  /** Copy the source file's permission bits onto the destination (default: true) */
  preserveMode?: boolean;
}

/**
 * Where a transfer actually read from and wrote to
 */
export interface TransferResult {
  /** Absolute local path */
  local: string;
  /** Absolute remote path */
  remote: string;
  /** Local path as given by the caller */
  origLocal?: string;
  /** Remote path as given by the caller */
  origRemote?: string;
  connection: Connection;
}

/**
 * File upload and download over a connection's SFTP endpoint
 */
export class Transfer {
  private readonly logger = new Logger('Transfer');

  constructor(
    public readonly connection: Connection,
    private readonly localFs?: LocalFs
  ) {}

  private get fs(): LocalFs {
    return this.localFs ?? getLocalFs();
  }

  /**
   * Download a remote file.
   *
   * Relative remote paths are taken from the remote working directory. The
   * local path defaults to the remote file's name in the current directory.
   */
  async get(remote: string, local?: string, options: TransferOptions = {}): Promise<TransferResult> {
    if (!remote) {
      throw new TransferError('Remote path must not be empty');
    }
    const preserveMode = options.preserveMode ?? true;

    return this.wrap(`download ${remote}`, async () => {
      const sftp = await this.connection.sftp();
      const remotePath = await this.resolveRemote(sftp, remote);
      const localPath = this.fs.resolve(local || path.posix.basename(remotePath));

      await sftp.get(remotePath, localPath);
      if (preserveMode) {
        const { mode } = await sftp.stat(remotePath);
        await this.fs.chmod(localPath, permissionBits(mode));
      }

      this.logger.debug(`Downloaded ${remotePath} to ${localPath}`);
      return { local: localPath, remote: remotePath, origLocal: local, origRemote: remote, connection: this.connection };
    });
  }

  /**
   * Upload a local file.
   *
   * The remote path defaults to the local file's name in the remote working
   * directory; when it names an existing directory the file goes inside it.
   */
  async put(local: string, remote?: string, options: TransferOptions = {}): Promise<TransferResult> {
    if (!local) {
      throw new TransferError('Local path must not be empty');
    }
    const preserveMode = options.preserveMode ?? true;

    return this.wrap(`upload ${local}`, async () => {
      const sftp = await this.connection.sftp();
      const localName = this.fs.basename(local);
      let remotePath = await this.resolveRemote(sftp, remote || localName);
      if (await this.isRemoteDirectory(sftp, remotePath)) {
        remotePath = path.posix.join(remotePath, localName);
      }
      const localPath = this.fs.resolve(local);

      await sftp.put(localPath, remotePath);
      if (preserveMode) {
        const { mode } = await this.fs.stat(localPath);
        await sftp.chmod(remotePath, permissionBits(mode));
      }

      this.logger.debug(`Uploaded ${localPath} to ${remotePath}`);
      return { local: localPath, remote: remotePath, origLocal: local, origRemote: remote, connection: this.connection };
    });
  }

  private async resolveRemote(sftp: SftpEndpoint, remote: string): Promise<string> {
    const cwd = sftp.getcwd() ?? (await sftp.normalize('.'));
    return path.posix.resolve(cwd, remote);
  }

  private async isRemoteDirectory(sftp: SftpEndpoint, remotePath: string): Promise<boolean> {
    try {
      return isDirectoryMode((await sftp.stat(remotePath)).mode);
    } catch (error) {
      // A missing destination is the normal case for a new upload
      this.logger.debug(`stat ${remotePath} failed, treating as a file:`, error);
      return false;
    }
  }

  private async wrap(action: string, operation: () => Promise<TransferResult>): Promise<TransferResult> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof RemoteError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new TransferError(`Failed to ${action}: ${cause.message}`, cause);
    }
  }
}
