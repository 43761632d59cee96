import { ConnectOptions, RemoteClient, RemoteTransport, SftpEndpoint } from '../types';
import { MockChannel } from './MockChannel';
import { HarnessUsageError } from './errors';

export interface FakeTransport extends RemoteTransport {
  isActive: jest.Mock<boolean, []>;
  openSession: jest.Mock<Promise<MockChannel>, []>;
}

export interface FakeClient extends RemoteClient {
  connect: jest.Mock<Promise<void>, [options: ConnectOptions]>;
  getTransport: jest.Mock<FakeTransport | null, []>;
  openSftp: jest.Mock<Promise<SftpEndpoint>, []>;
  close: jest.Mock<void, []>;
}

/**
 * Transport that hands out the given channels, one per openSession() call.
 *
 * It reports itself active from the start: a transport that exists but has
 * not finished connecting is not modelled.
 */
export function createFakeTransport(channels: readonly MockChannel[]): FakeTransport {
  let next = 0;
  return {
    isActive: jest.fn((): boolean => true),
    openSession: jest.fn((): Promise<MockChannel> => {
      const channel = channels[next];
      if (!channel) {
        return Promise.reject(
          new HarnessUsageError(`openSession called ${next + 1} times but only ${channels.length} command(s) were declared`)
        );
      }
      next++;
      return Promise.resolve(channel);
    }),
  };
}

/**
 * Client whose connect always succeeds and whose getTransport returns the
 * given transport
 */
export function createFakeClient(transport: FakeTransport, sftp?: SftpEndpoint): FakeClient {
  return {
    connect: jest.fn((_options: ConnectOptions): Promise<void> => Promise.resolve()),
    getTransport: jest.fn((): FakeTransport | null => transport),
    openSftp: jest.fn((): Promise<SftpEndpoint> =>
      sftp
        ? Promise.resolve(sftp)
        : Promise.reject(new HarnessUsageError('This session does not script SFTP; use MockSftp for transfers'))
    ),
    close: jest.fn((): void => undefined),
  };
}
