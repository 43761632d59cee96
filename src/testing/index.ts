export { Command, CommandSpec } from './Command';
export { ByteReader, MockChannel } from './MockChannel';
export { Session, SessionOptions, SessionTarget } from './Session';
export { MockRemote, MockRemoteOptions } from './MockRemote';
export { FAKE_MODE, FAKE_REMOTE_CWD, FakeLocalFs, FakeSftp, MockSftp, MockSftpHandles } from './MockSftp';
export { FakeClient, FakeTransport } from './fakes';
export { RemoteTestBody, SftpTestBody, TestFn, mockRemote, mockSftp } from './decorators';
export {
  ExpectationMismatchError,
  HarnessConfigurationError,
  HarnessError,
  HarnessUsageError,
} from './errors';
