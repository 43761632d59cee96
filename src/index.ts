/**
 * remote-exec: run commands and transfer files over SSH.
 *
 * The scripted test harness lives in `./testing` and needs a Jest runtime.
 *
 * @module
 */

export { Connection, ConnectionOptions, RunOptions, AuthOptions } from './connection/Connection';
export { Ssh2Client, Ssh2ExecChannel, Ssh2Sftp } from './connection/Ssh2Client';
export { getClientFactory, isClientFactorySubstituted, substituteClientFactory } from './connection/clientFactory';
export { Transfer, TransferOptions, TransferResult } from './transfer/Transfer';
export { LocalFs, getLocalFs, isLocalFsSubstituted, nodeLocalFs, substituteLocalFs } from './transfer/localFs';
export { HostService, HostOverrides } from './services/HostService';
export { RemoteSettings, getSettings, resetSettings, updateSettings } from './utils/settings';
export { LogLevel, Logger } from './utils/logger';
export { SubstitutionHandle } from './utils/substitution';
export * from './types';
