import { ClientFactory } from '../types';
import { SubstitutionHandle, SubstitutionSlot } from '../utils/substitution';
import { Ssh2Client } from './Ssh2Client';

const createSsh2Client: ClientFactory = () => new Ssh2Client();

const slot = new SubstitutionSlot<ClientFactory>('Client factory', () => createSsh2Client);

/**
 * Factory used by connections that were not handed one explicitly
 */
export function getClientFactory(): ClientFactory {
  return slot.get();
}

export function isClientFactorySubstituted(): boolean {
  return slot.isSubstituted;
}

/**
 * Replace the default ssh2-backed factory until the handle is restored
 */
export function substituteClientFactory(factory: ClientFactory, owner: string): SubstitutionHandle {
  return slot.install(factory, owner);
}
