import * as fs from 'fs';
import * as path from 'path';
import { SubstitutionHandle, SubstitutionSlot } from '../utils/substitution';

/**
 * The local filesystem queries Transfer depends on
 */
export interface LocalFs {
  /** Absolute form of a local path */
  resolve(localPath: string): string;
  basename(localPath: string): string;
  stat(localPath: string): Promise<{ mode: number }>;
  chmod(localPath: string, mode: number): Promise<void>;
}

export const nodeLocalFs: LocalFs = {
  resolve: (localPath) => path.resolve(localPath),
  basename: (localPath) => path.basename(localPath),
  stat: async (localPath) => {
    const stats = await fs.promises.stat(localPath);
    return { mode: stats.mode };
  },
  chmod: (localPath, mode) => fs.promises.chmod(localPath, mode),
};

const slot = new SubstitutionSlot<LocalFs>('Local filesystem', () => nodeLocalFs);

export function getLocalFs(): LocalFs {
  return slot.get();
}

export function isLocalFsSubstituted(): boolean {
  return slot.isSubstituted;
}

export function substituteLocalFs(localFs: LocalFs, owner: string): SubstitutionHandle {
  return slot.install(localFs, owner);
}
