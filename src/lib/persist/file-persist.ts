import { randomBytes } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { debugPersist } from '../utils/debug.js';
import {
  persistKeyToString,
  type AcmePersist,
  type PersistKey,
  type PersistKind,
} from './types.js';

const EXTENSIONS: Record<PersistKind, string> = {
  private_key: 'key',
  certificate: 'crt',
  account: 'json',
};

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * One file per key under a directory: `<dir>/<realm>_<kind>_<key>.<ext>`.
 * Private keys are written owner-readable only.
 */
export class FilePersist implements AcmePersist {
  constructor(private readonly dir: string) {}

  pathFor(key: PersistKey): string {
    return join(this.dir, `${persistKeyToString(key)}.${EXTENSIONS[key.kind]}`);
  }

  async get(key: PersistKey): Promise<Uint8Array | undefined> {
    const path = this.pathFor(key);
    try {
      const data = await readFile(path);
      debugPersist('file get %s length=%d', path, data.length);
      return new Uint8Array(data);
    } catch (err) {
      if (isNotFound(err)) {
        debugPersist('file get %s: not found', path);
        return undefined;
      }
      throw err;
    }
  }

  async put(key: PersistKey, value: Uint8Array): Promise<void> {
    const path = this.pathFor(key);
    const mode = key.kind === 'private_key' ? 0o600 : 0o644;
    await mkdir(this.dir, { recursive: true });

    // write-then-rename so a reader never sees a partial file
    const tmp = `${path}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await writeFile(tmp, value, { mode });
      await rename(tmp, path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    debugPersist('file put %s length=%d', path, value.length);
  }
}
