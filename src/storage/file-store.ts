import fs from 'node:fs';
import path from 'node:path';
import type { KeyValueStore } from './key-value-store.js';

/**
 * One JSON file per key under `dir`, for hosts without Web Storage.
 * Writes go through a temp file and a rename so a crash never leaves half a blob.
 */
export function createFileStore(dir: string): KeyValueStore {
  const fileFor = (key: string) => path.join(dir, `${encodeURIComponent(key)}.json`);

  return {
    restore(key) {
      const file = fileFor(key);
      if (!fs.existsSync(file)) return null;
      return fs.readFileSync(file, 'utf8');
    },
    store(key, blob) {
      const file = fileFor(key);
      fs.mkdirSync(dir, { recursive: true });
      const tmp = `${file}.tmp`;
      fs.writeFileSync(tmp, blob, 'utf8');
      fs.renameSync(tmp, file);
    },
  };
}
