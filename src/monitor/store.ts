import {
  readFileSync,
  openSync,
  writeSync,
  fsyncSync,
  closeSync,
  renameSync,
  mkdirSync,
  existsSync,
  rmSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { StateError, errorMessage } from '../errors.js';
import { emptySnapshot, type Snapshot } from './state.js';

const itemStateSchema = z.object({
  name: z.string().nullable(),
  link: z.string().nullable(),
  image: z.string().nullable(),
  stockLabel: z.string().nullable(),
  inStock: z.boolean(),
  lastSeen: z.string(),
});

// z.record assigns keys onto a plain object, which would turn an item called
// "__proto__" into a prototype; validating entries keeps every key an own property.
const itemsSchema = z.preprocess(
  (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
  z.array(z.tuple([z.string(), itemStateSchema])).transform((entries) => Object.fromEntries(entries)),
);

const snapshotSchema = z.object({
  items: itemsSchema,
  lastChecked: z.string().nullable(),
});

export interface StoreFileSystem {
  exists(path: string): boolean;
  read(path: string): string;
  /** Must not return before the data is on stable storage. */
  write(path: string, data: string): void;
  rename(from: string, to: string): void;
  remove(path: string): void;
  mkdirp(path: string): void;
}

export const nodeFileSystem: StoreFileSystem = {
  exists: (path) => existsSync(path),
  read: (path) => readFileSync(path, 'utf-8'),
  write: (path, data) => {
    const fd = openSync(path, 'w');
    try {
      writeSync(fd, data, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  },
  rename: (from, to) => renameSync(from, to),
  remove: (path) => rmSync(path, { force: true }),
  mkdirp: (path) => {
    mkdirSync(path, { recursive: true });
  },
};

export class StateStore {
  readonly path: string;
  private fs: StoreFileSystem;

  constructor(path: string, fs: StoreFileSystem = nodeFileSystem) {
    this.path = path;
    this.fs = fs;
  }

  get tempPath(): string {
    return `${this.path}.tmp`;
  }

  load(): Snapshot {
    if (!this.fs.exists(this.path)) {
      return emptySnapshot();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.fs.read(this.path));
    } catch (err) {
      throw new StateError(`Cannot read state snapshot: ${errorMessage(err)}`, this.path, { cause: err });
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      throw new StateError(
        `Malformed state snapshot: ${result.error.issues[0]?.message ?? 'unknown issue'}`,
        this.path,
        { cause: result.error },
      );
    }
    return result.data;
  }

  /**
   * Replaces the snapshot wholesale. The new document is written beside the
   * old one and renamed over it, so readers see either snapshot in full.
   */
  save(snapshot: Snapshot): void {
    const tmp = this.tempPath;
    try {
      this.fs.mkdirp(dirname(this.path));
      this.fs.write(tmp, JSON.stringify(snapshot, null, 2) + '\n');
      this.fs.rename(tmp, this.path);
    } catch (err) {
      try {
        this.fs.remove(tmp);
      } catch (cleanupErr) {
        throw new StateError(
          `Cannot save state snapshot: ${errorMessage(err)} (and ${tmp} could not be removed: ${errorMessage(cleanupErr)})`,
          this.path,
          { cause: err },
        );
      }
      throw new StateError(`Cannot save state snapshot: ${errorMessage(err)}`, this.path, { cause: err });
    }
  }
}
