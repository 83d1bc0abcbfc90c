import * as fs from 'fs/promises';
import * as path from 'path';
import { z, ZodError } from 'zod';
import { ConfigKey, ConfigValues, INTERVAL_BOUNDS, Sound, VOLUME_BOUNDS } from '../../types';
import { IStorageGateway, ReadTransaction, WriteTransaction } from '../../domain/storage/IStorageGateway';
import { ILogger } from '../../domain/common/ILogger';
import { AppError, NotFoundError, StorageError, ValidationError, hasErrorCode, toError } from '../../domain/common/Errors';
import { assertConfigValues } from '../../domain/common/Invariants';

// --- On-disk record schemas ---

const configFileSchema = z.object({
  interval: z.number().int().min(INTERVAL_BOUNDS.min).max(INTERVAL_BOUNDS.max),
  volume: z.number().int().min(VOLUME_BOUNDS.min).max(VOLUME_BOUNDS.max),
  notifyChannel: z.string().regex(/^\d+$/).nullable()
}).partial();

const soundRecordSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  createdAt: z.number(),
  payload: z.string()
});

const sequenceSchema = z.object({
  lastId: z.number().int().nonnegative()
});

type SoundRecord = z.infer<typeof soundRecordSchema>;

const SOUND_FILE_PATTERN = /^(\d+)\.json$/;

interface TableSnapshot {
  readonly sounds: ReadonlyMap<number, Sound>;
  readonly config: ConfigValues;
  readonly lastId: number;
}

function isConfigKey(key: string): key is ConfigKey {
  return key === 'interval' || key === 'volume' || key === 'notifyChannel';
}

function toRecord(sound: Sound): SoundRecord {
  return {
    id: sound.id,
    name: sound.name,
    createdAt: sound.createdAt,
    payload: sound.payload.toString('base64')
  };
}

/**
 * Committed state as seen by readers.
 */
class SnapshotView implements ReadTransaction {
  constructor(protected readonly base: TableSnapshot) {}

  getSound(id: number): Sound | undefined {
    return this.base.sounds.get(id);
  }

  findSoundByName(name: string): Sound | undefined {
    const key = name.toLowerCase();
    return this.listSounds().find(sound => sound.name.toLowerCase() === key);
  }

  listSounds(): Sound[] {
    return Array.from(this.base.sounds.values()).sort((a, b) => a.id - b.id);
  }

  countSounds(): number {
    return this.listSounds().length;
  }

  getConfig(): ConfigValues {
    return { ...this.base.config };
  }
}

/**
 * Overlay of staged changes on top of a committed snapshot.
 */
class StagedWriteTransaction extends SnapshotView implements WriteTransaction {
  readonly upserts = new Map<number, Sound>();
  readonly deletions = new Set<number>();
  stagedConfig: ConfigValues | null = null;
  lastId: number;

  constructor(base: TableSnapshot) {
    super(base);
    this.lastId = base.lastId;
  }

  get hasChanges(): boolean {
    return this.upserts.size > 0 || this.deletions.size > 0 || this.stagedConfig !== null;
  }

  getSound(id: number): Sound | undefined {
    if (this.deletions.has(id)) return undefined;
    return this.upserts.get(id) ?? this.base.sounds.get(id);
  }

  listSounds(): Sound[] {
    const rows = new Map(this.base.sounds);
    this.deletions.forEach(id => rows.delete(id));
    this.upserts.forEach((row, id) => rows.set(id, row));
    return Array.from(rows.values()).sort((a, b) => a.id - b.id);
  }

  getConfig(): ConfigValues {
    return { ...(this.stagedConfig ?? this.base.config) };
  }

  insertSound(name: string, payload: Buffer, createdAt: number = Date.now()): Sound {
    this.assertNameFree(name);

    const sound: Sound = { id: ++this.lastId, name, payload, createdAt };
    this.upserts.set(sound.id, sound);
    return sound;
  }

  renameSound(id: number, name: string): Sound {
    const sound = this.requireSound(id);
    this.assertNameFree(name, id);

    const renamed: Sound = { ...sound, name };
    this.upserts.set(id, renamed);
    return renamed;
  }

  deleteSound(id: number): Sound {
    const sound = this.requireSound(id);
    this.upserts.delete(id);
    this.deletions.add(id);
    return sound;
  }

  setConfig<K extends ConfigKey>(key: K, value: ConfigValues[K]): void {
    const next = this.getConfig();
    next[key] = value;
    assertConfigValues(next);
    this.stagedConfig = next;
  }

  apply(): TableSnapshot {
    const sounds = new Map(this.base.sounds);
    this.deletions.forEach(id => sounds.delete(id));
    this.upserts.forEach((row, id) => sounds.set(id, row));

    return {
      sounds,
      config: this.stagedConfig ?? this.base.config,
      lastId: this.lastId
    };
  }

  private requireSound(id: number): Sound {
    const sound = this.getSound(id);
    if (!sound) {
      throw new NotFoundError('Sound', id);
    }
    return sound;
  }

  private assertNameFree(name: string, exceptId?: number): void {
    const existing = this.findSoundByName(name);
    if (existing && existing.id !== exceptId) {
      throw new ValidationError(`A sound named '${existing.name}' already exists`, { name });
    }
  }
}

/**
 * File system backed storage gateway.
 *
 * Layout under the data directory:
 * - `config.json`: the configuration table
 * - `sounds/<id>.json`: one sound row, payload base64 encoded
 * - `sounds/_sequence.json`: last issued sound id
 *
 * Tables are cached in memory. Writes are chained on a single promise so at
 * most one is persisting at any time; staged changes become visible to
 * readers only after every file of the write has been renamed into place.
 */
export class FileSystemStorageGateway implements IStorageGateway {
  private readonly soundsDir: string;
  private readonly configPath: string;
  private readonly sequencePath: string;
  private snapshot: TableSnapshot;
  private tail: Promise<void> = Promise.resolve();
  private state: 'created' | 'open' | 'closed' = 'created';

  constructor(
    private dataDir: string,
    private defaults: ConfigValues,
    private logger: ILogger
  ) {
    this.soundsDir = path.join(dataDir, 'sounds');
    this.configPath = path.join(dataDir, 'config.json');
    this.sequencePath = path.join(this.soundsDir, '_sequence.json');
    this.snapshot = { sounds: new Map(), config: { ...defaults }, lastId: 0 };
  }

  async initialize(): Promise<void> {
    if (this.state !== 'created') return;

    try {
      await fs.mkdir(this.soundsDir, { recursive: true });

      const config = await this.loadConfig();
      const sounds = await this.loadSounds();
      const lastId = await this.loadSequence(sounds);

      this.snapshot = { sounds, config, lastId };
      this.state = 'open';
      this.logger.info(`Loaded ${sounds.size} sounds`, { dataDir: this.dataDir });
    } catch (err) {
      this.logger.error('Failed to initialize storage:', toError(err));
      throw err instanceof AppError ? err : new StorageError('Failed to open storage', err);
    }
  }

  async read<T>(fn: (tx: ReadTransaction) => T): Promise<T> {
    this.ensureOpen();
    await this.tail;
    return fn(new SnapshotView(this.snapshot));
  }

  write<T>(fn: (tx: WriteTransaction) => T): Promise<T> {
    if (this.state !== 'open') {
      return Promise.reject(new StorageError('Storage is not open'));
    }

    const run = this.tail.then(() => this.commit(fn));
    // Callers see failures through `run`; the chain itself keeps going
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  async close(): Promise<void> {
    if (this.state === 'closed') return;
    this.state = 'closed';
    await this.tail;
    this.logger.info('Storage closed');
  }

  private ensureOpen(): void {
    if (this.state !== 'open') {
      throw new StorageError('Storage is not open');
    }
  }

  private async commit<T>(fn: (tx: WriteTransaction) => T): Promise<T> {
    const tx = new StagedWriteTransaction(this.snapshot);
    const result = fn(tx);
    if (!tx.hasChanges) return result;

    try {
      await this.persist(tx);
    } catch (err) {
      this.logger.error('Failed to persist storage changes:', toError(err));
      throw new StorageError('Failed to persist changes', err);
    }

    this.snapshot = tx.apply();
    return result;
  }

  private async persist(tx: StagedWriteTransaction): Promise<void> {
    // Sequence first: a crash mid-write must never lead to id reuse
    if (tx.lastId !== this.snapshot.lastId) {
      await this.writeJsonAtomic(this.sequencePath, { lastId: tx.lastId });
    }

    const pending: Array<Promise<void>> = [];
    tx.upserts.forEach(sound => pending.push(this.writeJsonAtomic(this.soundPath(sound.id), toRecord(sound))));
    tx.deletions.forEach(id => pending.push(fs.rm(this.soundPath(id), { force: true })));
    if (tx.stagedConfig) {
      pending.push(this.writeJsonAtomic(this.configPath, tx.stagedConfig));
    }
    await Promise.all(pending);
  }

  private soundPath(id: number): string {
    return path.join(this.soundsDir, `${id}.json`);
  }

  private async writeJsonAtomic(file: string, data: unknown): Promise<void> {
    const tmp = `${file}.tmp.${process.pid}`;
    await fs.writeFile(tmp, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tmp, file);
  }

  private async readJsonFile(file: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return undefined;
      throw err;
    }
    return JSON.parse(text);
  }

  private async loadConfig(): Promise<ConfigValues> {
    let stored: z.infer<typeof configFileSchema> = {};

    try {
      const raw = await this.readJsonFile(this.configPath);
      if (raw !== undefined) {
        stored = configFileSchema.parse(raw);
      }
    } catch (err) {
      if (!(err instanceof SyntaxError || err instanceof ZodError)) throw err;
      this.logger.warn('Configuration file unreadable, reseeding from defaults', {
        file: this.configPath,
        error: err.message
      });
      await fs.rename(this.configPath, `${this.configPath}.bak`);
    }

    const config: ConfigValues = { ...this.defaults, ...stored };
    // Environment values only seed missing keys; runtime changes win afterwards
    for (const key of Object.keys(stored)) {
      if (isConfigKey(key) && config[key] !== this.defaults[key]) {
        this.logger.info(`Keeping stored ${key}, environment default is ignored`, {
          stored: config[key],
          environment: this.defaults[key]
        });
      }
    }

    const missing = Object.keys(this.defaults).filter(key => !(key in stored));
    if (missing.length > 0) {
      this.logger.debug('Seeding configuration defaults', { keys: missing });
      await this.writeJsonAtomic(this.configPath, config);
    }

    return config;
  }

  private async loadSounds(): Promise<Map<number, Sound>> {
    const files = await fs.readdir(this.soundsDir);
    const soundFiles = files
      .filter(file => SOUND_FILE_PATTERN.test(file))
      .sort((a, b) => parseInt(a, 10) - parseInt(b, 10));

    const sounds = new Map<number, Sound>();
    const names = new Set<string>();

    for (const file of soundFiles) {
      try {
        const record = soundRecordSchema.parse(await this.readJsonFile(path.join(this.soundsDir, file)));
        if (`${record.id}.json` !== file) {
          throw new Error(`record id ${record.id} does not match the file name`);
        }
        const payload = Buffer.from(record.payload, 'base64');
        if (payload.length === 0) {
          throw new Error('empty payload');
        }

        const key = record.name.toLowerCase();
        if (names.has(key)) {
          throw new Error(`duplicate name '${record.name}'`);
        }

        names.add(key);
        sounds.set(record.id, { id: record.id, name: record.name, createdAt: record.createdAt, payload });
      } catch (err) {
        this.logger.warn(`Skipping unreadable sound file: ${file}`, { error: toError(err).message });
      }
    }

    return sounds;
  }

  private async loadSequence(sounds: ReadonlyMap<number, Sound>): Promise<number> {
    const highest = Math.max(0, ...sounds.keys());

    try {
      const parsed = sequenceSchema.safeParse(await this.readJsonFile(this.sequencePath));
      if (parsed.success) {
        return Math.max(parsed.data.lastId, highest);
      }
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
    }

    if (highest > 0) {
      this.logger.warn('Sound sequence file missing or unreadable, continuing from highest id', { lastId: highest });
    }
    return highest;
  }
}
