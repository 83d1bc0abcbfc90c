import { ConfigKey, ConfigValues, Sound } from '../../types';

/**
 * Read view over the persisted tables.
 * Returned rows belong to the gateway and must not be mutated.
 */
export interface ReadTransaction {
  getSound(id: number): Sound | undefined;

  /**
   * Case-insensitive lookup.
   */
  findSoundByName(name: string): Sound | undefined;

  listSounds(): Sound[];

  countSounds(): number;

  getConfig(): ConfigValues;
}

/**
 * Staged changes for one `write` call. Nothing reaches disk until the
 * callback returns; a throw discards everything staged so far.
 */
export interface WriteTransaction extends ReadTransaction {
  /**
   * @throws {ValidationError} on a case-insensitive name collision
   */
  insertSound(name: string, payload: Buffer, createdAt?: number): Sound;

  /**
   * @throws {NotFoundError} for an unknown id
   * @throws {ValidationError} when another sound already uses the name
   */
  renameSound(id: number, name: string): Sound;

  /**
   * @throws {NotFoundError} for an unknown id
   */
  deleteSound(id: number): Sound;

  /**
   * @throws {ValidationError} for a non-integer or out-of-range value
   */
  setConfig<K extends ConfigKey>(key: K, value: ConfigValues[K]): void;
}

/**
 * Single-writer access to the sounds and configuration tables.
 */
export interface IStorageGateway {
  /**
   * Load tables from the backing store.
   * @throws {StorageError} if the store cannot be opened
   */
  initialize(): Promise<void>;

  /**
   * Run `fn` against committed state. Waits for writes queued earlier.
   */
  read<T>(fn: (tx: ReadTransaction) => T): Promise<T>;

  /**
   * Queue `fn` behind every earlier write, persist what it staged, then
   * make it visible to readers.
   */
  write<T>(fn: (tx: WriteTransaction) => T): Promise<T>;

  /**
   * Wait for queued writes, then reject further access.
   */
  close(): Promise<void>;
}
