// Which entry point triggered a mutation
export type EventSource = 'web' | 'command' | 'system';

// Base types
export interface Sound {
  id: number;
  name: string;
  payload: Buffer;
  createdAt: number;
}

export interface SoundSummary {
  id: number;
  name: string;
  size: number;
  createdAt: number;
}

// Persisted configuration table
export interface ConfigValues {
  interval: number;
  volume: number;
  notifyChannel: string | null;
}

export type ConfigKey = keyof ConfigValues;

export interface ConfigChange<T> {
  oldValue: T;
  newValue: T;
}

export interface NumericBounds {
  min: number;
  max: number;
}

export const INTERVAL_BOUNDS: NumericBounds = { min: 30, max: 3600 };
export const VOLUME_BOUNDS: NumericBounds = { min: 0, max: 100 };

export const SOUND_NAME_MAX_LENGTH = 64;

// Voice channel as seen by the scheduler
export interface VoiceChannelInfo {
  id: string;
  name: string;
  memberCount: number;
}

// Scheduler types
export type SchedulerState = 'idle' | 'selecting_channel' | 'connecting' | 'playing';
export type SchedulerLifecycle = 'created' | 'running' | 'stopped';

export type CycleOutcome =
  | 'played'
  | 'timed_out'
  | 'no_members'
  | 'empty_library'
  | 'connection_failed'
  | 'failed'
  | 'dropped'
  | 'stopped';

export interface SchedulerStatus {
  lifecycle: SchedulerLifecycle;
  state: SchedulerState;
  intervalSeconds: number;
  nextTickAt: number | null;
  lastOutcome: CycleOutcome | null;
  lastCycleAt: number | null;
  connectedChannelId: string | null;
}
