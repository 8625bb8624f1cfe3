/**
 * Projector power state as reported by POWR
 */
export enum PowerState {
  OFF = 'OFF',
  ON = 'ON',
  COOLING = 'COOLING',
  WARMING = 'WARMING'
}

/**
 * Picture (AV) mute state as reported by AVMT
 */
export enum MuteState {
  MUTED = 'MUTED',
  UNMUTED = 'UNMUTED'
}

/**
 * Freeze state as reported by FREZ
 */
export enum FreezeState {
  FROZEN = 'FROZEN',
  NORMAL = 'NORMAL'
}

export interface LampInfo {
  hours: number;
  on: boolean;
}

/**
 * Lamp status record. `hours` mirrors the first lamp.
 */
export interface LampStatus {
  hours: number;
  lamps: LampInfo[];
}

export type InputType = 'RGB' | 'VIDEO' | 'DIGITAL' | 'STORAGE' | 'NETWORK' | 'INTERNAL';

export interface InputSource {
  raw: string;
  type: InputType;
  channel: string;
}

export type ErrorLevel = 'ok' | 'warning' | 'error';

/**
 * ERST breakdown, one level per reported component
 */
export interface ErrorStatus {
  raw: string;
  fan: ErrorLevel;
  lamp: ErrorLevel;
  temperature: ErrorLevel;
  coverOpen: ErrorLevel;
  filter: ErrorLevel;
  other: ErrorLevel;
}

/**
 * Last-known state of one projector, kept by its session
 */
export interface DeviceState {
  power?: PowerState;
  mute?: MuteState;
  freeze?: FreezeState;
  lamp?: LampStatus;
  input?: InputSource;
  errorStatus?: ErrorStatus;
  updatedAt?: Date;
}

export default DeviceState;
