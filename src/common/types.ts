export interface RightAscension {
  hours: number;
  minutes: number;
}

export interface Declination {
  degrees: number;
  minutes: number;
  negative: boolean;
}

export type MountStatus = 'INIT' | 'SCOPE' | 'GOTO' | 'USER' | 'CHART';

export type MountMode = 'live' | 'simulate';

export interface MountTarget {
  ra: RightAscension;
  dec: Declination;
  name?: string;
}

export interface EncoderSample {
  x: number;
  y: number;
  round: number;
}

export interface RateEstimate {
  rateRa?: number;
  meridianMinutes: number;
}

export interface SitePlacement {
  longitudeHemisphere: 'E' | 'W';
  longitudeDegrees: number;
  longitudeMinutes: number;
  latitudeHemisphere: 'N' | 'S';
  latitudeDegrees: number;
  latitudeMinutes: number;
  utcOffset: number;
}

export interface MoveDirections {
  north: boolean;
  south: boolean;
  east: boolean;
  west: boolean;
}

export interface CatalogObject {
  catalog: string;
  name: string;
  ra: number;
  dec: number;
  magnitude: number;
  type: string;
  distance: number;
}

export interface MountSnapshot {
  address: string;
  mode: MountMode;
  version: string;
  status: MountStatus;
  ra: RightAscension;
  dec: Declination;
  target?: MountTarget;
  encoders: EncoderSample;
  rate: RateEstimate;
  speed: number;
  reverting: boolean;
  autoReverse: boolean;
  autoScreen: boolean;
  polling: boolean;
  place: SitePlacement;
  deviceTime: string;
  timestamp: number;
}

export type MountNotification = 'gotoStart' | 'gotoReached' | 'moving' | 'idle' | 'updated';

export type ZoomCommand = 'in' | 'out' | 'reset';
