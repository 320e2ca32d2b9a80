import type { FloorNumber } from './floor.types';

// Represents the state of the car's controller
export type ElevatorStateName = 'WAIT' | 'RISE' | 'SINK' | 'HALT';

// Rule used by the waiting car to choose a direction
export type DirectionPolicy = 'early' | 'count';

// Result of a single-floor movement step
export type MoveOutcome =
  | 'passing' // moved one floor, target still ahead
  | 'stopped' // serviced the floor, more work in the same direction
  | 'finished' // serviced the floor, nothing further in this direction
  | 'out-of-bounds'; // could not move; the car must fall back to waiting

// Characteristic times of the car, in milliseconds, already scaled to the update period
export interface ElevatorTimings {
  readonly startDelayMs: number;
  readonly updatePeriodMs: number;
  readonly minTimeDoorsOpenMs: number;
  readonly minTimeBeforeUnHaltMs: number;
  readonly timeToRiseOneFloorMs: number;
  readonly timeToRiseAnotherMs: number;
  readonly timeToSinkOneFloorMs: number;
  readonly timeToSinkAnotherMs: number;
  readonly maxInterRequestTimeMs: number;
}

// Source of the tick-clock time
export interface Clock {
  now(): number;
}

// Copies of the request flags, indexed by floor - minFloor
export interface RequestBoardSnapshot {
  stopRequested: boolean[];
  callUp: boolean[];
  callDown: boolean[];
}

// Represents the observable state of a car
export interface ElevatorSnapshot {
  name: string;
  minFloor: FloorNumber;
  maxFloor: FloorNumber;
  currentFloor: FloorNumber;
  state: ElevatorStateName;
  etaNextFloorMs: number;
  requests: RequestBoardSnapshot;
}

// Unserviced work left when the car is switched off
export interface ElevatorFinishReport {
  name: string;
  currentFloor: FloorNumber;
  state: ElevatorStateName;
  pendingAbove: number;
  pendingBelow: number;
}
