import type { Request, RequestOutcome, RequestType } from './call.types';
import type {
  ElevatorFinishReport,
  ElevatorStateName
} from './elevator.types';
import type { FloorNumber } from './floor.types';

// Reason the car stopped at a floor
export type StopReason =
  | 'exiting'
  | 'exiting and up-boarding'
  | 'exiting and down-boarding'
  | 'up-boarding'
  | 'down-boarding';

// Observations the core reports; formatting them is up to the observer
export type ElevatorEvent =
  | { type: 'transition'; from: ElevatorStateName; to: ElevatorStateName }
  | {
      type: 'request';
      request: RequestType;
      floor: FloorNumber;
      outcome: RequestOutcome;
      handledBy: ElevatorStateName;
    }
  | { type: 'wait' }
  | { type: 'pass'; target: FloorNumber }
  | { type: 'stop'; reason: StopReason }
  | { type: 'halt'; accepted: boolean }
  | { type: 'resume' }
  | { type: 'invalid'; message: string };

// Represents an entry in the car's event log
export interface ElevatorLogEntry {
  time: number; // Tick-clock time when the event occurred
  elevator: string; // Name of the car
  state: ElevatorStateName; // Controller state right after the event
  floor: FloorNumber; // Car floor right after the event
  event: ElevatorEvent;
}

export type ElevatorEventListener = (entry: ElevatorLogEntry) => void;

// Represents the result of a harness run
export interface SimulationResult {
  totalTime: number; // Elapsed tick-clock time in ms
  updates: number;
  requests: Request[];
  accepted: number; // Requests the car newly recorded or acted on
  logs: ElevatorLogEntry[];
  report: ElevatorFinishReport;
}
