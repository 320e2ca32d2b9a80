import type { FloorNumber } from './floor.types';

// Represents the kind of request delivered to the car.
// HALT_AT and UN_HALT carry no meaningful floor.
export type RequestType = 'STOP_AT' | 'CALL_UP' | 'CALL_DN' | 'HALT_AT' | 'UN_HALT';

export const FLOOR_REQUEST_TYPES = ['STOP_AT', 'CALL_UP', 'CALL_DN'] as const;

export type FloorRequestType = (typeof FLOOR_REQUEST_TYPES)[number];

// Represents a button press inside the car, on a floor's call panel, or on the emergency panel
export interface Request {
  type: RequestType;
  floor: FloorNumber;
}

// How the car dealt with a submitted request
export type RequestOutcome = 'new' | 'dupe' | 'no-op' | 'rejected';
