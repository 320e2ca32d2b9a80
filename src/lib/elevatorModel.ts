import {
  DEFAULT_UPDATE_PERIOD_MS,
  MAX_INTER_REQUEST_TIME_MS,
  MIN_TIME_BEFORE_UN_HALT_MS,
  MIN_TIME_DOORS_OPEN_MS,
  START_DELAY_MS,
  TIME_TO_RISE_ANOTHER_MS,
  TIME_TO_RISE_ONE_FLOOR_MS,
  TIME_TO_SINK_ANOTHER_MS,
  TIME_TO_SINK_ONE_FLOOR_MS
} from '@/constants/elevatorConfig';
import { RequestBoard } from '@/lib/requestBoard';
import type { AssertionPolicy } from '@/lib/errors';
import { ElevatorError } from '@/lib/errors';
import type { ElevatorTimings, MoveOutcome } from '@/types/elevator.types';
import type { FloorNumber } from '@/types/floor.types';
import type { ElevatorEvent, StopReason } from '@/types/simulation.types';

export function scaleTimings(updatePeriodMs: number): ElevatorTimings {
  if (!(updatePeriodMs > 0)) {
    throw new ElevatorError(
      'INVALID_CONFIG',
      `update period must be positive, got ${updatePeriodMs}`
    );
  }
  const scale =
    updatePeriodMs < DEFAULT_UPDATE_PERIOD_MS
      ? updatePeriodMs / DEFAULT_UPDATE_PERIOD_MS
      : 1;
  const scaled = (ms: number) => Math.trunc(scale * ms);
  return {
    startDelayMs: START_DELAY_MS,
    updatePeriodMs,
    minTimeDoorsOpenMs: scaled(MIN_TIME_DOORS_OPEN_MS),
    minTimeBeforeUnHaltMs: scaled(MIN_TIME_BEFORE_UN_HALT_MS),
    timeToRiseOneFloorMs: scaled(TIME_TO_RISE_ONE_FLOOR_MS),
    timeToRiseAnotherMs: scaled(TIME_TO_RISE_ANOTHER_MS),
    timeToSinkOneFloorMs: scaled(TIME_TO_SINK_ONE_FLOOR_MS),
    timeToSinkAnotherMs: scaled(TIME_TO_SINK_ANOTHER_MS),
    maxInterRequestTimeMs: scaled(MAX_INTER_REQUEST_TIME_MS)
  };
}

/**
 * Mechanics of one car: its floor, its request board and the time at
 * which it may next change floors.
 *
 * Floor position and request flags change only inside `moveUp` and
 * `moveDown`, and each call completes before the next update may begin:
 * the car moves exactly one floor per call, so a second call landing in
 * the middle of the first would skip a floor or run past the shaft ends.
 */
export class ElevatorModel {
  readonly name: string;
  readonly minFloor: FloorNumber;
  readonly maxFloor: FloorNumber;
  readonly numFloors: number;
  readonly timings: ElevatorTimings;
  etaNextFloorMs = 0;

  private readonly board: RequestBoard;
  private floor: FloorNumber;

  constructor(
    name: string,
    minFloor: FloorNumber,
    maxFloor: FloorNumber,
    updatePeriodMs: number,
    private readonly emit: (event: ElevatorEvent) => void,
    private readonly assertion: AssertionPolicy
  ) {
    if (
      !Number.isInteger(minFloor) ||
      !Number.isInteger(maxFloor) ||
      minFloor >= maxFloor
    ) {
      throw new ElevatorError(
        'INVALID_CONFIG',
        `floor range must be integers with min < max, got [${minFloor}, ${maxFloor}]`
      );
    }
    this.name = name;
    this.minFloor = minFloor;
    this.maxFloor = maxFloor;
    this.numFloors = maxFloor - minFloor + 1;
    this.timings = scaleTimings(updatePeriodMs);
    this.board = new RequestBoard(minFloor, maxFloor);
    this.floor = minFloor;
  }

  get currentFloor(): FloorNumber {
    return this.floor;
  }

  get requests(): RequestBoard {
    return this.board;
  }

  addStopRequest(floor: FloorNumber): boolean {
    return this.board.addStop(floor);
  }

  addCallUpRequest(floor: FloorNumber): boolean {
    return this.board.addCallUp(floor);
  }

  addCallDownRequest(floor: FloorNumber): boolean {
    return this.board.addCallDown(floor);
  }

  nextStopAbove(): FloorNumber {
    return this.board.nextStopAbove(this.floor);
  }

  nextStopBelow(): FloorNumber {
    return this.board.nextStopBelow(this.floor);
  }

  countAbove(): number {
    return this.board.countAbove(this.floor);
  }

  countBelow(): number {
    return this.board.countBelow(this.floor);
  }

  waitAt(): void {
    this.emit({ type: 'wait' });
  }

  haltNow(): boolean {
    this.emit({ type: 'halt', accepted: true });
    return true;
  }

  unHalt(): boolean {
    this.emit({ type: 'resume' });
    return true;
  }

  moveUp(): MoveOutcome {
    if (this.floor >= this.maxFloor) {
      this.emit({
        type: 'invalid',
        message: `Invalid RISE state: current floor ${this.floor} >= ${this.maxFloor} (max)`
      });
      return 'out-of-bounds';
    }
    // Re-computed before moving, so a request that arrived since the last
    // floor can shorten the trip.
    const target = this.nextStopAbove();
    if (target <= this.floor) {
      this.emit({
        type: 'invalid',
        message: `Invalid RISE state: no stop above floor ${this.floor}`
      });
      return 'out-of-bounds';
    }

    this.floor++;
    if (this.floor < target) {
      this.etaNextFloorMs += this.timings.timeToRiseAnotherMs;
      this.emit({ type: 'pass', target });
      return 'passing';
    }

    // At the highest requested stop, wait at least one update before
    // heading down: someone may still press a higher floor.
    const turning = this.nextStopAbove() <= this.floor;
    const reason = this.serviceFloor('up', turning);
    if (reason) this.emit({ type: 'stop', reason });

    if (turning) return 'finished';
    this.etaNextFloorMs += this.timings.timeToRiseOneFloorMs;
    return 'stopped';
  }

  moveDown(): MoveOutcome {
    if (this.floor <= this.minFloor) {
      this.emit({
        type: 'invalid',
        message: `Invalid SINK state: current floor ${this.floor} <= ${this.minFloor} (min)`
      });
      return 'out-of-bounds';
    }
    const target = this.nextStopBelow();
    if (target >= this.floor) {
      this.emit({
        type: 'invalid',
        message: `Invalid SINK state: no stop below floor ${this.floor}`
      });
      return 'out-of-bounds';
    }

    this.floor--;
    if (this.floor > target) {
      this.etaNextFloorMs += this.timings.timeToSinkAnotherMs;
      this.emit({ type: 'pass', target });
      return 'passing';
    }

    const turning = this.nextStopBelow() >= this.floor;
    const reason = this.serviceFloor('down', turning);
    if (reason) this.emit({ type: 'stop', reason });

    if (turning) return 'finished';
    this.etaNextFloorMs += this.timings.timeToSinkOneFloorMs;
    return 'stopped';
  }

  // Clears the flags the car serves at its current floor: exiting
  // passengers, boarders going the same way, and the opposite call only
  // when the car turns around here.
  private serviceFloor(
    direction: 'up' | 'down',
    turning: boolean
  ): StopReason | null {
    const floor = this.floor;
    const up = direction === 'up';
    const board = this.board;

    const exiting = board.hasStop(floor);
    if (exiting) board.clearStop(floor);

    let boarding: 'up' | 'down' | null = null;
    const sameCall = up ? board.hasCallUp(floor) : board.hasCallDown(floor);
    if (sameCall) {
      if (up) board.clearCallUp(floor);
      else board.clearCallDown(floor);
      boarding = direction;
    }
    const oppositeCall = up ? board.hasCallDown(floor) : board.hasCallUp(floor);
    if (turning && oppositeCall) {
      if (up) board.clearCallDown(floor);
      else board.clearCallUp(floor);
      boarding ??= up ? 'down' : 'up';
    }

    if (
      !this.assertion.check(
        exiting || boarding !== null,
        'UNEXPECTED_FLAGS',
        `stopped at floor ${floor} with no request to serve`
      )
    ) {
      return null;
    }
    if (boarding === null) return 'exiting';
    return exiting
      ? `exiting and ${boarding}-boarding`
      : `${boarding}-boarding`;
  }
}
