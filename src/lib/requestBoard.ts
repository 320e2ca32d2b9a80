import type { RequestBoardSnapshot } from '@/types/elevator.types';
import type { FloorNumber } from '@/types/floor.types';

/**
 * Per-floor request flags of a single car: stops pressed inside the car
 * and up/down calls pressed on the floors.
 *
 * Flags are set here; only the elevator model clears them, when the car
 * services the floor.
 */
export class RequestBoard {
  readonly minFloor: FloorNumber;
  readonly maxFloor: FloorNumber;
  readonly numFloors: number;
  private readonly stopRequested: boolean[];
  private readonly callUp: boolean[];
  private readonly callDown: boolean[];

  constructor(minFloor: FloorNumber, maxFloor: FloorNumber) {
    this.minFloor = minFloor;
    this.maxFloor = maxFloor;
    this.numFloors = maxFloor - minFloor + 1;
    this.stopRequested = new Array<boolean>(this.numFloors).fill(false);
    this.callUp = new Array<boolean>(this.numFloors).fill(false);
    this.callDown = new Array<boolean>(this.numFloors).fill(false);
  }

  isFloor(floor: FloorNumber): boolean {
    return (
      Number.isInteger(floor) && floor >= this.minFloor && floor <= this.maxFloor
    );
  }

  addStop(floor: FloorNumber): boolean {
    return this.raise(this.stopRequested, floor);
  }

  addCallUp(floor: FloorNumber): boolean {
    // The top floor has no up button.
    if (floor === this.maxFloor) return false;
    return this.raise(this.callUp, floor);
  }

  addCallDown(floor: FloorNumber): boolean {
    // The bottom floor has no down button.
    if (floor === this.minFloor) return false;
    return this.raise(this.callDown, floor);
  }

  hasStop(floor: FloorNumber): boolean {
    return this.isFloor(floor) && this.stopRequested[floor - this.minFloor];
  }

  hasCallUp(floor: FloorNumber): boolean {
    return this.isFloor(floor) && this.callUp[floor - this.minFloor];
  }

  hasCallDown(floor: FloorNumber): boolean {
    return this.isFloor(floor) && this.callDown[floor - this.minFloor];
  }

  clearStop(floor: FloorNumber): void {
    this.lower(this.stopRequested, floor);
  }

  clearCallUp(floor: FloorNumber): void {
    this.lower(this.callUp, floor);
  }

  clearCallDown(floor: FloorNumber): void {
    this.lower(this.callDown, floor);
  }

  /**
   * Next floor to head for while going up: the nearest stop or up-call
   * above `current`. With none left, the *highest* down-call above, since
   * the car has to reach the topmost one before serving the others on the
   * way down. Returns `current` when nothing is pending above.
   */
  nextStopAbove(current: FloorNumber): FloorNumber {
    for (let floor = current + 1; floor <= this.maxFloor; floor++) {
      if (this.hasStop(floor) || this.hasCallUp(floor)) return floor;
    }
    for (let floor = this.maxFloor; floor > current; floor--) {
      if (this.hasCallDown(floor)) return floor;
    }
    return current;
  }

  /** Mirror image of {@link nextStopAbove}: falls back to the *lowest* up-call below. */
  nextStopBelow(current: FloorNumber): FloorNumber {
    for (let floor = current - 1; floor >= this.minFloor; floor--) {
      if (this.hasStop(floor) || this.hasCallDown(floor)) return floor;
    }
    for (let floor = this.minFloor; floor < current; floor++) {
      if (this.hasCallUp(floor)) return floor;
    }
    return current;
  }

  // Each flag counts as one request, whatever its type.
  countAbove(current: FloorNumber): number {
    let count = 0;
    for (let floor = Math.max(current + 1, this.minFloor); floor <= this.maxFloor; floor++) {
      count += this.countAt(floor);
    }
    return count;
  }

  countBelow(current: FloorNumber): number {
    let count = 0;
    for (let floor = Math.min(current - 1, this.maxFloor); floor >= this.minFloor; floor--) {
      count += this.countAt(floor);
    }
    return count;
  }

  snapshot(): RequestBoardSnapshot {
    return {
      stopRequested: [...this.stopRequested],
      callUp: [...this.callUp],
      callDown: [...this.callDown]
    };
  }

  private countAt(floor: FloorNumber): number {
    const i = floor - this.minFloor;
    return (
      Number(this.stopRequested[i]) + Number(this.callUp[i]) + Number(this.callDown[i])
    );
  }

  private raise(flags: boolean[], floor: FloorNumber): boolean {
    if (!this.isFloor(floor)) return false;
    const i = floor - this.minFloor;
    if (flags[i]) return false;
    flags[i] = true;
    return true;
  }

  private lower(flags: boolean[], floor: FloorNumber): void {
    if (this.isFloor(floor)) flags[floor - this.minFloor] = false;
  }
}
