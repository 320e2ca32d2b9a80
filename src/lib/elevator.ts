import { ElevatorModel } from '@/lib/elevatorModel';
import { ElevatorError, createAssertionPolicy } from '@/lib/errors';
import { ElevatorLog } from '@/lib/eventLog';
import { ElevatorStateMachine } from '@/lib/stateMachine';
import type { RequestType } from '@/types/call.types';
import type {
  Clock,
  DirectionPolicy,
  ElevatorFinishReport,
  ElevatorSnapshot,
  ElevatorStateName,
  ElevatorTimings
} from '@/types/elevator.types';
import type { FloorNumber } from '@/types/floor.types';
import type {
  ElevatorEvent,
  ElevatorEventListener,
  ElevatorLogEntry
} from '@/types/simulation.types';

export interface ElevatorOptions {
  policy?: DirectionPolicy; // Waiting-state exit rule, 'early' by default
  strict?: boolean; // Throw on broken invariants instead of logging them
  clock?: Clock;
  onEvent?: ElevatorEventListener;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * One elevator car: the model and its state machine behind a single
 * update entry point.
 *
 * Nothing here locks. `update` and `submit` must not overlap; a call made
 * while another is still running throws instead of corrupting the floor
 * or request state. Events raised during an operation reach listeners
 * only once it has finished, so a listener always sees a settled car and
 * may safely act on it.
 */
export class ElevatorCar {
  readonly name: string;
  private readonly model: ElevatorModel;
  private readonly machine: ElevatorStateMachine;
  private readonly clock: Clock;
  private readonly log = new ElevatorLog();
  private busy = false;
  private pending: ElevatorLogEntry[] = [];

  constructor(
    name: string,
    minFloor: FloorNumber,
    maxFloor: FloorNumber,
    tickPeriodMs: number,
    options: ElevatorOptions = {}
  ) {
    this.name = name;
    this.clock = options.clock ?? systemClock;
    if (options.onEvent) this.log.subscribe(options.onEvent);

    const emit = (event: ElevatorEvent) => this.record(event);
    const assertion = createAssertionPolicy(options.strict ?? true, emit);
    this.model = new ElevatorModel(
      name,
      minFloor,
      maxFloor,
      tickPeriodMs,
      emit,
      assertion
    );
    this.machine = new ElevatorStateMachine(this.model, {
      policy: options.policy ?? 'early',
      clock: this.clock,
      emit,
      assertion
    });
  }

  get minFloor(): FloorNumber {
    return this.model.minFloor;
  }

  get maxFloor(): FloorNumber {
    return this.model.maxFloor;
  }

  get numFloors(): number {
    return this.model.numFloors;
  }

  get timings(): ElevatorTimings {
    return this.model.timings;
  }

  get policy(): DirectionPolicy {
    return this.machine.policy;
  }

  /** Puts the car into service: HALT => WAIT. */
  start(): boolean {
    return this.exclusive(() => this.machine.start());
  }

  /** Advances the state machine by exactly one step. */
  update(): void {
    this.exclusive(() => this.machine.update());
  }

  /**
   * Delivers a request; returns whether it was newly recorded or acted on.
   * `floor` is ignored for HALT_AT and UN_HALT.
   */
  submit(
    type: RequestType,
    floor: FloorNumber = this.model.currentFloor
  ): boolean {
    return this.exclusive(() => {
      switch (type) {
        case 'HALT_AT':
          return this.machine.handleHalt();
        case 'UN_HALT':
          return this.machine.handleUnHalt();
        case 'STOP_AT':
        case 'CALL_UP':
        case 'CALL_DN':
          if (!this.model.requests.isFloor(floor)) {
            this.record({
              type: 'request',
              request: type,
              floor,
              outcome: 'rejected',
              handledBy: this.machine.state
            });
            return false;
          }
          return this.machine.handleFloorRequest(type, floor);
      }
    });
  }

  currentFloor(): FloorNumber {
    return this.model.currentFloor;
  }

  currentStateName(): ElevatorStateName {
    return this.machine.state;
  }

  savedStateName(): ElevatorStateName | null {
    return this.machine.savedState;
  }

  pendingRequestCountAbove(): number {
    return this.model.countAbove();
  }

  pendingRequestCountBelow(): number {
    return this.model.countBelow();
  }

  nextStopAbove(): FloorNumber {
    return this.model.nextStopAbove();
  }

  nextStopBelow(): FloorNumber {
    return this.model.nextStopBelow();
  }

  etaNextFloorMs(): number {
    return this.model.etaNextFloorMs;
  }

  lastStateChangeMs(): number {
    return this.machine.lastStateChangeMs;
  }

  logs(): readonly ElevatorLogEntry[] {
    return this.log.entries;
  }

  subscribe(listener: ElevatorEventListener): () => void {
    return this.log.subscribe(listener);
  }

  snapshot(): ElevatorSnapshot {
    return {
      name: this.name,
      minFloor: this.model.minFloor,
      maxFloor: this.model.maxFloor,
      currentFloor: this.model.currentFloor,
      state: this.machine.state,
      etaNextFloorMs: this.model.etaNextFloorMs,
      requests: this.model.requests.snapshot()
    };
  }

  /** Reports the work left undone when the car is switched off. */
  finish(): ElevatorFinishReport {
    return {
      name: this.name,
      currentFloor: this.model.currentFloor,
      state: this.machine.state,
      pendingAbove: this.model.countAbove(),
      pendingBelow: this.model.countBelow()
    };
  }

  private record(event: ElevatorEvent): void {
    const entry: ElevatorLogEntry = {
      time: this.clock.now(),
      elevator: this.name,
      state: this.machine.state,
      floor: this.model.currentFloor,
      event
    };
    if (this.busy) this.pending.push(entry);
    else this.log.record(entry);
  }

  private flush(): void {
    if (this.pending.length === 0) return;
    const entries = this.pending;
    this.pending = [];
    this.log.record(...entries);
  }

  private exclusive<T>(operation: () => T): T {
    if (this.busy) {
      throw new ElevatorError(
        'REENTRANT_CALL',
        `${this.name}: update or request issued while another is still running`
      );
    }
    this.busy = true;
    try {
      return operation();
    } finally {
      this.busy = false;
      this.flush();
    }
  }
}
