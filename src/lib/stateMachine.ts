import type { ElevatorModel } from '@/lib/elevatorModel';
import type { AssertionPolicy } from '@/lib/errors';
import type { FloorRequestType, RequestOutcome } from '@/types/call.types';
import type {
  Clock,
  DirectionPolicy,
  ElevatorStateName
} from '@/types/elevator.types';
import type { FloorNumber } from '@/types/floor.types';
import type { ElevatorEvent } from '@/types/simulation.types';

// Allowed transitions. No state may transition to itself.
//
//          WAIT  RISE  SINK  HALT
//   WAIT         X     X     X
//   RISE   X                 X
//   SINK   X                 X
//   HALT   X     X     X
export const ALLOWED_TRANSITIONS: Record<
  ElevatorStateName,
  readonly ElevatorStateName[]
> = {
  WAIT: ['RISE', 'SINK', 'HALT'],
  RISE: ['WAIT', 'HALT'],
  SINK: ['WAIT', 'HALT'],
  HALT: ['WAIT', 'RISE', 'SINK']
};

export function canTransition(
  from: ElevatorStateName,
  to: ElevatorStateName
): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Direction a waiting car should leave in, or `null` to keep waiting. */
export function chooseDirection(
  policy: DirectionPolicy,
  model: ElevatorModel
): 'RISE' | 'SINK' | null {
  const floor = model.currentFloor;
  if (policy === 'early') {
    // Prioritize up when waking up.
    if (model.nextStopAbove() > floor) return 'RISE';
    if (model.nextStopBelow() < floor) return 'SINK';
    return null;
  }
  const up = model.countAbove();
  const down = model.countBelow();
  if (up > down) return 'RISE';
  if (down > 0) return 'SINK';
  return null;
}

// What a state does on each operation
interface StateBehavior {
  onEntry?(): void;
  onExit?(): void;
  onUpdate(): void;
  onFloorRequest(type: FloorRequestType, floor: FloorNumber): boolean;
  onHalt(): boolean;
  onUnHalt(): boolean;
}

export interface StateMachineOptions {
  policy: DirectionPolicy;
  clock: Clock;
  emit: (event: ElevatorEvent) => void;
  assertion: AssertionPolicy;
}

/**
 * Controller of one car. Holds the active state tag and dispatches
 * updates and requests through a per-state behavior table; the states
 * call into the elevator model for anything physical.
 */
export class ElevatorStateMachine {
  readonly policy: DirectionPolicy;
  private current: ElevatorStateName = 'HALT';
  private saved: ElevatorStateName | null = null;
  private timeLastStateChangeMs = -1;

  private readonly clock: Clock;
  private readonly emit: (event: ElevatorEvent) => void;
  private readonly assertion: AssertionPolicy;
  private readonly behaviors: Record<ElevatorStateName, StateBehavior>;

  constructor(
    private readonly model: ElevatorModel,
    options: StateMachineOptions
  ) {
    this.policy = options.policy;
    this.clock = options.clock;
    this.emit = options.emit;
    this.assertion = options.assertion;

    const defaults = {
      onFloorRequest: (type: FloorRequestType, floor: FloorNumber) =>
        this.admitFloorRequest(type, floor),
      onHalt: () => this.haltTheElevator(),
      onUnHalt: () => this.unHaltTheElevator()
    };

    this.behaviors = {
      WAIT: {
        ...defaults,
        onEntry: () => this.model.waitAt(),
        onUpdate: () => this.updateWaiting(),
        // Idle, so a new request immediately sets the car in motion.
        onFloorRequest: (type, floor) => {
          if (!this.admitFloorRequest(type, floor)) return false;
          this.setState(floor > this.model.currentFloor ? 'RISE' : 'SINK');
          return true;
        }
      },
      RISE: {
        ...defaults,
        onEntry: () => {
          this.model.etaNextFloorMs =
            this.timeLastStateChangeMs +
            this.model.timings.timeToRiseOneFloorMs;
        },
        onUpdate: () => {
          if (this.clock.now() < this.model.etaNextFloorMs) return;
          const outcome = this.model.moveUp();
          if (outcome === 'finished' || outcome === 'out-of-bounds') {
            this.setState('WAIT');
          }
        }
      },
      SINK: {
        ...defaults,
        onEntry: () => {
          this.model.etaNextFloorMs =
            this.timeLastStateChangeMs +
            this.model.timings.timeToSinkOneFloorMs;
        },
        onUpdate: () => {
          if (this.clock.now() < this.model.etaNextFloorMs) return;
          const outcome = this.model.moveDown();
          if (outcome === 'finished' || outcome === 'out-of-bounds') {
            this.setState('WAIT');
          }
        }
      },
      HALT: {
        ...defaults,
        onUpdate: () => {},
        // Already halted, so there is nothing to do.
        onHalt: () => {
          this.emit({ type: 'halt', accepted: false });
          return false;
        }
      }
    };
  }

  get state(): ElevatorStateName {
    return this.current;
  }

  get savedState(): ElevatorStateName | null {
    return this.saved;
  }

  get lastStateChangeMs(): number {
    return this.timeLastStateChangeMs;
  }

  /** Takes a freshly built (halted, nothing saved) controller into service. */
  start(): boolean {
    if (this.current !== 'HALT' || this.saved !== null) return false;
    return this.setState('WAIT');
  }

  /** Runs one step of the current state. Never sleeps. */
  update(): void {
    this.behaviors[this.current].onUpdate();
  }

  handleFloorRequest(type: FloorRequestType, floor: FloorNumber): boolean {
    return this.behaviors[this.current].onFloorRequest(type, floor);
  }

  handleHalt(): boolean {
    return this.behaviors[this.current].onHalt();
  }

  handleUnHalt(): boolean {
    return this.behaviors[this.current].onUnHalt();
  }

  setState(next: ElevatorStateName): boolean {
    const prev = this.current;
    if (
      !this.assertion.check(
        next !== prev,
        'SELF_TRANSITION',
        `${prev} cannot transition to itself`
      ) ||
      !this.assertion.check(
        canTransition(prev, next),
        'ILLEGAL_TRANSITION',
        `${prev} cannot transition to ${next}`
      )
    ) {
      return false;
    }
    this.behaviors[prev].onExit?.();
    this.current = next;
    this.timeLastStateChangeMs = this.clock.now();
    this.behaviors[next].onEntry?.();
    this.emit({ type: 'transition', from: prev, to: next });
    return true;
  }

  private updateWaiting(): void {
    const next = chooseDirection(this.policy, this.model);
    if (next) this.setState(next);
  }

  // A request for the floor the car is standing at is meaningless while
  // it waits or is halted. A moving car may just be passing that floor
  // with its doors closed, so it still plans to stop there.
  private admitFloorRequest(
    type: FloorRequestType,
    floor: FloorNumber
  ): boolean {
    const board = this.model.requests;
    const moving = this.current === 'RISE' || this.current === 'SINK';
    let outcome: RequestOutcome;
    if (
      !board.isFloor(floor) ||
      (type === 'CALL_UP' && floor === board.maxFloor) ||
      (type === 'CALL_DN' && floor === board.minFloor)
    ) {
      outcome = 'rejected';
    } else if (floor === this.model.currentFloor && !moving) {
      outcome = 'no-op';
    } else {
      const added =
        type === 'STOP_AT'
          ? this.model.addStopRequest(floor)
          : type === 'CALL_UP'
            ? this.model.addCallUpRequest(floor)
            : this.model.addCallDownRequest(floor);
      outcome = added ? 'new' : 'dupe';
    }
    this.emit({
      type: 'request',
      request: type,
      floor,
      outcome,
      handledBy: this.current
    });
    return outcome === 'new';
  }

  private haltTheElevator(): boolean {
    const halted = this.model.haltNow();
    this.saved = this.current;
    this.setState('HALT');
    return halted;
  }

  private unHaltTheElevator(): boolean {
    if (
      !this.assertion.check(
        this.current === 'HALT',
        'NOT_HALTED',
        `cannot resume from ${this.current}`
      )
    ) {
      return false;
    }
    const saved = this.saved;
    if (saved === null) {
      this.assertion.check(false, 'NO_SAVED_STATE', 'no state saved to resume');
      return false;
    }
    const resumed = this.model.unHalt();
    this.saved = null;
    this.setState(saved);
    return resumed;
  }
}
