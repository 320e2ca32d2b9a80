import { DEFAULT_VERBOSE } from '@/constants/elevatorConfig';
import type {
  ElevatorEvent,
  ElevatorEventListener,
  ElevatorLogEntry
} from '@/types/simulation.types';

/** In-memory event log of a car, with synchronous listeners. */
export class ElevatorLog {
  private readonly items: ElevatorLogEntry[] = [];
  private readonly listeners = new Set<ElevatorEventListener>();

  get entries(): readonly ElevatorLogEntry[] {
    return this.items;
  }

  /** Stores every entry first, then notifies listeners in order. */
  record(...entries: ElevatorLogEntry[]): void {
    this.items.push(...entries);
    for (const entry of entries) {
      for (const listener of this.listeners) {
        listener(entry);
      }
    }
  }

  subscribe(listener: ElevatorEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

// 0: invalid conditions, 1: movement, 2: request handling, 3: transitions
export function verbosityOf(event: ElevatorEvent): number {
  switch (event.type) {
    case 'invalid':
      return 0;
    case 'wait':
    case 'pass':
    case 'stop':
    case 'halt':
    case 'resume':
      return 1;
    case 'request':
      return 2;
    case 'transition':
      return 3;
  }
}

const floorLabel = (floor: number) => String(floor).padStart(2);

export function formatLogEntry(entry: ElevatorLogEntry): string {
  const { event, state, floor } = entry;
  switch (event.type) {
    case 'transition':
      return `     ${event.from} => ${event.to}`;
    case 'request': {
      const compare =
        event.floor < floor ? '<' : event.floor > floor ? '>' : '=';
      const novelty = {
        new: 'New',
        dupe: 'dupe',
        'no-op': 'No-op',
        rejected: 'Rejected'
      }[event.outcome];
      return `     Hndl by ${event.handledBy}:  ${event.request} ${event.floor}  ${compare}  ${floor}:  ${novelty}`;
    }
    case 'wait':
      return `${state} Wait at ${floorLabel(floor)}`;
    case 'pass':
      return `${state} Pass ${state === 'SINK' ? 'by' : 'up'} ${floorLabel(floor)} en route to ${event.target}`;
    case 'stop':
      return `${state} Stop at ${floorLabel(floor)} for ${event.reason}`;
    case 'halt':
      return event.accepted
        ? `${state} Halt at ${floorLabel(floor)}`
        : `     Hndl by ${state}:  HALT_AT ${floor}      :  No-op`;
    case 'resume':
      return `${state} unHalt ${floorLabel(floor)}`;
    case 'invalid':
      return `>>>>>>>> ${event.message}`;
  }
}

/** Prints entries up to the given verbosity, invalid conditions to stderr. */
export function createConsoleObserver(
  verbose: number = DEFAULT_VERBOSE
): ElevatorEventListener {
  return (entry) => {
    if (verbosityOf(entry.event) > verbose) return;
    const line = `[${entry.time}] ${entry.elevator}: ${formatLogEntry(entry)}`;
    if (entry.event.type === 'invalid') console.error(line);
    else console.log(line);
  };
}
