import {
  BASE_INTER_REQUEST_TIME_MS,
  MAX_FLOOR,
  MAX_SIMULATION_CYCLES,
  MAX_UPDATES_BEFORE_REQUEST,
  MIN_FLOOR,
  MIN_REQUESTS,
  SETTLE_TIME_MS,
  TOTAL_REQUESTS,
  UPDATE_PERIOD_MS
} from '@/constants/elevatorConfig';
import { ElevatorCar, systemClock } from '@/lib/elevator';
import { ElevatorError } from '@/lib/errors';
import { UpdateDriver } from '@/lib/updateDriver';
import { FLOOR_REQUEST_TYPES, type Request } from '@/types/call.types';
import type { Clock, DirectionPolicy } from '@/types/elevator.types';
import type { FloorNumber } from '@/types/floor.types';
import type {
  ElevatorEventListener,
  SimulationResult
} from '@/types/simulation.types';

export type RandomSource = () => number;

export interface SimulationOptions {
  name?: string;
  minFloor?: FloorNumber;
  maxFloor?: FloorNumber;
  periodMs?: number;
  policy?: DirectionPolicy;
  strict?: boolean;
  requests?: Request[]; // Generated at random when omitted
  numRequests?: number;
  random?: RandomSource;
  onEvent?: ElevatorEventListener;
}

export interface InterleavedSimulationOptions extends SimulationOptions {
  maxCycles?: number;
}

export interface TimedSimulationOptions extends SimulationOptions {
  clock?: Clock;
  settleTimeMs?: number; // How long the driver keeps running after the last request
}

function randomInt(random: RandomSource, bound: number): number {
  return Math.floor(random() * bound);
}

/**
 * Random stop and call requests for a test run. Exactly one of them is a
 * HALT_AT, followed at least two requests later by one UN_HALT.
 */
export function generateRandomRequests(
  minFloor: FloorNumber,
  maxFloor: FloorNumber,
  numRequests: number = TOTAL_REQUESTS,
  random: RandomSource = Math.random
): Request[] {
  if (numRequests < MIN_REQUESTS) {
    throw new ElevatorError(
      'INVALID_ARGUMENT',
      `need at least ${MIN_REQUESTS} requests, got ${numRequests}`
    );
  }
  const numFloors = maxFloor - minFloor + 1;
  const haltAt = randomInt(random, Math.floor(numRequests / 2));
  const unHaltAt = haltAt + 2 + randomInt(random, Math.floor(numRequests / 3));

  const requests: Request[] = [];
  for (let j = 0; j < numRequests; j++) {
    const floor = minFloor + randomInt(random, numFloors);
    if (j === haltAt) {
      requests.push({ type: 'HALT_AT', floor });
    } else if (j === unHaltAt) {
      requests.push({ type: 'UN_HALT', floor });
    } else {
      const type =
        FLOOR_REQUEST_TYPES[randomInt(random, FLOOR_REQUEST_TYPES.length)];
      requests.push({ type, floor });
    }
  }
  return requests;
}

function createCar(options: SimulationOptions, clock: Clock): ElevatorCar {
  return new ElevatorCar(
    options.name ?? 'El Ten',
    options.minFloor ?? MIN_FLOOR,
    options.maxFloor ?? MAX_FLOOR,
    options.periodMs ?? UPDATE_PERIOD_MS,
    {
      policy: options.policy,
      strict: options.strict,
      clock,
      onEvent: options.onEvent
    }
  );
}

function resolveRequests(
  options: SimulationOptions,
  car: ElevatorCar,
  random: RandomSource
): Request[] {
  return (
    options.requests ??
    generateRandomRequests(
      car.minFloor,
      car.maxFloor,
      options.numRequests ?? TOTAL_REQUESTS,
      random
    )
  );
}

// Nothing left to do: waiting with no work, or parked in HALT.
function isSettled(car: ElevatorCar): boolean {
  const state = car.currentStateName();
  if (state === 'HALT') return true;
  return (
    state === 'WAIT' &&
    car.pendingRequestCountAbove() + car.pendingRequestCountBelow() === 0
  );
}

/**
 * Single-threaded event loop on a virtual clock: a random number of
 * updates before each request, then updates until the car settles.
 * Each update advances the clock by one period.
 */
export function runInterleavedSimulation(
  options: InterleavedSimulationOptions = {}
): SimulationResult {
  const random = options.random ?? Math.random;
  const maxCycles = options.maxCycles ?? MAX_SIMULATION_CYCLES;
  let now = 0;
  const car = createCar(options, { now: () => now });
  const requests = resolveRequests(options, car, random);

  let updates = 0;
  let accepted = 0;
  const step = () => {
    now += car.timings.updatePeriodMs;
    car.update();
    updates++;
  };

  car.start();
  for (const request of requests) {
    const updatesBeforeRequest = randomInt(random, MAX_UPDATES_BEFORE_REQUEST);
    for (let k = 0; k < updatesBeforeRequest; k++) step();
    if (car.submit(request.type, request.floor)) accepted++;
  }
  while (updates < maxCycles && !isSettled(car)) step();

  return {
    totalTime: now,
    updates,
    requests,
    accepted,
    logs: [...car.logs()],
    report: car.finish()
  };
}

const delay = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Drives the car from an {@link UpdateDriver} while requests arrive after
 * random delays, then lets it run for `settleTimeMs` before stopping.
 */
export async function runTimedSimulation(
  options: TimedSimulationOptions = {}
): Promise<SimulationResult> {
  const random = options.random ?? Math.random;
  const clock = options.clock ?? systemClock;
  const car = createCar(options, clock);
  const requests = resolveRequests(options, car, random);

  const failures: unknown[] = [];
  const driver = new UpdateDriver(car, {
    onError: (error) => failures.push(error)
  });
  const startedAt = clock.now();
  let accepted = 0;

  car.start();
  driver.start();
  try {
    for (const request of requests) {
      await delay(
        BASE_INTER_REQUEST_TIME_MS +
          randomInt(random, car.timings.maxInterRequestTimeMs)
      );
      if (failures.length > 0) break;
      if (car.submit(request.type, request.floor)) accepted++;
    }
    if (failures.length === 0) {
      await delay(options.settleTimeMs ?? SETTLE_TIME_MS);
    }
  } finally {
    driver.stop();
  }
  if (failures.length > 0) throw failures[0];

  return {
    totalTime: clock.now() - startedAt,
    updates: driver.ticks,
    requests,
    accepted,
    logs: [...car.logs()],
    report: car.finish()
  };
}
