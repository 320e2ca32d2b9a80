import { describe, expect, it } from 'vitest';
import { ElevatorModel, scaleTimings } from '@/lib/elevatorModel';
import { ElevatorError, createAssertionPolicy } from '@/lib/errors';
import type { ElevatorEvent } from '@/types/simulation.types';

function createModel(minFloor = 0, maxFloor = 9) {
  const events: ElevatorEvent[] = [];
  const emit = (event: ElevatorEvent) => {
    events.push(event);
  };
  const model = new ElevatorModel(
    'test',
    minFloor,
    maxFloor,
    10,
    emit,
    createAssertionPolicy(true, emit)
  );
  return { model, events };
}

describe('scaleTimings', () => {
  it('scales every time down with a shorter period', () => {
    expect(scaleTimings(10)).toEqual({
      startDelayMs: 33,
      updatePeriodMs: 10,
      minTimeDoorsOpenMs: 456,
      minTimeBeforeUnHaltMs: 200,
      timeToRiseOneFloorMs: 432,
      timeToRiseAnotherMs: 222,
      timeToSinkOneFloorMs: 377,
      timeToSinkAnotherMs: 177,
      maxInterRequestTimeMs: 166
    });
  });

  it('keeps the real-world times at or above the default period', () => {
    expect(scaleTimings(100).timeToRiseOneFloorMs).toBe(4321);
    expect(scaleTimings(250).timeToSinkAnotherMs).toBe(1777);
  });

  it('rejects a non-positive period', () => {
    expect(() => scaleTimings(0)).toThrow(ElevatorError);
    expect(() => scaleTimings(-5)).toThrow('update period must be positive');
  });
});

describe('ElevatorModel', () => {
  it('rejects an empty floor range', () => {
    expect(() => createModel(5, 5)).toThrow(ElevatorError);
  });

  it('starts on the bottom floor', () => {
    const { model } = createModel(-1, 4);
    expect(model.currentFloor).toBe(-1);
    expect(model.numFloors).toBe(6);
  });

  it('passes floors short of the target with the shorter transit time', () => {
    const { model, events } = createModel();
    model.addStopRequest(3);
    expect(model.moveUp()).toBe('passing');
    expect(model.currentFloor).toBe(1);
    expect(model.etaNextFloorMs).toBe(222);
    expect(model.moveUp()).toBe('passing');
    expect(model.etaNextFloorMs).toBe(444);
    expect(events).toEqual([
      { type: 'pass', target: 3 },
      { type: 'pass', target: 3 }
    ]);
  });

  it('clears the stop and finishes at the last stop above', () => {
    const { model, events } = createModel();
    model.addStopRequest(3);
    model.moveUp();
    model.moveUp();
    expect(model.moveUp()).toBe('finished');
    expect(model.currentFloor).toBe(3);
    expect(model.requests.hasStop(3)).toBe(false);
    expect(model.etaNextFloorMs).toBe(444);
    expect(events.at(-1)).toEqual({ type: 'stop', reason: 'exiting' });
  });

  it('takes the longer transit time after a stop with more work ahead', () => {
    const { model } = createModel();
    model.addStopRequest(1);
    model.addStopRequest(2);
    expect(model.moveUp()).toBe('stopped');
    expect(model.etaNextFloorMs).toBe(432);
    expect(model.nextStopAbove()).toBe(2);
  });

  it('serves exiting and up-boarding passengers in one stop', () => {
    const { model, events } = createModel();
    model.addStopRequest(1);
    model.addCallUpRequest(1);
    model.moveUp();
    expect(model.requests.hasStop(1)).toBe(false);
    expect(model.requests.hasCallUp(1)).toBe(false);
    expect(events).toEqual([
      { type: 'stop', reason: 'exiting and up-boarding' }
    ]);
  });

  it('rises past lower down-calls to the highest one', () => {
    const { model, events } = createModel();
    model.addCallDownRequest(2);
    model.addCallDownRequest(4);
    expect(model.moveUp()).toBe('passing');
    expect(model.moveUp()).toBe('passing');
    expect(model.moveUp()).toBe('passing');
    expect(model.moveUp()).toBe('finished');
    expect(model.currentFloor).toBe(4);
    expect(events.at(-1)).toEqual({ type: 'stop', reason: 'down-boarding' });
    expect(model.requests.hasCallDown(4)).toBe(false);
    expect(model.requests.hasCallDown(2)).toBe(true);
  });

  it('sinks to the lowest up-call when nothing else is below', () => {
    const { model, events } = createModel();
    model.addStopRequest(5);
    for (let i = 0; i < 5; i++) model.moveUp();
    expect(model.currentFloor).toBe(5);
    model.addCallUpRequest(1);
    model.addCallUpRequest(3);

    expect(model.moveDown()).toBe('passing');
    expect(model.etaNextFloorMs).toBe(888 + 177);
    expect(model.moveDown()).toBe('passing');
    expect(model.moveDown()).toBe('passing');
    expect(model.moveDown()).toBe('finished');
    expect(model.currentFloor).toBe(1);
    expect(events.at(-1)).toEqual({ type: 'stop', reason: 'up-boarding' });
    expect(model.requests.hasCallUp(1)).toBe(false);
    expect(model.requests.hasCallUp(3)).toBe(true);
  });

  it('serves exiting and down-boarding passengers on the way down', () => {
    const { model, events } = createModel();
    model.addStopRequest(3);
    for (let i = 0; i < 3; i++) model.moveUp();
    model.addStopRequest(2);
    model.addCallDownRequest(2);
    model.addStopRequest(1);
    expect(model.moveDown()).toBe('stopped');
    expect(model.etaNextFloorMs).toBe(444 + 377);
    expect(events.at(-1)).toEqual({
      type: 'stop',
      reason: 'exiting and down-boarding'
    });
  });

  it('serves an up call where a sinking car turns around', () => {
    const { model, events } = createModel();
    model.addStopRequest(3);
    for (let i = 0; i < 3; i++) model.moveUp();
    model.addStopRequest(1);
    model.addCallUpRequest(1);
    expect(model.moveDown()).toBe('passing');
    expect(model.moveDown()).toBe('finished');
    expect(model.requests.hasStop(1)).toBe(false);
    expect(model.requests.hasCallUp(1)).toBe(false);
    expect(events.at(-1)).toEqual({
      type: 'stop',
      reason: 'exiting and up-boarding'
    });
  });

  it('keeps the opposite call for the way back while stops lie ahead', () => {
    const { model, events } = createModel();
    model.addStopRequest(2);
    model.addCallDownRequest(2);
    model.addStopRequest(5);
    model.moveUp();
    expect(model.moveUp()).toBe('stopped');
    expect(model.requests.hasStop(2)).toBe(false);
    expect(model.requests.hasCallDown(2)).toBe(true);
    expect(events.at(-1)).toEqual({ type: 'stop', reason: 'exiting' });
  });

  it('refuses to rise through the roof', () => {
    const { model, events } = createModel(0, 1);
    model.addStopRequest(1);
    expect(model.moveUp()).toBe('finished');
    expect(model.moveUp()).toBe('out-of-bounds');
    expect(model.currentFloor).toBe(1);
    expect(events.at(-1)).toEqual({
      type: 'invalid',
      message: 'Invalid RISE state: current floor 1 >= 1 (max)'
    });
  });

  it('refuses to move without a stop in that direction', () => {
    const { model, events } = createModel();
    expect(model.moveUp()).toBe('out-of-bounds');
    expect(model.currentFloor).toBe(0);
    expect(events).toEqual([
      { type: 'invalid', message: 'Invalid RISE state: no stop above floor 0' }
    ]);
    expect(model.moveDown()).toBe('out-of-bounds');
    expect(events.at(-1)).toEqual({
      type: 'invalid',
      message: 'Invalid SINK state: current floor 0 <= 0 (min)'
    });
  });

  it('acknowledges waits, halts and resumes without moving', () => {
    const { model, events } = createModel();
    model.waitAt();
    expect(model.haltNow()).toBe(true);
    expect(model.unHalt()).toBe(true);
    expect(model.currentFloor).toBe(0);
    expect(events).toEqual([
      { type: 'wait' },
      { type: 'halt', accepted: true },
      { type: 'resume' }
    ]);
  });
});
