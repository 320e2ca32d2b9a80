import { describe, expect, it } from 'vitest';
import { RequestBoard } from '@/lib/requestBoard';

describe('RequestBoard', () => {
  it('records each flag once', () => {
    const board = new RequestBoard(0, 9);
    expect(board.addStop(3)).toBe(true);
    expect(board.addStop(3)).toBe(false);
    expect(board.addCallUp(3)).toBe(true);
    expect(board.addCallUp(3)).toBe(false);
    expect(board.addCallDown(3)).toBe(true);
    expect(board.addCallDown(3)).toBe(false);
  });

  it('has no up call on the top floor and no down call on the bottom floor', () => {
    const board = new RequestBoard(0, 9);
    expect(board.addCallUp(9)).toBe(false);
    expect(board.addCallDown(0)).toBe(false);
    expect(board.hasCallUp(9)).toBe(false);
    expect(board.hasCallDown(0)).toBe(false);
    expect(board.addCallDown(9)).toBe(true);
    expect(board.addCallUp(0)).toBe(true);
  });

  it('ignores floors outside the shaft', () => {
    const board = new RequestBoard(0, 9);
    expect(board.addStop(10)).toBe(false);
    expect(board.addStop(-1)).toBe(false);
    expect(board.addStop(2.5)).toBe(false);
    expect(board.snapshot().stopRequested.every((flag) => !flag)).toBe(true);
  });

  it('heads up to the nearest stop or up-call first', () => {
    const board = new RequestBoard(0, 9);
    board.addCallDown(4);
    board.addStop(6);
    board.addCallDown(8);
    expect(board.nextStopAbove(2)).toBe(6);
    board.addCallUp(5);
    expect(board.nextStopAbove(2)).toBe(5);
  });

  it('heads up to the highest down-call when no up work is left', () => {
    const board = new RequestBoard(0, 9);
    board.addCallDown(4);
    board.addCallDown(8);
    expect(board.nextStopAbove(2)).toBe(8);
    expect(board.nextStopAbove(8)).toBe(8);
  });

  it('heads down to the nearest stop or down-call, else the lowest up-call below', () => {
    const board = new RequestBoard(0, 9);
    board.addCallUp(1);
    board.addCallUp(3);
    board.addCallUp(8);
    expect(board.nextStopBelow(7)).toBe(1);
    board.addStop(5);
    expect(board.nextStopBelow(7)).toBe(5);
  });

  it('returns the current floor when nothing is pending in that direction', () => {
    const board = new RequestBoard(0, 9);
    board.addCallUp(8);
    expect(board.nextStopBelow(5)).toBe(5);
    expect(board.nextStopAbove(9)).toBe(9);
    expect(new RequestBoard(0, 9).nextStopAbove(4)).toBe(4);
  });

  it('counts every flag strictly above or below', () => {
    const board = new RequestBoard(0, 9);
    board.addStop(7);
    board.addCallUp(7);
    board.addCallDown(8);
    board.addStop(2);
    board.addStop(5);
    expect(board.countAbove(5)).toBe(3);
    expect(board.countBelow(5)).toBe(1);
    expect(board.countAbove(9)).toBe(0);
    expect(board.countBelow(0)).toBe(0);
  });

  it('clears single flags', () => {
    const board = new RequestBoard(0, 9);
    board.addStop(4);
    board.addCallUp(4);
    board.clearStop(4);
    expect(board.hasStop(4)).toBe(false);
    expect(board.hasCallUp(4)).toBe(true);
    expect(board.addStop(4)).toBe(true);
  });

  it('works with a shaft that does not start at zero', () => {
    const board = new RequestBoard(-2, 3);
    expect(board.numFloors).toBe(6);
    expect(board.addStop(-2)).toBe(true);
    expect(board.addCallDown(-2)).toBe(false);
    expect(board.addCallUp(3)).toBe(false);
    expect(board.nextStopBelow(3)).toBe(-2);
    expect(board.snapshot()).toEqual({
      stopRequested: [true, false, false, false, false, false],
      callUp: [false, false, false, false, false, false],
      callDown: [false, false, false, false, false, false]
    });
  });
});
