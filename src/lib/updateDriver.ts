import type { ElevatorCar } from '@/lib/elevator';

export interface UpdateDriverOptions {
  periodMs?: number; // Defaults to the car's update period
  startDelayMs?: number; // Defaults to the car's start delay
  onError?: (error: unknown) => void;
}

/**
 * Fixed-period clock for one car: one `update()` per tick.
 *
 * Ticks never overlap because each update runs synchronously to
 * completion; the period still has to exceed the worst-case update time
 * or ticks pile up behind each other.
 */
export class UpdateDriver {
  private readonly periodMs: number;
  private readonly startDelayMs: number;
  private readonly onError?: (error: unknown) => void;
  private startTimer: ReturnType<typeof setTimeout> | null = null;
  private interval: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private tickCount = 0;

  constructor(
    private readonly car: ElevatorCar,
    options: UpdateDriverOptions = {}
  ) {
    this.periodMs = options.periodMs ?? car.timings.updatePeriodMs;
    this.startDelayMs = options.startDelayMs ?? car.timings.startDelayMs;
    this.onError = options.onError;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get ticks(): number {
    return this.tickCount;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      this.interval = setInterval(() => this.tick(), this.periodMs);
      this.tick();
    }, this.startDelayMs);
  }

  stop(): void {
    this.running = false;
    if (this.startTimer !== null) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  private tick(): void {
    this.tickCount++;
    try {
      this.car.update();
    } catch (error) {
      // A failed update leaves the car in an unknown state; stop driving it.
      this.stop();
      if (!this.onError) throw error;
      this.onError(error);
    }
  }
}
