/**
 * Time and height sources.
 *
 * The engine never reads the wall clock directly. Time is Unix seconds;
 * height is a monotonically increasing confirmation counter used for the
 * flash-loan guard, reveal windows and rate-limit periods.
 */

export interface Clock {
  /** Current time, Unix seconds */
  now(): number;

  /** Current height */
  height(): number;
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private _time: number;
  private _height: number;

  constructor(time = 1_700_000_000, height = 100) {
    this._time = time;
    this._height = height;
  }

  now(): number {
    return this._time;
  }

  height(): number {
    return this._height;
  }

  advance(seconds: number, heights = 0): void {
    if (seconds < 0 || heights < 0) {
      throw new RangeError("ManualClock cannot move backwards");
    }
    this._time += seconds;
    this._height += heights;
  }
}

export interface SystemClockOptions {
  /** Unix seconds at which height 0 began */
  readonly genesisTime: number;

  /** Seconds per height increment */
  readonly heightIntervalSeconds: number;
}

/**
 * Wall clock with height derived from elapsed intervals since genesis.
 */
export class SystemClock implements Clock {
  private readonly genesisTime: number;
  private readonly heightIntervalSeconds: number;

  constructor(options: SystemClockOptions) {
    if (options.heightIntervalSeconds <= 0) {
      throw new RangeError("heightIntervalSeconds must be positive");
    }
    this.genesisTime = options.genesisTime;
    this.heightIntervalSeconds = options.heightIntervalSeconds;
  }

  now(): number {
    return Math.floor(Date.now() / 1000);
  }

  height(): number {
    const elapsed = Math.max(0, this.now() - this.genesisTime);
    return Math.floor(elapsed / this.heightIntervalSeconds);
  }
}
