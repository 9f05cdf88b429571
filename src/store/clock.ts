export interface ClockReading {
  seconds: number;
  microseconds: number;
}

export interface Clock {
  now(): ClockReading;
}

export const systemClock: Clock = {
  now() {
    const ms = Date.now();
    return {
      seconds: Math.floor(ms / 1000),
      microseconds: (ms % 1000) * 1000,
    };
  },
};

/**
 * A clock that only moves when told to. Lets a MemoryStore replay exact
 * sequences of store time.
 */
export class FrozenClock implements Clock {
  private seconds: number;
  private microseconds: number;

  constructor(seconds: number, microseconds = 0) {
    this.seconds = seconds;
    this.microseconds = microseconds;
    this.normalize();
  }

  now(): ClockReading {
    return { seconds: this.seconds, microseconds: this.microseconds };
  }

  set(seconds: number, microseconds = 0): void {
    this.seconds = seconds;
    this.microseconds = microseconds;
    this.normalize();
  }

  advance(seconds: number, microseconds = 0): void {
    this.seconds += seconds;
    this.microseconds += microseconds;
    this.normalize();
  }

  private normalize(): void {
    if (!Number.isInteger(this.seconds) || !Number.isInteger(this.microseconds)) {
      throw new RangeError("FrozenClock takes whole seconds and microseconds");
    }
    this.seconds += Math.floor(this.microseconds / 1_000_000);
    this.microseconds = ((this.microseconds % 1_000_000) + 1_000_000) % 1_000_000;
  }
}
