export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite number of milliseconds");
    }
    if (milliseconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value * 1000);
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * 60_000);
  }

  static fromHours(value: number): Duration {
    return new Duration(value * 3_600_000);
  }

  static zero(): Duration {
    return new Duration(0);
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get seconds(): number {
    return this._milliseconds / 1000;
  }

  get minutes(): number {
    return this._milliseconds / 60_000;
  }

  get hours(): number {
    return this._milliseconds / 3_600_000;
  }

  equals(other: unknown): boolean {
    return other instanceof Duration && other._milliseconds === this._milliseconds;
  }

  /** Short human label used in log lines, e.g. `90s`, `10m`, `2h`. */
  toString(): string {
    if (this._milliseconds % 3_600_000 === 0 && this._milliseconds > 0) {
      return `${this.hours}h`;
    }
    if (this._milliseconds % 60_000 === 0 && this._milliseconds > 0) {
      return `${this.minutes}m`;
    }
    if (this._milliseconds % 1000 === 0) {
      return `${this.seconds}s`;
    }
    return `${this._milliseconds}ms`;
  }

  toJSON(): number {
    return this._milliseconds;
  }
}
