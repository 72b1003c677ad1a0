export type PeriodUnit = 'ms' | 's' | 'm' | 'h' | 'd';

const UNIT_MILLIS: Record<PeriodUnit, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

const PERIOD_PATTERN = /^(\d+)(ms|s|m|h|d)$/;

function isPeriodUnit(unit: string): unit is PeriodUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_MILLIS, unit);
}

/**
 * A length of time written as `<amount><unit>`, e.g. `14d` or `60m`.
 */
export class Period {
  constructor(
    public readonly amount: number,
    public readonly unit: PeriodUnit
  ) {}

  static parse(text: string): Period {
    const m = text.trim().match(PERIOD_PATTERN);
    const amount = m?.[1];
    const unit = m?.[2];
    if (amount === undefined || unit === undefined || !isPeriodUnit(unit)) {
      throw new Error(`expected a period such as 14d, 12h, 30m, 10s or 500ms`);
    }
    return new Period(Number(amount), unit);
  }

  toMilliseconds(): number {
    return this.amount * UNIT_MILLIS[this.unit];
  }

  isLongerThan(other: Period): boolean {
    return this.toMilliseconds() > other.toMilliseconds();
  }

  /**
   * Re-expresses the period in `unit`; throws when it is not a whole number of them.
   */
  to(unit: PeriodUnit): Period {
    if (unit === this.unit) return this;
    const amount = this.toMilliseconds() / UNIT_MILLIS[unit];
    if (!Number.isInteger(amount)) {
      throw new Error(`${this.toString()} is not a whole number of ${unit}`);
    }
    return new Period(amount, unit);
  }

  toString(): string {
    return `${this.amount}${this.unit}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
