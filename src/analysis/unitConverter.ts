/**
 * Raw histogram values are nanosecond-equivalents; display values are
 * millisecond-equivalents. Every conversion in the project goes through here.
 */
export const VALUE_FACTOR = 1e6;

export type UnitName = 'ms' | 'RU';

export class UnitConverter {
  constructor(public readonly raw: boolean = false) {}

  /** Multiplier from display units to raw units */
  get scale(): number {
    return this.raw ? 1 : VALUE_FACTOR;
  }

  get unitName(): UnitName {
    return unitName(this.raw);
  }

  toDisplay(value: number): number {
    return this.raw ? value : toDisplay(value);
  }

  toRaw(value: number): number {
    return this.raw ? value : toRaw(value);
  }
}

export function toDisplay(value: number): number {
  return value / VALUE_FACTOR;
}

export function toRaw(value: number): number {
  return value * VALUE_FACTOR;
}

/**
 * Label of the values leaving the engine: "RU" (raw unit) when no conversion occurs
 */
export function unitName(raw: boolean): UnitName {
  return raw ? 'RU' : 'ms';
}
