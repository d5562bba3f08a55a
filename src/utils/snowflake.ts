// src/utils/snowflake.ts
import { Clock, systemClock } from './clock';
import { ClockSkewError, IdSpaceExhaustedError } from './errors';

/**
 * Bit layout of an ordinal id, high to low:
 * [timestamp][worker][sequence]
 *
 * The default 41/10/12 split gives ~69 years of milliseconds, 1024 workers and
 * 4096 ids per millisecond per worker.
 */
export interface SnowflakeLayout {
  timestampBits: number;
  workerBits: number;
  sequenceBits: number;
}

export const DEFAULT_LAYOUT: SnowflakeLayout = {
  timestampBits: 41,
  workerBits: 10,
  sequenceBits: 12,
};

/** 2024-01-01T00:00:00Z */
export const DEFAULT_EPOCH_MS = Date.UTC(2024, 0, 1);

export interface SnowflakeOptions {
  workerId: number;
  epochMs?: number;
  layout?: SnowflakeLayout;
  clock?: Clock;
}

export interface DecomposedId {
  /** Absolute Unix time in milliseconds. */
  timestamp: number;
  workerId: number;
  sequence: number;
}

const isBitCount = (value: number, min: number, max: number): boolean =>
  Number.isInteger(value) && value >= min && value <= max;

/**
 * Issues time-ordered 64-bit ids for a single worker. All mutable state (last
 * timestamp and sequence) lives on the instance; share one instance per
 * worker id rather than constructing several.
 *
 * Once the clock is seen moving backwards the generator halts for good and
 * every later call rethrows the same ClockSkewError.
 */
export class SnowflakeGenerator {
  readonly workerId: number;
  readonly epochMs: number;
  readonly layout: SnowflakeLayout;

  private readonly clock: Clock;
  private readonly timestampShift: bigint;
  private readonly workerShift: bigint;
  private readonly maxSequence: number;
  private readonly maxTimestamp: number;

  private lastTimestamp = -1;
  private sequence = 0;
  private halted: ClockSkewError | null = null;

  constructor(options: SnowflakeOptions) {
    const layout = options.layout ?? DEFAULT_LAYOUT;
    const { timestampBits, workerBits, sequenceBits } = layout;

    if (
      !isBitCount(timestampBits, 1, 52) ||
      !isBitCount(workerBits, 0, 31) ||
      !isBitCount(sequenceBits, 1, 31) ||
      timestampBits + workerBits + sequenceBits > 63
    ) {
      throw new RangeError(
        `Invalid id layout ${timestampBits}/${workerBits}/${sequenceBits}: fields must total at most 63 bits`
      );
    }

    const maxWorkerId = 2 ** workerBits - 1;
    if (!Number.isInteger(options.workerId) || options.workerId < 0 || options.workerId > maxWorkerId) {
      throw new RangeError(`workerId must be an integer between 0 and ${maxWorkerId}`);
    }

    this.clock = options.clock ?? systemClock;
    this.epochMs = options.epochMs ?? DEFAULT_EPOCH_MS;
    if (this.epochMs > this.clock()) {
      throw new RangeError('Epoch must not lie in the future');
    }

    this.workerId = options.workerId;
    this.layout = { ...layout };
    this.workerShift = BigInt(sequenceBits);
    this.timestampShift = BigInt(sequenceBits + workerBits);
    this.maxSequence = 2 ** sequenceBits - 1;
    this.maxTimestamp = 2 ** timestampBits - 1;
  }

  nextId(): bigint {
    if (this.halted) {
      throw this.halted;
    }

    let timestamp = this.elapsed();

    if (timestamp === this.lastTimestamp) {
      this.sequence = this.sequence === this.maxSequence ? 0 : this.sequence + 1;
      if (this.sequence === 0) {
        // Sequence space for this millisecond is spent: spin to the next tick.
        timestamp = this.waitForNextTick();
      }
    } else {
      this.sequence = 0;
    }

    if (timestamp > this.maxTimestamp) {
      throw new IdSpaceExhaustedError(this.maxTimestamp);
    }

    this.lastTimestamp = timestamp;

    return (
      (BigInt(timestamp) << this.timestampShift) |
      (BigInt(this.workerId) << this.workerShift) |
      BigInt(this.sequence)
    );
  }

  /** Splits an id issued under this generator's epoch and layout. */
  decompose(id: bigint): DecomposedId {
    const workerMask = (1n << BigInt(this.layout.workerBits)) - 1n;
    return {
      timestamp: Number(id >> this.timestampShift) + this.epochMs,
      workerId: Number((id >> this.workerShift) & workerMask),
      sequence: Number(id & BigInt(this.maxSequence)),
    };
  }

  private elapsed(): number {
    const timestamp = this.clock() - this.epochMs;
    if (timestamp < this.lastTimestamp) {
      this.halted = new ClockSkewError(this.lastTimestamp, timestamp);
      throw this.halted;
    }
    return timestamp;
  }

  private waitForNextTick(): number {
    let timestamp = this.elapsed();
    while (timestamp <= this.lastTimestamp) {
      timestamp = this.elapsed();
    }
    return timestamp;
  }
}
