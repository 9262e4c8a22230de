import { Clock, systemClock } from "../core/scheduler.js";

// Compute-unit cost of each Alchemy method we call.
export const COMPUTE_UNIT_COSTS = {
  eth_gasPrice: 20,
  eth_getBalance: 19,
  alchemy_getTokenBalances: 26
} as const;

export type MeteredMethod = keyof typeof COMPUTE_UNIT_COSTS;

export const DEFAULT_MONTHLY_COMPUTE_UNITS = 300_000_000;

// Ticks since the last reset after which a day-2 observation also resets,
// covering a scheduler that slept through the 1st.
const MIN_TICKS_BEFORE_LATE_RESET = 28;

export interface BudgetStatus {
  used: number;
  capacity: number;
  remaining: number;
  ticksSinceReset: number;
}

/**
 * Running total of provider compute units consumed in the current calendar
 * month. It never blocks callers; they consult `isExhausted()` themselves.
 */
export class ComputeBudget {
  private readonly capacity: number;
  private readonly clock: Clock;
  private used = 0;
  private ticksSinceReset = 0;
  // "YYYY-M" of the last reset, so re-checks within one month never reset twice.
  private lastResetMonth?: string;

  constructor(capacity = DEFAULT_MONTHLY_COMPUTE_UNITS, clock: Clock = systemClock) {
    this.capacity = capacity;
    this.clock = clock;
  }

  addUnits(units: number): void {
    if (!Number.isFinite(units) || units <= 0) {
      return;
    }
    this.used += units;
  }

  charge(method: MeteredMethod): void {
    this.addUnits(COMPUTE_UNIT_COSTS[method]);
  }

  /** Called once per day. Returns true when the period was reset. */
  dailyTick(): boolean {
    const now = new Date(this.clock.now());
    const day = now.getUTCDate();
    const month = `${now.getUTCFullYear()}-${now.getUTCMonth() + 1}`;
    const due = day === 1 || (day === 2 && this.ticksSinceReset >= MIN_TICKS_BEFORE_LATE_RESET);
    if (due && month !== this.lastResetMonth) {
      this.used = 0;
      this.ticksSinceReset = 0;
      this.lastResetMonth = month;
      return true;
    }
    this.ticksSinceReset += 1;
    return false;
  }

  isExhausted(): boolean {
    return this.used >= this.capacity;
  }

  getStatus(): BudgetStatus {
    return {
      used: this.used,
      capacity: this.capacity,
      remaining: Math.max(0, this.capacity - this.used),
      ticksSinceReset: this.ticksSinceReset
    };
  }
}
