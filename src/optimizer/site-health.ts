/**
 * Per-site health state machine
 *
 * Healthy -> Degraded: at least `minSamples` outcomes in the window and an
 * error rate above `errorThreshold`.
 * Degraded -> Healthy: `recoverySuccesses` consecutive successes. The window
 * starts over on recovery.
 */

export type HealthState = "healthy" | "degraded";

export interface HealthOptions {
  windowSize?: number;
  minSamples?: number;
  errorThreshold?: number;
  recoverySuccesses?: number;
}

export interface HealthTransition {
  siteKey: string;
  from: HealthState;
  to: HealthState;
  errorRate: number;
}

export interface SiteHealthSnapshot {
  state: HealthState;
  samples: number;
  errorRate: number;
  consecutiveSuccesses: number;
  changedAt?: number;
}

const DEFAULT_HEALTH_OPTIONS: Required<HealthOptions> = {
  windowSize: 20,
  minSamples: 5,
  errorThreshold: 0.3,
  recoverySuccesses: 3,
};

export class SiteHealth {
  state: HealthState = "healthy";
  consecutiveSuccesses = 0;
  changedAt?: number;
  private outcomes: boolean[] = [];

  constructor(
    readonly siteKey: string,
    private readonly options: Required<HealthOptions> = DEFAULT_HEALTH_OPTIONS
  ) {}

  get errorRate(): number {
    if (this.outcomes.length === 0) return 0;
    return this.outcomes.filter((ok) => !ok).length / this.outcomes.length;
  }

  /**
   * Record one outcome
   * @returns the transition it caused, if any
   */
  record(success: boolean): HealthTransition | undefined {
    this.outcomes.push(success);
    if (this.outcomes.length > this.options.windowSize) {
      this.outcomes.shift();
    }
    this.consecutiveSuccesses = success ? this.consecutiveSuccesses + 1 : 0;

    if (this.state === "healthy") {
      if (this.outcomes.length >= this.options.minSamples && this.errorRate > this.options.errorThreshold) {
        return this.transition("degraded");
      }
    } else if (this.consecutiveSuccesses >= this.options.recoverySuccesses) {
      const transition = this.transition("healthy");
      this.outcomes = [];
      return transition;
    }
    return undefined;
  }

  snapshot(): SiteHealthSnapshot {
    return {
      state: this.state,
      samples: this.outcomes.length,
      errorRate: this.errorRate,
      consecutiveSuccesses: this.consecutiveSuccesses,
      changedAt: this.changedAt,
    };
  }

  private transition(to: HealthState): HealthTransition {
    const from = this.state;
    this.state = to;
    this.changedAt = Date.now();
    return { siteKey: this.siteKey, from, to, errorRate: this.errorRate };
  }
}

export class HealthRegistry {
  private sites = new Map<string, SiteHealth>();
  private readonly options: Required<HealthOptions>;

  constructor(options: HealthOptions = {}) {
    this.options = { ...DEFAULT_HEALTH_OPTIONS, ...options };
  }

  get(siteKey: string): SiteHealth {
    let health = this.sites.get(siteKey);
    if (!health) {
      health = new SiteHealth(siteKey, this.options);
      this.sites.set(siteKey, health);
    }
    return health;
  }

  stateOf(siteKey: string): HealthState {
    return this.sites.get(siteKey)?.state ?? "healthy";
  }

  record(siteKey: string, success: boolean): HealthTransition | undefined {
    return this.get(siteKey).record(success);
  }

  degradedSites(): string[] {
    return [...this.sites.values()].filter((site) => site.state === "degraded").map((site) => site.siteKey);
  }

  snapshot(): Record<string, SiteHealthSnapshot> {
    const result: Record<string, SiteHealthSnapshot> = {};
    for (const [key, health] of this.sites) {
      result[key] = health.snapshot();
    }
    return result;
  }

  clear(): void {
    this.sites.clear();
  }
}
