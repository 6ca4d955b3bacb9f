import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  ENCODE: 'encodeMs',
  SEARCH: 'searchMs',
  RECONSTRUCT: 'reconstructMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  encodeMs: number;
  searchMs: number;
  reconstructMs: number;
  searches: number;
  laddersFound: number;
  ladderLevels: number;
  ladderNodesExpanded: number;
  ladderFrontierPeak: number;
  ladderVisitedPeak: number;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  encodeMs: 0,
  searchMs: 0,
  reconstructMs: 0,
  searches: 0,
  laddersFound: 0,
  ladderLevels: 0,
  ladderNodesExpanded: 0,
  ladderFrontierPeak: 0,
  ladderVisitedPeak: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export interface LadderBfsMetrics {
  levels: number;
  nodesExpanded: number;
  frontierPeak: number;
  visitedCount: number;
  found: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      encodeMs: { total: 0 },
      searchMs: { total: 0 },
      reconstructMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    const duration = this.now() - current.startedAt;
    this.accumulateDuration(key, duration);
    this.timers[key] = { total: this.snapshot[key] };
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  /**
   * Counters accumulate across searches; peaks keep the largest run.
   */
  public recordLadderBfs(metrics: LadderBfsMetrics): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.searches += 1;
    if (metrics.found) {
      this.snapshot.laddersFound += 1;
    }
    this.snapshot.ladderLevels += metrics.levels;
    this.snapshot.ladderNodesExpanded += metrics.nodesExpanded;
    this.snapshot.ladderFrontierPeak = Math.max(
      this.snapshot.ladderFrontierPeak,
      metrics.frontierPeak
    );
    this.snapshot.ladderVisitedPeak = Math.max(
      this.snapshot.ladderVisitedPeak,
      metrics.visitedCount
    );
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
