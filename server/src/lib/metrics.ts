import type { Recommendation } from '../agents/types.js';

const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000];
const RUN_BUCKETS_MS = [5_000, 15_000, 30_000, 60_000, 120_000, 300_000];

class Histogram {
  private readonly counts: number[];
  private count = 0;
  private sumMs = 0;

  constructor(private readonly buckets: number[]) {
    this.counts = new Array<number>(buckets.length + 1).fill(0);
  }

  observe(ms: number): void {
    this.count += 1;
    this.sumMs += ms;
    const idx = this.buckets.findIndex((limit) => ms <= limit);
    this.counts[idx >= 0 ? idx : this.buckets.length] += 1;
  }

  /** Upper bound of the bucket holding the p-th sample; the last bucket reports the largest bound. */
  percentile(p: number): number {
    const last = this.buckets[this.buckets.length - 1] ?? 0;
    if (this.count <= 0) return 0;
    const target = Math.max(1, Math.ceil(this.count * p));
    let running = 0;
    for (let i = 0; i < this.counts.length; i += 1) {
      running += this.counts[i] ?? 0;
      if (running >= target) {
        return this.buckets[i] ?? last;
      }
    }
    return last;
  }

  snapshot() {
    return {
      count: this.count,
      avg_ms: this.count > 0 ? Math.round((this.sumMs / this.count) * 100) / 100 : 0,
      p50_ms_upper_bound: this.percentile(0.5),
      p95_ms_upper_bound: this.percentile(0.95),
      p99_ms_upper_bound: this.percentile(0.99),
      buckets_ms: this.buckets,
      histogram: [...this.counts],
    };
  }

  reset(): void {
    this.counts.fill(0);
    this.count = 0;
    this.sumMs = 0;
  }
}

interface RequestCounters {
  total: number;
  status_2xx: number;
  status_3xx: number;
  status_4xx: number;
  status_5xx: number;
  status_409: number;
  status_503: number;
}

interface CouncilCounters {
  runs: number;
  failed_runs: number;
  auto_executed: number;
  routed_to_review: number;
  degraded_evaluations: number;
  fallback_syntheses: number;
  deliberation_rounds: number;
  recommendations: Record<Recommendation, number>;
}

function emptyRequestCounters(): RequestCounters {
  return { total: 0, status_2xx: 0, status_3xx: 0, status_4xx: 0, status_5xx: 0, status_409: 0, status_503: 0 };
}

function emptyCouncilCounters(): CouncilCounters {
  return {
    runs: 0,
    failed_runs: 0,
    auto_executed: 0,
    routed_to_review: 0,
    degraded_evaluations: 0,
    fallback_syntheses: 0,
    deliberation_rounds: 0,
    recommendations: { approve: 0, reject: 0, needs_review: 0 },
  };
}

let requests = emptyRequestCounters();
let council = emptyCouncilCounters();
const requestLatency = new Histogram(LATENCY_BUCKETS_MS);
const runDuration = new Histogram(RUN_BUCKETS_MS);

export function recordRequestMetric(status: number, latencyMs: number): void {
  requests.total += 1;
  if (status >= 200 && status < 300) requests.status_2xx += 1;
  else if (status >= 300 && status < 400) requests.status_3xx += 1;
  else if (status >= 400 && status < 500) requests.status_4xx += 1;
  else if (status >= 500) requests.status_5xx += 1;

  if (status === 409) requests.status_409 += 1;
  if (status === 503) requests.status_503 += 1;
  requestLatency.observe(latencyMs);
}

export interface CouncilRunSample {
  durationMs: number;
  recommendation: Recommendation;
  autoExecuted: boolean;
  degradedEvaluations: number;
  fallbackSynthesis: boolean;
  roundsRun: number;
}

export function recordCouncilRun(sample: CouncilRunSample): void {
  council.runs += 1;
  council.recommendations[sample.recommendation] += 1;
  if (sample.autoExecuted) council.auto_executed += 1;
  else council.routed_to_review += 1;
  council.degraded_evaluations += sample.degradedEvaluations;
  if (sample.fallbackSynthesis) council.fallback_syntheses += 1;
  council.deliberation_rounds += sample.roundsRun;
  runDuration.observe(sample.durationMs);
}

export function recordCouncilFailure(): void {
  council.failed_runs += 1;
}

export function getRequestMetrics() {
  return { counters: { ...requests }, latency: requestLatency.snapshot() };
}

export function getCouncilMetrics() {
  return {
    counters: { ...council, recommendations: { ...council.recommendations } },
    duration: runDuration.snapshot(),
  };
}

export function resetMetricsForTest(): void {
  requests = emptyRequestCounters();
  council = emptyCouncilCounters();
  requestLatency.reset();
  runDuration.reset();
}
