/**
 * High-resolution performance profiler for the resolve/infer/execute pipeline
 */

export interface PerformanceStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  total: number;
}

export interface PerformanceReport {
  timestamp: string;
  uptime: number;
  indexing: {
    buildTime: number | null;
    size: number;
    dimension: number | null;
    builds: number;
  };
  resolve: {
    total: PerformanceStats | null;
    override: PerformanceStats | null;
    semantic: PerformanceStats | null;
  };
  infer: PerformanceStats | null;
  execute: Record<string, PerformanceStats | null>;
}

/**
 * Calculate percentile from sorted array
 */
function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)]!;
}

function calculateStats(measurements: number[]): PerformanceStats | null {
  if (measurements.length === 0) return null;

  const sorted = [...measurements].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);

  return {
    count: sorted.length,
    min: sorted[0]!,
    max: sorted[sorted.length - 1]!,
    avg: total / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    total,
  };
}

const EXECUTE_PREFIX = "execute.";

/**
 * Collects named durations in milliseconds
 * Names in use: resolve, resolve.override, resolve.semantic, infer,
 * execute.<language>, index.build
 */
export class Profiler {
  private marks: Map<string, number> = new Map();
  private measures: Map<string, number[]> = new Map();

  private indexBuildTime: number | null = null;
  private indexSize: number = 0;
  private indexDimension: number | null = null;
  private indexBuilds: number = 0;

  private readonly startTime: number = performance.now();

  /**
   * Mark a point in time with a name
   */
  mark(name: string): void {
    this.marks.set(name, performance.now());
  }

  /**
   * Measure duration from a mark to now, -1 when the mark is unknown
   */
  measure(name: string, startMark: string): number {
    const start = this.marks.get(startMark);
    if (start === undefined) {
      return -1;
    }

    const duration = performance.now() - start;
    this.record(name, duration);
    return duration;
  }

  record(name: string, duration: number): void {
    const existing = this.measures.get(name) || [];
    existing.push(duration);
    this.measures.set(name, existing);
  }

  getStats(name: string): PerformanceStats | null {
    const measurements = this.measures.get(name);
    if (!measurements) return null;
    return calculateStats(measurements);
  }

  /**
   * Record a completed index build
   */
  recordIndexBuild(duration: number, size: number, dimension: number): void {
    this.record("index.build", duration);
    this.indexBuildTime = duration;
    this.indexSize = size;
    this.indexDimension = dimension;
    this.indexBuilds++;
  }

  /**
   * Record an index loaded from disk (no build time)
   */
  recordIndexLoad(size: number, dimension: number): void {
    this.indexSize = size;
    this.indexDimension = dimension;
  }

  export(): PerformanceReport {
    const execute: Record<string, PerformanceStats | null> = {};
    for (const name of [...this.measures.keys()].sort()) {
      if (name.startsWith(EXECUTE_PREFIX)) {
        execute[name.slice(EXECUTE_PREFIX.length)] = this.getStats(name);
      }
    }

    return {
      timestamp: new Date().toISOString(),
      uptime: performance.now() - this.startTime,
      indexing: {
        buildTime: this.indexBuildTime,
        size: this.indexSize,
        dimension: this.indexDimension,
        builds: this.indexBuilds,
      },
      resolve: {
        total: this.getStats("resolve"),
        override: this.getStats("resolve.override"),
        semantic: this.getStats("resolve.semantic"),
      },
      infer: this.getStats("infer"),
      execute,
    };
  }

  reset(): void {
    this.marks.clear();
    this.measures.clear();
    this.indexBuildTime = null;
    this.indexSize = 0;
    this.indexDimension = null;
    this.indexBuilds = 0;
  }

  /**
   * Create a scoped timer that records its duration when called
   * Usage: const done = profiler.startTimer("resolve"); ... done();
   */
  startTimer(name: string): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.record(name, duration);
      return duration;
    };
  }
}
