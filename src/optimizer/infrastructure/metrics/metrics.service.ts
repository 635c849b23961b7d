import { Injectable } from '@nestjs/common';

export interface OptimizerMetrics {
  runs: {
    completed: number;
    rejected: {
      invalid_csv: number;
    };
  };
  intervals: {
    received: number;
    selected: number;
  };
  optimizationTime: {
    p95: number | null;
    samples: number;
  };
}

@Injectable()
export class MetricsService {
  private runsCompleted = 0;
  private csvRejected = 0;
  private intervalsReceived = 0;
  private intervalsSelected = 0;

  private optimizationTimes: number[] = [];

  // Maximum samples to keep in memory
  private readonly MAX_SAMPLES = 1000;

  /**
   * Resets all in-memory counters and samples.
   * Intended for test isolation (e2e/units) since this service is stateful.
   */
  reset(): void {
    this.runsCompleted = 0;
    this.csvRejected = 0;
    this.intervalsReceived = 0;
    this.intervalsSelected = 0;
    this.optimizationTimes = [];
  }

  recordRunCompleted(intervalCount: number, selectedCount: number): void {
    this.runsCompleted++;
    this.intervalsReceived += intervalCount;
    this.intervalsSelected += selectedCount;
  }

  recordCsvRejected(): void {
    this.csvRejected++;
  }

  recordOptimizationTime(ms: number): void {
    this.optimizationTimes.push(ms);
    if (this.optimizationTimes.length > this.MAX_SAMPLES) {
      this.optimizationTimes.shift();
    }
  }

  getMetrics(): OptimizerMetrics {
    return {
      runs: {
        completed: this.runsCompleted,
        rejected: {
          invalid_csv: this.csvRejected,
        },
      },
      intervals: {
        received: this.intervalsReceived,
        selected: this.intervalsSelected,
      },
      optimizationTime: {
        p95: this.calculateP95(this.optimizationTimes),
        samples: this.optimizationTimes.length,
      },
    };
  }

  private calculateP95(values: number[]): number | null {
    if (values.length < 20) {
      // Insufficient data for reliable P95
      return null;
    }

    const sorted = [...values].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[index];
  }
}
