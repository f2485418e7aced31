/**
 * Found/tagged/failed counters for one resource type within one service pass.
 */
export class TaggingMetrics {
  found = 0;
  tagged = 0;
  failed = 0;

  constructor(readonly label: string) {}

  summary(): string {
    return `Found: ${this.found}, Tagged: ${this.tagged}, Failed: ${this.failed}`;
  }
}

export interface MetricTotals {
  found: number;
  tagged: number;
  failed: number;
}

/**
 * Metrics of every resource type visited during one service pass, in the order
 * the types were first visited.
 */
export class ServiceReport {
  private readonly metrics = new Map<string, TaggingMetrics>();

  constructor(readonly service: string) {}

  metricsFor(label: string): TaggingMetrics {
    let metrics = this.metrics.get(label);
    if (!metrics) {
      metrics = new TaggingMetrics(label);
      this.metrics.set(label, metrics);
    }
    return metrics;
  }

  get resourceTypes(): TaggingMetrics[] {
    return Array.from(this.metrics.values());
  }

  totals(): MetricTotals {
    return this.resourceTypes.reduce(
      (acc, metrics) => ({
        found: acc.found + metrics.found,
        tagged: acc.tagged + metrics.tagged,
        failed: acc.failed + metrics.failed,
      }),
      { found: 0, tagged: 0, failed: 0 }
    );
  }

  logSummary(): void {
    for (const metrics of this.resourceTypes) {
      console.log(`${this.service} ${metrics.label}: ${metrics.summary()}`);
    }
    const { found, tagged, failed } = this.totals();
    console.log(
      `${this.service} summary: Found: ${found}, Tagged: ${tagged}, Failed: ${failed}`
    );
  }
}
