import { performance } from 'node:perf_hooks';
import { LatencyBreakdown } from '../dto/chat-response.dto';

/**
 * Per-request wall-clock timer with named step accumulators.
 *
 * Steps are recorded as non-overlapping intervals inside the request, so
 * the floored step values never sum past the floored total.
 */
export class LatencyTimer {
  private readonly startedAt = performance.now();
  private readonly steps = new Map<string, number>();

  elapsedMs(): number {
    return performance.now() - this.startedAt;
  }

  record(step: string, ms: number): void {
    this.steps.set(step, (this.steps.get(step) ?? 0) + Math.max(0, ms));
  }

  /**
   * Integer millisecond breakdown. `requiredSteps` are always present.
   * Steps recorded out of band are clamped so their sum stays within the
   * total.
   */
  breakdown(requiredSteps: readonly string[] = ['retrieve', 'llm']): LatencyBreakdown {
    const total = Math.floor(this.elapsedMs());
    const byStep: Record<string, number> = {};
    for (const step of requiredSteps) {
      byStep[step] = 0;
    }

    let remaining = total;
    for (const [step, ms] of this.steps) {
      const value = Math.min(Math.floor(ms), remaining);
      byStep[step] = value;
      remaining -= value;
    }

    return { total, by_step: byStep };
  }
}
