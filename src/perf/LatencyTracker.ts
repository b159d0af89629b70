export interface InferenceLatencySample {
  queueMs: number;
  audioMs: number;
  engineMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  inferences: number;
  queueMs: PercentileSummary;
  audioMs: PercentileSummary;
  engineMs: PercentileSummary;
  realTimeFactor: number;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

const DEFAULT_WINDOW = 512;

/**
 * Percentiles cover the most recent `windowSize` inferences; the count and the
 * real-time factor cover every inference since the last reset.
 */
export class LatencyTracker {
  private samples: InferenceLatencySample[] = [];
  private nextSlot = 0;
  private inferences = 0;
  private totalAudioMs = 0;
  private totalEngineMs = 0;

  public constructor(private readonly windowSize = DEFAULT_WINDOW) {
    if (!Number.isInteger(windowSize) || windowSize <= 0) {
      throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
    }
  }

  public reset(): void {
    this.samples = [];
    this.nextSlot = 0;
    this.inferences = 0;
    this.totalAudioMs = 0;
    this.totalEngineMs = 0;
  }

  public push(sample: InferenceLatencySample): void {
    if (this.samples.length < this.windowSize) {
      this.samples.push(sample);
    } else {
      this.samples[this.nextSlot] = sample;
    }

    this.nextSlot = (this.nextSlot + 1) % this.windowSize;
    this.inferences += 1;
    this.totalAudioMs += sample.audioMs;
    this.totalEngineMs += sample.engineMs;
  }

  public summarize(): LatencySummary {
    return {
      inferences: this.inferences,
      queueMs: asSummary(this.samples.map((sample) => sample.queueMs)),
      audioMs: asSummary(this.samples.map((sample) => sample.audioMs)),
      engineMs: asSummary(this.samples.map((sample) => sample.engineMs)),
      // Engine time per second of audio; below 1 keeps up with real time.
      realTimeFactor: this.totalAudioMs > 0 ? Number((this.totalEngineMs / this.totalAudioMs).toFixed(3)) : 0
    };
  }
}
