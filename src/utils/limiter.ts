export type Lane = 'esearch' | 'efetch';

export type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  esearch: 1,
  efetch: 1,
};

export class LaneLimiter {
  private queues: Map<Lane, Array<() => void>> = new Map();
  private running: Map<Lane, number> = new Map();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
    for (const lane of Object.keys(defaultConfig) as Lane[]) {
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  size(lane: Lane): number {
    return this.config[lane];
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const running = this.running.get(lane) ?? 0;

    if (running < this.config[lane]) {
      this.running.set(lane, running + 1);
      try {
        return await fn();
      } finally {
        this.release(lane);
      }
    }

    return new Promise<T>((resolve, reject) => {
      this.queue(lane).push(() => {
        this.running.set(lane, (this.running.get(lane) ?? 0) + 1);
        void fn()
          .then(resolve, reject)
          .finally(() => this.release(lane));
      });
    });
  }

  private queue(lane: Lane): Array<() => void> {
    let q = this.queues.get(lane);
    if (!q) {
      q = [];
      this.queues.set(lane, q);
    }
    return q;
  }

  private release(lane: Lane): void {
    this.running.set(lane, Math.max(0, (this.running.get(lane) ?? 1) - 1));
    const queue = this.queue(lane);
    if ((this.running.get(lane) ?? 0) < this.config[lane] && queue.length > 0) {
      const next = queue.shift();
      next?.();
    }
  }
}
