export type HeaderValue = string | number | undefined;

const RESET_MARGIN_MS = 1000;

export class RateLimiter {
  private remaining: number | null = null;
  private resetsAt: number | null = null;

  constructor(
    private readonly minRemaining: number = 10,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
  ) {}

  // quota is unknown again until the next response
  async throttle() {
    if (this.remaining === null || this.resetsAt === null || this.remaining >= this.minRemaining) {
      return;
    }
    const pauseMs = this.resetsAt - Date.now() + RESET_MARGIN_MS;
    if (pauseMs > 0) {
      const time = new Date(this.resetsAt).toISOString();
      console.log(`⏳ GitHub API quota down to ${this.remaining}; pausing ${Math.ceil(pauseMs / 1000)}s until it resets at ${time}`);
      await this.sleep(pauseMs);
    }
    this.remaining = null;
  }

  record(headers: Record<string, HeaderValue>) {
    const remaining = headerInt(headers["x-ratelimit-remaining"]);
    const reset = headerInt(headers["x-ratelimit-reset"]);
    if (remaining !== null) {
      this.remaining = remaining;
    }
    if (reset !== null) {
      this.resetsAt = reset * 1000;
    }
  }
}

function headerInt(value: HeaderValue): number | null {
  const parsed = typeof value === "string" ? Number.parseInt(value, 10) : value;
  return parsed === undefined || Number.isNaN(parsed) ? null : parsed;
}
