/**
 * Token bucket shared by concurrent callers. `acquire()` resolves in FIFO
 * order once a token is available.
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;
  private lastRefill: number;
  private queue: Array<() => void> = [];
  private processing: boolean = false;

  constructor(maxTokens: number, refillRatePerSecond: number) {
    this.maxTokens = maxTokens;
    this.tokens = maxTokens;
    this.refillRate = refillRatePerSecond;
    this.lastRefill = Date.now();
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  acquire(): Promise<void> {
    return new Promise(resolve => {
      this.queue.push(resolve);
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    while (this.queue.length > 0) {
      this.refill();

      if (this.tokens >= 1) {
        this.tokens -= 1;
        this.queue.shift()?.();
      } else {
        const waitTime = (1 - this.tokens) / this.refillRate * 1000;
        await new Promise(r => setTimeout(r, Math.ceil(waitTime)));
      }
    }

    this.processing = false;
  }
}

// Telegram allows ~30 messages/second per bot; stay under it
export const createTelegramLimiter = (): RateLimiter => new RateLimiter(25, 25);
// public price APIs throttle hard on bursts
export const createPriceLimiter = (): RateLimiter => new RateLimiter(10, 0.5);
