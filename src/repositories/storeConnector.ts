import { logger } from "../utils/logger";

const log = logger.child("StoreConnector");

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Keeps trying to open a store connection that failed at startup, doubling
 * the delay between attempts up to `maxDelayMs`.
 */
export class StoreConnector {
  private timer: NodeJS.Timeout | null = null;
  private failures = 0;
  private stopped = false;

  constructor(
    private readonly store: string,
    private readonly connect: () => Promise<unknown>,
    private readonly backoff: BackoffOptions
  ) {}

  /** Resolves true once connected; false if the first attempt failed and retries are scheduled. */
  async start(): Promise<boolean> {
    this.stopped = false;
    return this.attempt();
  }

  stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get retrying(): boolean {
    return this.timer !== null;
  }

  nextDelayMs(): number {
    const exponent = Math.max(this.failures - 1, 0);
    return Math.min(this.backoff.baseDelayMs * 2 ** exponent, this.backoff.maxDelayMs);
  }

  private async attempt(): Promise<boolean> {
    try {
      await this.connect();
    } catch (error) {
      this.failures += 1;
      if (this.stopped) return false;

      const delay = this.nextDelayMs();
      log.warn(`${this.store} store unreachable, retrying in ${delay} ms:`, error);
      this.timer = setTimeout(() => {
        this.timer = null;
        this.attempt().catch((retryError: unknown) =>
          log.error(`${this.store} store retry failed:`, retryError)
        );
      }, delay);
      return false;
    }

    if (this.failures > 0) {
      log.info(`${this.store} store connected after ${this.failures + 1} attempts`);
    } else {
      log.info(`${this.store} store connected`);
    }
    this.failures = 0;
    return true;
  }
}
