/**
 * Rate limiting with token bucket + sliding window
 *
 * Per-client token bucket for burst protection
 * Per-IP sliding window for DoS protection
 *
 * State is held per instance; call cleanup() from a timer owned by the server.
 */

interface TokenBucket {
  tokens: number;
  updated: number;
}

export interface RateLimitOptions {
  /** Tokens per second per client (default: 5) */
  rate?: number;
  /** Maximum burst size per client (default: 10) */
  burst?: number;
  /** Maximum requests per IP per window (default: 100) */
  ipLimit?: number;
  /** Window size in milliseconds (default: 60000) */
  windowMs?: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

export type RateLimitDecision = { allowed: true } | { allowed: false; reason: "client_rate_limit" | "ip_rate_limit" };

export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly windows = new Map<string, number[]>();
  private readonly rate: number;
  private readonly burst: number;
  private readonly ipLimit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(opts: RateLimitOptions = {}) {
    this.rate = opts.rate ?? 5;
    this.burst = opts.burst ?? 10;
    this.ipLimit = opts.ipLimit ?? 100;
    this.windowMs = opts.windowMs ?? 60_000;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Token bucket check; consumes one token when allowed
   */
  takeClientToken(clientId: string): boolean {
    const now = this.now();
    const bucket = this.buckets.get(clientId) ?? { tokens: this.burst, updated: now };

    // Refill tokens based on elapsed time
    const elapsed = (now - bucket.updated) / 1000;
    bucket.tokens = Math.min(this.burst, bucket.tokens + elapsed * this.rate);
    bucket.updated = now;
    this.buckets.set(clientId, bucket);

    if (bucket.tokens < 1) return false;
    bucket.tokens -= 1;
    return true;
  }

  /**
   * Sliding window check; records the request when allowed
   */
  checkIpWindow(ip: string): boolean {
    const now = this.now();
    const requests = (this.windows.get(ip) ?? []).filter((ts) => now - ts < this.windowMs);
    this.windows.set(ip, requests);

    if (requests.length >= this.ipLimit) return false;
    requests.push(now);
    return true;
  }

  /**
   * Combined rate limit check (client + IP)
   */
  check(clientId: string, ip: string): RateLimitDecision {
    if (!this.takeClientToken(clientId)) return { allowed: false, reason: "client_rate_limit" };
    if (!this.checkIpWindow(ip)) return { allowed: false, reason: "ip_rate_limit" };
    return { allowed: true };
  }

  /**
   * Drop entries idle for longer than maxAgeMs (default: 5 minutes)
   */
  cleanup(maxAgeMs: number = 5 * 60 * 1000): void {
    const now = this.now();
    for (const [id, bucket] of this.buckets.entries()) {
      if (now - bucket.updated > maxAgeMs) this.buckets.delete(id);
    }
    for (const [ip, requests] of this.windows.entries()) {
      const active = requests.filter((ts) => now - ts < this.windowMs);
      if (active.length === 0) this.windows.delete(ip);
      else this.windows.set(ip, active);
    }
  }

  /** Number of tracked clients and IPs */
  size(): { clients: number; ips: number } {
    return { clients: this.buckets.size, ips: this.windows.size };
  }
}
