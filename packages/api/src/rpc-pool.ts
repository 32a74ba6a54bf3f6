/**
 * RPC Pool: latency-weighted load balancing with automatic failover.
 *
 * JSON-RPC calls to the archive node(s) are spread over every configured
 * endpoint. Until each endpoint has enough latency samples the pool
 * round-robins; after that faster endpoints get proportionally more calls.
 * Endpoints that keep failing are suspended with exponential backoff.
 */

const RPC_LATENCY_WINDOW = 200; // keep last 200 call timings per endpoint
const LATENCY_WARMUP_CALLS = 10; // round-robin until each endpoint has this many samples
const CALL_TIMEOUT_MS = 5_000;

const SUSPENSION_BASE_MS = 5_000; // 5 seconds initial suspension
const SUSPENSION_MAX_MS = 120_000; // 2 minute max suspension
const MAX_FAILURES = 3; // Suspend after 3 consecutive failures

interface EndpointState {
  /** The HTTP URL (converted from WSS if needed) */
  httpUrl: string;
  /** Number of consecutive failures */
  failures: number;
  suspendedUntil: number;
  successCount: number;
  failCount: number;
  /** Recent call latencies (ms) */
  latencies: number[];
}

export interface RpcEndpointStats {
  url: string;
  healthy: boolean;
  successes: number;
  failures: number;
  avgLatencyMs: number;
}

function toHttpUrl(url: string): string {
  return url.replace(/^wss:\/\//, "https://").replace(/^ws:\/\//, "http://");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function average(arr: number[]): number {
  return arr.length === 0 ? 0 : arr.reduce((a, b) => a + b, 0) / arr.length;
}

export class RpcPool {
  private endpoints: EndpointState[];
  private roundRobinIndex = 0;

  constructor(rpcUrls: string[]) {
    const unique = [...new Set(rpcUrls)];
    if (unique.length === 0) {
      throw new Error("[RpcPool] At least one RPC URL is required");
    }

    this.endpoints = unique.map((url) => ({
      httpUrl: toHttpUrl(url),
      failures: 0,
      suspendedUntil: 0,
      successCount: 0,
      failCount: 0,
      latencies: [],
    }));

    console.log(`[RpcPool] Initialized with ${this.endpoints.length} endpoint(s)`);
  }

  get size(): number {
    return this.endpoints.length;
  }

  private pickEndpoint(): EndpointState {
    const now = Date.now();
    const healthy = this.endpoints.filter((ep) => ep.suspendedUntil <= now);

    if (healthy.length === 0) {
      // All suspended, so revive the one whose suspension ends first
      const earliest = this.endpoints.reduce((a, b) => (a.suspendedUntil < b.suspendedUntil ? a : b));
      earliest.suspendedUntil = 0;
      earliest.failures = 0;
      return earliest;
    }

    const warmedUp = healthy.every((ep) => ep.latencies.length >= LATENCY_WARMUP_CALLS);
    if (!warmedUp) {
      const ep = healthy[this.roundRobinIndex % healthy.length] ?? healthy[0];
      this.roundRobinIndex++;
      if (ep) return ep;
    }

    // Weighted selection: weight = 1 / avgLatency
    const weights = healthy.map((ep) => 1 / Math.max(average(ep.latencies), 0.1));
    let rand = Math.random() * weights.reduce((a, b) => a + b, 0);
    for (let i = 0; i < healthy.length; i++) {
      rand -= weights[i] ?? 0;
      const ep = healthy[i];
      if (rand <= 0 && ep) return ep;
    }
    return healthy[healthy.length - 1] ?? earliestOf(this.endpoints);
  }

  private markSuccess(ep: EndpointState, latencyMs: number): void {
    ep.failures = 0;
    ep.suspendedUntil = 0;
    ep.successCount++;
    ep.latencies.push(latencyMs);
    if (ep.latencies.length > RPC_LATENCY_WINDOW) {
      ep.latencies = ep.latencies.slice(-RPC_LATENCY_WINDOW);
    }
  }

  private markFailed(ep: EndpointState): void {
    ep.failures++;
    ep.failCount++;

    if (ep.failures >= MAX_FAILURES) {
      // Exponential backoff: 5s, 10s, 20s, ... up to 120s
      const backoff = Math.min(SUSPENSION_BASE_MS * Math.pow(2, ep.failures - MAX_FAILURES), SUSPENSION_MAX_MS);
      ep.suspendedUntil = Date.now() + backoff;
      console.warn(`[RpcPool] Suspending ${ep.httpUrl} for ${backoff / 1000}s after ${ep.failures} failures`);
    }
  }

  /**
   * Execute a JSON-RPC call, failing over to the next endpoint on error.
   * Tries each endpoint at most once; the result is returned unvalidated.
   */
  async call(method: string, params: unknown[]): Promise<unknown> {
    const maxAttempts = this.endpoints.length;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ep = this.pickEndpoint();
      const callStart = performance.now();

      try {
        const res = await fetch(ep.httpUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ jsonrpc: "2.0", id: 1, method, params }),
          signal: AbortSignal.timeout(CALL_TIMEOUT_MS),
        });

        if (!res.ok) {
          throw new Error(`HTTP ${res.status}: ${res.statusText}`);
        }

        const json: unknown = await res.json();
        if (!isRecord(json)) {
          throw new Error(`RPC ${method} returned a non-object response`);
        }
        if (isRecord(json.error)) {
          throw new Error(`RPC ${method} error: ${String(json.error.message)} (code ${String(json.error.code)})`);
        }

        this.markSuccess(ep, performance.now() - callStart);
        return json.result ?? null;
      } catch (err) {
        this.markFailed(ep);
        lastError = err instanceof Error ? err : new Error(String(err));
        console.warn(
          `[RpcPool] ${ep.httpUrl} failed for ${method}: ${lastError.message} (attempt ${attempt + 1}/${maxAttempts})`,
        );
      }
    }

    throw new Error(`[RpcPool] All ${maxAttempts} endpoints failed for ${method}: ${lastError?.message ?? "unknown error"}`);
  }

  getStats(): RpcEndpointStats[] {
    const now = Date.now();
    return this.endpoints.map((ep) => ({
      url: ep.httpUrl,
      healthy: ep.suspendedUntil <= now,
      successes: ep.successCount,
      failures: ep.failCount,
      avgLatencyMs: Math.round(average(ep.latencies)),
    }));
  }
}

function earliestOf(endpoints: EndpointState[]): EndpointState {
  const first = endpoints[0];
  if (!first) throw new Error("[RpcPool] No endpoints configured");
  return endpoints.reduce((a, b) => (a.suspendedUntil < b.suspendedUntil ? a : b), first);
}
