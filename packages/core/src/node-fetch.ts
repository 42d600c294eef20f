import type { FetchPort } from "./ports.js";

/**
 * FetchPort implementation for Node.js.
 * Uses the global fetch() available in Node 18+.
 */
export class NodeFetch implements FetchPort {
  private timeout: number;

  constructor(timeout = 5000) {
    this.timeout = timeout;
  }

  async post(
    url: string,
    body: string,
    headers: Record<string, string>,
    signal?: AbortSignal
  ): Promise<{ status: number; body: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);
    // Forward the caller's cancellation into our own controller
    const forward = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener("abort", forward, { once: true });

    try {
      const response = await fetch(url, {
        method: "POST",
        headers,
        body,
        signal: controller.signal,
      });

      const text = await response.text();
      return { status: response.status, body: text };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    }
  }
}
