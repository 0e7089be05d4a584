import { ReadableStream } from "node:stream/web";

import { vi } from "vitest";

export type FakeReply =
  | { kind: "json"; body: unknown; status?: number }
  | { kind: "bytes"; body: Uint8Array | string; status?: number; contentType?: string }
  | { kind: "stream"; status: number; onCancel: () => void }
  | { kind: "network-error"; message?: string }
  | { kind: "hang" };

export const json = (body: unknown, status = 200): FakeReply => ({ kind: "json", body, status });
export const bytes = (body: Uint8Array | string, status = 200): FakeReply => ({
  kind: "bytes",
  body,
  status,
});
export const networkError = (message = "fetch failed"): FakeReply => ({
  kind: "network-error",
  message,
});
export const hang = (): FakeReply => ({ kind: "hang" });

/** A streamed body that records whether the caller cancelled it. */
export function trackedBody(status: number): { reply: FakeReply; cancelled: () => boolean } {
  let cancelled = false;
  return {
    reply: {
      kind: "stream",
      status,
      onCancel: () => {
        cancelled = true;
      },
    },
    cancelled: () => cancelled,
  };
}

/**
 * Routes a URL to a canned reply. A route may be a function, awaited per call.
 * Unknown URLs fail like an unreachable host. A "hang" reply only settles when
 * the request's abort signal fires.
 */
export function fakeHttp(
  routes: Record<string, FakeReply | (() => FakeReply | Promise<FakeReply>)>
) {
  return vi.fn(async (url: string, init?: RequestInit): Promise<Response> => {
    const route = routes[url];
    const reply = typeof route === "function" ? await route() : route;

    if (reply === undefined) {
      throw new TypeError("fetch failed");
    }

    switch (reply.kind) {
      case "json":
        return new Response(JSON.stringify(reply.body), {
          status: reply.status ?? 200,
          headers: { "Content-Type": "application/json" },
        });
      case "bytes":
        return new Response(reply.body, {
          status: reply.status ?? 200,
          headers: { "Content-Type": reply.contentType ?? "application/octet-stream" },
        });
      case "stream":
        return new Response(new ReadableStream<Uint8Array>({ cancel: reply.onCancel }), {
          status: reply.status,
        });
      case "network-error":
        throw new TypeError(reply.message ?? "fetch failed");
      case "hang":
        return new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal === undefined || signal === null) return;
          signal.addEventListener("abort", () => {
            reject(signal.reason);
          });
        });
    }
  });
}
