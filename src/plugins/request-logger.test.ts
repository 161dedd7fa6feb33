import { describe, test, expect } from "vitest";
import { createRequestLogger } from "./request-logger.ts";
import type { ProxyRequest, ProxyResponse } from "@shared/protocol.ts";
import { call, createRuntime, errorOf, resultOf } from "../testing/harness.ts";

const fixedNow = () => new Date("2024-03-05T12:00:00Z");

const request: ProxyRequest = {
  method: "POST",
  endpoint: "/v1/models",
  headers: { Accept: "application/json" },
  body: "",
  metadata: {},
};

const response: ProxyResponse = {
  status_code: 200,
  headers: {},
  body: "ok",
  metadata: { provider: "openai" },
};

async function initialized(config: Record<string, unknown> = {}) {
  const runtime = createRuntime(createRequestLogger({ now: fixedNow }));
  resultOf(await call(runtime, "init", [config]));
  return runtime;
}

describe("request_logger", () => {
  test("tags requests with its header and logs them", async () => {
    const runtime = await initialized();
    const reply = await call(runtime, "on_request", [JSON.stringify(request)]);

    expect(resultOf(reply)).toEqual({
      request: { ...request, headers: { Accept: "application/json", "X-Plugin-Logger": "enabled" } },
      continue: true,
    });
    expect(runtime.lines).toEqual([
      "Initialized (tag header: X-Plugin-Logger)",
      "POST Request to /v1/models at 2024-03-05T12:00:00.000Z",
    ]);
  });

  test("uses the configured header", async () => {
    const runtime = await initialized({ header_name: "X-Trace", header_value: "on" });
    const reply = await call(runtime, "on_request", [JSON.stringify(request)]);
    expect(resultOf(reply)).toMatchObject({ request: { headers: { "X-Trace": "on" } } });
  });

  test("rejects an empty header name", async () => {
    const runtime = createRuntime(createRequestLogger());
    expect(errorOf(await call(runtime, "init", [{ header_name: "" }])).message).toBe(
      "Invalid config (header_name): String must contain at least 1 character(s)"
    );
  });

  test("stamps responses and logs their size", async () => {
    const runtime = await initialized();
    const reply = await call(runtime, "on_response", [JSON.stringify(request), JSON.stringify(response)]);

    expect(resultOf(reply)).toEqual({
      ...response,
      metadata: { provider: "openai", logged_at: "2024-03-05T12:00:00.000Z" },
    });
    expect(runtime.lines).toContain("Response from /v1/models: status=200, size=2 bytes");
  });

  test("logs cache hits without changing them", async () => {
    const runtime = await initialized();
    const reply = await call(runtime, "on_cache_hit", [JSON.stringify(request), JSON.stringify(response)]);

    expect(resultOf(reply)).toEqual(response);
    expect(runtime.lines).toContain("Cache HIT for POST /v1/models");
  });

  test("logs shutdown", async () => {
    const runtime = await initialized();
    resultOf(await call(runtime, "shutdown"));
    expect(runtime.lines.at(-1)).toBe("Shutting down");
  });
});
