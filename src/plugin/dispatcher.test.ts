/**
 * Method Dispatcher Tests
 * Lifecycle gating, parameter validation and hook results, driven through
 * the runtime one line at a time.
 */

import { describe, test, expect } from "vitest";
import { z } from "zod";
import { configSchema, definePlugin } from "./define.ts";
import { proceed, shortCircuit, withHeader, withMetadata } from "./pipeline.ts";
import { arityOf } from "./dispatcher.ts";
import type { ProxyRequest, ProxyResponse } from "@shared/protocol.ts";
import { call, createRuntime, errorOf, resultOf } from "../testing/harness.ts";

const SampleConfigSchema = configSchema({
  api_key: z.string().default(""),
  retries: z.number().int().default(1),
});

function samplePlugin(events: string[] = []) {
  return definePlugin({
    name: "sample",
    version: "2.1.0",
    configSchema: SampleConfigSchema,

    onInit({ config }) {
      if (config.api_key === "rejected") {
        throw new Error("api key rejected");
      }
      events.push(`init:${config.api_key}`);
    },

    onRequest(request, { config }) {
      if (request.endpoint === "/boom") {
        throw new Error("upstream exploded");
      }
      if (request.endpoint === "/bad") {
        return shortCircuit(request, { status_code: 200.5, headers: {}, body: "", metadata: {} });
      }
      return proceed(withHeader(request, "X-Sample", config.api_key));
    },

    onResponse(_request, response, { config }) {
      return withMetadata(response, { seen: config.api_key });
    },

    onShutdown() {
      events.push("shutdown");
    },
  });
}

const request: ProxyRequest = {
  method: "GET",
  endpoint: "/v1/models",
  headers: {},
  body: "",
  metadata: { trace: "t1" },
};

const response: ProxyResponse = {
  status_code: 200,
  headers: { "Content-Type": "text/plain" },
  body: "ok",
  metadata: { trace: "t1" },
};

describe("get_info", () => {
  test("answers in every state with the same identity", async () => {
    const runtime = createRuntime(samplePlugin());
    const expected = { jsonrpc: "2.0", result: { name: "sample", version: "2.1.0" }, id: 1 };

    expect(await call(runtime, "get_info")).toEqual(expected);
    expect(runtime.session.getState()).toBe("uninitialized");

    await call(runtime, "init", [{}], 2);
    expect(await call(runtime, "get_info")).toEqual(expected);

    await call(runtime, "shutdown", [], 3);
    expect(await call(runtime, "get_info")).toEqual(expected);
  });

  test("ignores extra params", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(resultOf(await call(runtime, "get_info", [1, 2]))).toEqual({ name: "sample", version: "2.1.0" });
  });
});

describe("unknown methods", () => {
  test("are reported as MethodNotFound with the plugin error code", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(await call(runtime, "on_teardown", [], 9)).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not found: on_teardown", data: { kind: "MethodNotFound" } },
      id: 9,
    });
  });
});

describe("init", () => {
  test("requires its config param", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(errorOf(await call(runtime, "init", []))).toEqual({
      code: -32000,
      message: "Invalid params for init: expected 1, got 0",
      data: { kind: "InvalidParams" },
    });
    expect(runtime.session.getState()).toBe("uninitialized");
  });

  test("treats a null config as empty", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(resultOf(await call(runtime, "init", [null]))).toEqual({ status: "ok" });
    expect(runtime.session.getConfig()).toEqual({ api_key: "", retries: 1, extra: {} });
  });

  test("rejects a config that is not an object", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(errorOf(await call(runtime, "init", [5])).message).toBe(
      "Invalid params for init at params.0: Expected object, received number"
    );
  });

  test("rejects a config the plugin cannot use", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(errorOf(await call(runtime, "init", [{ retries: "three" }]))).toEqual({
      code: -32000,
      message: "Invalid config (retries): Expected number, received string",
      data: { kind: "InvalidParams" },
    });
    expect(runtime.session.getState()).toBe("uninitialized");
  });

  test("a second init replaces the first configuration", async () => {
    const events: string[] = [];
    const runtime = createRuntime(samplePlugin(events));

    await call(runtime, "init", [{ api_key: "k1" }], 1);
    await call(runtime, "init", [{ api_key: "k2", region: "eu" }], 2);

    expect(runtime.session.getConfig()).toEqual({ api_key: "k2", retries: 1, extra: { region: "eu" } });
    expect(events).toEqual(["init:k1", "init:k2"]);

    const result = resultOf(await call(runtime, "on_request", [JSON.stringify(request)], 3));
    expect(result).toEqual({
      request: { ...request, headers: { "X-Sample": "k2" } },
      continue: true,
    });
  });

  test("a failed onInit leaves the session uninitialized", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(errorOf(await call(runtime, "init", [{ api_key: "rejected" }]))).toEqual({
      code: -32000,
      message: "api key rejected",
      data: { kind: "HandlerError" },
    });
    expect(runtime.session.getState()).toBe("uninitialized");
    expect(runtime.session.getConfig()).toBeNull();
  });

  test("a failed re-init keeps the configuration in force", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{ api_key: "k1" }], 1);

    expect(errorOf(await call(runtime, "init", [{ api_key: "rejected" }], 2)).data).toEqual({
      kind: "HandlerError",
    });
    expect(runtime.session.getState()).toBe("ready");
    expect(runtime.session.getConfig()).toEqual({ api_key: "k1", retries: 1, extra: {} });
  });
});

describe("hooks before init", () => {
  test.each(["on_request", "on_response", "on_cache_hit"])("%s is a StateError", async (method) => {
    const runtime = createRuntime(samplePlugin());
    const params = method === "on_request" ? [JSON.stringify(request)] : [JSON.stringify(request), JSON.stringify(response)];
    expect(errorOf(await call(runtime, method, params))).toEqual({
      code: -32000,
      message: "not initialized",
      data: { kind: "StateError" },
    });
  });

  test("state is checked before params", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(errorOf(await call(runtime, "on_request", [])).data).toEqual({ kind: "StateError" });
  });
});

describe("on_request", () => {
  test("runs the hook on a request sent as JSON text", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{ api_key: "test-secret" }]);

    expect(resultOf(await call(runtime, "on_request", [JSON.stringify(request)]))).toEqual({
      request: {
        method: "GET",
        endpoint: "/v1/models",
        headers: { "X-Sample": "test-secret" },
        body: "",
        metadata: { trace: "t1" },
      },
      continue: true,
    });
  });

  test("accepts the request as a structured object too", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    const result = resultOf(await call(runtime, "on_request", [request]));
    expect(result).toEqual({ request: { ...request, headers: { "X-Sample": "" } }, continue: true });
  });

  test("reports a missing param", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    expect(errorOf(await call(runtime, "on_request", []))).toEqual({
      code: -32000,
      message: "Invalid params for on_request: expected 1, got 0",
      data: { kind: "InvalidParams" },
    });
  });

  test("reports a param that is not JSON text", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    expect(errorOf(await call(runtime, "on_request", ["{not json"])).message).toBe(
      "Invalid params for on_request at params.0: expected JSON text"
    );
  });

  test("reports a request without an endpoint", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    const params = [JSON.stringify({ method: "GET", headers: {}, body: "", metadata: {} })];
    expect(errorOf(await call(runtime, "on_request", params)).message).toBe(
      "Invalid params for on_request at params.0.endpoint: Required"
    );
  });

  test("turns a thrown hook error into a HandlerError reply", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    const params = [JSON.stringify({ ...request, endpoint: "/boom" })];
    expect(errorOf(await call(runtime, "on_request", params, 4))).toEqual({
      code: -32000,
      message: "upstream exploded",
      data: { kind: "HandlerError" },
    });
    expect(runtime.session.getState()).toBe("ready");
  });

  test("rejects an invalid hook result", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    const params = [JSON.stringify({ ...request, endpoint: "/bad" })];
    expect(errorOf(await call(runtime, "on_request", params))).toEqual({
      code: -32000,
      message: "on_request returned an invalid result: Expected integer, received float",
      data: { kind: "HandlerError" },
    });
  });
});

describe("response hooks", () => {
  test("on_response merges the hook's metadata over the input's", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{ api_key: "k" }]);
    const reply = await call(runtime, "on_response", [JSON.stringify(request), JSON.stringify(response)]);
    expect(resultOf(reply)).toEqual({ ...response, metadata: { trace: "t1", seen: "k" } });
  });

  test("on_cache_hit without a hook returns the response unchanged", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    const reply = await call(runtime, "on_cache_hit", [JSON.stringify(request), JSON.stringify(response)]);
    expect(resultOf(reply)).toEqual(response);
  });

  test("on_response needs both params", async () => {
    const runtime = createRuntime(samplePlugin());
    await call(runtime, "init", [{}]);
    expect(errorOf(await call(runtime, "on_response", [JSON.stringify(request)])).message).toBe(
      "Invalid params for on_response: expected 2, got 1"
    );
  });
});

describe("shutdown", () => {
  test("is terminal", async () => {
    const events: string[] = [];
    const runtime = createRuntime(samplePlugin(events));
    await call(runtime, "init", [{}]);

    expect(resultOf(await call(runtime, "shutdown"))).toEqual({ status: "ok" });
    expect(events).toEqual(["init:", "shutdown"]);

    const stateError = { code: -32000, message: "already shut down", data: { kind: "StateError" } };
    expect(errorOf(await call(runtime, "on_request", [JSON.stringify(request)]))).toEqual(stateError);
    expect(errorOf(await call(runtime, "init", [{}]))).toEqual(stateError);
    expect(errorOf(await call(runtime, "shutdown"))).toEqual(stateError);
    expect(events).toEqual(["init:", "shutdown"]);
  });

  test("is allowed before init", async () => {
    const runtime = createRuntime(samplePlugin());
    expect(resultOf(await call(runtime, "shutdown"))).toEqual({ status: "ok" });
    expect(runtime.session.getState()).toBe("terminated");
  });
});

describe("arityOf", () => {
  test("matches the hook signatures", () => {
    expect(arityOf("get_info")).toBe(0);
    expect(arityOf("init")).toBe(1);
    expect(arityOf("on_request")).toBe(1);
    expect(arityOf("on_response")).toBe(2);
    expect(arityOf("on_cache_hit")).toBe(2);
    expect(arityOf("shutdown")).toBe(0);
  });
});
