/**
 * Proxyhook public API
 */

export * from "@shared/rpc.ts";
export * from "@shared/protocol.ts";
export * from "@shared/body.ts";
export { Logger, initLogger, getLogger, type LoggerOptions } from "@shared/logger.ts";

export { decodeLine, encodeRequest, encodeResponse, extractId, type DecodeResult } from "@plugin/codec.ts";
export { dispatch, toResponse, METHOD_PARAMS, arityOf } from "@plugin/dispatcher.ts";
export { PluginSession, type SessionState } from "@plugin/session.ts";
export * from "@plugin/pipeline.ts";
export * from "@plugin/define.ts";
export { StreamTransport, MemoryTransport, type Transport } from "@plugin/transport.ts";
export { PluginRuntime, servePlugin } from "@plugin/runtime.ts";

export { PluginConnection, PluginCallError, type PluginCaller } from "@host/connection.ts";
export { PluginClient } from "@host/client.ts";
export { spawnPlugin, type PluginHandle } from "@host/process.ts";
export { PluginManager, type PluginLauncher } from "@host/manager.ts";
export { loadHostConfig, parseHostConfig, HostConfigError, type HostConfig, type PluginEntry } from "@host/config.ts";
