/**
 * Request/Response Mutation Pipeline
 * Hook result shapes and the rules applied to what a hook returns
 */

import {
  OnRequestResultSchema,
  ProxyResponseSchema,
  type OnRequestResult,
  type ProxyRequest,
  type ProxyResponse,
} from "@shared/protocol.ts";
import { FailureKind, fail, succeed, type Outcome } from "@shared/rpc.ts";
import { METADATA_KEYS } from "@shared/constants.ts";

/**
 * What an on_request hook decides
 */
export type RequestDecision =
  | { request: ProxyRequest; continue: true }
  | { request: ProxyRequest; continue: false; response: ProxyResponse };

/**
 * Let the host forward `request` upstream (or to the cache)
 */
export function proceed(request: ProxyRequest): RequestDecision {
  return { request, continue: true };
}

/**
 * Answer the exchange from the plugin; the host forwards nothing
 */
export function shortCircuit(request: ProxyRequest, response: ProxyResponse): RequestDecision {
  return { request, continue: false, response };
}

/**
 * Existing keys are kept, new keys added, and on collision `patch` wins
 */
export function mergeMetadata(
  base: Record<string, string>,
  patch: Record<string, string>
): Record<string, string> {
  return { ...base, ...patch };
}

export function withMetadata<T extends { metadata: Record<string, string> }>(
  message: T,
  patch: Record<string, string>
): T {
  return { ...message, metadata: mergeMetadata(message.metadata, patch) };
}

export function withHeader<T extends { headers: Record<string, string> }>(
  message: T,
  name: string,
  value: string
): T {
  return { ...message, headers: { ...message.headers, [name]: value } };
}

/**
 * Rewrite the endpoint, recording the value the client asked for first.
 * Metadata is the only state the host carries to the paired response hook.
 */
export function rewriteEndpoint(request: ProxyRequest, endpoint: string): ProxyRequest {
  const original = request.metadata[METADATA_KEYS.ORIGINAL_ENDPOINT] ?? request.endpoint;
  return {
    ...request,
    endpoint,
    metadata: mergeMetadata(request.metadata, { [METADATA_KEYS.ORIGINAL_ENDPOINT]: original }),
  };
}

/**
 * Validate an on_request hook's decision. No decision means "continue unchanged".
 */
export function finalizeRequest(
  input: ProxyRequest,
  decision: RequestDecision | void
): Outcome<OnRequestResult> {
  if (!decision) {
    return succeed({ request: input, continue: true });
  }

  const parsed = OnRequestResultSchema.safeParse(decision);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail(
      FailureKind.HANDLER_ERROR,
      `on_request returned an invalid result: ${issue ? issue.message : "unknown"}`
    );
  }

  const result = parsed.data;
  return succeed({
    ...result,
    request: { ...result.request, metadata: mergeMetadata(input.metadata, result.request.metadata) },
  });
}

/**
 * Validate a response hook's output and merge its metadata over the input's.
 * No output means the identity transform.
 */
export function finalizeResponse(
  input: ProxyResponse,
  output: ProxyResponse | void
): Outcome<ProxyResponse> {
  if (!output) {
    return succeed(input);
  }

  const parsed = ProxyResponseSchema.safeParse(output);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return fail(
      FailureKind.HANDLER_ERROR,
      `hook returned an invalid response: ${issue ? issue.message : "unknown"}`
    );
  }

  return succeed({
    ...parsed.data,
    metadata: mergeMetadata(input.metadata, parsed.data.metadata),
  });
}
