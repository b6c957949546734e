/**
 * Hook types
 *
 * Hooks are ordered interceptors applied to outbound requests, inbound
 * responses and resolved play URLs. Each hook sees a deep copy of the value
 * and answers with a tagged HookResult.
 */

import type { HttpMethod } from "../transport/types.js";

export type HookStage = "request" | "response" | "player";

export interface HookRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body: string;
  /** Query parameters appended to `url` before sending */
  params: Record<string, string>;
  metadata: Record<string, unknown>;
}

export interface HookResponse {
  url: string;
  statusCode: number;
  headers: Record<string, string>;
  /** Decoded body */
  body: string;
  /** Undecoded body, kept for re-decoding */
  bytes: Uint8Array;
  metadata: Record<string, unknown>;
}

export interface HookPlayerUrl {
  originalUrl: string;
  processedUrl: string;
  headers: Record<string, string>;
  needsParse: boolean;
  flag: string;
  metadata: Record<string, unknown>;
}

/**
 * Value type threaded through each stage
 */
export interface HookValueMap {
  request: HookRequest;
  response: HookResponse;
  player: HookPlayerUrl;
}

export interface HookContext<T> {
  /** Private copy of the current value */
  value: T;
  siteKey?: string;
  /** Fires on hook timeout or cancellation of the enclosing query */
  signal: AbortSignal;
  timestamp: number;
}

export type HookResult<T> =
  | { type: "success"; value: T }
  | { type: "skip"; reason: string }
  | { type: "failure"; error: string }
  | { type: "stop"; value: T };

export const HookResults = {
  success: <T>(value: T): HookResult<T> => ({ type: "success", value }),
  skip: <T>(reason: string): HookResult<T> => ({ type: "skip", reason }),
  failure: <T>(error: string): HookResult<T> => ({ type: "failure", error }),
  stop: <T>(value: T): HookResult<T> => ({ type: "stop", value }),
};

export interface Hook<S extends HookStage> {
  readonly name: string;
  readonly description: string;
  /** Lower runs first (default: 100) */
  readonly priority?: number;
  /** Disabled hooks are skipped (default: true) */
  readonly enabled?: boolean;

  matches(context: HookContext<HookValueMap[S]>): boolean;

  execute(context: HookContext<HookValueMap[S]>): Promise<HookResult<HookValueMap[S]>> | HookResult<HookValueMap[S]>;
}

export type RequestHook = Hook<"request">;
export type ResponseHook = Hook<"response">;
export type PlayerHook = Hook<"player">;

export const DEFAULT_HOOK_PRIORITY = 100;
