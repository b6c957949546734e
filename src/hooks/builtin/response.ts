import type { HookContext, HookResponse, HookResult, ResponseHook } from "../types.js";
import { HookResults } from "../types.js";
import { getHeader, setHeader } from "../../utils/headers.js";

const META_CHARSET = /<meta[^>]+charset=["']?([\w-]+)/i;
const HEADER_CHARSET = /charset=["']?([\w-]+)/i;

/**
 * Infer a content type from the body when the server sent none
 */
export function inferContentType(body: string): string {
  const trimmed = body.trimStart();
  if (trimmed.startsWith("#EXTM3U")) return "application/vnd.apple.mpegurl";
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return "application/json";
  if (trimmed.startsWith("<")) return "text/html";
  return "text/plain";
}

export function isTextualContentType(contentType: string): boolean {
  const lower = contentType.toLowerCase();
  return (
    lower.startsWith("text/") ||
    lower.includes("json") ||
    lower.includes("xml") ||
    lower.includes("javascript") ||
    lower.includes("mpegurl")
  );
}

export class ContentTypeHook implements ResponseHook {
  readonly name = "ContentType";
  readonly description = "Infer a missing Content-Type";
  readonly priority = 10;

  matches(context: HookContext<HookResponse>): boolean {
    return getHeader(context.value.headers, "Content-Type") === undefined;
  }

  execute(context: HookContext<HookResponse>): HookResult<HookResponse> {
    const response = context.value;
    setHeader(response.headers, "Content-Type", inferContentType(response.body));
    return HookResults.success(response);
  }
}

/**
 * Re-decodes bodies in a non-UTF-8 charset and makes the charset explicit
 */
export class EncodingHook implements ResponseHook {
  readonly name = "Encoding";
  readonly description = "Decode non-UTF-8 bodies and declare the charset";
  readonly priority = 20;

  matches(context: HookContext<HookResponse>): boolean {
    const contentType = getHeader(context.value.headers, "Content-Type") ?? "";
    return contentType === "" || isTextualContentType(contentType);
  }

  execute(context: HookContext<HookResponse>): HookResult<HookResponse> {
    const response = context.value;
    const contentType = getHeader(response.headers, "Content-Type") ?? "";
    const declared = HEADER_CHARSET.exec(contentType)?.[1] ?? META_CHARSET.exec(response.body.slice(0, 2048))?.[1];
    const charset = normalizeCharset(declared);

    if (charset !== "utf-8" && response.bytes.byteLength > 0) {
      try {
        response.body = new TextDecoder(charset).decode(response.bytes);
      } catch (error: unknown) {
        return HookResults.failure(`cannot decode ${charset}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    if (contentType !== "" && !HEADER_CHARSET.test(contentType)) {
      setHeader(response.headers, "Content-Type", `${contentType}; charset=${charset}`);
    }
    return HookResults.success(response);
  }
}

function normalizeCharset(charset: string | undefined): string {
  const lower = (charset ?? "utf-8").toLowerCase();
  return lower === "utf8" ? "utf-8" : lower;
}
