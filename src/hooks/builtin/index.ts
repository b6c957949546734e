import type { HookPipeline } from "../pipeline.js";
import { type BuiltInHookOptions, resolveHookOptions } from "./options.js";
import { AntiHotlinkHook, CacheControlHook, RefererHook, UserAgentHook } from "./request.js";
import { ContentTypeHook, EncodingHook } from "./response.js";
import { M3u8Hook, Mp4Hook, PlayerUrlHook } from "./player.js";

/**
 * Register every built-in hook on a pipeline
 */
export function registerBuiltInHooks(pipeline: HookPipeline, options: BuiltInHookOptions = {}): void {
  const resolved = resolveHookOptions(options);

  pipeline.register("request", new AntiHotlinkHook(resolved));
  pipeline.register("request", new UserAgentHook(resolved));
  pipeline.register("request", new RefererHook(resolved));
  pipeline.register("request", new CacheControlHook());

  pipeline.register("response", new ContentTypeHook());
  pipeline.register("response", new EncodingHook());

  pipeline.register("player", new M3u8Hook());
  pipeline.register("player", new Mp4Hook());
  pipeline.register("player", new PlayerUrlHook(resolved));
}

export * from "./options.js";
export * from "./request.js";
export * from "./response.js";
export * from "./player.js";
