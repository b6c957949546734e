/**
 * Hook pipeline
 *
 * Runs the request, response and player chains. Order is priority (lower
 * first) then registration order. A hook that throws, fails or times out is
 * recorded and the chain continues with the value it was given; only
 * cancellation of the enclosing query stops the pipeline.
 */

import type { Hook, HookContext, HookResult, HookStage, HookValueMap } from "./types.js";
import { DEFAULT_HOOK_PRIORITY } from "./types.js";
import { abortReason, linkSignals, raceSignal, throwIfAborted } from "../utils/abort.js";
import { CounterMap, type OutcomeSnapshot } from "../utils/stats.js";
import type { Logger } from "../utils/logger.js";

export interface HookPipelineOptions {
  /** Per-hook timeout in milliseconds (default: 10000) */
  hookTimeoutMs?: number;
  logger?: Logger;
}

export interface HookRunOptions {
  siteKey?: string;
  signal?: AbortSignal;
}

export interface HookStats extends OutcomeSnapshot {
  executions: number;
}

interface Registered<S extends HookStage> {
  hook: Hook<S>;
  seq: number;
}

type HookChains = { [S in HookStage]: Array<Registered<S>> };

const STAGES: HookStage[] = ["request", "response", "player"];

export class HookPipeline {
  private chains: HookChains = { request: [], response: [], player: [] };
  private counters = new CounterMap();
  private seq = 0;
  private readonly hookTimeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: HookPipelineOptions = {}) {
    this.hookTimeoutMs = options.hookTimeoutMs ?? 10000;
    this.logger = options.logger;
  }

  /**
   * Register a hook; a hook with the same name on that stage is replaced
   */
  register<S extends HookStage>(stage: S, hook: Hook<S>): void {
    const chain: Array<Registered<S>> = this.chains[stage];
    const existing = chain.findIndex((entry) => entry.hook.name === hook.name);
    if (existing >= 0) {
      chain.splice(existing, 1);
      this.logger?.debug(`[hooks] Replacing ${stage} hook ${hook.name}`);
    }
    chain.push({ hook, seq: this.seq++ });
    chain.sort(
      (a, b) => (a.hook.priority ?? DEFAULT_HOOK_PRIORITY) - (b.hook.priority ?? DEFAULT_HOOK_PRIORITY) || a.seq - b.seq
    );
  }

  /**
   * Remove a hook by name
   * @returns true when a hook was removed
   */
  unregister<S extends HookStage>(stage: S, name: string): boolean {
    const chain: Array<Registered<S>> = this.chains[stage];
    const index = chain.findIndex((entry) => entry.hook.name === name);
    if (index < 0) {
      return false;
    }
    chain.splice(index, 1);
    return true;
  }

  /**
   * Hooks of a stage in execution order
   */
  list<S extends HookStage>(stage: S): Array<Hook<S>> {
    const chain: Array<Registered<S>> = this.chains[stage];
    return chain.map((entry) => entry.hook);
  }

  /**
   * Run one chain over a value and return the final value
   *
   * @throws CancelledError when the enclosing query is cancelled
   */
  async run<S extends HookStage>(stage: S, input: HookValueMap[S], options: HookRunOptions = {}): Promise<HookValueMap[S]> {
    const { signal, siteKey } = options;
    const chain: Array<Registered<S>> = [...this.chains[stage]];
    let current = input;

    for (const { hook } of chain) {
      throwIfAborted(signal, siteKey);

      if (hook.enabled === false) {
        continue;
      }

      const linked = linkSignals([signal], this.hookTimeoutMs);
      const startTime = Date.now();
      const counter = () => this.counters.get(this.statsKey(stage, hook.name));

      try {
        const context: HookContext<HookValueMap[S]> = {
          value: structuredClone(current),
          siteKey,
          signal: linked.signal,
          timestamp: startTime,
        };

        if (!hook.matches(context)) {
          continue;
        }

        const result: HookResult<HookValueMap[S]> = await raceSignal(
          Promise.resolve().then(() => hook.execute(context)),
          linked.signal,
          siteKey
        );
        const duration = Date.now() - startTime;

        switch (result.type) {
          case "success":
            current = result.value;
            counter().recordSuccess(duration);
            break;
          case "stop":
            counter().recordSuccess(duration);
            this.logger?.debug(`[hooks] ${stage} chain stopped by ${hook.name}`);
            return result.value;
          case "skip":
            counter().recordSkip();
            break;
          case "failure":
            counter().recordFailure(duration, { message: result.error });
            this.logger?.warn(`[hooks] ${stage} hook ${hook.name} failed: ${result.error}`);
            break;
          default: {
            const unreachable: never = result;
            throw new Error(`Unknown hook result ${JSON.stringify(unreachable)}`);
          }
        }
      } catch (error: unknown) {
        if (signal?.aborted) {
          throw abortReason(signal, siteKey);
        }

        const duration = Date.now() - startTime;
        const message = linked.timedOut ? "timeout" : error instanceof Error ? error.message : String(error);
        counter().recordFailure(duration, { message });
        this.logger?.warn(`[hooks] ${stage} hook ${hook.name} failed: ${message}`);
      } finally {
        linked.dispose();
      }
    }

    return current;
  }

  /**
   * Per-hook statistics keyed by "stage:name"
   */
  stats(): Record<string, HookStats> {
    const result: Record<string, HookStats> = {};
    for (const [key, counter] of this.counters.entries()) {
      const snapshot = counter.snapshot();
      result[key] = { ...snapshot, executions: snapshot.total + snapshot.skip };
    }
    return result;
  }

  clearStats(): void {
    this.counters.clear();
  }

  /**
   * Number of registered hooks per stage
   */
  counts(): Record<HookStage, number> {
    const counts: Record<HookStage, number> = { request: 0, response: 0, player: 0 };
    for (const stage of STAGES) {
      counts[stage] = this.chains[stage].length;
    }
    return counts;
  }

  private statsKey(stage: HookStage, name: string): string {
    return `${stage}:${name}`;
  }
}
