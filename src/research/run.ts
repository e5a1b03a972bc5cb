import type { Callbacks } from "@langchain/core/callbacks/manager";
import { awaitAllCallbacks } from "@langchain/core/callbacks/promises";
import {
  ConfigurationError,
  InvalidRequestError,
  ResearchAbortedError,
  ResearchError,
  ResearchTimeoutError,
} from "./errors";
import { createResearchGraph, recursionLimitFor } from "./master-graph";
import { DEFAULT_PIPELINE_SETTINGS, type PipelineSettings, type ResearchServices } from "./services";
import { createInitialState, type ResearchState } from "./states";
import { ResearchRequestSchema, type NewsDigest, type ResearchRequestInput } from "./types";

export const DEFAULT_RUN_TIMEOUT_MS = 10 * 60 * 1000;

export interface RunOptions {
  services: ResearchServices;
  settings?: Partial<PipelineSettings>;
  /** Wall-clock budget for the whole run. */
  timeoutMs?: number;
  /** Caller-side cancellation. */
  signal?: AbortSignal;
  callbacks?: Callbacks;
}

export interface ResearchResult {
  digest: NewsDigest;
  state: ResearchState;
}

/**
 * Run the research graph once.
 *
 * Resolves with the digest and the final state, or rejects with a
 * ResearchError: InvalidRequestError before anything runs, StageError naming
 * the failed stage, ResearchTimeoutError when the budget runs out, or
 * ResearchAbortedError when the caller cancels.
 */
export async function runResearch(request: ResearchRequestInput, options: RunOptions): Promise<ResearchResult> {
  const parsed = ResearchRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`));
  }

  const settings: PipelineSettings = { ...DEFAULT_PIPELINE_SETTINGS, ...options.settings };
  if (!Number.isInteger(settings.maxSearchIterations) || settings.maxSearchIterations < 1) {
    throw new ConfigurationError(`maxSearchIterations must be a positive integer, got ${settings.maxSearchIterations}`);
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
  const timeoutController = new AbortController();
  const timer = setTimeout(
    () => timeoutController.abort(new ResearchTimeoutError(timeoutMs)),
    timeoutMs
  );
  const signal = options.signal
    ? AbortSignal.any([timeoutController.signal, options.signal])
    : timeoutController.signal;

  const graph = createResearchGraph();

  try {
    const state = await graph.invoke(createInitialState(parsed.data), {
      configurable: { research: { services: options.services, settings } },
      signal,
      recursionLimit: recursionLimitFor(settings.maxSearchIterations),
      callbacks: options.callbacks,
    });

    if (!state.digest) {
      throw new ResearchError("incomplete_run", "Run ended without reaching finalize");
    }
    return { digest: state.digest, state };
  } catch (error) {
    if (timeoutController.signal.aborted) {
      throw new ResearchTimeoutError(timeoutMs, { cause: error });
    }
    if (options.signal?.aborted) {
      throw new ResearchAbortedError({ cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    await awaitAllCallbacks();
  }
}
