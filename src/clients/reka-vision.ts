import { abortReason, abortable, delay } from "../shared/utils/abort";
import { CollaboratorError, describeError } from "../research/errors";
import type { CallOptions, VideoQuestion, VideoUnderstanding } from "../research/services";
import { bodyExcerpt, defaultFetch, readJsonObject, type FetchLike, type HttpRequestInit, type HttpResponse } from "./http";

export const REKA_VISION_BASE_URL = "https://vision-agent.api.reka.ai";

const SERVICE = "reka";

export interface RekaVisionOptions {
  apiKey: string;
  baseUrl?: string;
  /** Give up on indexing after this long. */
  indexTimeoutMs?: number;
  pollIntervalMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

type IndexingStatus = "indexed" | "failed" | "pending";

/**
 * Video question answering on Reka Vision.
 *
 * upload (with indexing) → poll until indexed → one QA chat → delete.
 * The uploaded video is deleted whether or not the analysis worked.
 */
export class RekaVisionClient implements VideoUnderstanding {
  private readonly baseUrl: string;
  private readonly indexTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly fetch: FetchLike;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: RekaVisionOptions) {
    this.baseUrl = (options.baseUrl ?? REKA_VISION_BASE_URL).replace(/\/+$/, "");
    this.indexTimeoutMs = options.indexTimeoutMs ?? 300_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    this.fetch = options.fetch ?? defaultFetch;
    this.sleep = options.sleep ?? delay;
  }

  async analyze(request: VideoQuestion, options: CallOptions = {}): Promise<string> {
    const { signal } = options;
    const videoId = await this.upload(request.url, request.name, signal);

    try {
      await this.waitForIndexing(videoId, signal);
      return await this.ask(videoId, request.question, signal);
    } finally {
      await this.remove(videoId);
    }
  }

  private async send(path: string, init: HttpRequestInit, signal?: AbortSignal): Promise<HttpResponse> {
    const response = await this.fetch(`${this.baseUrl}${path}`, { ...init, signal });
    if (!response.ok) {
      throw new CollaboratorError(SERVICE, `${init.method ?? "GET"} ${path} returned ${response.status}: ${await bodyExcerpt(response)}`, {
        status: response.status,
        retryable: response.status >= 500,
      });
    }
    return response;
  }

  private call(path: string, init: HttpRequestInit, signal?: AbortSignal): Promise<HttpResponse> {
    return abortable(this.send(path, init, signal), signal);
  }

  /**
   * Not raced against the signal: an upload that lands after an abort still
   * yields a video id, and that video is deleted before the abort is rethrown.
   */
  private async upload(url: string, name: string, signal?: AbortSignal): Promise<string> {
    const response = await this.send(
      "/v1/videos/upload",
      {
        method: "POST",
        headers: { "X-Api-Key": this.options.apiKey, "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ video_url: url, video_name: name, index: "true" }).toString(),
      },
      signal
    );
    const { video_id: videoId } = await readJsonObject(SERVICE, response);
    if (typeof videoId !== "string" || !videoId) {
      throw new CollaboratorError(SERVICE, "upload response has no video_id");
    }
    if (signal?.aborted) {
      await this.remove(videoId);
      throw abortReason(signal);
    }
    console.log(`    Uploaded: ${videoId}`);
    return videoId;
  }

  private async status(videoId: string, signal?: AbortSignal): Promise<IndexingStatus> {
    const response = await this.call(
      `/v1/videos/${encodeURIComponent(videoId)}`,
      { method: "GET", headers: { "X-Api-Key": this.options.apiKey } },
      signal
    );
    const body = await readJsonObject(SERVICE, response);
    const status = body.indexing_status;
    return status === "indexed" || status === "failed" ? status : "pending";
  }

  private async waitForIndexing(videoId: string, signal?: AbortSignal): Promise<void> {
    let elapsed = 0;
    while (elapsed < this.indexTimeoutMs) {
      const status = await this.status(videoId, signal);
      if (status === "indexed") return;
      if (status === "failed") {
        throw new CollaboratorError(SERVICE, `indexing failed for ${videoId}`);
      }
      elapsed += this.pollIntervalMs;
      await this.sleep(this.pollIntervalMs, signal);
    }
    throw new CollaboratorError(SERVICE, `indexing did not finish within ${this.indexTimeoutMs}ms`, { retryable: true });
  }

  private async ask(videoId: string, question: string, signal?: AbortSignal): Promise<string> {
    const response = await this.call(
      "/v1/qa/chat",
      {
        method: "POST",
        headers: { "X-Api-Key": this.options.apiKey, "Content-Type": "application/json" },
        body: JSON.stringify({ video_id: videoId, messages: [{ role: "user", content: question }] }),
      },
      signal
    );
    const { chat_response: answer } = await readJsonObject(SERVICE, response);
    return typeof answer === "string" ? answer : "";
  }

  private async remove(videoId: string): Promise<void> {
    try {
      await this.fetch(`${this.baseUrl}/v1/videos/${encodeURIComponent(videoId)}`, {
        method: "DELETE",
        headers: { "X-Api-Key": this.options.apiKey },
      });
    } catch (error) {
      console.log(`    ! Could not delete video ${videoId}: ${describeError(error)}`);
    }
  }
}
