import { abortable, delay } from "../shared/utils/abort";
import { CollaboratorError } from "../research/errors";
import type { CallOptions, EntityExtractor } from "../research/services";
import type { EntityMention } from "../research/types";
import { bodyExcerpt, defaultFetch, isRecord, readJsonObject, type FetchLike } from "./http";

export const PIONEER_API_URL = "https://api.pioneer.ai/inference";

const SERVICE = "pioneer";

export interface PioneerOptions {
  apiKey: string;
  modelId: string;
  apiUrl?: string;
  maxRetries?: number;
  /** Base of the exponential backoff: base * 2^attempt. */
  backoffMs?: number;
  requestTimeoutMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Turn `{ result: { entities: { LABEL: [text, ...] } } }` into a flat list.
 */
export function flattenEntities(body: Record<string, unknown>): EntityMention[] {
  const result = body.result;
  if (!isRecord(result) || !isRecord(result.entities)) return [];

  const mentions: EntityMention[] = [];
  for (const [label, texts] of Object.entries(result.entities)) {
    if (!Array.isArray(texts)) continue;
    for (const text of texts) {
      if (typeof text === "string") mentions.push({ label, text });
    }
  }
  return mentions;
}

/**
 * Entity extraction on Pioneer's inference API.
 *
 * 5xx responses and request timeouts are retried with exponential backoff;
 * a 4xx means the input was rejected and yields no entities. Running out of
 * attempts throws a CollaboratorError.
 */
export class PioneerEntityClient implements EntityExtractor {
  private readonly apiUrl: string;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetch: FetchLike;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly options: PioneerOptions) {
    this.apiUrl = options.apiUrl ?? PIONEER_API_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffMs = options.backoffMs ?? 3000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
    this.fetch = options.fetch ?? defaultFetch;
    this.sleep = options.sleep ?? delay;
  }

  async extract(text: string, labels: readonly string[], options: CallOptions = {}): Promise<EntityMention[]> {
    const { signal } = options;
    const body = JSON.stringify({
      model_id: this.options.modelId,
      task: "extract_entities",
      text,
      schema: [...labels],
    });
    let lastFailure = "no attempt made";

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const timeout = AbortSignal.timeout(this.requestTimeoutMs);
      const callSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

      try {
        const response = await abortable(
          this.fetch(this.apiUrl, {
            method: "POST",
            headers: { "X-API-Key": this.options.apiKey, "Content-Type": "application/json" },
            body,
            signal: callSignal,
          }),
          callSignal
        );

        if (response.status >= 500) {
          lastFailure = `HTTP ${response.status}: ${await bodyExcerpt(response)}`;
          console.log(`   ! Pioneer ${response.status} (attempt ${attempt + 1}/${this.maxRetries})`);
        } else if (response.status >= 400) {
          console.log(`   ! Pioneer rejected input (${response.status}): ${await bodyExcerpt(response)}`);
          return [];
        } else {
          return flattenEntities(await readJsonObject(SERVICE, response));
        }
      } catch (error) {
        if (signal?.aborted) throw error;
        if (!timeout.aborted) throw error;
        lastFailure = `request timed out after ${this.requestTimeoutMs}ms`;
        console.log(`   ! Pioneer timeout (attempt ${attempt + 1}/${this.maxRetries})`);
      }

      if (attempt < this.maxRetries - 1) {
        await this.sleep(this.backoffMs * 2 ** attempt, signal);
      }
    }

    throw new CollaboratorError(SERVICE, `gave up after ${this.maxRetries} attempts (${lastFailure})`, {
      retryable: true,
    });
  }
}
