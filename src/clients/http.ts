import fetch from "node-fetch";
import { CollaboratorError } from "../research/errors";

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

/**
 * The slice of fetch the HTTP clients need. node-fetch by default; tests pass
 * their own.
 */
export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJsonObject(service: string, response: HttpResponse): Promise<Record<string, unknown>> {
  const body: unknown = await response.json();
  if (!isRecord(body)) {
    throw new CollaboratorError(service, "expected a JSON object in the response body", { status: response.status });
  }
  return body;
}

export async function bodyExcerpt(response: HttpResponse, length = 300): Promise<string> {
  try {
    return (await response.text()).slice(0, length);
  } catch (error) {
    return `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
}
