/**
 * renterd over native fetch.
 *
 * Requests go to the configured endpoints in order. An endpoint is skipped
 * only when nothing reached it; an HTTP error status is the daemon's answer
 * and is returned as-is. Replies are checked against a typebox schema, and an
 * `{ error, detail }` reply becomes an ApiError.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

/** Per attempt, in ms. */
const FETCH_TIMEOUT_MS = 30_000;

const ErrorReply = Type.Object({ error: Type.String(), detail: Type.String() });

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

const UNREACHABLE = /econnrefused|enotfound|etimedout|econnreset|fetch failed|abort/i;

/** undici reports refused connections and DNS failures as TypeError. */
function unreachable(err: unknown): boolean {
  return err instanceof TypeError || (err instanceof Error && UNREACHABLE.test(err.message));
}

/** First response from `baseUrls`; throws with every attempt once all are unreachable. */
export async function fetchWithRotation(
  baseUrls: string[],
  buildRequest: (baseUrl: string) => { url: string; init?: RequestInit },
): Promise<Response> {
  if (baseUrls.length === 0) {
    throw new Error("No endpoints configured");
  }

  const failures: string[] = [];
  for (const base of baseUrls) {
    const { url, init } = buildRequest(base);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (err) {
      if (!unreachable(err)) throw err;
      failures.push(`  ${url}: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(`All ${baseUrls.length} endpoint(s) unreachable:\n${failures.join("\n")}`);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function readReply<T extends TSchema>(
  res: Response,
  label: string,
  schema: T,
): Promise<Static<T>> {
  const text = await res.text();
  const body = parseJson(text);
  if (!res.ok) {
    if (Value.Check(ErrorReply, body)) throw new ApiError(res.status, body.error, body.detail);
    throw new ApiError(res.status, "http_error", `${label} → ${res.status}: ${text}`);
  }
  if (!Value.Check(schema, body)) {
    throw new Error(`${label}: unexpected response from renterd`);
  }
  return body;
}

/** Build `path?query`, dropping undefined values. */
export function withQuery(path: string, query: Record<string, string | undefined>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, value);
  }
  const qs = params.toString();
  return qs ? `${path}?${qs}` : path;
}

/** Catalog paths go into the URL one encoded segment at a time. */
export function catalogUrl(prefix: string, catalogPath: string): string {
  return `${prefix}/${catalogPath.split("/").map(encodeURIComponent).join("/")}`;
}

/** JSON GET with multi-endpoint rotation. */
export async function httpGetRotate<T extends TSchema>(
  baseUrls: string[],
  path: string,
  schema: T,
): Promise<Static<T>> {
  const res = await fetchWithRotation(baseUrls, (base) => ({ url: `${base}${path}` }));
  return readReply(res, `GET ${path}`, schema);
}

/** JSON POST with multi-endpoint rotation. */
export async function httpPostRotate<T extends TSchema>(
  baseUrls: string[],
  path: string,
  body: unknown,
  schema: T,
): Promise<Static<T>> {
  const res = await fetchWithRotation(baseUrls, (base) => ({
    url: `${base}${path}`,
    init: {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    },
  }));
  return readReply(res, `POST ${path}`, schema);
}
