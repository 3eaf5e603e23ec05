import { vi } from "vitest";
import { Library, type LibraryOptions } from "../../ingest/library";
import { ServerConfigSchema, type AppConfig, type ServerConfig } from "../../types/config";
import type { LibraryEnvironment } from "../../types/library";
import { VOCAB } from "./mappingFixtures";

export const ENV: LibraryEnvironment = {
  vocab: VOCAB,
  apiUrl: "https://api.example.org/",
  baseUrl: "https://example.org/",
  importDirectory: "import",
};

/** In-memory server settings over the test environment. */
export function testConfig(server: Partial<ServerConfig> = {}, schema?: string): AppConfig {
  return {
    server: ServerConfigSchema.parse({ store_mode: "memory", ...server }),
    context: { vocab: ENV.vocab, apiUrl: ENV.apiUrl, baseUrl: ENV.baseUrl, schema },
    libraries: [],
    sources: {},
  };
}

/** No retries, no pauses. */
export const FAST: LibraryOptions = { transport: { retries: 0, baseDelayMs: 0 }, pageDelayMs: 0 };

export function makeLibrary(raw: Record<string, unknown>, opts: LibraryOptions = FAST): Library {
  return new Library({ name: "Test", library_type: "groups", library_id: 42, ...raw }, ENV, opts);
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

/** Replaces the global fetch with one answering from `replies` in order. */
export function stubFetch(...replies: Array<Response | Error>) {
  const queue = [...replies];
  const mock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const next = queue.shift();
    if (!next) throw new Error(`Unexpected request to ${String(input)} (${init?.method ?? "GET"})`);
    if (next instanceof Error) throw next;
    return next;
  });
  vi.stubGlobal("fetch", mock);
  return mock;
}
