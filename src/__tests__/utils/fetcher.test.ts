import { afterEach, describe, it, expect, vi } from "vitest";
import { doFetch, fetchJson, withQuery } from "../../utils/fetcher";
import { HttpError } from "../../utils/errors";
import { jsonResponse, stubFetch } from "../fixtures/libraryFixtures";

const URL_ = "https://api.example.org/items";

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("doFetch", () => {
  it("retries retryable statuses", async () => {
    const fetchMock = stubFetch(new Response("busy", { status: 503 }), new Response("slow down", { status: 429 }), jsonResponse([1]));

    const res = await doFetch(URL_, { baseDelayMs: 0 });

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("retries network failures", async () => {
    const fetchMock = stubFetch(new TypeError("fetch failed"), jsonResponse({ ok: true }));

    await expect(fetchJson(URL_, { baseDelayMs: 0 })).resolves.toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("fails at once on other statuses", async () => {
    const fetchMock = stubFetch(new Response("gone", { status: 404 }));

    const err = await doFetch(URL_, { baseDelayMs: 0 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 404, url: URL_, message: `GET failed: 404 for ${URL_}` });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last retry", async () => {
    const fetchMock = stubFetch(new Response("", { status: 500 }), new Response("", { status: 502 }));

    await expect(doFetch(URL_, { retries: 1, baseDelayMs: 0 })).rejects.toMatchObject({ status: 502 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("rethrows the network error when out of retries", async () => {
    stubFetch(new TypeError("fetch failed"));
    await expect(doFetch(URL_, { retries: 0 })).rejects.toThrow("fetch failed");
  });

  it("sends method, headers and body", async () => {
    const fetchMock = stubFetch(jsonResponse({}));

    await doFetch(URL_, { method: "POST", headers: { "Content-Type": "application/json" }, body: "{}" });

    const init = fetchMock.mock.calls[0][1];
    expect(init).toMatchObject({ method: "POST", headers: { "Content-Type": "application/json" }, body: "{}", redirect: "follow" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("keeps the timeout armed while the body is read", async () => {
    const fetchMock = stubFetch(jsonResponse({}));

    await doFetch(URL_, { timeoutMs: 20 });
    const signal = fetchMock.mock.calls[0][1]?.signal;
    expect(signal?.aborted).toBe(false);

    await new Promise((resolve) => setTimeout(resolve, 80));
    expect(signal?.aborted).toBe(true);
  });

  it("requires a target", async () => {
    await expect(doFetch("")).rejects.toThrow("doFetch requires a target URL");
  });
});

describe("withQuery", () => {
  it("appends defined parameters", () => {
    expect(withQuery(URL_, { format: "json", limit: 100, since: undefined, top: true })).toBe(`${URL_}?format=json&limit=100&top=true`);
  });
});
