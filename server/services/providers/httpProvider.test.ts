import { afterEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import { describeProviderStatus } from "./baseProvider";
import { HttpStatusError, HttpTimeoutError } from "./httpProvider";
import { WikidataProvider, entityIdFromUri } from "./wikidataProvider";
import { WikipediaProvider } from "./wikipediaProvider";

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function stubFetch(impl: (...args: FetchArgs) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createWikidata(timeoutMs = 5000) {
  return new WikidataProvider({
    endpoint: "https://query.wikidata.org/sparql",
    userAgent: "test-agent/1.0",
    timeoutMs,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("WikidataProvider", () => {
  it("sends the query as a GET parameter and flattens bindings", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({
      head: { vars: ["club", "clubLabel"] },
      results: {
        bindings: [
          {
            club: { type: "uri", value: "http://www.wikidata.org/entity/Q15789" },
            clubLabel: { type: "literal", value: "FC Bayern Munich", "xml:lang": "en" },
          },
        ],
      },
    }));

    const rows = await createWikidata().runGraphQuery("SELECT ?club WHERE {}");

    expect(rows).toEqual([{ club: "http://www.wikidata.org/entity/Q15789", clubLabel: "FC Bayern Munich" }]);
    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(`${url.origin}${url.pathname}`).toBe("https://query.wikidata.org/sparql");
    expect(url.searchParams.get("query")).toBe("SELECT ?club WHERE {}");
    expect(url.searchParams.get("format")).toBe("json");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      "User-Agent": "test-agent/1.0",
      Accept: "application/sparql-results+json",
    });
  });

  it("raises HttpStatusError and records the failure", async () => {
    stubFetch(async () => new Response("", { status: 503, statusText: "Service Unavailable" }));
    const provider = createWikidata();

    const failure = provider.runGraphQuery("SELECT * WHERE {}");

    await expect(failure).rejects.toBeInstanceOf(HttpStatusError);
    await expect(failure).rejects.toMatchObject({ status: 503 });
    const metadata = provider.getMetadata();
    expect(metadata.status).toBe("degraded");
    expect(metadata.consecutiveFailures).toBe(1);
    expect(describeProviderStatus(metadata)).toBe(
      "wikidata: degraded (1 request, 1 consecutive failure, last operation: GET /sparql, last error: HTTP 503 Service Unavailable)"
    );
  });

  it("rejects responses that are not SPARQL results", async () => {
    stubFetch(async () => jsonResponse({ unexpected: true }));

    await expect(createWikidata().runGraphQuery("SELECT * WHERE {}")).rejects.toBeInstanceOf(ZodError);
  });

  it("aborts requests that exceed the timeout", async () => {
    stubFetch((_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    }));

    await expect(createWikidata(10).runGraphQuery("SELECT * WHERE {}")).rejects.toBeInstanceOf(HttpTimeoutError);
  });

  it("resets the failure count after a success", async () => {
    const responses = [
      new Response("", { status: 500, statusText: "Internal Server Error" }),
      jsonResponse({ results: { bindings: [] } }),
    ];
    stubFetch(async () => responses.shift() ?? jsonResponse({ results: { bindings: [] } }));
    const provider = createWikidata();

    await expect(provider.runGraphQuery("SELECT * WHERE {}")).rejects.toBeInstanceOf(HttpStatusError);
    await expect(provider.runGraphQuery("SELECT * WHERE {}")).resolves.toEqual([]);

    const metadata = provider.getMetadata();
    expect(metadata.status).toBe("online");
    expect(metadata.totalRequests).toBe(2);
    expect(metadata.consecutiveFailures).toBe(0);
  });
});

describe("entityIdFromUri", () => {
  it("extracts Q-ids and rejects anything else", () => {
    expect(entityIdFromUri("http://www.wikidata.org/entity/Q64")).toBe("Q64");
    expect(entityIdFromUri("http://www.wikidata.org/entity/P286")).toBeNull();
    expect(entityIdFromUri(undefined)).toBeNull();
  });
});

describe("WikipediaProvider", () => {
  it("requests the summary for an underscored title", async () => {
    const fetchMock = stubFetch(async () => jsonResponse({
      type: "standard",
      title: "Max Mustermann",
    }));
    const provider = new WikipediaProvider({
      baseUrl: "https://en.wikipedia.org/",
      userAgent: "test-agent/1.0",
      timeoutMs: 5000,
    });

    const summary = await provider.fetchSummary("Max Mustermann");

    expect(String(fetchMock.mock.calls[0][0])).toBe("https://en.wikipedia.org/api/rest_v1/page/summary/Max_Mustermann");
    expect(summary).toEqual({ type: "standard", title: "Max Mustermann", extract: "" });
    expect(provider.getMetadata().lastOperation).toBe("GET /api/rest_v1/page/summary/Max_Mustermann");
  });

  it("surfaces a missing page as a 404", async () => {
    stubFetch(async () => new Response("", { status: 404, statusText: "Not Found" }));
    const provider = new WikipediaProvider({
      baseUrl: "https://en.wikipedia.org",
      userAgent: "test-agent/1.0",
      timeoutMs: 5000,
    });

    await expect(provider.fetchSummary("Nobody In Particular")).rejects.toMatchObject({
      name: "HttpStatusError",
      status: 404,
    });
  });
});
