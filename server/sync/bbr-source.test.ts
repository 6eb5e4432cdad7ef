import { describe, it, expect } from "vitest";
import { createBbrSource, toDafDateTime } from "./bbr-source";

const NOW = new Date("2026-03-01T03:00:00.123Z");

function respondWith(response: Response | Error) {
  const requests: { url: string; body: unknown }[] = [];
  const impl: typeof fetch = async (input, init) => {
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;
    requests.push({ url: String(input), body });
    if (response instanceof Error) throw response;
    return response;
  };
  return { impl, requests };
}

const json = (body: unknown, status = 200) => new Response(JSON.stringify(body), { status });

function source(response: Response | Error) {
  const fake = respondWith(response);
  const fetchPage = createBbrSource({ url: "https://bbr.test/graphql", apiKey: "test-api-key", fetchImpl: fake.impl });
  return { fetchPage, requests: fake.requests };
}

describe("toDafDateTime", () => {
  it("drops milliseconds and keeps the Z suffix", () => {
    expect(toDafDateTime(NOW)).toBe("2026-03-01T03:00:00Z");
  });
});

describe("createBbrSource", () => {
  it("posts the query with paging variables and the api key", async () => {
    const { fetchPage, requests } = source(json({ data: { BBR_Bygning: { nodes: [], pageInfo: { hasNextPage: false } } } }));

    await fetchPage({ first: 500, after: "c1", now: NOW });

    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://bbr.test/graphql?apikey=test-api-key");
    expect(requests[0]?.body).toMatchObject({ variables: { now: "2026-03-01T03:00:00Z", after: "c1", first: 500 } });
  });

  it("maps building nodes to upstream records", async () => {
    const { fetchPage } = source(
      json({
        data: {
          BBR_Bygning: {
            nodes: [
              {
                id_lokalId: "b-1",
                byg069Sikringsrumpladser: "40",
                byg021BygningensAnvendelse: 120,
                kommunekode: "0751",
                husnummer: "h-1",
              },
              { id_lokalId: "b-2", byg069Sikringsrumpladser: null, kommunekode: null },
            ],
            pageInfo: { hasNextPage: true, endCursor: "c2" },
          },
        },
      })
    );

    const result = await fetchPage({ first: 2, after: null, now: NOW });

    expect(result).toEqual({
      kind: "ok",
      data: {
        records: [
          { externalId: "b-1", capacity: "40", usageCode: "120", municipalityCode: "0751", addressPointId: "h-1" },
          { externalId: "b-2", capacity: null, usageCode: null, municipalityCode: null, addressPointId: null },
        ],
        hasNextPage: true,
        endCursor: "c2",
      },
    });
  });

  it("treats a reply without a result block as fatal", async () => {
    expect(await source(json({ data: null })).fetchPage({ first: 10, after: "c1", now: NOW })).toEqual({
      kind: "fatal",
      reason: "response has no BBR_Bygning block",
    });
    expect(await source(json({ data: {} })).fetchPage({ first: 10, after: "c1", now: NOW })).toEqual({
      kind: "fatal",
      reason: "response has no BBR_Bygning block",
    });
  });

  it("reads an empty node list with no further pages as the last page", async () => {
    const { fetchPage } = source(json({ data: { BBR_Bygning: { nodes: [], pageInfo: { hasNextPage: false } } } }));
    expect(await fetchPage({ first: 10, after: "c1", now: NOW })).toEqual({
      kind: "ok",
      data: { records: [], hasNextPage: false, endCursor: null },
    });
  });

  it("marks throttling and gateway failures as retryable", async () => {
    expect(await source(json({}, 429)).fetchPage({ first: 10, after: null, now: NOW })).toEqual({
      kind: "retryable",
      reason: "transient status 429",
      status: 429,
    });
    const result = await source(json({}, 503)).fetchPage({ first: 10, after: null, now: NOW });
    expect(result.kind).toBe("retryable");
  });

  it("marks network errors as retryable", async () => {
    const result = await source(new Error("ECONNRESET")).fetchPage({ first: 10, after: null, now: NOW });
    expect(result).toEqual({ kind: "retryable", reason: "request failed: ECONNRESET" });
  });

  it("treats client errors as fatal", async () => {
    const result = await source(new Response("bad query", { status: 400 })).fetchPage({ first: 10, after: null, now: NOW });
    expect(result).toEqual({ kind: "fatal", reason: "status 400: bad query", status: 400 });
  });

  it("treats GraphQL errors as fatal", async () => {
    const result = await source(json({ data: null, errors: [{ message: "boom" }] })).fetchPage({
      first: 10,
      after: null,
      now: NOW,
    });
    expect(result).toEqual({ kind: "fatal", reason: 'GraphQL errors: [{"message":"boom"}]' });
  });

  it("treats an unparseable body as fatal", async () => {
    const result = await source(new Response("<html>", { status: 200 })).fetchPage({ first: 10, after: null, now: NOW });
    expect(result.kind).toBe("fatal");
  });
});
