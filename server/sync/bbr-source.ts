import { z } from "zod";
import { errorMessage, fatal, isRetryableStatus, ok, retryable, type FetchResult } from "./result";
import type { PageRequest, UpstreamPage, UpstreamRecord } from "./types";

// Status 6 = buildings registered with civil defense shelter places
const SHELTERS_QUERY = `
query GetShelters($now: DafDateTime, $after: String, $first: Int) {
  BBR_Bygning(
    first: $first,
    after: $after,
    registreringstid: $now,
    virkningstid: $now,
    where: { status: { eq: "6" } }
  ) {
    nodes {
      id_lokalId
      byg069Sikringsrumpladser
      byg021BygningensAnvendelse
      kommunekode
      husnummer
    }
    pageInfo {
      hasNextPage
      endCursor
    }
  }
}
`;

const code = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const bygningSchema = z.object({
  id_lokalId: z.string().min(1),
  byg069Sikringsrumpladser: z.unknown(),
  byg021BygningensAnvendelse: code,
  kommunekode: code,
  husnummer: z.string().nullish(),
});

const responseSchema = z.object({
  data: z
    .object({
      BBR_Bygning: z
        .object({
          nodes: z.array(bygningSchema).default([]),
          pageInfo: z
            .object({
              hasNextPage: z.boolean().default(false),
              endCursor: z.string().nullish(),
            })
            .default({ hasNextPage: false }),
        })
        .nullish(),
    })
    .nullish(),
  errors: z.array(z.unknown()).optional(),
});

export type PageSource = (request: PageRequest) => Promise<FetchResult<UpstreamPage>>;

export interface BbrSourceOptions {
  url: string;
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

/** Datafordeler expects second precision with a Z suffix. */
export function toDafDateTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Single page request against the BBR GraphQL endpoint. Retries are the scan driver's job. */
export function createBbrSource(options: BbrSourceOptions): PageSource {
  const { url, apiKey, timeoutMs = 45_000, fetchImpl = fetch } = options;

  return async function fetchPage({ first, after, now }) {
    const endpoint = new URL(url);
    endpoint.searchParams.set("apikey", apiKey);

    let response: Response;
    try {
      response = await fetchImpl(endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          query: SHELTERS_QUERY,
          variables: { now: toDafDateTime(now), after, first },
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      return retryable(`request failed: ${errorMessage(error)}`);
    }

    if (isRetryableStatus(response.status)) {
      return retryable(`transient status ${response.status}`, response.status);
    }
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      return fatal(`status ${response.status}: ${body.substring(0, 200)}`, response.status);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      return fatal(`malformed JSON: ${errorMessage(error)}`);
    }

    const parsed = responseSchema.safeParse(json);
    if (!parsed.success) {
      return fatal(`unexpected response shape: ${parsed.error.message}`);
    }
    if (parsed.data.errors && parsed.data.errors.length > 0) {
      return fatal(`GraphQL errors: ${JSON.stringify(parsed.data.errors).substring(0, 500)}`);
    }

    const block = parsed.data.data?.BBR_Bygning;
    if (!block) {
      return fatal("response has no BBR_Bygning block");
    }

    const records: UpstreamRecord[] = block.nodes.map((node) => ({
      externalId: node.id_lokalId,
      capacity: node.byg069Sikringsrumpladser,
      usageCode: node.byg021BygningensAnvendelse,
      municipalityCode: node.kommunekode,
      addressPointId: node.husnummer ?? null,
    }));

    return ok({
      records,
      hasNextPage: block.pageInfo.hasNextPage,
      endCursor: block.pageInfo.endCursor ?? null,
    });
  };
}
