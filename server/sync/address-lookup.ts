import { z } from "zod";
import { delay, type Sleep } from "server/utils/delay";
import { errorMessage, fatal, notFound, ok, retryable, type FetchResult } from "./result";
import type { AddressResult } from "./types";

const dawaAccessAddressSchema = z.object({
  adressebetegnelse: z.string().nullish(),
  husnr: z.string().nullish(),
  vejstykke: z.object({ navn: z.string().nullish() }).nullish(),
  postnummer: z.object({ nr: z.string().nullish() }).nullish(),
  adgangspunkt: z.object({ koordinater: z.array(z.number()).nullish() }).nullish(),
});

type DawaAccessAddress = z.infer<typeof dawaAccessAddressSchema>;

export type AddressLookup = (addressPointId: string | null) => Promise<AddressResult | null>;

export interface AddressLookupOptions {
  baseUrl: string;
  attempts?: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
}

// DAWA returns coordinates as [lon, lat]
function extractLocation(data: DawaAccessAddress): AddressResult["location"] {
  const coords = data.adgangspunkt?.koordinater;
  if (!coords || coords.length !== 2) return null;
  const [lon, lat] = coords;
  return [lon, lat];
}

export function toAddressResult(data: DawaAccessAddress): AddressResult {
  return {
    address: data.adressebetegnelse ?? null,
    streetName: data.vejstykke?.navn ?? null,
    houseNumber: data.husnr ?? null,
    postalCode: data.postnummer?.nr ?? null,
    location: extractLocation(data),
  };
}

/**
 * Client for DAWA access addresses (adgangsadresser), keyed by the BBR husnummer id.
 * Best effort: misses and failures resolve to null, never throw.
 */
export function createAddressLookup(options: AddressLookupOptions): AddressLookup {
  const { baseUrl, attempts = 3, fetchImpl = fetch, sleep = delay } = options;

  async function fetchOnce(addressPointId: string): Promise<FetchResult<AddressResult>> {
    const url = `${baseUrl.replace(/\/$/, "")}/adgangsadresser/${encodeURIComponent(addressPointId)}`;
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(10_000) });
      if (response.status === 404) return notFound();
      if (response.status === 429) return retryable("rate limited", 429);
      if (!response.ok) return retryable(`HTTP ${response.status}`, response.status);

      const parsed = dawaAccessAddressSchema.safeParse(await response.json());
      if (!parsed.success) return fatal(`unexpected response shape: ${parsed.error.message}`);
      return ok(toAddressResult(parsed.data));
    } catch (error) {
      return retryable(errorMessage(error));
    }
  }

  return async function lookup(addressPointId) {
    if (!addressPointId) return null;

    let last: FetchResult<AddressResult> = retryable("not attempted");
    for (let attempt = 1; attempt <= attempts; attempt++) {
      last = await fetchOnce(addressPointId);
      switch (last.kind) {
        case "ok":
          return last.data;
        case "not-found":
          // obsolete id
          return null;
        case "fatal":
          console.warn(`[ADDRESS] Failed to fetch address data for ${addressPointId}: ${last.reason}`);
          return null;
        case "retryable":
          if (attempt < attempts) {
            await sleep(last.status === 429 ? 1000 * attempt : 500);
          }
          break;
      }
    }

    const reason = last.kind === "retryable" ? last.reason : last.kind;
    console.warn(`[ADDRESS] Failed to fetch address data for ${addressPointId} after ${attempts} attempts: ${reason}`);
    return null;
  };
}
