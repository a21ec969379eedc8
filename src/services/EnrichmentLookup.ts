export interface EnrichmentDetails {
  externalId: string | null;
  director: string | null;
  plot: string | null;
  boxOffice: number | null;
  runtimeMinutes: number | null;
}

export type EnrichmentResult =
  | { status: "found"; details: EnrichmentDetails }
  | { status: "not-found"; reason: string }
  | { status: "error"; reason: string };

/**
 * Looks up extra movie details by title and year. Implementations resolve
 * every failure to a result; they never reject.
 */
export interface EnrichmentLookup {
  lookup(title: string, year: number | null): Promise<EnrichmentResult>;
}

export const LOOKUP_DISABLED = "lookup disabled";

export const EnrichmentLookup: unique symbol = Symbol.for("EnrichmentLookup");
