import type { EtlConfig, OmdbSettings } from "../src/config";
import type { EnrichmentDetails, EnrichmentLookup, EnrichmentResult } from "../src/services/EnrichmentLookup";
import type { RawMovieRow, RawRatingRow } from "../src/services/RecordSourceService";

// keeps the EnrichmentLookup token registered for services that inject it
import "../src/services/OmdbService";

export function createTestConfig(overrides: Partial<Omit<EtlConfig, "omdb">> = {}, omdb: Partial<OmdbSettings> = {}): EtlConfig {
  return {
    databasePath: ":memory:",
    moviesCsv: "movies.csv",
    ratingsCsv: "ratings.csv",
    batchSize: 100,
    dedupeTitles: true,
    logLevel: "off",
    ...overrides,
    omdb: {
      enabled: false,
      apiKey: null,
      baseUrl: "http://omdb.test/",
      timeoutMs: 1000,
      maxRetries: 0,
      backoffMs: 0,
      concurrency: 2,
      ...omdb,
    },
  };
}

export function details(overrides: Partial<EnrichmentDetails> = {}): EnrichmentDetails {
  return {
    externalId: "tt0114709",
    director: "John Lasseter",
    plot: "A cowboy doll is threatened by a new spaceman figure.",
    boxOffice: 223225679,
    runtimeMinutes: 81,
    ...overrides,
  };
}

/** Answers by title; anything unknown is not found. Results can be swapped between runs, and `failures` make a title reject. */
export class FakeLookup implements EnrichmentLookup {
  readonly results = new Map<string, EnrichmentResult>();
  readonly failures = new Map<string, Error>();
  readonly calls: Array<{ title: string; year: number | null }> = [];

  found(title: string, value: EnrichmentDetails): this {
    this.results.set(title, { status: "found", details: value });
    return this;
  }

  async lookup(title: string, year: number | null): Promise<EnrichmentResult> {
    this.calls.push({ title, year });
    const failure = this.failures.get(title);
    if (failure) {
      throw failure;
    }
    return this.results.get(title) ?? { status: "not-found", reason: "Movie not found!" };
  }
}

export function movieRows(...rows: Array<[movieId: string, title: string, genres: string]>): RawMovieRow[] {
  return rows.map(([movieId, title, genres], index) => ({ record: index + 1, movieId, title, genres }));
}

export function ratingRows(
  ...rows: Array<[userId: string, movieId: string, rating: string, timestamp?: string]>
): RawRatingRow[] {
  return rows.map(([userId, movieId, rating, timestamp = ""], index) => ({
    record: index + 1,
    userId,
    movieId,
    rating,
    timestamp,
  }));
}
