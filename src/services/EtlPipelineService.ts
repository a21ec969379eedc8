import { Constant, Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import pLimit from "p-limit";
import type { EtlConfig } from "../config";
import {
  EnrichmentUnavailableError,
  EtlError,
  EtlErrorCode,
  OrphanRatingError,
  RecordParseError,
  errorMessage,
} from "../errors";
import { DatabaseService } from "./DatabaseService";
import { EnrichmentDetails, EnrichmentLookup, EnrichmentResult, LOOKUP_DISABLED } from "./EnrichmentLookup";
import { LoaderService } from "./LoaderService";
import { RawMovieRow, RawRatingRow, RecordSourceService } from "./RecordSourceService";
import { MovieRecord, RatingRecord, TransformService } from "./TransformService";

export interface RunInput {
  movies: RawMovieRow[];
  ratings: RawRatingRow[];
}

export interface RunWarning {
  code: EtlErrorCode;
  record?: number;
  message: string;
}

export interface RunSummary {
  movies: {
    read: number;
    loaded: number;
    skipped: number;
    duplicates: number;
    enriched: number;
    unenriched: number;
  };
  genreLinks: number;
  ratings: {
    read: number;
    loaded: number;
    skipped: number;
  };
  users: number;
  warnings: RunWarning[];
}

interface RunState {
  summary: RunSummary;
  // duplicate movie id -> id of the first row with the same title and year
  canonicalIds: Map<number, number>;
  seenTitles: Map<string, number>;
  knownMovies: Set<number>;
  users: Set<number>;
}

function emptySummary(): RunSummary {
  return {
    movies: { read: 0, loaded: 0, skipped: 0, duplicates: 0, enriched: 0, unenriched: 0 },
    genreLinks: 0,
    ratings: { read: 0, loaded: 0, skipped: 0 },
    users: 0,
    warnings: [],
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

@Injectable()
export class EtlPipelineService {
    @Constant("etl")
    private readonly config!: EtlConfig;

    @Inject()
    private databaseService!: DatabaseService;
    @Inject()
    private loaderService!: LoaderService;
    @Inject()
    private transformService!: TransformService;
    @Inject()
    private recordSourceService!: RecordSourceService;
    @Inject(EnrichmentLookup)
    private enrichmentLookup!: EnrichmentLookup;

    async runFromFiles(): Promise<RunSummary> {
        const movies = this.recordSourceService.readMovies(this.config.moviesCsv);
        const ratings = this.recordSourceService.readRatings(this.config.ratingsCsv);
        $log.info({ event: "source-loaded", movies: movies.length, ratings: ratings.length });
        return this.run({ movies, ratings });
    }

    /**
     * Loads every movie (with its genres) before any rating, since ratings
     * reference movies. Record-level problems are collected as warnings;
     * only a StoreUnavailableError rejects.
     */
    async run(input: RunInput): Promise<RunSummary> {
        this.databaseService.initSchema();

        const state: RunState = {
            summary: emptySummary(),
            canonicalIds: new Map(),
            seenTitles: new Map(),
            knownMovies: new Set(),
            users: new Set(),
        };

        const movieBatches = chunk(input.movies, this.config.batchSize);
        for (const [index, batch] of movieBatches.entries()) {
            await this.loadMovieBatch(batch, state);
            $log.info({ event: "movie-batch", batch: index + 1, of: movieBatches.length, loaded: state.summary.movies.loaded });
        }

        for (const batch of chunk(input.ratings, this.config.batchSize)) {
            this.loadRatingBatch(batch, state);
        }
        state.summary.users = state.users.size;

        $log.info({
            event: "etl-complete",
            movies: state.summary.movies,
            genreLinks: state.summary.genreLinks,
            ratings: state.summary.ratings,
            users: state.summary.users,
            warnings: state.summary.warnings.length,
            tables: this.loaderService.counts(),
        });
        return state.summary;
    }

    private async loadMovieBatch(rows: RawMovieRow[], state: RunState): Promise<void> {
        const { summary } = state;
        const movies: MovieRecord[] = [];

        for (const row of rows) {
            summary.movies.read++;
            const movie = this.parse(state, () => this.transformService.toMovie(row));
            if (!movie) {
                summary.movies.skipped++;
                continue;
            }
            if (this.isDuplicate(movie, state)) {
                summary.movies.duplicates++;
                continue;
            }
            movies.push(movie);
        }

        const limit = pLimit(this.config.omdb.concurrency);
        const results = await Promise.all(
            movies.map((movie) => limit(() => this.lookup(movie)))
        );

        this.databaseService.transaction("load movies", () => {
            movies.forEach((movie, i) => {
                const details = this.enrichment(movie, results[i], state);
                this.loaderService.upsertMovie(movie, details);

                const genreIds = this.loaderService.resolveGenres(movie.genres);
                const ids = movie.genres.flatMap((name) => {
                    const id = genreIds.get(name);
                    return id === undefined ? [] : [id];
                });
                summary.genreLinks += this.loaderService.linkGenres(movie.movieId, ids);

                state.knownMovies.add(movie.movieId);
                summary.movies.loaded++;
            });
        });
    }

    private loadRatingBatch(rows: RawRatingRow[], state: RunState): void {
        const { summary } = state;
        const ratings: RatingRecord[] = [];

        for (const row of rows) {
            summary.ratings.read++;
            const parsed = this.parse(state, () => this.transformService.toRating(row));
            if (!parsed) {
                summary.ratings.skipped++;
                continue;
            }
            const rating = { ...parsed, movieId: state.canonicalIds.get(parsed.movieId) ?? parsed.movieId };
            if (!this.movieExists(rating.movieId, state)) {
                this.warn(state, new OrphanRatingError(
                    `Rating by user ${rating.userId} references unknown movie ${rating.movieId}`,
                    row.record,
                    { userId: rating.userId, movieId: rating.movieId }
                ));
                summary.ratings.skipped++;
                continue;
            }
            ratings.push(rating);
        }

        this.databaseService.transaction("load ratings", () => {
            for (const rating of ratings) {
                this.loaderService.upsertUser(rating.userId);
                this.loaderService.upsertRating(rating);
                state.users.add(rating.userId);
                summary.ratings.loaded++;
            }
        });
    }

    private parse<T>(state: RunState, fn: () => T): T | null {
        try {
            return fn();
        } catch (error) {
            if (error instanceof RecordParseError) {
                this.warn(state, error);
                return null;
            }
            throw error;
        }
    }

    private isDuplicate(movie: MovieRecord, state: RunState): boolean {
        if (!this.config.dedupeTitles) {
            return false;
        }
        const key = `${movie.title}\u0000${movie.releaseYear ?? ""}`;
        const canonicalId = state.seenTitles.get(key);
        if (canonicalId === undefined || canonicalId === movie.movieId) {
            state.seenTitles.set(key, movie.movieId);
            // an id loaded under its own title is no longer an alias
            state.canonicalIds.delete(movie.movieId);
            return false;
        }
        state.canonicalIds.set(movie.movieId, canonicalId);
        $log.info({ event: "duplicate-title", movieId: movie.movieId, title: movie.title, year: movie.releaseYear, canonicalId });
        return true;
    }

    private lookup(movie: MovieRecord): Promise<EnrichmentResult> {
        return this.enrichmentLookup.lookup(movie.title, movie.releaseYear)
            .catch((error: unknown): EnrichmentResult => ({ status: "error", reason: errorMessage(error) }));
    }

    private enrichment(movie: MovieRecord, result: EnrichmentResult, state: RunState): EnrichmentDetails | null {
        if (result.status === "found") {
            state.summary.movies.enriched++;
            return result.details;
        }
        state.summary.movies.unenriched++;
        if (result.reason !== LOOKUP_DISABLED) {
            this.warn(state, new EnrichmentUnavailableError(
                `No enrichment for movie ${movie.movieId} "${movie.title}": ${result.reason}`,
                { movieId: movie.movieId, status: result.status }
            ));
        }
        return null;
    }

    private movieExists(movieId: number, state: RunState): boolean {
        if (state.knownMovies.has(movieId)) {
            return true;
        }
        const exists = this.loaderService.hasMovie(movieId);
        if (exists) {
            state.knownMovies.add(movieId);
        }
        return exists;
    }

    private warn(state: RunState, error: EtlError & { record?: number }): void {
        const warning: RunWarning = { code: error.code, message: error.message };
        if (error.record !== undefined) {
            warning.record = error.record;
        }
        state.summary.warnings.push(warning);
        $log.warn({ event: error.code, record: error.record, message: error.message });
    }
}
