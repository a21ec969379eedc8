import { Inject, Injectable } from "@tsed/di";
import { count, eq, inArray, sql, type AnyColumn, type SQL } from "drizzle-orm";
import type { SQLiteTable } from "drizzle-orm/sqlite-core";
import * as schema from "../db/schema";
import type { Genre, NewMovie, NewRating } from "../db/schema";
import { DatabaseService } from "./DatabaseService";
import type { EnrichmentDetails } from "./EnrichmentLookup";
import type { MovieRecord, RatingRecord } from "./TransformService";

export interface TableCounts {
  movies: number;
  genres: number;
  movieGenres: number;
  users: number;
  ratings: number;
}

/** The value being inserted when it is non-null, otherwise the stored one. */
function keepExisting(column: AnyColumn): SQL {
  return sql`coalesce(${sql.raw(`excluded."${column.name}"`)}, ${column})`;
}

/**
 * Key-based upserts for every table. Movies, users and ratings are identified
 * by the keys in the source data; genres by name. Writing the same record
 * twice never adds a row.
 */
@Injectable()
export class LoaderService {

    @Inject()
    private databaseService!: DatabaseService; // handled by tsed's DI using !

    upsertMovie(movie: MovieRecord, details: EnrichmentDetails | null): void {
        const db = this.databaseService.getDb();
        const row: NewMovie = {
            movieId: movie.movieId,
            title: movie.title,
            releaseYear: movie.releaseYear,
            decade: movie.decade,
            externalId: details?.externalId ?? null,
            director: details?.director ?? null,
            plot: details?.plot ?? null,
            boxOffice: details?.boxOffice ?? null,
            runtimeMinutes: details?.runtimeMinutes ?? null,
        };
        this.databaseService.write("upsert movie", () =>
            db.insert(schema.movies)
                .values(row)
                .onConflictDoUpdate({
                    target: schema.movies.movieId,
                    set: {
                        title: movie.title,
                        releaseYear: movie.releaseYear,
                        decade: movie.decade,
                        // a missed lookup never erases what an earlier run stored
                        externalId: keepExisting(schema.movies.externalId),
                        director: keepExisting(schema.movies.director),
                        plot: keepExisting(schema.movies.plot),
                        boxOffice: keepExisting(schema.movies.boxOffice),
                        runtimeMinutes: keepExisting(schema.movies.runtimeMinutes),
                    },
                })
                .run()
        );
    }

    resolveGenres(names: string[]): Map<string, number> {
        const resolved = new Map<string, number>();
        if (names.length === 0) {
            return resolved;
        }

        const db = this.databaseService.getDb();
        const rows: Genre[] = this.databaseService.write("resolve genres", () => {
            for (const name of names) {
                db.insert(schema.genres)
                    .values({ name })
                    .onConflictDoNothing({ target: schema.genres.name })
                    .run();
            }
            return db
                .select({ genreId: schema.genres.genreId, name: schema.genres.name })
                .from(schema.genres)
                .where(inArray(schema.genres.name, names))
                .all();
        });

        for (const row of rows) {
            resolved.set(row.name, row.genreId);
        }
        return resolved;
    }

    /** Returns how many of the links did not exist before. */
    linkGenres(movieId: number, genreIds: number[]): number {
        const db = this.databaseService.getDb();
        return this.databaseService.write("link genres", () => {
            let created = 0;
            for (const genreId of genreIds) {
                const result = db.insert(schema.movieGenres)
                    .values({ movieId, genreId })
                    .onConflictDoNothing()
                    .run();
                created += result.changes;
            }
            return created;
        });
    }

    upsertUser(userId: number): void {
        const db = this.databaseService.getDb();
        this.databaseService.write("upsert user", () =>
            db.insert(schema.users)
                .values({ userId })
                .onConflictDoNothing()
                .run()
        );
    }

    upsertRating(rating: RatingRecord): void {
        const db = this.databaseService.getDb();
        const row: NewRating = {
            userId: rating.userId,
            movieId: rating.movieId,
            rating: rating.rating,
            ratedAt: rating.ratedAt,
        };
        this.databaseService.write("upsert rating", () =>
            db.insert(schema.ratings)
                .values(row)
                .onConflictDoUpdate({
                    target: [schema.ratings.userId, schema.ratings.movieId],
                    set: {
                        rating: rating.rating,
                        ratedAt: keepExisting(schema.ratings.ratedAt),
                    },
                })
                .run()
        );
    }

    hasMovie(movieId: number): boolean {
        const db = this.databaseService.getDb();
        const row = this.databaseService.write("find movie", () =>
            db.select({ movieId: schema.movies.movieId })
                .from(schema.movies)
                .where(eq(schema.movies.movieId, movieId))
                .get()
        );
        return row !== undefined;
    }

    counts(): TableCounts {
        const db = this.databaseService.getDb();
        const total = (table: SQLiteTable): number =>
            db.select({ n: count() }).from(table).get()?.n ?? 0;

        return this.databaseService.write("count rows", () => ({
            movies: total(schema.movies),
            genres: total(schema.genres),
            movieGenres: total(schema.movieGenres),
            users: total(schema.users),
            ratings: total(schema.ratings),
        }));
    }
}
