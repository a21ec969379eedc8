import { Inject, Injectable } from "@tsed/di";
import { asc, desc, eq, isNotNull, sql } from "drizzle-orm";
import * as schema from "../db/schema";
import { UNKNOWN_DIRECTOR } from "../config";
import { DatabaseService } from "./DatabaseService";

export interface TopRatedMovie {
  movieId: number;
  title: string;
  avgRating: number;
  ratingCount: number;
}

export interface GenreRating {
  genre: string;
  avgRating: number;
  ratingCount: number;
}

export interface DirectorCount {
  director: string;
  movieCount: number;
}

export interface YearRating {
  releaseYear: number;
  avgRating: number;
  ratingCount: number;
}

/** Read-only aggregates over the loaded tables. */
@Injectable()
export class ReportService {

    @Inject()
    private databaseService!: DatabaseService;

    topRatedMovie(): TopRatedMovie | null {
        const db = this.databaseService.getDb();
        const avgRating = sql<number>`round(avg(${schema.ratings.rating}), 3)`;
        const ratingCount = sql<number>`count(${schema.ratings.userId})`;

        const row = db
            .select({
                movieId: schema.movies.movieId,
                title: schema.movies.title,
                avgRating,
                ratingCount,
            })
            .from(schema.movies)
            .innerJoin(schema.ratings, eq(schema.ratings.movieId, schema.movies.movieId))
            .groupBy(schema.movies.movieId, schema.movies.title)
            .orderBy(desc(avgRating), desc(ratingCount))
            .limit(1)
            .get();

        return row ?? null;
    }

    topGenres(limit: number = 5, minRatings: number = 10): GenreRating[] {
        const db = this.databaseService.getDb();
        const avgRating = sql<number>`round(avg(${schema.ratings.rating}), 3)`;
        const ratingCount = sql<number>`count(*)`;

        return db
            .select({
                genre: schema.genres.name,
                avgRating,
                ratingCount,
            })
            .from(schema.ratings)
            .innerJoin(schema.movieGenres, eq(schema.movieGenres.movieId, schema.ratings.movieId))
            .innerJoin(schema.genres, eq(schema.genres.genreId, schema.movieGenres.genreId))
            .groupBy(schema.genres.genreId, schema.genres.name)
            .having(sql`count(*) >= ${minRatings}`)
            .orderBy(desc(avgRating), desc(ratingCount))
            .limit(limit)
            .all();
    }

    mostProlificDirector(): DirectorCount | null {
        const db = this.databaseService.getDb();
        const director = sql<string>`coalesce(${schema.movies.director}, ${UNKNOWN_DIRECTOR})`;
        const movieCount = sql<number>`count(*)`;

        const row = db
            .select({ director, movieCount })
            .from(schema.movies)
            .groupBy(director)
            .orderBy(desc(movieCount))
            .limit(1)
            .get();

        return row ?? null;
    }

    averageRatingByYear(): YearRating[] {
        const db = this.databaseService.getDb();
        const releaseYear = sql<number>`${schema.movies.releaseYear}`;

        return db
            .select({
                releaseYear,
                avgRating: sql<number>`round(avg(${schema.ratings.rating}), 3)`,
                ratingCount: sql<number>`count(*)`,
            })
            .from(schema.movies)
            .innerJoin(schema.ratings, eq(schema.ratings.movieId, schema.movies.movieId))
            .where(isNotNull(schema.movies.releaseYear))
            .groupBy(schema.movies.releaseYear)
            .orderBy(asc(schema.movies.releaseYear))
            .all();
    }
}
