import { Injectable } from "@tsed/di";
import { NO_GENRES_SENTINEL } from "../config";
import { RecordParseError } from "../errors";
import type { RawMovieRow, RawRatingRow } from "./RecordSourceService";

export interface MovieRecord {
  movieId: number;
  title: string;
  releaseYear: number | null;
  decade: string | null;
  genres: string[];
}

export interface RatingRecord {
  userId: number;
  movieId: number;
  rating: number;
  ratedAt: string | null;
}

const TRAILING_YEAR = /^(.*?)\s*\((\d{4})\)\s*$/;
const INTEGER_KEY = /^\d+$/;

@Injectable()
export class TransformService {

    /** "Toy Story (1995)" -> { title: "Toy Story", releaseYear: 1995 } */
    parseTitle(raw: string): { title: string; releaseYear: number | null } {
        const trimmed = raw.trim();
        const match = TRAILING_YEAR.exec(trimmed);
        if (!match || match[1].trim() === "") {
            return { title: trimmed, releaseYear: null };
        }
        return { title: match[1].trim(), releaseYear: Number.parseInt(match[2], 10) };
    }

    computeDecade(year: number | null): string | null {
        if (year === null || !Number.isInteger(year)) {
            return null;
        }
        return `${Math.floor(year / 10) * 10}s`;
    }

    parseGenres(raw: string): string[] {
        const names = raw
            .split(/[|,]/)
            .map((part) => part.trim())
            .filter((part) => part !== "" && part.toLowerCase() !== NO_GENRES_SENTINEL);
        return [...new Set(names)];
    }

    // OMDb matches poorly on alternate titles, e.g. "Seven (a.k.a. Se7en)"
    queryTitle(title: string): string {
        let query = title.trim();
        while (query.endsWith(")") && query.includes(" (")) {
            query = query.slice(0, query.lastIndexOf(" (")).trim();
        }
        return query;
    }

    toMovie(row: RawMovieRow): MovieRecord {
        const movieId = this.parseKey(row.movieId, "movieId", row.record);
        const { title, releaseYear } = this.parseTitle(row.title);
        if (title === "") {
            throw new RecordParseError(`Movie ${movieId} has no title`, row.record, { movieId });
        }
        return {
            movieId,
            title,
            releaseYear,
            decade: this.computeDecade(releaseYear),
            genres: this.parseGenres(row.genres),
        };
    }

    toRating(row: RawRatingRow): RatingRecord {
        const userId = this.parseKey(row.userId, "userId", row.record);
        const movieId = this.parseKey(row.movieId, "movieId", row.record);
        const rating = row.rating.trim() === "" ? Number.NaN : Number(row.rating);
        if (!Number.isFinite(rating)) {
            throw new RecordParseError(`Invalid rating "${row.rating}"`, row.record, { userId, movieId });
        }
        return { userId, movieId, rating, ratedAt: this.toRatedAt(row.timestamp) };
    }

    /** Unix seconds to ISO-8601; anything else is dropped rather than failing the record. */
    toRatedAt(timestamp: string): string | null {
        const value = timestamp.trim();
        if (!INTEGER_KEY.test(value)) {
            return null;
        }
        const date = new Date(Number(value) * 1000);
        return Number.isNaN(date.getTime()) ? null : date.toISOString();
    }

    private parseKey(raw: string, field: string, record: number): number {
        const value = raw.trim();
        const key = Number(value);
        if (!INTEGER_KEY.test(value) || !Number.isSafeInteger(key)) {
            throw new RecordParseError(`Invalid ${field} "${raw}"`, record, { field, value: raw });
        }
        return key;
    }
}
