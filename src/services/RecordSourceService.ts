import { readFileSync } from "fs";
import { Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { SourceUnavailableError, errorMessage } from "../errors";

export interface RawMovieRow {
  record: number;
  movieId: string;
  title: string;
  genres: string;
}

export interface RawRatingRow {
  record: number;
  userId: string;
  movieId: string;
  rating: string;
  timestamp: string;
}

const csvRows = z.array(z.record(z.string()));

/**
 * Reads MovieLens-style CSV exports. Values are handed on as raw strings;
 * key validation belongs to the transformer so a bad row is skipped, not fatal.
 */
@Injectable()
export class RecordSourceService {

    readMovies(path: string): RawMovieRow[] {
        return this.parseMovies(this.readFile(path), path);
    }

    readRatings(path: string): RawRatingRow[] {
        return this.parseRatings(this.readFile(path), path);
    }

    parseMovies(csv: string, source = "movies"): RawMovieRow[] {
        return this.parseCsv(csv, source).map((row, index) => ({
            record: index + 1,
            movieId: row.movieId ?? "",
            title: row.title ?? "",
            genres: row.genres ?? "",
        }));
    }

    parseRatings(csv: string, source = "ratings"): RawRatingRow[] {
        return this.parseCsv(csv, source).map((row, index) => ({
            record: index + 1,
            userId: row.userId ?? "",
            movieId: row.movieId ?? "",
            rating: row.rating ?? "",
            timestamp: row.timestamp ?? "",
        }));
    }

    /** A file csv-parse cannot read as a whole (an unclosed quote, say) is unusable input. */
    private parseCsv(csv: string, source: string): Record<string, string | undefined>[] {
        let rows: unknown;
        try {
            rows = parse(csv, {
                columns: true,
                skip_empty_lines: true,
                trim: true,
                bom: true,
                relax_column_count: true,
            });
        } catch (error) {
            throw new SourceUnavailableError(source, error, `Malformed CSV in ${source}: ${errorMessage(error)}`);
        }
        return csvRows.parse(rows);
    }

    private readFile(path: string): string {
        try {
            const content = readFileSync(path, "utf-8");
            $log.debug({ event: "source-read", path, bytes: content.length });
            return content;
        } catch (error) {
            throw new SourceUnavailableError(path, error);
        }
    }
}
