import { Constant, Injectable, ProviderScope } from "@tsed/di";
import { $log } from "@tsed/logger";
import { BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import * as schema from "../db/schema";
import type { EtlConfig } from "../config";
import { StoreUnavailableError, errorMessage } from "../errors";

export type MovieDb = BetterSQLite3Database<typeof schema>;

@Injectable({
  scope: ProviderScope.SINGLETON
})
export class DatabaseService {
    @Constant("etl")
    private readonly config!: EtlConfig;

    private dbInstance: MovieDb | null = null;
    private dbConnection: Database.Database | null = null;

    getRawDb(): Database.Database {
        if (!this.dbConnection) {
            const dbPath = this.config.databasePath;
            try {
                const connection = new Database(dbPath);
                connection.pragma("foreign_keys = ON");
                this.dbConnection = connection;
            } catch (error) {
                throw new StoreUnavailableError(`Cannot open database at ${dbPath}: ${errorMessage(error)}`, error);
            }
            $log.debug({ event: "db-open", dbPath });
        }
        return this.dbConnection;
    }

    getDb(): MovieDb {
        if (!this.dbInstance) {
            this.dbInstance = drizzle(this.getRawDb(), { schema });
        }
        return this.dbInstance;
    }

    closeConnections(): void {
        if (this.dbConnection) {
            this.dbConnection.close();
            this.dbConnection = null;
            this.dbInstance = null;
        }
    }

    $onDestroy(): void {
        this.closeConnections();
    }

    /**
     * Creates the tables when missing. Existing rows are left alone so a
     * re-run keeps enrichment gathered earlier.
     */
    initSchema(): void {
      this.write("init-schema", () => this.getRawDb().exec(`
        CREATE TABLE IF NOT EXISTS movies (
          movie_id INTEGER PRIMARY KEY,
          title TEXT NOT NULL,
          release_year INTEGER,
          decade TEXT,
          external_id TEXT,
          director TEXT,
          plot TEXT,
          box_office INTEGER,
          runtime_minutes INTEGER
        );

        CREATE TABLE IF NOT EXISTS genres (
          genre_id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL UNIQUE
        );

        CREATE TABLE IF NOT EXISTS movie_genres (
          movie_id INTEGER NOT NULL REFERENCES movies(movie_id) ON DELETE CASCADE,
          genre_id INTEGER NOT NULL REFERENCES genres(genre_id) ON DELETE CASCADE,
          PRIMARY KEY (movie_id, genre_id)
        );

        CREATE TABLE IF NOT EXISTS users (
          user_id INTEGER PRIMARY KEY
        );

        CREATE TABLE IF NOT EXISTS ratings (
          user_id INTEGER NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
          movie_id INTEGER NOT NULL REFERENCES movies(movie_id) ON DELETE CASCADE,
          rating REAL NOT NULL,
          rated_at TEXT,
          PRIMARY KEY (user_id, movie_id)
        );
      `));
    }

    /** Runs `fn` in one SQLite transaction; any failure rolls the whole batch back. */
    transaction<T>(operation: string, fn: () => T): T {
      const connection = this.getRawDb();
      return this.write(operation, () => connection.transaction(fn)());
    }

    /** Rethrows any failure of `fn` as a StoreUnavailableError. */
    write<T>(operation: string, fn: () => T): T {
      try {
        return fn();
      } catch (error) {
        if (error instanceof StoreUnavailableError) {
          throw error;
        }
        throw new StoreUnavailableError(`Database ${operation} failed: ${errorMessage(error)}`, error);
      }
    }
}
