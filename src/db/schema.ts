import { sqliteTable, text, integer, real, primaryKey } from "drizzle-orm/sqlite-core";

// movieId is the MovieLens id, never generated here
export const movies = sqliteTable("movies", {
  movieId: integer("movie_id").primaryKey(),
  title: text("title").notNull(),
  releaseYear: integer("release_year"),
  decade: text("decade"), // e.g. "1990s"
  externalId: text("external_id"), // imdb id from OMDb
  director: text("director"),
  plot: text("plot"),
  boxOffice: integer("box_office"), // whole dollars
  runtimeMinutes: integer("runtime_minutes"),
});

export const genres = sqliteTable("genres", {
  genreId: integer("genre_id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull().unique(),
});

export const movieGenres = sqliteTable(
  "movie_genres",
  {
    movieId: integer("movie_id")
      .notNull()
      .references(() => movies.movieId, { onDelete: "cascade" }),
    genreId: integer("genre_id")
      .notNull()
      .references(() => genres.genreId, { onDelete: "cascade" }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.movieId, table.genreId] }),
  })
);

export const users = sqliteTable("users", {
  userId: integer("user_id").primaryKey(),
});

export const ratings = sqliteTable(
  "ratings",
  {
    userId: integer("user_id")
      .notNull()
      .references(() => users.userId, { onDelete: "cascade" }),
    movieId: integer("movie_id")
      .notNull()
      .references(() => movies.movieId, { onDelete: "cascade" }),
    rating: real("rating").notNull(),
    ratedAt: text("rated_at"), // ISO-8601
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.movieId] }),
  })
);

export type NewMovie = typeof movies.$inferInsert;

export type Genre = typeof genres.$inferSelect;

export type NewRating = typeof ratings.$inferInsert;
