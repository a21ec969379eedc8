import { DITest } from "@tsed/di";
import { DatabaseService } from "../../src/services/DatabaseService";
import { LoaderService } from "../../src/services/LoaderService";
import { ReportService } from "../../src/services/ReportService";
import { createTestConfig, details } from "../helpers";

describe("ReportService", () => {
  let loader: LoaderService;
  let reports: ReportService;

  beforeEach(async () => {
    await DITest.create({ etl: createTestConfig() });
    const database = DITest.get<DatabaseService>(DatabaseService);
    database.initSchema();
    const locals = [{ token: DatabaseService, use: database }];
    loader = await DITest.invoke<LoaderService>(LoaderService, locals);
    reports = await DITest.invoke<ReportService>(ReportService, locals);
  });

  afterEach(() => DITest.reset());

  function seed() {
    const movies = [
      { movieId: 1, title: "Toy Story", releaseYear: 1995, decade: "1990s", genres: ["Animation", "Comedy"] },
      { movieId: 2, title: "A Bug's Life", releaseYear: 1998, decade: "1990s", genres: ["Animation"] },
      { movieId: 3, title: "Heat", releaseYear: 1995, decade: "1990s", genres: ["Crime"] },
      { movieId: 4, title: "Untitled", releaseYear: null, decade: null, genres: [] },
    ];
    const directors: Record<number, string | null> = { 1: "John Lasseter", 2: "John Lasseter", 3: "Michael Mann", 4: null };

    for (const movie of movies) {
      loader.upsertMovie(movie, details({ director: directors[movie.movieId] }));
      const ids = [...loader.resolveGenres(movie.genres).values()];
      loader.linkGenres(movie.movieId, ids);
    }

    const ratings: Array<[number, number, number]> = [
      [1, 1, 4], [2, 1, 5],
      [1, 2, 3],
      [1, 3, 5], [2, 3, 5], [3, 3, 4],
      [1, 4, 1],
    ];
    for (const [userId, movieId, rating] of ratings) {
      loader.upsertUser(userId);
      loader.upsertRating({ userId, movieId, rating, ratedAt: null });
    }
  }

  it("should find the movie with the highest average rating", () => {
    seed();

    expect(reports.topRatedMovie()).toEqual({ movieId: 3, title: "Heat", avgRating: 4.667, ratingCount: 3 });
  });

  it("should return null without ratings", () => {
    expect(reports.topRatedMovie()).toBeNull();
  });

  it("should rank genres with enough ratings", () => {
    seed();

    expect(reports.topGenres(5, 2)).toEqual([
      { genre: "Crime", avgRating: 4.667, ratingCount: 3 },
      { genre: "Comedy", avgRating: 4.5, ratingCount: 2 },
      { genre: "Animation", avgRating: 4, ratingCount: 3 },
    ]);
    expect(reports.topGenres(1, 3)).toEqual([{ genre: "Crime", avgRating: 4.667, ratingCount: 3 }]);
  });

  it("should find the most prolific director", () => {
    seed();

    expect(reports.mostProlificDirector()).toEqual({ director: "John Lasseter", movieCount: 2 });
  });

  it("should average ratings per release year", () => {
    seed();

    expect(reports.averageRatingByYear()).toEqual([
      { releaseYear: 1995, avgRating: 4.6, ratingCount: 5 },
      { releaseYear: 1998, avgRating: 3, ratingCount: 1 },
    ]);
  });
});
