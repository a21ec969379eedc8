import { DITest } from "@tsed/di";
import { $log } from "@tsed/logger";
import { AxiosError, AxiosHeaders, AxiosResponse } from "axios";
import type { OmdbSettings } from "../../src/config";
import { EnrichmentLookup } from "../../src/services/EnrichmentLookup";
import {
  OmdbMovieResponse,
  OmdbService,
  parseBoxOffice,
  parseRuntime,
  toEnrichmentDetails,
} from "../../src/services/OmdbService";
import { createTestConfig } from "../helpers";

function response<T>(data: T, status = 200): AxiosResponse<T> {
  return { data, status, statusText: status === 200 ? "OK" : "Error", headers: {}, config: { headers: new AxiosHeaders() } };
}

function httpError(status: number): AxiosError {
  return new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", undefined, undefined, response({}, status));
}

const toyStory: OmdbMovieResponse = {
  Response: "True",
  Title: "Toy Story",
  Year: "1995",
  imdbID: "tt0114709",
  Director: "John Lasseter",
  Plot: "N/A",
  BoxOffice: "$223,225,679",
  Runtime: "81 min",
};

describe("OmdbService", () => {
  async function createService(omdb: Partial<OmdbSettings> = {}) {
    await DITest.create({
      etl: createTestConfig({}, { enabled: true, apiKey: "test-key", maxRetries: 2, backoffMs: 0, ...omdb }),
    });
    return DITest.invoke<OmdbService>(EnrichmentLookup);
  }

  describe("field cleaning", () => {
    it("should parse box office dollars", () => {
      expect(parseBoxOffice("$1,234,567")).toBe(1234567);
      expect(parseBoxOffice("N/A")).toBeNull();
      expect(parseBoxOffice(undefined)).toBeNull();
    });

    it("should parse runtime minutes", () => {
      expect(parseRuntime("81 min")).toBe(81);
      expect(parseRuntime("N/A")).toBeNull();
      expect(parseRuntime("1 h 21")).toBeNull();
    });

    it("should map a response to details with N/A as null", () => {
      expect(toEnrichmentDetails(toyStory)).toEqual({
        externalId: "tt0114709",
        director: "John Lasseter",
        plot: null,
        boxOffice: 223225679,
        runtimeMinutes: 81,
      });
    });
  });

  describe("lookup", () => {
    afterEach(() => DITest.reset());

    it("should query by cleaned title and year", async () => {
      const service = await createService();
      const get = jest.spyOn(service.getClient(), "get").mockResolvedValueOnce(response(toyStory));

      const result = await service.lookup("Toy Story (Toy Story 1)", 1995);

      expect(get).toHaveBeenCalledWith("", {
        params: { apikey: "test-key", t: "Toy Story", type: "movie", r: "json", y: "1995" },
      });
      expect(result).toEqual({ status: "found", details: toEnrichmentDetails(toyStory) });
    });

    it("should omit the year when unknown", async () => {
      const service = await createService();
      const get = jest.spyOn(service.getClient(), "get").mockResolvedValueOnce(response(toyStory));

      await service.lookup("Toy Story", null);

      expect(get).toHaveBeenCalledWith("", {
        params: { apikey: "test-key", t: "Toy Story", type: "movie", r: "json" },
      });
    });

    it("should report not-found for a negative response", async () => {
      const service = await createService();
      jest.spyOn(service.getClient(), "get").mockResolvedValueOnce(response({ Response: "False", Error: "Movie not found!" }));
      const warn = jest.spyOn($log, "warn");

      await expect(service.lookup("Nothing Like It", 2001)).resolves.toEqual({
        status: "not-found",
        reason: "Movie not found!",
      });
      expect(warn).not.toHaveBeenCalled();
      warn.mockRestore();
    });

    it("should report the daily limit as an error without retrying", async () => {
      const service = await createService();
      const get = jest.spyOn(service.getClient(), "get")
        .mockResolvedValueOnce(response({ Response: "False", Error: "Request limit reached!" }));

      await expect(service.lookup("Heat", 1995)).resolves.toEqual({ status: "error", reason: "Request limit reached!" });
      expect(get).toHaveBeenCalledTimes(1);
    });

    it("should retry transient failures", async () => {
      const service = await createService();
      const get = jest.spyOn(service.getClient(), "get")
        .mockRejectedValueOnce(httpError(503))
        .mockRejectedValueOnce(new AxiosError("timeout of 1000ms exceeded", "ECONNABORTED"))
        .mockResolvedValueOnce(response(toyStory));

      const result = await service.lookup("Toy Story", 1995);

      expect(result.status).toBe("found");
      expect(get).toHaveBeenCalledTimes(3);
    });

    it("should give up after the configured retries", async () => {
      const service = await createService({ maxRetries: 1 });
      const get = jest.spyOn(service.getClient(), "get").mockRejectedValue(httpError(502));

      await expect(service.lookup("Toy Story", 1995)).resolves.toEqual({ status: "error", reason: "HTTP 502" });
      expect(get).toHaveBeenCalledTimes(2);
    });

    it("should not retry client errors", async () => {
      const service = await createService();
      const get = jest.spyOn(service.getClient(), "get").mockRejectedValue(httpError(401));

      await expect(service.lookup("Toy Story", 1995)).resolves.toEqual({ status: "error", reason: "HTTP 401" });
      expect(get).toHaveBeenCalledTimes(1);
    });

    it("should skip the request when enrichment is disabled", async () => {
      const service = await createService({ enabled: false });
      const get = jest.spyOn(service.getClient(), "get");

      await expect(service.lookup("Toy Story", 1995)).resolves.toEqual({
        status: "not-found",
        reason: "lookup disabled",
      });
      expect(get).not.toHaveBeenCalled();
    });

    it("should skip the request without an API key", async () => {
      const service = await createService({ apiKey: null });

      expect(service.isEnabled()).toBe(false);
    });
  });
});
