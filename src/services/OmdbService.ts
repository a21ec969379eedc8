import axios, { AxiosInstance } from "axios";
import { Constant, Inject, Injectable } from "@tsed/di";
import { $log } from "@tsed/logger";
import type { EtlConfig } from "../config";
import { errorMessage } from "../errors";
import { EnrichmentDetails, EnrichmentLookup, EnrichmentResult, LOOKUP_DISABLED } from "./EnrichmentLookup";
import { TransformService } from "./TransformService";

export interface OmdbMovieResponse {
    Response: "True" | "False";
    Error?: string;
    Title?: string;
    Year?: string;
    imdbID?: string;
    Director?: string;
    Plot?: string;
    BoxOffice?: string;
    Runtime?: string;
}

type Attempt =
    | { done: true; result: EnrichmentResult }
    | { done: false; reason: string };

export function naToNull(value: string | undefined): string | null {
    if (value === undefined) {
        return null;
    }
    const trimmed = value.trim();
    return trimmed === "" || trimmed.toUpperCase() === "N/A" ? null : trimmed;
}

/** "$1,234,567" -> 1234567 */
export function parseBoxOffice(value: string | undefined): number | null {
    const cleaned = naToNull(value)?.replace(/[$,]/g, "");
    if (!cleaned || !/^\d+$/.test(cleaned)) {
        return null;
    }
    return Number(cleaned);
}

/** "81 min" -> 81 */
export function parseRuntime(value: string | undefined): number | null {
    const cleaned = naToNull(value)?.toLowerCase().replace(/\s*min$/, "");
    if (!cleaned || !/^\d+$/.test(cleaned)) {
        return null;
    }
    return Number(cleaned);
}

export function toEnrichmentDetails(data: OmdbMovieResponse): EnrichmentDetails {
    return {
        externalId: naToNull(data.imdbID),
        director: naToNull(data.Director),
        plot: naToNull(data.Plot),
        boxOffice: parseBoxOffice(data.BoxOffice),
        runtimeMinutes: parseRuntime(data.Runtime),
    };
}

@Injectable({
    provide: EnrichmentLookup
})
export class OmdbService implements EnrichmentLookup {
    @Constant("etl")
    private readonly config!: EtlConfig;

    @Inject()
    private transformService!: TransformService;

    private client: AxiosInstance | null = null;

    getClient(): AxiosInstance {
        if (!this.client) {
            this.client = axios.create({
                baseURL: this.config.omdb.baseUrl,
                timeout: this.config.omdb.timeoutMs,
            });
        }
        return this.client;
    }

    isEnabled(): boolean {
        return this.config.omdb.enabled && this.config.omdb.apiKey !== null;
    }

    async lookup(title: string, year: number | null): Promise<EnrichmentResult> {
        if (!this.isEnabled()) {
            return { status: "not-found", reason: LOOKUP_DISABLED };
        }

        const query = this.transformService.queryTitle(title);
        const { maxRetries, backoffMs } = this.config.omdb;
        let attempt = 0;

        for (;;) {
            const outcome = await this.attempt(query, year);
            if (outcome.done) {
                return outcome.result;
            }
            if (attempt >= maxRetries) {
                $log.warn({ event: "omdb-error", title, query, year, reason: outcome.reason, attempts: attempt + 1 });
                return { status: "error", reason: outcome.reason };
            }
            attempt++;
            $log.info({ event: "omdb-retry", query, year, attempt, reason: outcome.reason });
            await new Promise((resolve) => setTimeout(resolve, backoffMs * attempt));
        }
    }

    private async attempt(query: string, year: number | null): Promise<Attempt> {
        const params: Record<string, string> = {
            apikey: this.config.omdb.apiKey ?? "",
            t: query,
            type: "movie",
            r: "json",
        };
        if (year !== null) {
            params.y = String(year);
        }

        try {
            const response = await this.getClient().get<OmdbMovieResponse>("", { params });
            const data = response.data;

            if (data.Response !== "True") {
                const reason = data.Error ?? "no match";
                // OMDb reports its daily quota as a normal response body
                if (/limit/i.test(reason)) {
                    return { done: true, result: { status: "error", reason } };
                }
                $log.debug({ event: "omdb-not-found", query, year, reason });
                return { done: true, result: { status: "not-found", reason } };
            }

            return { done: true, result: { status: "found", details: toEnrichmentDetails(data) } };
        } catch (error) {
            if (axios.isAxiosError(error) && error.response) {
                const status = error.response.status;
                if (status === 429 || status >= 500) {
                    return { done: false, reason: `HTTP ${status}` };
                }
                $log.warn({ event: "omdb-http", query, year, status });
                return { done: true, result: { status: "error", reason: `HTTP ${status}` } };
            }
            return { done: false, reason: errorMessage(error) };
        }
    }
}
