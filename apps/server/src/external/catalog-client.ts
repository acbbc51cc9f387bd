import {
	DeezerArtistListSchema,
	DeezerErrorSchema,
	DeezerTrackListSchema,
} from "@playlist-agents/shared/validation/catalog-schemas";
import type { ZodType } from "zod";

export interface CatalogArtist {
	id: number;
	name: string;
}

export interface CatalogTrack {
	title: string;
}

/**
 * Read-only view of a music catalog. Every method rejects on failure,
 * including when `signal` aborts.
 */
export interface CatalogClient {
	searchArtists(query: string, signal?: AbortSignal): Promise<CatalogArtist[]>;
	getTopTracks(
		artistId: number,
		limit: number,
		signal?: AbortSignal,
	): Promise<CatalogTrack[]>;
	getRelatedArtists(
		artistId: number,
		limit: number,
		signal?: AbortSignal,
	): Promise<CatalogArtist[]>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DeezerCatalogOptions {
	baseUrl?: string;
	timeoutMs?: number;
	fetch?: FetchLike;
}

export class DeezerCatalogClient implements CatalogClient {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly fetchImpl: FetchLike;

	constructor(options: DeezerCatalogOptions = {}) {
		this.baseUrl = (options.baseUrl ?? "https://api.deezer.com").replace(
			/\/+$/,
			"",
		);
		this.timeoutMs = options.timeoutMs ?? 10_000;
		this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
	}

	async searchArtists(
		query: string,
		signal?: AbortSignal,
	): Promise<CatalogArtist[]> {
		const params = new URLSearchParams({ q: query });
		const body = await this.requestJson(
			`/search/artist?${params.toString()}`,
			DeezerArtistListSchema,
			signal,
		);
		return body.data.map((artist) => ({ id: artist.id, name: artist.name }));
	}

	async getTopTracks(
		artistId: number,
		limit: number,
		signal?: AbortSignal,
	): Promise<CatalogTrack[]> {
		const body = await this.requestJson(
			`/artist/${artistId}/top?limit=${limit}`,
			DeezerTrackListSchema,
			signal,
		);
		return body.data.map((track) => ({ title: track.title }));
	}

	async getRelatedArtists(
		artistId: number,
		limit: number,
		signal?: AbortSignal,
	): Promise<CatalogArtist[]> {
		const body = await this.requestJson(
			`/artist/${artistId}/related?limit=${limit}`,
			DeezerArtistListSchema,
			signal,
		);
		return body.data.map((artist) => ({ id: artist.id, name: artist.name }));
	}

	private async requestJson<T>(
		pathname: string,
		schema: ZodType<T, unknown>,
		signal?: AbortSignal,
	): Promise<T> {
		const url = `${this.baseUrl}${pathname}`;
		const timeout = AbortSignal.timeout(this.timeoutMs);
		let response: Response;
		try {
			response = await this.fetchImpl(url, {
				headers: { Accept: "application/json" },
				signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
			});
		} catch (error) {
			throw new Error(
				`Failed to reach ${url}: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}

		if (!response.ok) {
			throw new Error(`Catalog request ${url} failed (${response.status})`);
		}

		const payload: unknown = await response.json();
		const catalogError = DeezerErrorSchema.safeParse(payload);
		if (catalogError.success) {
			const { type, message } = catalogError.data.error;
			throw new Error(
				`Catalog error for ${url}: ${type ? `${type}: ` : ""}${message}`,
			);
		}

		const parsed = schema.safeParse(payload);
		if (!parsed.success) {
			throw new Error(
				`Unexpected catalog response for ${url}: ${parsed.error.message}`,
			);
		}
		return parsed.data;
	}
}
