import type {
	ArtistMetadata,
	RelatedArtist,
} from "@playlist-agents/shared/types";
import type { CatalogClient } from "../external/catalog-client";
import {
	createRandomSource,
	type RandomSource,
	sampleWithoutReplacement,
} from "../lib/random";
import { mapWithConcurrency } from "../lib/semaphore";
import { type Logger, queryLogger } from "../logger";

export const SOURCE_TRACK_LIMIT = 4;
export const RELATED_FETCH_LIMIT = 20;
export const RELATED_SAMPLE_SIZE = 5;
export const RELATED_TRACK_LIMIT = 2;

export interface MetadataFetchOptions {
	catalog: CatalogClient;
	random?: RandomSource;
	/** Max related-artist top-track requests in flight. */
	relatedConcurrency?: number;
	/** Cancels outstanding catalog requests; the fetch then yields null. */
	signal?: AbortSignal;
	log?: Logger;
}

/**
 * Resolves `artistQuery` to its first catalog match and gathers the data
 * the pipeline reasons over. Resolves to null when nothing matches or when
 * any catalog request fails; there is no partial result.
 */
export async function fetchArtistMetadata(
	artistQuery: string,
	options: MetadataFetchOptions,
): Promise<ArtistMetadata | null> {
	const { catalog, relatedConcurrency = 1, signal } = options;
	const random = options.random ?? createRandomSource();
	const log = options.log ?? queryLogger(artistQuery);

	try {
		const matches = await catalog.searchArtists(artistQuery, signal);
		const artist = matches[0];
		if (!artist) {
			log.info("No catalog match for artist query");
			return null;
		}

		const topTracks = await catalog.getTopTracks(
			artist.id,
			SOURCE_TRACK_LIMIT,
			signal,
		);
		const sourceTracks = topTracks
			.slice(0, SOURCE_TRACK_LIMIT)
			.map((track) => track.title);

		const related = await catalog.getRelatedArtists(
			artist.id,
			RELATED_FETCH_LIMIT,
			signal,
		);
		// Sample before any track request starts so the pick does not depend
		// on fetch ordering.
		const sampled = sampleWithoutReplacement(
			related,
			RELATED_SAMPLE_SIZE,
			random,
		);

		const similar = await mapWithConcurrency(
			sampled,
			relatedConcurrency,
			async (relatedArtist, _index, taskSignal): Promise<RelatedArtist> => {
				const tracks = await catalog.getTopTracks(
					relatedArtist.id,
					RELATED_TRACK_LIMIT,
					taskSignal,
				);
				return {
					name: relatedArtist.name,
					tracks: tracks
						.slice(0, RELATED_TRACK_LIMIT)
						.map((track) => track.title),
				};
			},
			signal,
		);

		log.debug(
			{
				artistId: artist.id,
				sourceArtist: artist.name,
				relatedReturned: related.length,
				relatedSampled: similar.length,
			},
			"Fetched artist metadata",
		);

		return { sourceArtist: artist.name, sourceTracks, similar };
	} catch (err) {
		log.warn({ err }, "Artist metadata fetch failed");
		return null;
	}
}
