import z from "zod";

/**
 * Deezer answers failures with HTTP 200 and an `error` object instead of
 * `data`, so every response is checked against this first.
 */
export const DeezerErrorSchema = z.object({
	error: z.object({
		type: z.string().optional(),
		message: z.string(),
		code: z.number().optional(),
	}),
});

export const DeezerArtistSchema = z
	.object({
		id: z.number(),
		name: z.string(),
	})
	.passthrough();

export const DeezerTrackSchema = z
	.object({
		id: z.number().optional(),
		title: z.string(),
	})
	.passthrough();

function deezerListSchema<T extends z.ZodTypeAny>(item: T) {
	// A missing `data` key is an empty listing, not a failure.
	return z.object({ data: z.array(item).default([]) }).passthrough();
}

export const DeezerArtistListSchema = deezerListSchema(DeezerArtistSchema);
export const DeezerTrackListSchema = deezerListSchema(DeezerTrackSchema);

export type DeezerError = z.infer<typeof DeezerErrorSchema>;
export type DeezerArtist = z.infer<typeof DeezerArtistSchema>;
export type DeezerTrack = z.infer<typeof DeezerTrackSchema>;
