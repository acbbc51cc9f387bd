import type { ArtistMetadata } from "@playlist-agents/shared/types";

/**
 * Renders metadata as the text block every agent reasons over: the target
 * artist line first, then one line per related artist. Pure.
 */
export function buildArtistContext(metadata: ArtistMetadata): string {
	let context = `TARGET ARTIST: ${metadata.sourceArtist} (Top tracks: ${metadata.sourceTracks.join(", ")})\n`;
	context += "RELATED ARTISTS:\n";
	for (const related of metadata.similar) {
		context += `- ${related.name} (Tracks: ${related.tracks.join(", ")})\n`;
	}
	return context;
}
