import { describe, expect, it } from "vitest";
import { mulberry32 } from "../lib/random";
import { fetchArtistMetadata } from "../playlist/metadata-fetcher";
import { createEchoCatalog, FakeCatalog } from "./fakes";

const echoRelatedNames = [1, 2, 3, 4, 5, 6].map((n) => `Related ${n}`);

function smallCatalog(relatedCount: number): FakeCatalog {
	const related = Array.from({ length: relatedCount }, (_, i) => ({
		id: 200 + i,
		name: `Neighbour ${i + 1}`,
		tracks: ["First", "Second", "Third"],
	}));
	return new FakeCatalog([
		{
			id: 2,
			name: "Solo Act",
			tracks: ["One", "Two", "Three", "Four", "Five", "Six"],
			related: related.map((artist) => artist.id),
		},
		...related,
	]);
}

describe("fetchArtistMetadata", () => {
	it("returns null when the search has no match", async () => {
		const catalog = createEchoCatalog();
		const result = await fetchArtistMetadata("Zzyzx123", { catalog });
		expect(result).toBeNull();
		expect(catalog.calls).toEqual(["search:Zzyzx123"]);
	});

	it("uses only the first search match", async () => {
		const catalog = new FakeCatalog([
			{ id: 1, name: "Echo", tracks: ["A"] },
			{ id: 2, name: "Echo Chamber", tracks: ["B"] },
		]);
		const result = await fetchArtistMetadata("echo", { catalog });
		expect(result).toEqual({
			sourceArtist: "Echo",
			sourceTracks: ["A"],
			similar: [],
		});
		expect(catalog.calls).toEqual(["search:echo", "top:1:4", "related:1:20"]);
	});

	it("samples exactly five distinct related artists out of more", async () => {
		const catalog = createEchoCatalog();
		const result = await fetchArtistMetadata("Echo", {
			catalog,
			random: mulberry32(99),
		});

		expect(result?.sourceArtist).toBe("Echo");
		expect(result?.sourceTracks).toEqual(["Echo Song A", "Echo Song B"]);
		const names = result?.similar.map((artist) => artist.name) ?? [];
		expect(names).toHaveLength(5);
		expect(new Set(names).size).toBe(5);
		for (const name of names) {
			expect(echoRelatedNames).toContain(name);
		}
		for (const artist of result?.similar ?? []) {
			expect(artist.tracks).toEqual([`${artist.name} Hit`]);
		}
		// search + top + related + one request per sampled artist
		expect(catalog.calls).toHaveLength(8);
	});

	it("reproduces the same sample for the same seed", async () => {
		const first = await fetchArtistMetadata("Echo", {
			catalog: createEchoCatalog(),
			random: mulberry32(1234),
		});
		const second = await fetchArtistMetadata("Echo", {
			catalog: createEchoCatalog(),
			random: mulberry32(1234),
		});
		expect(first).toEqual(second);
	});

	it("follows the injected random source", async () => {
		const result = await fetchArtistMetadata("Echo", {
			catalog: createEchoCatalog(),
			random: () => 0,
		});
		expect(result?.similar.map((artist) => artist.name)).toEqual(
			echoRelatedNames.slice(0, 5),
		);
	});

	it("keeps every related artist in order when five or fewer come back", async () => {
		const result = await fetchArtistMetadata("Solo", {
			catalog: smallCatalog(3),
			random: () => 0.999999,
		});
		expect(result?.similar.map((artist) => artist.name)).toEqual([
			"Neighbour 1",
			"Neighbour 2",
			"Neighbour 3",
		]);
	});

	it("truncates track lists the catalog over-delivers", async () => {
		const result = await fetchArtistMetadata("Solo", {
			catalog: smallCatalog(1),
		});
		expect(result).toEqual({
			sourceArtist: "Solo Act",
			sourceTracks: ["One", "Two", "Three", "Four"],
			similar: [{ name: "Neighbour 1", tracks: ["First", "Second"] }],
		});
	});

	it.each([
		"search:Echo",
		"top:1:4",
		"related:1:20",
		"top:103:2",
	])("returns null when %s fails", async (failingCall) => {
		const catalog = createEchoCatalog();
		catalog.failOn = failingCall;
		const result = await fetchArtistMetadata("Echo", {
			catalog,
			random: () => 0,
		});
		expect(result).toBeNull();
	});

	it("sends no catalog request after a related-track lookup fails", async () => {
		const catalog = createEchoCatalog();
		catalog.failOn = "top:102:2";

		const result = await fetchArtistMetadata("Echo", {
			catalog,
			random: () => 0,
		});
		await new Promise((resolve) => setTimeout(resolve, 20));

		expect(result).toBeNull();
		expect(catalog.calls).toEqual([
			"search:Echo",
			"top:1:4",
			"related:1:20",
			"top:101:2",
			"top:102:2",
		]);
	});

	it("returns null without calling the catalog once the signal has aborted", async () => {
		const catalog = createEchoCatalog();
		const controller = new AbortController();
		controller.abort(new Error("client disconnected"));

		const result = await fetchArtistMetadata("Echo", {
			catalog,
			signal: controller.signal,
		});

		expect(result).toBeNull();
		expect(catalog.calls).toEqual([]);
	});

	it("stops fetching related tracks when the signal aborts mid-way", async () => {
		const catalog = createEchoCatalog();
		const controller = new AbortController();
		catalog.trackDelayMs = (artistId) => {
			if (artistId === 101) controller.abort(new Error("client disconnected"));
			return 0;
		};

		const result = await fetchArtistMetadata("Echo", {
			catalog,
			random: () => 0,
			signal: controller.signal,
		});
		await new Promise((resolve) => setTimeout(resolve, 20));

		expect(result).toBeNull();
		expect(catalog.calls).toEqual([
			"search:Echo",
			"top:1:4",
			"related:1:20",
			"top:101:2",
		]);
	});

	it("keeps sampled order when related tracks are fetched concurrently", async () => {
		const catalog = createEchoCatalog();
		// Earlier artists answer later.
		catalog.trackDelayMs = (artistId) =>
			artistId > 100 ? (107 - artistId) * 5 : 0;

		const result = await fetchArtistMetadata("Echo", {
			catalog,
			random: () => 0,
			relatedConcurrency: 5,
		});

		expect(result?.similar.map((artist) => artist.name)).toEqual(
			echoRelatedNames.slice(0, 5),
		);
	});
});
