export type ParsedArgs = {
	positionals: string[];
	flags: Map<string, string | boolean>;
};

/** Single-letter aliases accepted as `-x value`. */
const SHORT_FLAGS: Record<string, string> = {
	s: "server",
	l: "language",
	h: "help",
};

/** Flags that never take a value, so `-h Foo` leaves `Foo` positional. */
const SWITCH_FLAGS = new Set(["help", "json", "clear-language"]);

function isFlagToken(part: string): boolean {
	return part.startsWith("--") || /^-[A-Za-z]$/.test(part);
}

export function parseArgs(argv: string[]): ParsedArgs {
	const flags = new Map<string, string | boolean>();
	const positionals: string[] = [];

	for (let i = 0; i < argv.length; i += 1) {
		const part = argv[i];
		let key: string;
		if (part.startsWith("--")) {
			const eqIndex = part.indexOf("=");
			if (eqIndex !== -1) {
				flags.set(part.slice(2, eqIndex), part.slice(eqIndex + 1));
				continue;
			}
			key = part.slice(2);
		} else if (/^-[A-Za-z]$/.test(part) && part.slice(1) in SHORT_FLAGS) {
			key = SHORT_FLAGS[part.slice(1)];
		} else {
			positionals.push(part);
			continue;
		}

		const next = argv[i + 1];
		if (!SWITCH_FLAGS.has(key) && next !== undefined && !isFlagToken(next)) {
			flags.set(key, next);
			i += 1;
			continue;
		}
		flags.set(key, true);
	}

	return { positionals, flags };
}

export function getFlagString(
	parsed: ParsedArgs,
	...keys: string[]
): string | undefined {
	for (const key of keys) {
		const value = parsed.flags.get(key);
		if (typeof value === "string" && value.length > 0) {
			return value;
		}
	}
	return undefined;
}

/** Integer flag value; throws when present but not an integer. */
export function getFlagInt(
	parsed: ParsedArgs,
	...keys: string[]
): number | undefined {
	const raw = getFlagString(parsed, ...keys);
	if (raw === undefined) return undefined;
	const value = Number(raw);
	if (!Number.isInteger(value)) {
		throw new Error(`--${keys[0]} must be an integer, got "${raw}"`);
	}
	return value;
}

/** Flag value restricted to `choices`; throws on anything else. */
export function getFlagChoice<T extends string>(
	parsed: ParsedArgs,
	choices: readonly T[],
	...keys: string[]
): T | undefined {
	const raw = getFlagString(parsed, ...keys);
	if (raw === undefined) return undefined;
	const match = choices.find((choice) => choice === raw);
	if (!match) {
		throw new Error(
			`--${keys[0]} must be one of ${choices.join(", ")}, got "${raw}"`,
		);
	}
	return match;
}

export function hasFlag(parsed: ParsedArgs, ...keys: string[]): boolean {
	for (const key of keys) {
		if (parsed.flags.has(key)) return true;
	}
	return false;
}
