import os from "node:os";
import path from "node:path";

const APP_DIR_NAME = "playlist-agents";

export function getConfigRoot(): string {
	const xdg = process.env.XDG_CONFIG_HOME;
	if (xdg && xdg.trim().length > 0) {
		return path.join(xdg, APP_DIR_NAME);
	}
	return path.join(os.homedir(), ".config", APP_DIR_NAME);
}
