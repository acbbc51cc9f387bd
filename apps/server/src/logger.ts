import pino from "pino";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const isDev = process.env.NODE_ENV !== "production" && !isTest;

const LOG_LEVEL =
	process.env.LOG_LEVEL ?? (isTest ? "silent" : isDev ? "debug" : "info");
const LOG_SESSION_ID = new Date().toISOString().replace(/[:.]/g, "-");

const transportTargets: pino.TransportTargetOptions[] = [];

if (isDev) {
	transportTargets.push({
		target: "pino-pretty",
		level: LOG_LEVEL,
		options: {
			colorize: true,
			ignore: "pid,hostname",
			translateTime: "HH:MM:ss",
			singleLine: false,
		},
	});
}

export const logger = pino(
	{
		level: LOG_LEVEL,
		base: {
			service: "playlist-agents-server",
			logSessionId: LOG_SESSION_ID,
		},
		redact: {
			paths: [
				"req.headers.authorization",
				"headers.authorization",
				"apiKey",
				"openrouterApiKey",
			],
			remove: true,
		},
	},
	transportTargets.length > 0
		? pino.transport({ targets: transportTargets })
		: undefined,
);

export type Logger = pino.Logger;

export const loggingConfig = {
	level: LOG_LEVEL,
	logSessionId: LOG_SESSION_ID,
};

/** Create a child logger scoped to one artist lookup */
export function queryLogger(query: string) {
	return logger.child({ query });
}

/** Create a child logger scoped to one pipeline stage */
export function stageLogger(stage: string) {
	return logger.child({ stage });
}
