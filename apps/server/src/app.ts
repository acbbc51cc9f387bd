import { randomUUID } from "node:crypto";
import { Hono } from "hono";
import { logger } from "./logger";
import {
	createPlaylistRoutes,
	type PlaylistRouteDeps,
} from "./routes/playlist";

export function createApp(deps: PlaylistRouteDeps): Hono {
	const app = new Hono();

	app.onError((err, c) => {
		logger.error(
			{ err, method: c.req.method, path: c.req.path },
			"Unhandled request error",
		);
		return c.json({ error: "Internal server error", message: err.message }, 500);
	});

	// Request lifecycle logging with request IDs for easier tracing.
	app.use("*", async (c, next) => {
		const requestId = c.req.header("x-request-id") ?? randomUUID();
		c.header("x-request-id", requestId);
		const startedAt = performance.now();
		const requestLogger = logger.child({
			requestId,
			method: c.req.method,
			path: c.req.path,
		});

		try {
			await next();
		} finally {
			const durationMs = Math.round((performance.now() - startedAt) * 10) / 10;
			const status = c.res.status || 200;
			const level =
				status >= 500
					? "error"
					: status >= 400
						? "warn"
						: c.req.path === "/health"
							? "debug"
							: "info";
			requestLogger[level]({ status, durationMs }, "HTTP request completed");
		}
	});

	app.get("/health", (c) => c.json({ ok: true }));

	app.route("/api/playlist", createPlaylistRoutes(deps));

	return app;
}
