import type { AgentResult } from "./types";

export const AGENT_FAILURE_PREFIX = "Agent execution failed";

/** Display form of a result; failures read the way a user should see them. */
export function formatAgentResult(result: AgentResult): string {
	return result.ok ? result.text : `${AGENT_FAILURE_PREFIX}: ${result.reason}`;
}
