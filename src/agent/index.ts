export { TerminalAgent, type TerminalAgentOptions } from "./terminal-agent.js";
export { formatResult } from "./format.js";
export { success, failure, categorizeCommandFailure, describeFsError, type FailureDetails } from "./results.js";
