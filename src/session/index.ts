export { AssistantSession, type AssistantSessionOptions, type SessionState } from "./session.js";
export { startRepl, type ReplOptions } from "./repl.js";
export { HELP_TEXT } from "./help.js";
