export { Supervisor, type AgentName, type DelegationOutcome, type SupervisorDeps } from "./supervisor.js";
