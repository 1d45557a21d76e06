/**
 * Polling Module Index
 */

export { formatStatus, classifyStatus, parseStatus, isTerminal } from "./status.js";
export type { ResourceBackend, BackendContext, ResourceTypeDefinition } from "./protocol.js";
