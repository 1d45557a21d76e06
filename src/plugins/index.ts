/**
 * Bundled resource types
 */

export {
  isClientError,
  createClientError,
  translateClientError,
  callClient,
  type ClientError,
} from "./client.js";

// Networking
export {
  createFirewallType,
  createFirewallPolicyType,
  createFirewallRuleType,
  createFirewallTypes,
  prepareCreateBody,
  prepareUpdateBody,
  firewallPropertiesSchema,
  firewallPolicyPropertiesSchema,
  firewallRulePropertiesSchema,
  FIREWALL_TYPE,
  FIREWALL_POLICY_TYPE,
  FIREWALL_RULE_TYPE,
  type NetworkClient,
  type NetworkEntity,
  type NetworkEntityKind,
  type FirewallProperties,
  type FirewallPolicyProperties,
  type FirewallRuleProperties,
} from "./network/firewall.js";

// Orchestration
export {
  createRemoteStackType,
  flattenOutputs,
  remoteStackPropertiesSchema,
  REMOTE_STACK_TYPE,
  type OrchestrationClient,
  type RemoteStackRecord,
  type RemoteStackProperties,
  type RemoteStackTypeOptions,
  type StackOutput,
  type StackRequest,
} from "./orchestration/remote-stack.js";
