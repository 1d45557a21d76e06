/**
 * Network firewall resource types
 *
 * `Network::Firewall`, `Network::FirewallPolicy` and `Network::FirewallRule`
 * over a networking service client. Creation and in-place updates take
 * effect when the call returns; deletion is confirmed by showing the entity
 * until the service answers 404.
 */

import { z } from "zod";
import type {
  BackendContext,
  ResourceBackend,
  ResourceTypeDefinition,
} from "../../polling/protocol.js";
import { formatStatus } from "../../polling/status.js";
import type {
  LifecycleAction,
  PollResult,
  ResourceAttributes,
  ResourceProperties,
} from "../../types.js";
import { callClient } from "../client.js";

// =============================================================================
// Client Interface
// =============================================================================

export type NetworkEntityKind = "firewall" | "firewall_policy" | "firewall_rule";

/** Entity as returned by the networking service */
export type NetworkEntity = { id: string } & Record<string, unknown>;

/**
 * Networking service operations used by the firewall types.
 * Failures are thrown as errors carrying `statusCode`.
 */
export interface NetworkClient {
  createEntity(kind: NetworkEntityKind, body: Record<string, unknown>): Promise<NetworkEntity>;
  updateEntity(kind: NetworkEntityKind, id: string, body: Record<string, unknown>): Promise<void>;
  deleteEntity(kind: NetworkEntityKind, id: string): Promise<void>;
  showEntity(kind: NetworkEntityKind, id: string): Promise<NetworkEntity>;
}

// =============================================================================
// Property Schemas
// =============================================================================

export const firewallPropertiesSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  admin_state_up: z.boolean().default(true),
  firewall_policy_id: z.string().min(1),
});

export const firewallPolicyPropertiesSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  shared: z.boolean().default(false),
  audited: z.boolean().default(false),
  firewall_rules: z.array(z.string()),
});

export const firewallRulePropertiesSchema = z.object({
  name: z.string().optional(),
  description: z.string().optional(),
  shared: z.boolean().default(false),
  protocol: z.enum(["tcp", "udp", "icmp"]).nullable().default(null),
  ip_version: z.enum(["4", "6"]).default("4"),
  source_ip_address: z.string().nullable().default(null),
  destination_ip_address: z.string().nullable().default(null),
  source_port: z.string().nullable().default(null),
  destination_port: z.string().nullable().default(null),
  action: z.enum(["allow", "deny"]).default("deny"),
  enabled: z.boolean().default(true),
});

export type FirewallProperties = z.infer<typeof firewallPropertiesSchema>;
export type FirewallPolicyProperties = z.infer<typeof firewallPolicyPropertiesSchema>;
export type FirewallRuleProperties = z.infer<typeof firewallRulePropertiesSchema>;

// =============================================================================
// Request Bodies
// =============================================================================

/**
 * Body of a create request: unset values are left out and the entity is
 * named after the resource's physical name unless a name was given.
 */
export function prepareCreateBody(
  properties: Readonly<ResourceProperties>,
  physicalName: string,
): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    if (value !== null && value !== undefined) body[key] = value;
  }
  if (body.name === undefined) body.name = physicalName;
  return body;
}

/**
 * Body of an update request; dropped properties are sent as null.
 */
export function prepareUpdateBody(diff: Readonly<ResourceProperties>): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(diff)) {
    body[key] = value === undefined ? null : value;
  }
  return body;
}

// =============================================================================
// Backend
// =============================================================================

class NetworkEntityBackend implements ResourceBackend {
  constructor(
    private kind: NetworkEntityKind,
    private label: string,
    private client: NetworkClient,
    private context: BackendContext,
  ) {}

  async createRemote(properties: ResourceProperties): Promise<string> {
    const body = prepareCreateBody(properties, this.context.physicalName);
    const entity = await callClient(
      () => this.client.createEntity(this.kind, body),
      `Cannot create ${this.label} ${this.context.resourceName}`,
    );
    this.context.logger.debug(`${this.label} created`, { id: entity.id });
    return entity.id;
  }

  async updateRemote(identity: string, diff: ResourceProperties): Promise<void> {
    if (Object.keys(diff).length === 0) return;
    await callClient(
      () => this.client.updateEntity(this.kind, identity, prepareUpdateBody(diff)),
      this.notFound(identity),
    );
  }

  async deleteRemote(identity: string): Promise<void> {
    await callClient(() => this.client.deleteEntity(this.kind, identity), this.notFound(identity));
  }

  async probeStatus(identity: string, action: LifecycleAction): Promise<PollResult> {
    if (action !== "DELETE") {
      return { status: formatStatus(action, "COMPLETE"), reason: null };
    }

    await callClient(() => this.client.showEntity(this.kind, identity), this.notFound(identity));
    return { status: formatStatus("DELETE", "IN_PROGRESS"), reason: null };
  }

  async showAttributes(identity: string): Promise<ResourceAttributes> {
    return callClient(() => this.client.showEntity(this.kind, identity), this.notFound(identity));
  }

  private notFound(identity: string): string {
    return `${this.label} ${identity} not found`;
  }
}

// =============================================================================
// Type Definitions
// =============================================================================

export const FIREWALL_TYPE = "Network::Firewall";
export const FIREWALL_POLICY_TYPE = "Network::FirewallPolicy";
export const FIREWALL_RULE_TYPE = "Network::FirewallRule";

export function createFirewallType(client: NetworkClient): ResourceTypeDefinition {
  return {
    type: FIREWALL_TYPE,
    description: "Firewall of the networking service",
    schema: firewallPropertiesSchema,
    replaceOnUpdate: [],
    attributes: [
      "name",
      "description",
      "admin_state_up",
      "firewall_policy_id",
      "status",
      "tenant_id",
    ],
    createBackend: (context) => new NetworkEntityBackend("firewall", "Firewall", client, context),
  };
}

export function createFirewallPolicyType(client: NetworkClient): ResourceTypeDefinition {
  return {
    type: FIREWALL_POLICY_TYPE,
    description: "Ordered collection of firewall rules",
    schema: firewallPolicyPropertiesSchema,
    replaceOnUpdate: [],
    attributes: ["name", "description", "firewall_rules", "shared", "audited", "tenant_id"],
    createBackend: (context) =>
      new NetworkEntityBackend("firewall_policy", "FirewallPolicy", client, context),
  };
}

export function createFirewallRuleType(client: NetworkClient): ResourceTypeDefinition {
  return {
    type: FIREWALL_RULE_TYPE,
    description: "Single allow/deny rule of a firewall policy",
    schema: firewallRulePropertiesSchema,
    replaceOnUpdate: [],
    attributes: [
      "name",
      "description",
      "firewall_policy_id",
      "shared",
      "protocol",
      "ip_version",
      "source_ip_address",
      "destination_ip_address",
      "source_port",
      "destination_port",
      "action",
      "enabled",
      "position",
      "tenant_id",
    ],
    createBackend: (context) =>
      new NetworkEntityBackend("firewall_rule", "FirewallRule", client, context),
  };
}

/**
 * All three firewall types bound to one client
 */
export function createFirewallTypes(client: NetworkClient): ResourceTypeDefinition[] {
  return [
    createFirewallType(client),
    createFirewallPolicyType(client),
    createFirewallRuleType(client),
  ];
}
