/**
 * Remote stack resource type
 *
 * `Orchestration::Stack` manages a whole stack on an orchestration service,
 * possibly in another region. Progress is observed through the remote
 * stack's own `<ACTION>_<PHASE>` status.
 */

import { z } from "zod";
import { ValidationFailedError, formatErrorMessage } from "../../errors.js";
import type {
  BackendContext,
  ResourceBackend,
  ResourceTypeDefinition,
} from "../../polling/protocol.js";
import type { PollResult, ResourceAttributes, ResourceProperties } from "../../types.js";
import { callClient } from "../client.js";

// =============================================================================
// Client Interface
// =============================================================================

export type StackOutput = {
  output_key: string;
  output_value: unknown;
  description?: string;
};

export type RemoteStackRecord = {
  id: string;
  stack_name: string;
  stack_status: string;
  stack_status_reason?: string | null;
  outputs?: StackOutput[] | null;
};

export type StackRequest = {
  template: string | Record<string, unknown>;
  parameters: Record<string, unknown>;
  files: Record<string, string>;
  timeoutMins?: number;
  disableRollback: boolean;
  environment?: Record<string, unknown>;
};

/**
 * Orchestration service operations for one region
 */
export interface OrchestrationClient {
  createStack(request: StackRequest & { stackName: string }): Promise<{ id: string }>;
  updateStack(stackId: string, request: StackRequest): Promise<void>;
  deleteStack(stackId: string): Promise<void>;
  suspendStack(stackId: string): Promise<void>;
  resumeStack(stackId: string): Promise<void>;
  getStack(stackId: string): Promise<RemoteStackRecord>;
  validateTemplate(
    template: string | Record<string, unknown>,
    files: Record<string, string>,
  ): Promise<void>;
}

export type RemoteStackTypeOptions = {
  /** Region used when the properties name none */
  defaultRegion: string;
  /** Connect to the service of a region; throws when it is unreachable */
  clientForRegion(region: string): OrchestrationClient;
  /** Environment passed with every create and update */
  environment?: Record<string, unknown>;
};

// =============================================================================
// Property Schema
// =============================================================================

export const remoteStackPropertiesSchema = z.object({
  context: z
    .object({
      region_name: z.string().min(1).optional(),
    })
    .optional(),
  template: z.union([z.string().min(1), z.record(z.string(), z.unknown())]),
  timeout: z.number().int().positive().optional(),
  parameters: z.record(z.string(), z.unknown()).default({}),
  files: z.record(z.string(), z.string()).default({}),
});

export type RemoteStackProperties = z.infer<typeof remoteStackPropertiesSchema>;

/**
 * Flatten a stack's output list into a key → value map
 */
export function flattenOutputs(
  outputs: readonly StackOutput[] | null | undefined,
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const output of outputs ?? []) {
    result[output.output_key] = output.output_value;
  }
  return result;
}

// =============================================================================
// Backend
// =============================================================================

class RemoteStackBackend implements ResourceBackend {
  private properties: RemoteStackProperties;
  private client: OrchestrationClient | null = null;

  constructor(
    private options: RemoteStackTypeOptions,
    private context: BackendContext,
  ) {
    this.properties = remoteStackPropertiesSchema.parse(context.properties);
  }

  get region(): string {
    return this.properties.context?.region_name ?? this.options.defaultRegion;
  }

  async validate(properties: ResourceProperties): Promise<void> {
    const parsed = remoteStackPropertiesSchema.parse(properties);
    const region = parsed.context?.region_name ?? this.options.defaultRegion;

    let client: OrchestrationClient;
    try {
      client = this.options.clientForRegion(region);
    } catch (error) {
      throw new ValidationFailedError(
        `Cannot establish connection to orchestration endpoint at region "${region}" ` +
          `due to "${formatErrorMessage(error)}"`,
      );
    }

    try {
      await client.validateTemplate(parsed.template, parsed.files);
    } catch (error) {
      throw new ValidationFailedError(
        `Failed validating stack template using orchestration endpoint at region "${region}" ` +
          `due to "${formatErrorMessage(error)}"`,
      );
    }
  }

  async createRemote(properties: ResourceProperties): Promise<string> {
    this.properties = remoteStackPropertiesSchema.parse(properties);
    const stackName = this.context.physicalName;
    const created = await callClient(
      () => this.connect().createStack({ ...this.request(this.properties), stackName }),
      `Cannot create stack ${stackName}`,
    );
    this.context.logger.info(`Remote stack ${stackName} requested`, {
      id: created.id,
      region: this.region,
    });
    return created.id;
  }

  async updateRemote(
    identity: string,
    _diff: ResourceProperties,
    properties: ResourceProperties,
  ): Promise<void> {
    const next = remoteStackPropertiesSchema.parse(properties);
    await callClient(
      () => this.connect().updateStack(identity, this.request(next)),
      this.notFound(identity),
    );
    this.properties = next;
  }

  async deleteRemote(identity: string): Promise<void> {
    await callClient(() => this.connect().deleteStack(identity), this.notFound(identity));
  }

  async suspendRemote(identity: string): Promise<void> {
    await callClient(() => this.connect().suspendStack(identity), this.notFound(identity));
  }

  async resumeRemote(identity: string): Promise<void> {
    await callClient(() => this.connect().resumeStack(identity), this.notFound(identity));
  }

  async probeStatus(identity: string): Promise<PollResult> {
    const stack = await callClient(() => this.connect().getStack(identity), this.notFound(identity));
    return { status: stack.stack_status, reason: stack.stack_status_reason || null };
  }

  async showAttributes(identity: string): Promise<ResourceAttributes> {
    const stack = await callClient(() => this.connect().getStack(identity), this.notFound(identity));
    return {
      stack_name: stack.stack_name,
      outputs: flattenOutputs(stack.outputs),
    };
  }

  private connect(): OrchestrationClient {
    if (!this.client) {
      this.client = this.options.clientForRegion(this.region);
    }
    return this.client;
  }

  private request(properties: RemoteStackProperties): StackRequest {
    return {
      template: properties.template,
      parameters: properties.parameters,
      files: properties.files,
      timeoutMins: properties.timeout,
      disableRollback: true,
      environment: this.options.environment,
    };
  }

  private notFound(identity: string): string {
    return `Stack ${identity} not found`;
  }
}

// =============================================================================
// Type Definition
// =============================================================================

export const REMOTE_STACK_TYPE = "Orchestration::Stack";

export function createRemoteStackType(options: RemoteStackTypeOptions): ResourceTypeDefinition {
  return {
    type: REMOTE_STACK_TYPE,
    description: "Stack managed on an orchestration service, possibly in another region",
    schema: remoteStackPropertiesSchema,
    replaceOnUpdate: ["context"],
    attributes: ["stack_name", "outputs"],
    createBackend: (context) => new RemoteStackBackend(options, context),
  };
}
