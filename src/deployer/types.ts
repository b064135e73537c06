/**
 * Stack Deployer Types
 */

/**
 * Capability acknowledgment sent with every creation request. The
 * service refuses templates that create IAM resources without it.
 */
export const STACK_CAPABILITIES = ['CAPABILITY_IAM'] as const;

export type StackCapability = (typeof STACK_CAPABILITIES)[number];

export interface DeployRequest {
  stackName: string;
  templatePath: string;
}

export interface CreateStackInput {
  stackName: string;
  templateBody: string;
  capabilities: StackCapability[];
  clientRequestToken: string;
}

export interface CreateStackOutput {
  stackId?: string;
}

/** Only the successful terminal status resolves a wait */
export type StackCompleteStatus = 'CREATE_COMPLETE';

export type DeploymentPhase = 'pending' | 'done';

export interface DeployResult {
  stackName: string;
  stackId?: string;
  status: StackCompleteStatus;
  durationMs: number;
}

export interface StackFailureSignal {
  logicalId: string;
  resourceType: string;
  resourceStatus: string;
  statusReason: string;
  timestamp: Date;
  physicalResourceId?: string;
}
