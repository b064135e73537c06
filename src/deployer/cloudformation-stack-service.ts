/**
 * CloudFormation implementation of StackService using AWS SDK v3
 *
 * Polling is delegated to the SDK's waitUntilStackCreateComplete waiter;
 * every SDK or waiter failure leaves this class as a DeployError.
 */

import {
  CloudFormationClient,
  CreateStackCommand,
  waitUntilStackCreateComplete,
} from '@aws-sdk/client-cloudformation';
import { Logger, logger as defaultLogger } from '../logger/logger';
import { collectStackFailureSignals } from './collectors';
import {
  isErrorLike,
  StackCreateFailedError,
  StackCreateRejectedError,
  StackWaitTimeoutError,
} from './errors';
import { StackService } from './stack-service';
import {
  CreateStackInput,
  CreateStackOutput,
  StackCompleteStatus,
  StackFailureSignal,
} from './types';

// Same bound as the classic stack_create_complete waiter: 120 polls, 30s apart
export const STACK_CREATE_MAX_WAIT_SECONDS = 3600;
export const STACK_CREATE_MIN_DELAY_SECONDS = 30;

export interface CloudFormationStackServiceOptions {
  region?: string;
  profile?: string;
  client?: CloudFormationClient;
  logger?: Logger;
}

export class CloudFormationStackService implements StackService {
  private readonly client: CloudFormationClient;
  private readonly logger: Logger;

  constructor(options: CloudFormationStackServiceOptions = {}) {
    this.client =
      options.client ??
      new CloudFormationClient({
        ...(options.region ? { region: options.region } : {}),
        ...(options.profile ? { profile: options.profile } : {}),
      });
    this.logger = options.logger ?? defaultLogger;
  }

  async createStack(input: CreateStackInput): Promise<CreateStackOutput> {
    try {
      const response = await this.client.send(
        new CreateStackCommand({
          StackName: input.stackName,
          TemplateBody: input.templateBody,
          Capabilities: input.capabilities,
          ClientRequestToken: input.clientRequestToken,
        })
      );

      return { stackId: response.StackId };
    } catch (error) {
      throw new StackCreateRejectedError(input.stackName, error);
    }
  }

  async waitForCreateComplete(stackName: string): Promise<StackCompleteStatus> {
    try {
      await waitUntilStackCreateComplete(
        {
          client: this.client,
          maxWaitTime: STACK_CREATE_MAX_WAIT_SECONDS,
          minDelay: STACK_CREATE_MIN_DELAY_SECONDS,
        },
        { StackName: stackName }
      );
    } catch (error) {
      if (isErrorLike(error) && error.name === 'TimeoutError') {
        throw new StackWaitTimeoutError(stackName, STACK_CREATE_MAX_WAIT_SECONDS, error);
      }

      const signals = await this.collectFailureSignals(stackName);
      throw new StackCreateFailedError(stackName, signals, error);
    }

    return 'CREATE_COMPLETE';
  }

  private async collectFailureSignals(stackName: string): Promise<StackFailureSignal[]> {
    try {
      return await collectStackFailureSignals(this.client, stackName);
    } catch (error) {
      this.logger.warn('Could not collect stack failure signals', {
        stackName,
        reason: isErrorLike(error) ? error.message : String(error),
      });
      return [];
    }
  }
}
