import { CreateStackInput, CreateStackOutput, StackCompleteStatus } from './types';

/**
 * Remote operations the deployer needs from an infrastructure service.
 *
 * Implementations own polling, backoff and timeout. They should reject
 * with a DeployError subclass; anything else is normalized by the
 * deployer according to the step it came from.
 */
export interface StackService {
  /**
   * Submit a stack creation request. Rejects if the service refuses it.
   */
  createStack(input: CreateStackInput): Promise<CreateStackOutput>;

  /**
   * Block until the named stack reaches a terminal state. Resolves only
   * on successful creation.
   */
  waitForCreateComplete(stackName: string): Promise<StackCompleteStatus>;
}
