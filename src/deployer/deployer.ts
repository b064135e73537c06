/**
 * Stack Deployer
 *
 * Reads a template, submits one stack creation request and blocks until
 * the stack service reports a terminal state. Prints a single
 * confirmation line on success.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger, logger as defaultLogger } from '../logger/logger';
import {
  DeployError,
  isDeployError,
  StackCreateFailedError,
  StackCreateRejectedError,
  TemplateReadError,
} from './errors';
import { StackService } from './stack-service';
import { readTemplate } from './template';
import { DeployRequest, DeployResult, DeploymentPhase, STACK_CAPABILITIES } from './types';

export interface DeployerOptions {
  stackService: StackService;
  logger?: Logger;
  print?: (line: string) => void;
  onPhaseChange?: (phase: DeploymentPhase, stackName: string) => void;
}

export function successMessage(stackName: string): string {
  return `Stack ${stackName} created successfully.`;
}

export class Deployer {
  private readonly stackService: StackService;
  private readonly logger: Logger;
  private readonly print: (line: string) => void;
  private readonly onPhaseChange?: (phase: DeploymentPhase, stackName: string) => void;

  constructor(options: DeployerOptions) {
    this.stackService = options.stackService;
    this.logger = options.logger ?? defaultLogger;
    this.print = options.print ?? ((line: string) => console.log(line));
    this.onPhaseChange = options.onPhaseChange;
  }

  async deployStack(request: DeployRequest): Promise<DeployResult> {
    const { stackName, templatePath } = request;
    const startTime = Date.now();

    let templateBody: string;
    try {
      templateBody = await readTemplate(templatePath);
    } catch (error) {
      throw new TemplateReadError(stackName, templatePath, error);
    }

    if (!stackName) {
      throw new StackCreateRejectedError(stackName, new Error('Stack name must not be empty'));
    }
    this.logger.debug('Template loaded', { templatePath, bytes: Buffer.byteLength(templateBody) });

    let stackId: string | undefined;
    try {
      const output = await this.stackService.createStack({
        stackName,
        templateBody,
        capabilities: [...STACK_CAPABILITIES],
        clientRequestToken: `deploy-${uuidv4()}`,
      });
      stackId = output.stackId;
    } catch (error) {
      throw normalize(error, () => new StackCreateRejectedError(stackName, error));
    }
    this.logger.info('Stack creation submitted', { stackName, stackId });
    this.setPhase('pending', stackName);

    try {
      await this.stackService.waitForCreateComplete(stackName);
    } catch (error) {
      this.setPhase('done', stackName);
      const deployError = normalize(error, () => new StackCreateFailedError(stackName, [], error));
      this.logger.error('Stack creation did not complete', deployError, {
        stackName,
        code: deployError.code,
        failureSignals:
          deployError instanceof StackCreateFailedError ? deployError.failureSignals : undefined,
      });
      throw deployError;
    }
    this.setPhase('done', stackName);

    const durationMs = Date.now() - startTime;
    this.logger.info('Stack created', { stackName, stackId, durationMs });
    this.print(successMessage(stackName));

    return { stackName, stackId, status: 'CREATE_COMPLETE', durationMs };
  }

  private setPhase(phase: DeploymentPhase, stackName: string): void {
    this.logger.debug('Deployment phase changed', { stackName, phase });
    this.onPhaseChange?.(phase, stackName);
  }
}

/**
 * Convenience wrapper for a one-off deployment
 */
export async function deployStack(
  stackName: string,
  templatePath: string,
  options: DeployerOptions
): Promise<DeployResult> {
  return new Deployer(options).deployStack({ stackName, templatePath });
}

function normalize(error: unknown, fallback: () => DeployError): DeployError {
  return isDeployError(error) ? error : fallback();
}
