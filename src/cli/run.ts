import { ConfigManager } from '../config/config-manager';
import { CloudFormationStackService } from '../deployer/cloudformation-stack-service';
import { Deployer } from '../deployer/deployer';
import { isErrorLike } from '../deployer/errors';
import { StackService } from '../deployer/stack-service';
import { Logger, logger as defaultLogger } from '../logger/logger';
import { helpText, parseArgs } from './args';

export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  createStackService?: (aws: { region?: string; profile?: string }, logger: Logger) => StackService;
}

/**
 * Runs the deploy-stack command and resolves to the process exit code
 */
export async function run(args: string[], deps: RunDependencies = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const createStackService =
    deps.createStackService ??
    ((aws, logger) => new CloudFormationStackService({ ...aws, logger }));

  try {
    const options = parseArgs(args);
    if (options.help) {
      print(helpText());
      return 0;
    }

    const config = new ConfigManager(deps.env ?? process.env).getConfig({
      stackName: options.stackName,
      templatePath: options.templatePath,
      region: options.region,
      profile: options.profile,
    });
    const logger = (deps.logger ?? defaultLogger).withLevel(config.logLevel);

    const deployer = new Deployer({
      stackService: createStackService(config.aws, logger),
      logger,
      print,
    });
    await deployer.deployStack({
      stackName: config.stack.name,
      templatePath: config.stack.templatePath,
    });

    return 0;
  } catch (error) {
    printError(`Error: ${isErrorLike(error) ? error.message : String(error)}`);
    return 1;
  }
}
