/**
 * Command line parsing for deploy-stack
 */

export interface CliOptions {
  stackName?: string;
  templatePath?: string;
  region?: string;
  profile?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  public readonly code = 'INVALID_USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const VALUE_FLAGS = new Map<string, keyof Omit<CliOptions, 'help'>>([
  ['--stack-name', 'stackName'],
  ['--template', 'templatePath'],
  ['--region', 'region'],
  ['--profile', 'profile'],
]);

/**
 * Parses command line arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    const field = VALUE_FLAGS.get(arg);
    if (!field) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }

    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new CliUsageError(`Option ${arg} requires a value`);
    }
    options[field] = next;
    i++;
  }

  return options;
}

export function helpText(): string {
  return `
Stack Deployer

Creates one CloudFormation stack from a template file and waits until
the stack is created.

Usage:
  deploy-stack [options]

Options:
  --stack-name <name>    Name of the stack to create (default: my-iac-stack)
  --template <path>      Path to the template file (default: cloudformation/main.yaml)
  --region <region>      AWS region (default: SDK resolution, e.g. AWS_REGION)
  --profile <profile>    AWS profile to use
  --help, -h             Show this help message

Environment Variables:
  DEPLOY_STACK_NAME      Stack name when --stack-name is not given
  DEPLOY_TEMPLATE_PATH   Template path when --template is not given
  AWS_REGION             Default AWS region
  AWS_PROFILE            Default AWS profile
  LOG_LEVEL              DEBUG, INFO, WARN or ERROR (default: INFO)
`;
}
