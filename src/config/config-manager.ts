/**
 * Configuration Management
 * Reads deployer settings from environment variables and validates them
 * with zod. AWS credentials are never read here; the SDK resolves them.
 */

import { z } from 'zod';

export const DEFAULT_STACK_NAME = 'my-iac-stack';
export const DEFAULT_TEMPLATE_PATH = 'cloudformation/main.yaml';

// Empty environment variables count as unset
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

export const DeployerEnvSchema = z
  .object({
    DEPLOY_STACK_NAME: optionalString,
    DEPLOY_TEMPLATE_PATH: optionalString,
    AWS_REGION: optionalString,
    AWS_PROFILE: optionalString,
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === 'string' && value !== '' ? value.toUpperCase() : undefined),
      z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']).optional()
    ),
  })
  .passthrough(); // Allow other env vars

export type DeployerEnv = z.infer<typeof DeployerEnvSchema>;

export const DeployerConfigSchema = z.object({
  stack: z.object({
    name: z.string().min(1, 'stack name must not be empty'),
    templatePath: z.string().min(1, 'template path must not be empty'),
  }),
  aws: z.object({
    region: z.string().optional(),
    profile: z.string().optional(),
  }),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']),
});

export type DeployerConfig = z.infer<typeof DeployerConfigSchema>;

export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  constructor(message: string, public readonly details: string[]) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export type ConfigOverrides = {
  stackName?: string;
  templatePath?: string;
  region?: string;
  profile?: string;
};

export class ConfigManager {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Get configuration from environment variables, with explicit
   * overrides (e.g. CLI flags) taking precedence
   */
  getConfig(overrides: ConfigOverrides = {}): DeployerConfig {
    const env = parseOrThrow(DeployerEnvSchema, this.env, 'Invalid environment');

    return parseOrThrow(
      DeployerConfigSchema,
      {
        stack: {
          name: overrides.stackName ?? env.DEPLOY_STACK_NAME ?? DEFAULT_STACK_NAME,
          templatePath: overrides.templatePath ?? env.DEPLOY_TEMPLATE_PATH ?? DEFAULT_TEMPLATE_PATH,
        },
        aws: {
          region: overrides.region ?? env.AWS_REGION,
          profile: overrides.profile ?? env.AWS_PROFILE,
        },
        logLevel: env.LOG_LEVEL ?? 'INFO',
      },
      'Invalid configuration'
    );
  }
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      message,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

export const configManager = new ConfigManager();
