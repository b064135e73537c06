/**
 * Stack Deployer
 *
 * Main entry point for the library
 */

export * from './deployer/types';
export * from './deployer/errors';
export * from './deployer/stack-service';
export * from './deployer/template';
export * from './deployer/collectors';
export * from './deployer/cloudformation-stack-service';
export * from './deployer/deployer';
export * from './config/config-manager';
export * from './logger/logger';
export { run } from './cli/run';
export { parseArgs, helpText, CliUsageError } from './cli/args';
