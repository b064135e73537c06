#!/usr/bin/env node

/**
 * deploy-stack CLI
 *
 * Creates a CloudFormation stack from a template and waits for completion.
 * Usage:
 *   deploy-stack --stack-name <name> --template <path> [--region <region>]
 */

import { run } from '../src/cli/run';

if (require.main === module) {
  run(process.argv.slice(2))
    .then((exitCode) => {
      process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
      console.error(`Fatal error: ${error instanceof Error ? error.message : 'Unknown error'}`);
      process.exit(1);
    });
}
