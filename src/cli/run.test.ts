import * as path from 'path';
import { StackCreateRejectedError } from '../deployer/errors';
import { StackService } from '../deployer/stack-service';
import { Logger } from '../logger/logger';
import { run, RunDependencies } from './run';

const BUNDLED_TEMPLATE = path.resolve(__dirname, '../../cloudformation/main.yaml');

function createHarness(stackService: StackService, env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const awsConfigs: Array<{ region?: string; profile?: string }> = [];
  const deps: RunDependencies = {
    env,
    logger: new Logger('test', { write: () => undefined }),
    print: (line) => out.push(line),
    printError: (line) => err.push(line),
    createStackService: (aws) => {
      awsConfigs.push(aws);
      return stackService;
    },
  };
  return { deps, out, err, awsConfigs };
}

function succeedingService(): StackService & { createStack: jest.Mock; waitForCreateComplete: jest.Mock } {
  return {
    createStack: jest.fn().mockResolvedValue({ stackId: 'arn:test-stack-id' }),
    waitForCreateComplete: jest.fn().mockResolvedValue('CREATE_COMPLETE'),
  };
}

describe('run', () => {
  test('deploys my-iac-stack from the bundled template and exits 0', async () => {
    const service = succeedingService();
    const { deps, out, err } = createHarness(service, { DEPLOY_TEMPLATE_PATH: BUNDLED_TEMPLATE });

    const exitCode = await run([], deps);

    expect(exitCode).toBe(0);
    expect(out).toEqual(['Stack my-iac-stack created successfully.']);
    expect(err).toEqual([]);
    expect(service.createStack).toHaveBeenCalledTimes(1);
    expect(service.createStack.mock.calls[0][0].stackName).toBe('my-iac-stack');
    expect(service.waitForCreateComplete).toHaveBeenCalledWith('my-iac-stack');
  });

  test('lets flags override the environment', async () => {
    const service = succeedingService();
    const { deps, out, awsConfigs } = createHarness(service, {
      DEPLOY_STACK_NAME: 'env-stack',
      AWS_REGION: 'eu-central-1',
    });

    const exitCode = await run(
      ['--stack-name', 'flag-stack', '--template', BUNDLED_TEMPLATE, '--profile', 'test-profile'],
      deps
    );

    expect(exitCode).toBe(0);
    expect(out).toEqual(['Stack flag-stack created successfully.']);
    expect(awsConfigs).toEqual([{ region: 'eu-central-1', profile: 'test-profile' }]);
  });

  test('prints help without deploying', async () => {
    const service = succeedingService();
    const { deps, out } = createHarness(service);

    const exitCode = await run(['--help'], deps);

    expect(exitCode).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toContain('Usage:\n  deploy-stack [options]');
    expect(service.createStack).not.toHaveBeenCalled();
  });

  test('exits 1 with the error message when the template is missing', async () => {
    const service = succeedingService();
    const { deps, out, err } = createHarness(service);
    const missing = path.join(__dirname, 'does-not-exist.yaml');

    const exitCode = await run(['--template', missing], deps);

    expect(exitCode).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`Error: Failed to read template '${missing}': ENOENT`)).toBe(true);
    expect(service.createStack).not.toHaveBeenCalled();
  });

  test('exits 1 when the stack name is already taken', async () => {
    const conflict = new Error('Stack [my-iac-stack] already exists');
    conflict.name = 'AlreadyExistsException';
    const service = succeedingService();
    service.createStack.mockRejectedValueOnce(new StackCreateRejectedError('my-iac-stack', conflict));
    const { deps, out, err } = createHarness(service, { DEPLOY_TEMPLATE_PATH: BUNDLED_TEMPLATE });

    const exitCode = await run([], deps);

    expect(exitCode).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      'Error: Stack my-iac-stack creation was rejected: Stack [my-iac-stack] already exists',
    ]);
    expect(service.waitForCreateComplete).not.toHaveBeenCalled();
  });

  test('exits 1 on a usage error', async () => {
    const { deps, err } = createHarness(succeedingService());

    const exitCode = await run(['--unknown'], deps);

    expect(exitCode).toBe(1);
    expect(err).toEqual(['Error: Unknown option: --unknown']);
  });
});
