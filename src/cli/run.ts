/**
 * CLI program and runner
 *
 * `runCli` parses the arguments, resolves settings, runs the annotate
 * workflow and returns the process exit status:
 *   0 every step succeeded
 *   1 a step failed, or the kubeconfig could not be loaded
 *   2 invalid flags, configuration or descriptor
 */

import { Command, CommanderError, Option } from 'commander';
import type { Logger } from 'pino';
import { createAppConfig, type AppConfig } from '../config/app-config';
import type { DeploymentApi } from '../domain/types';
import { ConfigurationError, isValidationError, type ValidationError } from '../errors';
import { createKubernetesClient, type KubernetesClientConfig } from '../lib/kubernetes';
import { createLogger, defaultLogLevel } from '../lib/logger';
import { annotateDeployment, type AnnotateDeploymentReport } from '../tools/annotate-deployment';
import { collectKeyValue, parseIntegerOption, resolveRunSettings, type CliOptions, type RunSettings } from './options';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID_INPUT = 2;

export interface CliOutput {
  log: (line: string) => void;
  error: (line: string) => void;
}

export interface CliDependencies {
  version: string;
  env: Record<string, string | undefined>;
  createApi?: (logger: Logger, config: KubernetesClientConfig) => DeploymentApi;
  createLogger?: (level: string) => Logger;
  output?: CliOutput;
}

const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function createProgram(version: string, output: CliOutput): Command {
  return new Command()
    .name('deployment-annotator')
    .description('Create a Kubernetes Deployment and merge annotations into its metadata')
    .version(version)
    .option('-n, --namespace <namespace>', 'target namespace (default: KUBE_NAMESPACE, K8S_NAMESPACE or "default")')
    .option('--name <name>', 'deployment name (default: deploy-nginx)')
    .option('--image <image>', 'container image (default: nginx)')
    .option('--replicas <count>', 'replica count (default: 1)', parseIntegerOption)
    .option('--port <port>', 'container port (default: 80)', parseIntegerOption)
    .option('-l, --label <key=value>', 'pod and selector label, repeatable (default: app=nginx)', collectKeyValue)
    .option('-a, --annotation <key=value>', 'annotation to merge, repeatable', collectKeyValue)
    .addOption(new Option('--wait <strategy>', 'propagation wait strategy').choices(['fixed', 'poll']))
    .option('--wait-ms <ms>', 'fixed pause, or first poll delay, in milliseconds', parseIntegerOption)
    .option('--continue-on-error', 'attempt every step even after a failure')
    .addOption(
      new Option('--if-exists <policy>', 'what to do when the deployment already exists').choices([
        'fail',
        'reuse',
      ]),
    )
    .option('--kubeconfig <path>', 'kubeconfig file (default: KUBECONFIG or ~/.kube/config)')
    .option('--context <name>', 'kubeconfig context to use')
    .addOption(
      new Option('--log-level <level>', 'logging level').choices(['fatal', 'error', 'warn', 'info', 'debug', 'trace']),
    )
    .addHelpText(
      'after',
      `
Examples:
  $ deployment-annotator                                       Create deploy-nginx in "default" and annotate it
  $ deployment-annotator -n staging -a team=web -a tier=front  Merge custom annotations
  $ deployment-annotator --if-exists reuse                     Annotate an existing deployment
  $ deployment-annotator --wait fixed --wait-ms 2000           Pause instead of polling

Exit status:
  0  every step succeeded
  1  a step failed
  2  invalid input or configuration

Environment Variables:
  NODE_ENV                 development logs at debug unless LOG_LEVEL is set
  LOG_LEVEL                Logging level (fatal, error, warn, info, debug, trace)
  KUBE_NAMESPACE           Default namespace, preferred over K8S_NAMESPACE
  K8S_NAMESPACE            Default namespace
  KUBECONFIG               Kubeconfig path
  K8S_CONTEXT              Kubeconfig context
  K8S_TIMEOUT              Per-call timeout in milliseconds
  WAIT_STRATEGY            fixed or poll
  WAIT_FIXED_MS            Fixed pause in milliseconds
  WAIT_MAX_ATTEMPTS        Poll attempts before giving up
  WAIT_INITIAL_DELAY_MS    First poll delay in milliseconds
  WAIT_BACKOFF_FACTOR      Poll delay multiplier
  WAIT_MAX_DELAY_MS        Poll delay ceiling in milliseconds
`,
    )
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    })
    .exitOverride();
}

function isInputError(error: unknown): error is ValidationError | ConfigurationError {
  return isValidationError(error) || error instanceof ConfigurationError;
}

function printReport(report: AnnotateDeploymentReport, output: CliOutput): void {
  for (const step of report.steps) {
    const detail = step.error ? ` (${step.error.message})` : '';
    output.log(`${step.status.padEnd(9)} ${step.step}${detail}`);
  }
}

/**
 * Run the command for `args` (user arguments, without node and script path)
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  const output = deps.output ?? consoleOutput;
  const program = createProgram(deps.version, output);

  try {
    program.parse(args, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end with exit code 0
      return error.exitCode === 0 ? EXIT_OK : EXIT_INVALID_INPUT;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();

  let config: AppConfig;
  let settings: RunSettings;
  try {
    config = createAppConfig(deps.env);
    settings = resolveRunSettings(options, config);
  } catch (error) {
    if (isInputError(error)) {
      output.error(`Error: ${error.message}`);
      return EXIT_INVALID_INPUT;
    }
    throw error;
  }

  const level = options.logLevel ?? config.server.logLevel ?? defaultLogLevel(config.server.nodeEnv);
  const logger = (deps.createLogger ?? ((value: string) => createLogger({ level: value })))(level);
  logger.debug({ namespace: settings.namespace, wait: settings.wait }, 'Resolved settings');

  let api: DeploymentApi;
  try {
    api = (deps.createApi ?? createKubernetesClient)(logger, {
      kubeconfig: settings.kubeconfig,
      context: settings.context,
      timeoutMs: settings.timeoutMs,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Failed to load kubeconfig');
    output.error(`Error: failed to load kubeconfig: ${message}`);
    return EXIT_FAILED;
  }

  let report: AnnotateDeploymentReport;
  try {
    report = await annotateDeployment(
      {
        namespace: settings.namespace,
        descriptor: settings.descriptor,
        annotations: settings.annotations,
        onError: settings.onError,
        ifExists: settings.ifExists,
      },
      { api, logger, wait: settings.wait },
    );
  } catch (error) {
    if (isInputError(error)) {
      output.error(`Error: ${error.message}`);
      return EXIT_INVALID_INPUT;
    }
    throw error;
  }

  printReport(report, output);
  return report.ok ? EXIT_OK : EXIT_FAILED;
}
