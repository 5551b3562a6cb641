#!/usr/bin/env node
import { Command } from 'commander';
import pc from 'picocolors';
import { runTasks, EXIT_USAGE } from './commands/run.js';

interface CliOptions {
  csv?: string;
  sheet?: string;
  out: string;
  repoPathInContainer: string;
  cache: boolean;
  keep?: boolean;
  buildTimeout: string;
  agentTimeout: string;
  testTimeout: string;
  modelName?: string;
  agentBranch?: string;
  agentCommand?: string;
  envFile?: string;
  runId?: string;
  allowFailures?: boolean;
}

function parseSeconds(name: string, raw: string): number | null {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > 86400) {
    console.error(pc.red(`Error: --${name} must be a whole number of seconds between 1 and 86400`));
    return null;
  }
  return value;
}

const program = new Command();

program
  .name('sandbox-task-runner')
  .description('Build, modify and verify tasks in isolated Docker sandboxes')
  .version('0.1.0')
  .option('--csv <path>', 'Local CSV file with task rows')
  .option('--sheet <url>', 'Google Sheet URL with task rows')
  .option('-o, --out <dir>', 'Output directory for task artifacts and the summary', 'tasks')
  .option('--repo-path-in-container <path>', 'Repository mount point inside the task container', '/repo')
  .option('--no-cache', 'Build images without the Docker cache')
  .option('--keep', 'Keep containers and volumes for debugging')
  .option('--build-timeout <seconds>', 'Image build timeout', '3600')
  .option('--agent-timeout <seconds>', 'Agent run timeout', '1800')
  .option('--test-timeout <seconds>', 'Test command timeout', '1800')
  .option('--model-name <name>', 'Explicit model name (overrides credential-based selection)')
  .option('--agent-branch <branch>', 'Agent branch or variant, exported to the agent as AGENT_BRANCH')
  .option('--agent-command <command>', 'Agent command template ({model}, {config}, {issue}, {repo} placeholders)')
  .option('--env-file <path>', 'Extra environment for the agent (dotenv format)')
  .option('--run-id <id>', 'Namespace for Docker resource names')
  .option('--allow-failures', 'Exit 0 once every task has completed, whatever its status')
  .action(async (options: CliOptions) => {
    if (Boolean(options.csv) === Boolean(options.sheet)) {
      console.error(pc.red('Error: provide exactly one of --csv or --sheet'));
      process.exit(EXIT_USAGE);
    }

    const buildTimeout = parseSeconds('build-timeout', options.buildTimeout);
    const agentTimeout = parseSeconds('agent-timeout', options.agentTimeout);
    const testTimeout = parseSeconds('test-timeout', options.testTimeout);
    if (buildTimeout === null || agentTimeout === null || testTimeout === null) {
      process.exit(EXIT_USAGE);
    }

    if (!options.repoPathInContainer.startsWith('/')) {
      console.error(pc.red('Error: --repo-path-in-container must be an absolute path'));
      process.exit(EXIT_USAGE);
    }

    const exitCode = await runTasks({
      csv: options.csv,
      sheet: options.sheet,
      out: options.out,
      repoPath: options.repoPathInContainer,
      useCache: options.cache,
      keep: Boolean(options.keep),
      buildTimeout,
      agentTimeout,
      testTimeout,
      modelName: options.modelName,
      agentBranch: options.agentBranch,
      agentCommand: options.agentCommand,
      envFile: options.envFile,
      runId: options.runId,
      allowFailures: Boolean(options.allowFailures),
    });

    process.exit(exitCode);
  });

await program.parseAsync();
