#!/usr/bin/env tsx

/**
 * RabbitMQ Topology Tool
 *
 * Dumps, compares, checks, replays and draws broker topologies. Every
 * <source> is a snapshot file or a broker address (host[:port]).
 *
 * Usage:
 *   tsx server/scripts/topology-tool.ts dump <source> [--output snapshot.json]
 *   tsx server/scripts/topology-tool.ts diff <expected> <actual>
 *   tsx server/scripts/topology-tool.ts check <source>
 *   tsx server/scripts/topology-tool.ts sync <source> <target-broker>
 *   tsx server/scripts/topology-tool.ts graph <source> | dot -Tsvg > topology.svg
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { pathToFileURL } from 'url';
import type { AxiosInstance } from 'axios';
import { loadConfig, type AppConfig } from '../bootstrap/config';
import { getLogger, type Logger } from '../bootstrap/logger';
import { checkTopology, countFindings, GovernanceRule, RULE_DESCRIPTIONS } from '../messaging/governance';
import { diffTopologies } from '../messaging/topology-diff';
import { renderTopologyGraph } from '../messaging/topology-graph';
import { syncTopology } from '../messaging/topology-sync';
import { serializeError } from '../services/rabbitmq-errors';
import { serializeSnapshot, writeSnapshot } from '../services/snapshot-store';
import { connectBroker, isSnapshotPath, loadTopology, type SourceOptions } from '../services/topology-source';

export const SYNC_FAILURE_EXIT_CODE = 2;

export interface ToolContext {
  config: AppConfig;
  logger: Logger;
  /** Command output (JSON or DOT) */
  stdout: (text: string) => void;
  /** Human-readable progress and summaries */
  stderr: (text: string) => void;
  setExitCode: (code: number) => void;
  http?: AxiosInstance;
}

type GlobalOptions = {
  user?: string;
  password?: string;
  includeTransient?: boolean;
};

function sourceOptions(ctx: ToolContext, command: Command): SourceOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return {
    credentials: {
      username: opts.user ?? ctx.config.managementUser,
      password: opts.password ?? ctx.config.managementPassword,
    },
    defaultPort: ctx.config.managementPort,
    maxRedirects: ctx.config.maxRedirects,
    timeoutMs: ctx.config.requestTimeoutMs,
    includeTransient: opts.includeTransient ?? false,
    http: ctx.http,
    logger: ctx.logger,
  };
}

function printJson(ctx: ToolContext, value: unknown): void {
  ctx.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

export function createProgram(ctx: ToolContext): Command {
  const program = new Command();

  program
    .name('topology-tool')
    .description('Dump, diff, check, sync and graph RabbitMQ topologies')
    .option('-u, --user <user>', 'management API user')
    .option('-p, --password <password>', 'management API password')
    .option('--include-transient', 'keep non-durable and auto-delete resources');

  program
    .command('dump')
    .description('print the canonical topology as a snapshot document')
    .argument('<source>', 'snapshot file or broker address')
    .option('-o, --output <file>', 'write the snapshot to a file instead of stdout')
    .action(async (source: string, options: { output?: string }, command: Command) => {
      const topology = await loadTopology(source, sourceOptions(ctx, command));
      if (options.output) {
        await writeSnapshot(options.output, topology);
        ctx.stderr(chalk.green(`✓ Snapshot written to ${options.output}\n`));
        ctx.logger.info({ output: options.output, ...topology.getStats() }, 'Snapshot written');
      } else {
        ctx.stdout(serializeSnapshot(topology));
      }
    });

  program
    .command('diff')
    .description('compare an expected topology with an actual one')
    .argument('<expected>', 'snapshot file or broker address')
    .argument('<actual>', 'snapshot file or broker address')
    .action(async (expectedRef: string, actualRef: string, _options: object, command: Command) => {
      const options = sourceOptions(ctx, command);
      const expected = await loadTopology(expectedRef, options);
      const actual = await loadTopology(actualRef, options);

      const result = diffTopologies(expected, actual, (entity, key, side) => {
        ctx.logger.warn({ entity, key, side }, 'Duplicate diff key, keeping the last record');
      });

      printJson(ctx, result);
      ctx.stderr(
        result.inSync
          ? chalk.green('✓ Topologies are in sync\n')
          : chalk.yellow('⚠️  Topology drift detected\n')
      );
    });

  program
    .command('check')
    .description('report unbound and unprotected resources')
    .argument('<source>', 'snapshot file or broker address')
    .action(async (source: string, _options: object, command: Command) => {
      const topology = await loadTopology(source, sourceOptions(ctx, command));
      if (topology.consumerCounts.size === 0 && topology.queues.length > 0) {
        ctx.logger.warn({ source }, 'No consumer counts available, consumer checks report nothing');
      }

      const report = checkTopology(topology);
      printJson(ctx, report);

      for (const rule of Object.values(GovernanceRule)) {
        const names = report[rule];
        if (names.length > 0) {
          ctx.stderr(chalk.yellow(`• ${RULE_DESCRIPTIONS[rule]}: ${names.join(', ')}\n`));
        }
      }
      ctx.stderr(
        countFindings(report) === 0
          ? chalk.green('✓ No findings\n')
          : chalk.yellow(`⚠️  ${countFindings(report)} finding(s)\n`)
      );
    });

  program
    .command('sync')
    .description('replay a topology onto a target broker')
    .argument('<source>', 'snapshot file or broker address')
    .argument('<target>', 'broker address')
    .action(async (sourceRef: string, targetRef: string, _options: object, command: Command) => {
      const options = sourceOptions(ctx, command);
      if (await isSnapshotPath(targetRef)) {
        throw new Error(`Sync target must be a broker address, got snapshot "${targetRef}"`);
      }

      const source = await loadTopology(sourceRef, options);
      const target = await connectBroker(targetRef, options);
      ctx.logger.info({ target: target.baseUrl, ...source.getStats() }, 'Replaying topology');

      const failures = await syncTopology(source, target, { logger: ctx.logger });
      printJson(ctx, { failures });

      if (failures.length > 0) {
        ctx.stderr(chalk.red(`❌ ${failures.length} create call(s) failed\n`));
        ctx.setExitCode(SYNC_FAILURE_EXIT_CODE);
      } else {
        ctx.stderr(chalk.green('✓ Target broker is fully synced\n'));
      }
    });

  program
    .command('graph')
    .description('render the topology as a Graphviz digraph')
    .argument('<source>', 'snapshot file or broker address')
    .action(async (source: string, _options: object, command: Command) => {
      const topology = await loadTopology(source, sourceOptions(ctx, command));
      ctx.stdout(renderTopologyGraph(topology));
    });

  return program;
}

/**
 * Context for a real process: logger built from the validated config,
 * output on the process streams
 */
export function createToolContext(config: AppConfig): ToolContext {
  return {
    config,
    logger: getLogger(config.logLevel, config.logPretty),
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    setExitCode: code => {
      process.exitCode = code;
    },
  };
}

async function main(): Promise<void> {
  const ctx = createToolContext(loadConfig());
  try {
    await createProgram(ctx).parseAsync(process.argv);
  } catch (error) {
    ctx.logger.debug({ error: serializeError(error) }, 'Command failed');
    throw error;
  }
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(error => {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  });
}
