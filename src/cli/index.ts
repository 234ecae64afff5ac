#!/usr/bin/env node
import process from 'process';
import path from 'path';

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadStabilityConfigFile } from '../config/stability-config-file';
import { StabilityPolicy, policyFromConfig } from '../config/stability-policy';
import { CascadeWalker, formatCascadeSummary, formatCascadeTree } from '../cascade';
import {
  InMemoryTypeModel,
  SnapshotValidationError,
  classType,
  loadSnapshotFile,
  renderType,
} from '../model';
import {
  CallableAnalyzer,
  CallableStabilityInfo,
  Classification,
  StabilityClassifier,
  createAnalysisContext,
  describeClassification,
  toParameterStability,
} from '../stability';
import { config } from '../utils/config';
import { logger } from '../utils/logger';

interface SharedOptions {
  ignore?: string;
  stableConfig?: string;
  strongSkipping?: boolean;
  json?: boolean;
  verbose?: boolean;
}

interface ClassifyOptions extends SharedOptions {
  nullable?: boolean;
}

interface CascadeOptions extends SharedOptions {
  maxDepth?: string;
}

interface AnalysisSession {
  model: InMemoryTypeModel;
  policy: StabilityPolicy;
  classifier: StabilityClassifier;
  analyzer: CallableAnalyzer;
}

async function createSession(snapshotPath: string, options: SharedOptions): Promise<AnalysisSession> {
  const model = await loadSnapshotFile(path.resolve(snapshotPath));

  const customStableTypes = await loadStabilityConfigFile(
    options.stableConfig ?? config.stability.configurationFile
  );
  const ignoredTypePatterns = [...config.stability.ignoredTypePatterns, ...splitPatterns(options.ignore)];

  const policy = policyFromConfig(customStableTypes, {
    ignoredTypePatterns,
    treatUnstableAsIdentityComparable: options.strongSkipping || config.stability.strongSkipping,
  });

  const classifier = new StabilityClassifier(model);
  const analyzer = new CallableAnalyzer(model, classifier, policy);
  return { model, policy, classifier, analyzer };
}

function splitPatterns(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map(pattern => pattern.trim())
    .filter(pattern => pattern.length > 0);
}

function applyVerbosity(options: SharedOptions): void {
  if (options.verbose) {
    logger.level = 'debug';
  }
}

function colorForClassification(classification: Classification): (text: string) => string {
  switch (toParameterStability(classification)) {
    case 'STABLE':
      return chalk.green;
    case 'UNSTABLE':
      return chalk.red;
    default:
      return chalk.yellow;
  }
}

function printCallable(info: CallableStabilityInfo): void {
  const skippable = info.isSkippable ? chalk.green('skippable') : chalk.red('not skippable');
  console.log(chalk.bold(`${info.qualifiedName}`) + ` [${skippable}]`);
  console.log(
    chalk.gray(
      `  restartable: ${info.isRestartable}, readonly: ${info.isReadonly}` +
        (info.isSkippableInStrongSkippingMode ? ', skippable via strong skipping' : '')
    )
  );

  for (const receiver of info.receivers) {
    const color = colorForClassification(receiver.classification);
    console.log(`  ${chalk.cyan(`<${receiver.kind} receiver>`)}: ${receiver.type} ${color(receiver.stability)}`);
    console.log(chalk.gray(`    ${receiver.reason}`));
  }

  for (const param of info.parameters) {
    const color = colorForClassification(param.classification);
    console.log(`  ${chalk.cyan(param.name)}: ${param.type} ${color(param.stability)}`);
    console.log(chalk.gray(`    ${param.reason}`));
  }
}

function reportFailure(spinner: ora.Ora, label: string, error: unknown): never {
  spinner.fail(label);
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  if (error instanceof SnapshotValidationError) {
    for (const issue of error.issues) {
      console.error(chalk.red(`  - ${issue}`));
    }
  }
  process.exit(1);
}

function addSharedOptions(command: Command): Command {
  return command
    .option('--ignore <patterns>', 'Comma separated type patterns to treat as stable')
    .option('--stable-config <file>', 'File of custom stable type patterns, one per line')
    .option('--strong-skipping', 'Treat non-stable parameters as identity-comparable')
    .option('--json', 'Print machine readable JSON')
    .option('--verbose', 'Enable verbose logging');
}

const program = new Command();

program
  .name('stability-analyzer')
  .description('Classify type stability and report skippability of UI callables')
  .version('0.1.0');

// Classify command
addSharedOptions(
  program
    .command('classify <snapshot> <declarationId>')
    .description('Classify the stability of a declared type')
    .option('--nullable', 'Classify the nullable form of the type')
).action(async (snapshot: string, declarationId: string, options: ClassifyOptions) => {
  applyVerbosity(options);
  const spinner = ora({ text: 'Loading snapshot...', isSilent: options.json === true }).start();

  try {
    const { policy, classifier } = await createSession(snapshot, options);
    spinner.stop();

    const type = classType(declarationId, [], { nullable: options.nullable === true });
    const classification = classifier.classify(type, createAnalysisContext(policy));

    if (options.json) {
      console.log(JSON.stringify({ type: renderType(type), classification }, null, 2));
      return;
    }

    const color = colorForClassification(classification);
    console.log(`${chalk.bold(renderType(type))}: ${color(toParameterStability(classification))}`);
    console.log(chalk.gray(`  ${describeClassification(classification)}`));
  } catch (error) {
    reportFailure(spinner, 'Classification failed', error);
  }
});

// Callable command
addSharedOptions(
  program.command('callable <snapshot> <callableId>').description('Report parameter stability of a callable')
).action(async (snapshot: string, callableId: string, options: SharedOptions) => {
  applyVerbosity(options);
  const spinner = ora({ text: 'Loading snapshot...', isSilent: options.json === true }).start();

  try {
    const { analyzer } = await createSession(snapshot, options);
    const info = analyzer.analyzeCallable(callableId);
    if (!info) {
      throw new Error(`Callable not found: ${callableId}`);
    }
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(info, null, 2));
      return;
    }
    printCallable(info);
  } catch (error) {
    reportFailure(spinner, 'Callable analysis failed', error);
  }
});

// Cascade command
addSharedOptions(
  program
    .command('cascade <snapshot> <callableId>')
    .description('Walk the callables reachable from a root and report their skippability')
    .option('--max-depth <depth>', 'Maximum call depth', config.cascade.maxDepth.toString())
).action(async (snapshot: string, callableId: string, options: CascadeOptions) => {
  applyVerbosity(options);
  const spinner = ora({ text: 'Loading snapshot...', isSilent: options.json === true }).start();

  try {
    const { model, analyzer } = await createSession(snapshot, options);
    if (!model.resolveCallable(callableId)) {
      throw new Error(`Callable not found: ${callableId}`);
    }

    spinner.text = 'Walking call graph...';
    const maxDepth = options.maxDepth ? parseInt(options.maxDepth, 10) : undefined;
    if (maxDepth !== undefined && isNaN(maxDepth)) {
      throw new Error(`Invalid --max-depth value: ${options.maxDepth}`);
    }

    const walker = new CascadeWalker(analyzer, model);
    const result = await walker.walk(callableId, { maxDepth });
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log(formatCascadeTree(result));
    console.log(chalk.blue(`\n${formatCascadeSummary(result.summary, result.complete)}`));
    console.log(chalk.gray(`Completed in ${result.executionTimeMs}ms`));
  } catch (error) {
    reportFailure(spinner, 'Cascade analysis failed', error);
  }
});

// Help and error handling
program.configureHelp({
  sortSubcommands: true,
});

program.on('command:*', () => {
  console.error(chalk.red(`Invalid command: ${program.args.join(' ')}`));
  console.log(chalk.blue('See --help for a list of available commands.'));
  process.exit(1);
});

process.on('unhandledRejection', reason => {
  logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  console.error(chalk.red('\nUnhandled promise rejection:'), reason);
  process.exit(1);
});

program.parseAsync().catch(error => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
