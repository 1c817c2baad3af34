#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import * as readline from 'readline';
import * as path from 'path';
import * as fs from 'fs-extra';
import chalk from 'chalk';
import dayjs from 'dayjs';
import * as dotenv from 'dotenv';

import { EngineConfig, loadConfig } from './config/EngineConfig';
import { ConsoleLogger, Logger } from './logging/Logger';
import { CdbExecutor } from './tool/CdbExecutor';
import { ToolExecutor } from './tool/ToolExecutor';
import { SessionManager } from './storage/SessionManager';
import { loadCustomPatterns } from './evidence/PatternLoader';
import { Redactor } from './evidence/Redactor';
import { OpenAIEmbeddings, OpenAIOracle } from './llm/OpenAIOracle';
import { createEngine } from './engine';
import { runSetup } from './setup';
import { ConfirmCallback, ConfirmDecision, createInitialState } from './orchestration/InvestigationController';
import { ChatSession } from './orchestration/ChatSession';
import { CommandResult, InvestigationPhase } from './types';
import { InvestigationError, describeError } from './errors';

dotenv.config();

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim().toLowerCase());
    });
  });
}

const interactiveConfirm: ConfirmCallback = async (from: InvestigationPhase, to: InvestigationPhase): Promise<ConfirmDecision> => {
  console.log(chalk.gray(`\n── ${from} → ${to}`));
  const answer = await ask(chalk.yellow('Continue? [Y]es / [r]eport now / [a]bort: '));
  if (answer === 'a' || answer === 'abort') return 'abort';
  if (answer === 'r' || answer === 'report') return 'report';
  return 'continue';
};

async function chatLoop(chat: ChatSession): Promise<void> {
  console.log(chalk.bold.cyan('\n💬 Ask follow-up questions (/help for commands, /exit to leave)'));
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt(chalk.yellow('\nYou: '));
  rl.prompt();
  for await (const line of rl) {
    const reply = await chat.handle(line);
    if (reply.kind === 'exit') break;
    console.log(`\n${reply.text}`);
    rl.prompt();
  }
  rl.close();
}

/** Prints every command and a short preview of its output. */
class EchoingExecutor implements ToolExecutor {
  constructor(private inner: ToolExecutor) {}

  async execute(command: string, timeoutSeconds: number): Promise<CommandResult> {
    console.log(chalk.gray(`\n$ ${command}`));
    const result = await this.inner.execute(command, timeoutSeconds);
    const preview = result.output.split('\n').slice(0, 10).join('\n');
    if (preview.trim()) console.log(chalk.gray(preview));
    return result;
  }
}

function fail(error: unknown): never {
  if (error instanceof InvestigationError) {
    console.error(chalk.red(`\n❌ [${error.code}] ${error.message}`));
  } else {
    console.error(chalk.red(`\n❌ Unexpected error: ${describeError(error)}`));
  }
  process.exit(1);
}

function setupContext(logOutput?: string): { config: EngineConfig; logger: Logger } {
  const config = loadConfig();
  return { config, logger: new ConsoleLogger(config.logLevel, logOutput) };
}

yargs(hideBin(process.argv))
  .scriptName("dump-investigator")
  .command('analyze <dump>', 'Investigate the root cause of a crash or hang dump', (y) => y
    .positional('dump', { type: 'string', demandOption: true, description: 'Path to the .dmp file' })
    .option('issue', { alias: 'i', type: 'string', demandOption: true, description: 'What went wrong, in plain words' })
    .option('output', { alias: 'o', type: 'string', description: 'Also write the report to this file' })
    .option('interactive', { type: 'boolean', default: false, description: 'Confirm each phase change' })
    .option('show-commands', { type: 'boolean', default: false, description: 'Print debugger commands and output' })
    .option('chat', { type: 'boolean', default: false, description: 'Ask follow-up questions after the report' })
    .option('log-output', { type: 'string', description: 'Append plain log lines to this file' }),
  async (argv) => {
    try {
      const { config, logger } = setupContext(argv.logOutput);
      const dumpPath = path.resolve(argv.dump);

      console.log(chalk.bold.cyan('\n🩺 DUMP INVESTIGATION\n'));
      const cdb = new CdbExecutor(dumpPath, config.cdbPath, config.symbolPath, logger);
      await cdb.validateDump();
      const dumpType = await cdb.detectDumpType();
      logger.info(`Dump: ${path.basename(dumpPath)} (${dumpType}-mode)`);

      const sessions = new SessionManager(path.resolve(config.sessionsBaseDir));
      const session = await sessions.createSession(dumpPath);
      logger.info(`Session: ${session.id}`);

      const engine = createEngine({
        config,
        session,
        sessions,
        executor: argv.showCommands ? new EchoingExecutor(cdb) : cdb,
        oracle: new OpenAIOracle(config.openaiApiKey, config.openaiModel),
        embeddings: config.useEmbeddings && config.openaiApiKey
          ? new OpenAIEmbeddings(config.openaiApiKey, config.embeddingsModel)
          : null,
        customPatterns: await loadCustomPatterns(path.resolve(config.customPatternsPath)),
        logger,
        confirm: argv.interactive ? interactiveConfirm : undefined
      });

      const state = createInitialState(session.id, dumpPath, argv.issue, dumpType, config.maxIterations);
      const outcome = await engine.controller.run(state);

      const stats = engine.healer.getStats();
      if (stats.successfulHeals + stats.failedHeals > 0) {
        logger.info(`🔧 Command healing: ${stats.successfulHeals} healed, ${stats.failedHeals} failed (${Math.round(stats.successRate * 100)}%)`);
      }

      if (outcome.status === 'aborted') {
        console.log(chalk.yellow(`\n✗ Investigation aborted. State kept in ${session.dir}`));
        process.exit(1);
      }

      if (argv.output && outcome.state.report) {
        await fs.outputFile(path.resolve(argv.output), outcome.state.report, 'utf-8');
        logger.success(`Report written to ${path.resolve(argv.output)}`);
      }
      console.log(chalk.green(`\n✅ Investigation complete (${outcome.state.iteration} step(s), ${outcome.state.terminationReason ?? 'done'})`));
      if (outcome.reportPath) console.log(chalk.gray(`   Report: ${outcome.reportPath}`));

      if (argv.chat) {
        await chatLoop(engine.chat(outcome.state));
      }
    } catch (err) {
      fail(err);
    }
  })
  .command('validate <dump>', 'Check that a dump loads in the debugger', (y) => y
    .positional('dump', { type: 'string', demandOption: true }),
  async (argv) => {
    try {
      const { config, logger } = setupContext();
      const cdb = new CdbExecutor(path.resolve(argv.dump), config.cdbPath, config.symbolPath, logger);
      const lastEvent = await cdb.validateDump();
      const dumpType = await cdb.detectDumpType();
      console.log(chalk.green(`✅ Valid ${dumpType}-mode dump`));
      console.log(chalk.gray(lastEvent.split('\n').filter(l => l.trim()).slice(-5).join('\n')));
    } catch (err) {
      fail(err);
    }
  })
  .command('setup', 'Write .env.example and an example custom redaction pattern file', {}, async () => {
    try {
      const result = await runSetup(process.cwd());
      result.written.forEach(f => console.log(chalk.green(`✅ Wrote ${path.relative(process.cwd(), f)}`)));
      result.skipped.forEach(f => console.log(chalk.gray(`   Kept existing ${path.relative(process.cwd(), f)}`)));
      console.log(chalk.cyan('\nCopy .env.example to .env and set OPENAI_API_KEY to get started.'));
    } catch (err) {
      fail(err);
    }
  })
  .command('test-patterns <file>', 'Show what redaction would remove from a sample file', (y) => y
    .positional('file', { type: 'string', demandOption: true })
    .option('pattern-name', { alias: 'p', type: 'string', description: 'Test a single pattern' }),
  async (argv) => {
    try {
      const { config, logger } = setupContext();
      const text = await fs.readFile(path.resolve(argv.file), 'utf-8');
      const redactor = new Redactor(await loadCustomPatterns(path.resolve(config.customPatternsPath)), { logger });

      if (argv.patternName) {
        const result = redactor.testPattern(argv.patternName, text);
        console.log(chalk.bold(`\n${result.pattern}: ${result.count} match(es)`));
        result.matches.forEach(m => console.log(chalk.gray(`   [${m.start}-${m.end}] ${m.text}`)));
        return;
      }

      const { redacted, report } = redactor.redact(text);
      if (!report.hasChanges) {
        console.log(chalk.green('✅ No sensitive data found'));
        return;
      }
      console.log(chalk.bold(`\n${report.matches.length} redaction(s): ${report.bySeverity.critical} critical, ${report.bySeverity.warning} warning, ${report.bySeverity.info} info`));
      console.log(chalk.gray(`   Patterns: ${report.appliedRules.join(', ')}\n`));
      console.log(redacted);
    } catch (err) {
      fail(err);
    }
  })
  .command('sessions', 'Manage investigation sessions', (y) => y
    .command('list', 'List sessions, newest first', {}, async () => {
      try {
        const { config } = setupContext();
        const sessions = await new SessionManager(path.resolve(config.sessionsBaseDir)).listSessions();
        if (sessions.length === 0) {
          console.log("No sessions found.");
          return;
        }
        sessions.forEach(s => {
          const created = dayjs(s.createdAt).format('YYYY-MM-DD HH:mm');
          console.log(`${s.id}  ${chalk.gray(created)}  ${path.basename(s.dumpPath)}`);
        });
      } catch (err) {
        fail(err);
      }
    })
    .command('cleanup', 'Delete old sessions', (c) => c
      .option('days', { type: 'number', description: 'Delete sessions older than this many days' })
      .option('keep', { type: 'number', description: 'Always keep this many recent sessions' }),
    async (argv) => {
      try {
        const { config } = setupContext();
        const manager = new SessionManager(path.resolve(config.sessionsBaseDir));
        const removed = await manager.cleanupOldSessions(argv.days ?? config.sessionCleanupDays, argv.keep ?? config.sessionKeepRecent);
        console.log(chalk.green(`✅ Removed ${removed.length} session(s)`));
        removed.forEach(id => console.log(chalk.gray(`   ${id}`)));
      } catch (err) {
        fail(err);
      }
    })
    .demandCommand(1, 'Choose a sessions subcommand'))
  .demandCommand(1)
  .strict()
  .parse();
