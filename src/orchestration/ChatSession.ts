import dayjs from 'dayjs';
import { AnalysisState, Evidence } from '../types';
import { ChatAgent } from '../agents/ChatAgent';
import { ReportWriter } from '../agents/ReportWriter';
import { allEvidence } from '../agents/AgentContext';
import { CommandRunner } from './CommandRunner';
import { SessionManager } from '../storage/SessionManager';
import { HealingExhausted } from '../errors';
import { Logger, silentLogger } from '../logging/Logger';

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
  commandsExecuted: string[];
  evidenceUsed: string[];
}

export interface ChatTurn {
  answer: string;
  commandsExecuted: string[];
  newEvidence: Evidence[];
}

export type ChatReply = { kind: 'exit' } | { kind: 'answer'; text: string };

export interface ChatSettings {
  maxHistory: number;
  maxRounds: number;
  maxCommandsPerRound: number;
}

export const DEFAULT_CHAT_ROUNDS = 3;
export const MAX_CHAT_COMMANDS = 15;
export const CHAT_TASK_PREFIX = 'Chat: ';

// Shell pipelines the debugger cannot run
const SHELL_SYNTAX = /\|\s*(?:foreach|findstr|grep|where|select)\b|\$_/i;
const HISTORY_PREVIEW = 200;

export const CHAT_HELP = [
  'Ask any question about the dump. Commands:',
  '  /report    show the investigation report',
  '  /history   show this conversation',
  '  /evidence  list collected evidence',
  '  /help      show this help',
  '  /exit      leave the chat (/quit works too)'
].join('\n');

export function renderHistory(history: readonly ChatMessage[]): string {
  if (history.length === 0) return 'No chat history yet.';
  const lines: string[] = [];
  history.forEach((m, i) => {
    const preview = m.role === 'assistant' && m.content.length > HISTORY_PREVIEW
      ? `${m.content.slice(0, HISTORY_PREVIEW)}...`
      : m.content;
    lines.push(`${i + 1}. ${m.role === 'user' ? 'You' : 'Assistant'}: ${preview}`);
    if (m.commandsExecuted.length > 0) {
      lines.push(`   Commands run: ${m.commandsExecuted.join(', ')}`);
    }
  });
  return lines.join('\n');
}

export function renderEvidence(state: AnalysisState): string {
  const tasks = Object.entries(state.evidenceInventory).filter(([, items]) => items.length > 0);
  if (tasks.length === 0) return 'No evidence collected.';
  const lines = [`${allEvidence(state).length} evidence item(s):`];
  for (const [task, items] of tasks) {
    lines.push(`${task} (${items.length})`, ...items.map(e => `  - ${e.command}: ${e.finding}`));
  }
  return lines.join('\n');
}

/**
 * Question and answer over a finished session. Each question may run up to
 * `maxRounds` rounds of suggested commands before it is answered; new
 * evidence is filed under `Chat: <question>` and the state is saved.
 */
export class ChatSession {
  private history: ChatMessage[] = [];
  private logger: Logger;

  constructor(
    private state: AnalysisState,
    private agent: ChatAgent,
    private commands: CommandRunner,
    private reportWriter: ReportWriter,
    private sessions: SessionManager,
    private settings: ChatSettings,
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
  }

  getHistory(): readonly ChatMessage[] {
    return this.history;
  }

  async handle(input: string): Promise<ChatReply> {
    const text = input.trim();
    if (text.length === 0) {
      return { kind: 'answer', text: 'Ask a question about the dump, or /help for commands.' };
    }
    if (text.startsWith('/')) {
      return this.special(text.split(/\s+/)[0].toLowerCase());
    }
    const turn = await this.ask(text);
    return { kind: 'answer', text: turn.answer };
  }

  async ask(question: string): Promise<ChatTurn> {
    const task = CHAT_TASK_PREFIX + question;
    const relevant = await this.agent.relevant(this.state, question);
    const gathered: Evidence[] = [];
    const executed: string[] = [];

    for (let round = 1; round <= this.settings.maxRounds; round++) {
      const attempted = this.attemptedCommands();
      const assessment = await this.agent.assess(this.state, question, [...relevant, ...gathered], attempted);
      if (assessment.hasSufficientEvidence) break;

      const seen = new Set(attempted.map(c => c.toLowerCase()));
      const fresh: string[] = [];
      for (const suggested of assessment.suggestedCommands) {
        const command = suggested.trim();
        if (command.length === 0 || seen.has(command.toLowerCase())) continue;
        seen.add(command.toLowerCase());
        fresh.push(command);
      }

      let found = 0;
      for (const command of fresh.slice(0, this.settings.maxCommandsPerRound)) {
        if (SHELL_SYNTAX.test(command)) {
          this.logger.warn(`Skipping ${command}: shell pipelines are not debugger commands`);
          continue;
        }
        executed.push(command);
        const evidence = await this.run(command, task);
        if (evidence) {
          gathered.push(evidence);
          found++;
        }
      }
      await this.sessions.saveState(this.state.sessionId, this.state);

      if (found === 0) {
        this.logger.info('No new evidence gathered; answering with what is known');
        break;
      }
    }

    const used = [...relevant, ...gathered];
    const answer = await this.agent.answer(this.state, question, used);
    const now = dayjs().toISOString();
    this.history.push(
      { role: 'user', content: question, timestamp: now, commandsExecuted: [], evidenceUsed: [] },
      { role: 'assistant', content: answer, timestamp: now, commandsExecuted: executed, evidenceUsed: used.map(e => e.command) }
    );
    if (this.history.length > this.settings.maxHistory) {
      this.history = this.history.slice(-this.settings.maxHistory);
    }
    return { answer, commandsExecuted: executed, newEvidence: gathered };
  }

  private async special(command: string): Promise<ChatReply> {
    switch (command) {
      case '/exit':
      case '/quit':
        return { kind: 'exit' };
      case '/help':
        return { kind: 'answer', text: CHAT_HELP };
      case '/report':
        return { kind: 'answer', text: await this.currentReport() };
      case '/history':
        return { kind: 'answer', text: renderHistory(this.history) };
      case '/evidence':
        return { kind: 'answer', text: renderEvidence(this.state) };
      default:
        return { kind: 'answer', text: `Unknown command ${command}. Type /help for the list.` };
    }
  }

  private async currentReport(): Promise<string> {
    if (this.state.report) return this.state.report;
    this.state.report = await this.reportWriter.write(this.state);
    await this.sessions.saveReport(this.state.sessionId, this.state.report);
    await this.sessions.saveState(this.state.sessionId, this.state);
    return this.state.report;
  }

  private attemptedCommands(): string[] {
    const commands = [
      ...allEvidence(this.state).map(e => e.command),
      ...this.state.failedCommands.map(f => f.command)
    ];
    return [...new Set(commands)];
  }

  private async run(command: string, task: string): Promise<Evidence | null> {
    try {
      const evidence = await this.commands.run(command, {
        sessionId: this.state.sessionId,
        dumpType: this.state.dumpType,
        recentEvidence: allEvidence(this.state)
      });
      const inventory = this.state.evidenceInventory[task] ?? [];
      this.state.evidenceInventory[task] = inventory;
      inventory.push(evidence);
      return evidence;
    } catch (error) {
      if (error instanceof HealingExhausted) {
        this.state.failedCommands.push({ command, error: error.reason, task });
        this.logger.warn(`Skipping ${command}: ${error.reason}`);
        return null;
      }
      throw error;
    }
  }
}
