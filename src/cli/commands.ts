import { Command } from 'commander';
import inquirer from 'inquirer';
import chalk from 'chalk';
import Table from 'cli-table3';
import fs from 'fs';
import { AdvisoryOrchestrator } from '../application/orchestrators/AdvisoryOrchestrator';
import { loadConfig, loadEnvironment, validateConfig } from '../config';
import { ApplicationError, DomainError, InfrastructureError, ValidationDomainError } from '../core/interfaces';
import { getSupportedProviders } from '../core/factories/advisor-client.factory';
import { ConsoleLogger } from '../infrastructure/logging/ConsoleLogger';
import { AdvisorOutcome, AskOptions, MarketContext, MarketContextSchema, TradeProposal } from '../types';

// Conventional exit codes: 128 + signal number
const SHUTDOWN_SIGNALS: ReadonlyArray<[NodeJS.Signals, number]> = [['SIGINT', 130], ['SIGTERM', 143]];
const SHUTDOWN_GRACE_MS = 500;

export interface SignalTarget {
  once(event: NodeJS.Signals, listener: () => void): unknown;
  exit(code: number): void;
}

export class AdvisoryCLI {
  constructor(private orchestrator?: AdvisoryOrchestrator) {}

  async run(argv: string[]): Promise<void> {
    await this.createProgram().parseAsync(argv);
  }

  /**
   * On SIGINT or SIGTERM, cancels outstanding advisor calls and exits after a
   * short grace period in which the round can print its Cancelled outcomes.
   */
  installSignalHandlers(target: SignalTarget = process, graceMs = SHUTDOWN_GRACE_MS): void {
    for (const [signal, code] of SHUTDOWN_SIGNALS) {
      target.once(signal, () => {
        this.shutdown(signal);
        setTimeout(() => target.exit(code), graceMs);
      });
    }
  }

  /**
   * Ends the orchestrator session if one was started. Returns whether there
   * was a session to end.
   */
  shutdown(signal: NodeJS.Signals): boolean {
    if (!this.orchestrator) {
      return false;
    }

    console.log(chalk.yellow(`\n${signal} received, cancelling outstanding advisor calls...`));
    this.orchestrator.endSession();
    return true;
  }

  createProgram(): Command {
    const program = new Command();

    program
      .name('advisory')
      .description('Ask several AI advisors for independent opinions on one market snapshot')
      .version('1.0.0');

    program
      .command('advisors')
      .description('List configured advisors and whether they are ready')
      .action(() => this.handleAdvisors());

    program
      .command('ask <contextFile>')
      .description('Run one round against every ready advisor, or a single one')
      .option('-a, --advisor <name>', 'Ask only this advisor')
      .option('-q, --question <text>', 'Question to send along with the market data')
      .option('-r, --retries <count>', 'Extra attempts for transient failures', '0')
      .option('--json', 'Print the raw result as JSON')
      .action((contextFile: string, options: AskOptions) => this.handleAsk(contextFile, options));

    program
      .command('chat <contextFile> <advisor>')
      .description('Talk to one advisor; history is kept across turns')
      .action((contextFile: string, advisor: string) => this.handleChat(contextFile, advisor));

    return program;
  }

  async handleAdvisors(): Promise<void> {
    try {
      const orchestrator = this.getOrchestrator();
      const table = new Table({
        head: ['Advisor', 'Provider', 'Model', 'Status'],
        style: { head: ['cyan'] }
      });

      for (const status of orchestrator.listAdvisors()) {
        table.push([
          status.name,
          status.provider,
          status.model,
          status.state === 'ready' ? chalk.green('ready') : chalk.red(`unusable: ${status.reason ?? 'unknown'}`)
        ]);
      }

      console.log(table.toString());
      console.log(chalk.gray(`Supported providers: ${getSupportedProviders().join(', ')}`));
    } catch (error) {
      this.handleError(error);
    }
  }

  async handleAsk(contextFile: string, options: AskOptions): Promise<void> {
    try {
      const orchestrator = this.getOrchestrator();
      const context = this.readContext(contextFile);
      const retries = Number.parseInt(options.retries ?? '0', 10);
      const roundOptions = {
        question: options.question,
        retries: Number.isNaN(retries) ? 0 : retries
      };

      if (options.advisor) {
        const outcome = await orchestrator.askOne(options.advisor, context, roundOptions);
        if (options.json) {
          console.log(JSON.stringify(outcome, null, 2));
          return;
        }
        this.displayOutcomes([outcome]);
        return;
      }

      console.log(chalk.gray(`Querying all advisors for ${context.symbol}...`));
      const result = await orchestrator.askAll(context, roundOptions);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }

      this.displayOutcomes(result.outcomes);
    } catch (error) {
      this.handleError(error);
    }
  }

  async handleChat(contextFile: string, advisor: string): Promise<void> {
    try {
      const orchestrator = this.getOrchestrator();
      const context = this.readContext(contextFile);

      console.log(chalk.blue(`💬 Chatting with ${advisor} about ${context.symbol}`));
      console.log(chalk.gray('Type /reset to clear the conversation, /exit to leave.\n'));

      for (;;) {
        const { message } = await inquirer.prompt<{ message: string }>([
          { type: 'input', name: 'message', message: chalk.cyan('You:') }
        ]);
        const text = message.trim();

        if (text === '/exit') break;

        if (text === '/reset') {
          orchestrator.resetHistory(advisor);
          console.log(chalk.yellow('History cleared.\n'));
          continue;
        }

        const outcome = await orchestrator.askOne(advisor, context, { question: text || undefined });
        this.displayOutcomes([outcome]);
        console.log(chalk.gray(`(${orchestrator.history(advisor).messages.length} messages in history)\n`));
      }

      orchestrator.endSession();
    } catch (error) {
      this.handleError(error);
    }
  }

  // ===== HELPERS =====

  private getOrchestrator(): AdvisoryOrchestrator {
    if (this.orchestrator) {
      return this.orchestrator;
    }

    loadEnvironment();
    const config = loadConfig();
    validateConfig(config);

    const logger = new ConsoleLogger('Advisory', config.logLevel);
    for (const rejected of config.rejectedAdvisors) {
      logger.warn('Skipping invalid advisor entry', { ...rejected });
    }

    this.orchestrator = new AdvisoryOrchestrator({ logger });
    this.orchestrator.registerAll(config.advisors);
    return this.orchestrator;
  }

  private readContext(contextFile: string): MarketContext {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(contextFile, 'utf8'));
    } catch (error) {
      throw new ValidationDomainError(`Cannot read market context from ${contextFile}`, {
        error: error instanceof Error ? error.message : 'Unknown error'
      });
    }

    const parsed = MarketContextSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationDomainError('Market context file is invalid', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }
    return parsed.data;
  }

  private displayOutcomes(outcomes: readonly AdvisorOutcome[]): void {
    const table = new Table({
      head: ['Advisor', 'Status', 'Latency', 'Proposal'],
      style: { head: ['cyan'] }
    });

    for (const outcome of outcomes) {
      const status = outcome.status === 'ok'
        ? chalk.green('ok')
        : outcome.status === 'timeout'
          ? chalk.yellow('timeout')
          : chalk.red(`error (${outcome.error.kind})`);
      const proposal = outcome.status === 'ok' && outcome.proposal ? this.formatProposal(outcome.proposal) : '-';

      table.push([outcome.advisor, status, `${(outcome.latencyMs / 1000).toFixed(1)}s`, proposal]);
    }

    console.log(table.toString());

    for (const outcome of outcomes) {
      console.log(chalk.bold(`\n${outcome.advisor}`));
      if (outcome.status === 'ok') {
        console.log(outcome.reply);
        if (outcome.proposalWarning) {
          console.log(chalk.yellow(`⚠️  ${outcome.proposalWarning.message}`));
        }
      } else {
        console.log(chalk.red(outcome.error.message));
      }
    }
  }

  private formatProposal(proposal: TradeProposal): string {
    const parts = [`${proposal.action.toUpperCase()} ${proposal.symbol}`];
    if (proposal.entry !== undefined) parts.push(`entry ${proposal.entry}`);
    if (proposal.stopLoss !== undefined) parts.push(`SL ${proposal.stopLoss}`);
    if (proposal.takeProfit !== undefined) parts.push(`TP ${proposal.takeProfit}`);
    return parts.join(' | ');
  }

  private handleError(error: unknown): void {
    if (error instanceof DomainError || error instanceof ApplicationError || error instanceof InfrastructureError) {
      console.error(chalk.red(`❌ ${error.message}`));
      if (error.details) {
        console.error(chalk.gray(JSON.stringify(error.details, null, 2)));
      }
    } else {
      console.error(chalk.red('❌ Unexpected error:'), error instanceof Error ? error.message : String(error));
    }
    process.exitCode = 1;
  }
}
