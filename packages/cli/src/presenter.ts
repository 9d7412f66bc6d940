import type { Interface as ReadlineInterface } from 'node:readline/promises';
import chalk from 'chalk';
import {
  describeHypothesis,
  type BoardSnapshot,
  type Candidate,
  type Feedback,
  type Presenter,
  type SeedRequest,
} from '@trackboard/core';

/** Only an explicit "yes" counts; anything else, blank included, is a no. */
export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}

export function toFeedback(answer: string): Feedback {
  return isYes(answer) ? 'accepted' : 'rejected';
}

export function formatBoard(board: BoardSnapshot): string[] {
  const lines = ['- - - - - THE BLACKBOARD - - - - -', '- Find a recommendation based on:'];
  lines.push(`- ${board.solving ? board.solving.candidate.describe() : '(no reference track)'}`);
  lines.push('-', '- Recommendation Pool:');
  for (const candidate of board.pool) lines.push(`- ${candidate.describe()}`);
  lines.push('-', '- Assumptions and Assertions:');
  for (const h of board.hypotheses) lines.push(`- **** ${describeHypothesis(h)}`);
  lines.push('- - - - - ************** - - - - -');
  return lines;
}

/** The one readline call the presenter needs. */
export type Prompt = Pick<ReadlineInterface, 'question'>;

export interface TerminalPresenterOptions {
  /** Skip the seed prompt when both are given on the command line. */
  seed?: Partial<SeedRequest>;
  print?: (line: string) => void;
}

export class TerminalPresenter implements Presenter {
  private readonly print: (line: string) => void;

  constructor(
    private readonly rl: Prompt,
    private readonly options: TerminalPresenterOptions = {},
  ) {
    this.print = options.print ?? ((line) => console.log(line));
  }

  async promptSeed(): Promise<SeedRequest> {
    const given = this.options.seed ?? {};
    if (!given.artist || !given.track) {
      this.print(chalk.bold('Ask me for a recommendation based on a track of your choosing:'));
    }
    const artist = given.artist ?? (await this.rl.question('artist: ')).trim();
    const track = given.track ?? (await this.rl.question('track: ')).trim();
    this.print(chalk.gray('Working...'));
    return { artist, track };
  }

  showCycleState(board: BoardSnapshot): void {
    this.print('');
    for (const line of formatBoard(board)) this.print(chalk.cyan(line));
    this.print('');
  }

  async presentCandidate(candidate: Candidate): Promise<Feedback> {
    this.print(`Do you like ${chalk.bold(`"${candidate.name}"`)} by ${chalk.bold(candidate.artist)}?`);
    if (candidate.url) this.print(chalk.gray(`Check it out: ${candidate.url}`));
    const feedback = toFeedback(await this.rl.question('response (yes/No): '));
    if (feedback === 'rejected') {
      this.print("Okay, I'll find another recommendation.");
      this.print(chalk.gray('Working...'));
    }
    return feedback;
  }

  async confirmContinue(): Promise<boolean> {
    this.print(chalk.green('Great! Would you like me to make another recommendation?'));
    return isYes(await this.rl.question('response (yes/No): '));
  }

  announceProgress(message: string): void {
    this.print(chalk.gray(`    ~ ${message}`));
  }

  announceExhausted(): void {
    this.print(chalk.yellow('Sorry, but there are no more recommendations to be had.'));
  }

  announceSessionEnd(): void {
    this.print('Okay. Goodbye!');
  }
}
