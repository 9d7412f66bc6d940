import { Command } from 'commander';
import { createInterface } from 'node:readline/promises';
import chalk from 'chalk';
import { ZodError } from 'zod';
import { LastFmProvider, ProviderConfigSchema, RecommendationSession, SessionConfigSchema } from '@trackboard/core';
import { TerminalPresenter } from '../presenter.js';

interface RecommendOptions {
  artist?: string;
  track?: string;
  apiKey?: string;
  count: string;
  verbose?: boolean;
}

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

export const recommendCommand = new Command('recommend')
  .description('Start an interactive recommendation session from a seed track')
  .option('-a, --artist <artist>', 'Seed artist (prompted for when omitted)')
  .option('-t, --track <track>', 'Seed track (prompted for when omitted)')
  .option('-k, --api-key <key>', 'Last.fm API key (default: $LASTFM_API_KEY)')
  .option('-c, --count <n>', 'Tracks gathered into each new pool', '4')
  .option('-v, --verbose', 'Print blackboard activity as it happens')
  .action(async (opts: RecommendOptions) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });

    try {
      const provider = new LastFmProvider(
        ProviderConfigSchema.parse({ apiKey: opts.apiKey ?? process.env.LASTFM_API_KEY ?? '' }),
      );
      const config = SessionConfigSchema.parse({ initialCount: Number(opts.count) });

      const session = new RecommendationSession({
        provider,
        config,
        presenter: new TerminalPresenter(rl, { seed: { artist: opts.artist, track: opts.track } }),
        onActivity: opts.verbose
          ? (e) => console.log(chalk.dim(`  [${e.type}] ${e.description}${e.details ? ` (${e.details})` : ''}`))
          : undefined,
      });

      const outcome = await session.run();
      console.log();
      console.log(chalk.gray(`${outcome.rounds} recommendation(s), ${outcome.liked.length} liked.`));
    } catch (err) {
      console.error(chalk.red('Error:'), describeError(err));
      process.exitCode = 1;
    } finally {
      rl.close();
    }
  });
