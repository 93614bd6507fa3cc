import { Command } from 'commander';
import { addSubscriptionCommands } from './commands/subscriptions';
import { addTokenCommands } from './commands/tokens';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('strava-reporter-admin')
    .description('CLI for strava-reporter administration')
    .version('1.0.0');

  addSubscriptionCommands(program);
  addTokenCommands(program);

  return program;
}
