#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { Command } from 'commander';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli/cli.module';
import { ConsoleIo } from './cli/command-io';
import { RebalanceCommand } from './cli/rebalance.command';
import { loadAppSettings, logLevelsFrom } from './common/config/app-settings';
import { StderrLogger } from './common/logging/stderr-logger';
import { FALLBACK_BALANCE_FILE, LOCAL_BALANCE_FILE } from './balances/balance-loader.service';

type CliFlags = {
  config: string;
  balances?: string;
  balancesDir: string;
  amount?: string;
  cashSymbol?: string;
  json: boolean;
  verbose: boolean;
};

async function main(argv: string[]): Promise<void> {
  const settings = loadAppSettings();

  const program = new Command()
    .name('rebalance')
    .description('Recommend how to split a new investment across portfolio categories')
    .option('-c, --config <path>', 'allocation configuration file', settings.configPath)
    .option('-b, --balances <path>', 'balance CSV to read, skipping the local/fallback lookup', settings.balancesPath)
    .option(
      '-d, --balances-dir <dir>',
      `directory searched for ${LOCAL_BALANCE_FILE}, then ${FALLBACK_BALANCE_FILE}`,
      settings.balancesDir,
    )
    .option('-a, --amount <amount>', 'amount to invest, e.g. 2,500.00; prompts when omitted')
    .option('--cash-symbol <symbol>', `cash-equivalent symbol left out of the balances (default ${settings.cashSymbol})`)
    .option('--json', 'print the recommendation as JSON', false)
    .option('--verbose', 'log loader and allocation details', false)
    .parse(argv);

  const flags = program.opts<CliFlags>();
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: new StderrLogger('Rebalance', {
      logLevels: logLevelsFrom(flags.verbose ? 'debug' : settings.logLevel ?? 'warn'),
    }),
  });
  // JSON mode keeps stdout for the document alone
  const io = new ConsoleIo({
    input: process.stdin,
    output: process.stdout,
    prompts: flags.json ? process.stderr : process.stdout,
  });

  try {
    await app.get(RebalanceCommand).run(
      {
        config: flags.config,
        balances: flags.balances,
        balancesDir: flags.balancesDir,
        amount: flags.amount,
        cashSymbol: flags.cashSymbol,
        defaultCashSymbol: settings.cashSymbol,
        json: flags.json,
      },
      io,
    );
  } finally {
    io.close();
    await app.close();
  }
}

main(process.argv).catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.message : String(err), 'Rebalance');
  process.exitCode = 1;
});
