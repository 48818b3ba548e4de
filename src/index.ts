#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigError, loadConfig, type EngineConfig } from './core/config.js';
import { createEngine } from './core/engine.js';
import { isEngineError } from './core/errors.js';
import { FactLedger } from './core/ledger.js';
import { logger } from './core/logger.js';
import { KpiRegistry } from './processing/kpi-registry.js';
import { CONCEPT_DEFINITIONS } from './processing/concept-definitions.js';
import { KPI_DEFINITIONS } from './processing/kpi-definitions.js';
import { parsePeriodRequest } from './analysis/period-parser.js';
import { renderError, renderRegistry, renderResult, renderResultJson, renderStatus } from './output/result-renderer.js';

// Terminal output is chalk; structured logs only when asked for
if (!process.env.LOG_LEVEL) logger.level = 'silent';

function configOrExit(): EngineConfig {
  try {
    const config = loadConfig();
    if (process.env.LOG_LEVEL) logger.level = config.logLevel;
    return config;
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(chalk.red(err.message));
      process.exit(1);
    }
    throw err;
  }
}

interface CalcOptions {
  period?: string;
  freq?: string;
  ttm?: boolean;
  asOf?: string;
  json?: boolean;
}

async function executeCalc(ticker: string, metric: string, options: CalcOptions): Promise<void> {
  const engine = createEngine(configOrExit());
  try {
    const request = parsePeriodRequest({
      period: options.period,
      freq: options.freq,
      ttm: options.ttm ?? false,
      as_of: options.asOf,
    });

    const outcome = await engine.compute(ticker, metric, request);
    if (!outcome.success) {
      console.error(renderError(outcome.error));
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(renderResultJson(outcome.result));
    } else {
      const displayName = engine.registry.kpi(metric)?.display_name ?? engine.registry.concept(metric)?.display_name;
      console.log('');
      console.log(renderResult(outcome.result, displayName));
      console.log('');
    }
  } catch (err) {
    if (isEngineError(err)) {
      console.error(renderError(err));
    } else {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
    }
    process.exitCode = 1;
  } finally {
    engine.close();
  }
}

const program = new Command();

program
  .name('finkpi')
  .description('Financial KPIs from filings and market data, with full source provenance')
  .version('0.1.0');

program
  .command('calc')
  .description('Compute a KPI or base concept for a company (e.g., finkpi calc AAPL grossMargin --period 2024-Q4)')
  .argument('<ticker>', 'Company ticker')
  .argument('<metric>', 'KPI or concept name (see `finkpi kpis`)')
  .option('-p, --period <period>', 'latest, YYYY-Qn or YYYY', 'latest')
  .option('-f, --freq <freq>', 'Q (quarterly) or A (annual)')
  .option('--ttm', 'Trailing twelve months (sum of four quarters)')
  .option('--as-of <date>', 'Ignore periods ending after YYYY-MM-DD')
  .option('-j, --json', 'Output as JSON instead of table')
  .action(async (ticker: string, metric: string, options: CalcOptions) => {
    await executeCalc(ticker, metric, options);
  });

program
  .command('kpis')
  .description('List base concepts and KPIs in evaluation order')
  .action(() => {
    console.log(renderRegistry(new KpiRegistry(CONCEPT_DEFINITIONS, KPI_DEFINITIONS)));
  });

program
  .command('status')
  .description('Show configured data sources and their health')
  .action(() => {
    const engine = createEngine(configOrExit());
    console.log(renderStatus(engine.status()));
    engine.close();
  });

program
  .command('ledger')
  .description('Show fact ledger row counts')
  .action(() => {
    const config = configOrExit();
    if (!config.ledgerPath) {
      console.log(chalk.dim('\n  Ledger disabled (LEDGER_PATH=off)\n'));
      return;
    }
    const ledger = new FactLedger(config.ledgerPath);
    const stats = ledger.stats();
    console.log(`\n  Facts:       ${stats.facts}`);
    console.log(`  Rejections:  ${stats.rejections}`);
    console.log(`  Entities:    ${stats.entities}`);
    console.log(`  Location:    ${config.ledgerPath}\n`);
    ledger.close();
  });

await program.parseAsync();
