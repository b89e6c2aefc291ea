#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import { stringify as yamlStringify } from 'yaml';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getAppDir, truncate } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { HttpClient } from '../http/client.js';
import { loadCookie } from '../http/credentials.js';
import { runAnalysis } from '../engine/pipeline.js';
import type { ListingParams } from '../source/listing.js';
import { EXPORT_FORMATS, type ExportFormat } from '../export/sinks.js';
import { describeRecord } from './display.js';
import {
  FORMAT_MENU,
  ask,
  parseFormatChoice,
  parseFormatOption,
  parseNumberAnswer,
  type NumberRule,
} from './prompts.js';

const program = new Command();

program
  .name('bilirank')
  .description('Fetch Bilibili popular videos, enrich their statistics and export reports')
  .version('0.1.0');

function numberOption(rule: Omit<NumberRule, 'defaultValue'>) {
  return (value: string): number => {
    if (!value.trim()) throw new InvalidArgumentError('A value is required');
    const result = parseNumberAnswer(value, { ...rule, defaultValue: rule.min });
    if (!result.ok) throw new InvalidArgumentError(result.error);
    return result.value;
  };
}

function formatOption(value: string): ExportFormat[] {
  const result = parseFormatOption(value);
  if (!result.ok) throw new InvalidArgumentError(result.error);
  return result.value;
}

interface RunOpts {
  pageSize?: number;
  startPage?: number;
  pages?: number;
  format?: ExportFormat[];
  outDir?: string;
  cookie?: string;
  yes: boolean;
}

async function collectParams(
  rl: readline.Interface | null,
  config: Config,
  opts: RunOpts,
): Promise<ListingParams> {
  const defaults = config.listing;

  const pick = async (given: number | undefined, text: string, rule: NumberRule): Promise<number> => {
    if (given !== undefined) return given;
    if (!rl) return rule.defaultValue;
    return ask(rl, text, (a) => parseNumberAnswer(a, rule), (e) => log(`  ${e}`));
  };

  const pageSize = await pick(opts.pageSize, `Videos per page (default ${defaults.page_size}, max 100): `, {
    defaultValue: defaults.page_size,
    min: 1,
    max: 100,
  });
  const startPage = await pick(opts.startPage, `Start page (default ${defaults.start_page}): `, {
    defaultValue: defaults.start_page,
    min: 1,
  });
  const maxPages = await pick(opts.pages, `Number of pages (default ${defaults.max_pages}): `, {
    defaultValue: defaults.max_pages,
    min: 1,
  });

  return { pageSize, startPage, maxPages };
}

// === run ===
program
  .command('run', { isDefault: true })
  .description('Fetch, enrich and export the popular video list')
  .option('-n, --page-size <n>', 'Videos per page (1-100)', numberOption({ min: 1, max: 100 }))
  .option('-s, --start-page <n>', 'First page to fetch', numberOption({ min: 1 }))
  .option('-p, --pages <n>', 'Number of pages to fetch', numberOption({ min: 1 }))
  .option('-f, --format <formats>', 'Exports: json,csv,markdown | all | none', formatOption)
  .option('-o, --out-dir <dir>', 'Directory for export files')
  .option('--cookie <file>', 'Cookie file supplying the session')
  .option('-y, --yes', 'Use configured defaults instead of prompting', false)
  .action(async (opts: RunOpts) => {
    const config = await loadConfig();
    const interactive = !opts.yes && process.stdin.isTTY === true;
    const rl = interactive ? readline.createInterface({ input: process.stdin, output: process.stdout }) : null;

    try {
      log('Bilibili popular video analysis');
      log('='.repeat(60));

      const params = await collectParams(rl, config, opts);
      log(`Settings: ${params.pageSize} per page, starting at page ${params.startPage}, ${params.maxPages} page(s)`);
      log('='.repeat(60));

      const cookie = loadCookie(opts.cookie ?? config.credentials.cookie_file);
      const client = new HttpClient({ http: config.http, cookie });
      if (!client.hasCookie()) {
        log('No session cookie, running with anonymous requests');
      }

      const result = await runAnalysis(
        client,
        config,
        params,
        {
          onEmpty: () => {
            log('No popular videos were returned.');
          },
          onListed: (count) => {
            log(`\nFetched ${count} popular videos, collecting detailed statistics...`);
            log('='.repeat(60));
          },
          onEnriching: (index, total, title) => {
            log(`Processing ${index}/${total}: ${truncate(title, 30)}`);
          },
          onRecord: (record) => {
            for (const line of describeRecord(record)) log(line);
          },
          chooseFormats: async () => {
            if (opts.format) return opts.format;
            if (!rl) return [...EXPORT_FORMATS];
            log('\nExport options:');
            for (const line of FORMAT_MENU) log(line);
            return ask(rl, 'Choose export format (1-5): ', parseFormatChoice, (e) => log(`  ${e}`));
          },
        },
        { outputDir: opts.outDir },
      );

      if (result.records.length === 0) {
        process.exitCode = 1;
        return;
      }

      for (const outcome of result.exports) {
        if (outcome.ok) {
          log(`✓ ${outcome.format} written to: ${outcome.path}`);
        } else {
          log(`✗ ${outcome.format} export failed: ${outcome.error}`);
          process.exitCode = 1;
        }
      }
      log(`\nDone: ${result.records.length} videos in ${(result.durationMs / 1000).toFixed(1)}s`);
    } finally {
      rl?.close();
    }
  });

// === init ===
program
  .command('init')
  .description('Create ~/.bilirank/config.yaml with default settings')
  .action(() => {
    const configPath = path.join(getAppDir(), 'config.yaml');
    if (fs.existsSync(configPath)) {
      log(`✓ ${configPath} already exists`);
      return;
    }
    writeDefaultConfig(configPath);
    log(`✓ ${configPath} created`);
  });

// === config ===
program
  .command('config')
  .description('Print the effective configuration')
  .action(async () => {
    const config = await loadConfig();
    log(yamlStringify(config));
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  logger.error({ error: errorMessage(err) }, 'Command failed');
  process.exitCode = 1;
});
