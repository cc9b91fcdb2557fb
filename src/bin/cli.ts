#!/usr/bin/env node
import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { toAnalysisConfig } from '../config/defaults.js';
import { loadConfig } from '../config/loader.js';
import { auditConfigSchema, type AuditConfigResolved } from '../config/schema.js';
import {
  EXIT_CODES,
  cleanDocument,
  loadDocument,
  runScan,
} from '../core/pipeline.js';
import { formatTextReport } from '../core/report/text.js';
import { toScanResponse } from '../core/report/json.js';

interface ScanCliOptions {
  config?: string;
  reportDir?: string;
  format?: string;
  scope?: string;
  json?: boolean;
  verbose?: boolean;
}

interface CleanCliOptions {
  config?: string;
  strategy?: string;
  output?: string;
  removeSuspicious?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('hidden-text-audit')
  .description('Detects document text a human reader cannot see before it reaches a language model')
  .version('0.1.0');

program
  .command('scan')
  .description('Scan span documents for hidden text and prompt injection')
  .argument('[files...]', 'Span document files or globs (defaults to configured src)')
  .option('-c, --config <path>', 'Path to config file')
  .option('--report-dir <dir>', 'Output directory for reports')
  .option('--format <type>', 'Report format: markdown or json')
  .option('--scope <scope>', 'Text read by the injection matcher: hidden or all')
  .option('--json', 'Print JSON responses instead of the text summary')
  .option('--verbose', 'Print progress and reasons')
  .action(async (files: string[], opts: ScanCliOptions) => {
    try {
      // 1. Load config file (if any), then merge CLI flags as overrides
      const fileConfig = await loadConfig(opts.config);
      const config = withOverrides(fileConfig, {
        reportDir: opts.reportDir,
        format: opts.format,
        scanScope: opts.scope,
      });
      const verbose = opts.verbose === true;
      const cwd = process.cwd();

      // 2. Run pipeline
      const { documents, reportPath, exitCode } = runScan({
        src: files.length > 0 ? files : config.src,
        cwd,
        analysis: toAnalysisConfig(config),
        reportDir: config.reportDir,
        format: config.format,
        verbose,
      });

      // 3. Print per-document results (runScan already warned about failed files)
      for (const doc of documents) {
        if (doc.kind === 'failed') continue;
        if (opts.json) {
          console.log(JSON.stringify({ file: doc.file, ...toScanResponse(doc.analysis.assessment) }, null, 2));
        } else {
          console.log(formatTextReport(doc.file, doc.analysis, { verbose }));
        }
      }

      if (documents.length === 0) {
        console.error('[hidden-text-audit] No span documents matched.');
      }
      console.error(`[hidden-text-audit] Report saved to: ${reportPath}`);
      process.exit(exitCode);
    } catch (err) {
      console.error(`[hidden-text-audit] Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(EXIT_CODES.ERROR);
    }
  });

program
  .command('clean')
  .description('Print the document text with hidden spans stripped or flagged')
  .argument('<file>', 'Span document file')
  .option('-c, --config <path>', 'Path to config file')
  .option('--strategy <name>', 'strip, flag or preserve (default: picked from risk level)')
  .option('-o, --output <path>', 'Write the cleaned text to a file instead of stdout')
  .option('--remove-suspicious', 'strip: also remove low-contrast and small text')
  .option('--verbose', 'Print removed text samples')
  .action(async (file: string, opts: CleanCliOptions) => {
    try {
      const fileConfig = await loadConfig(opts.config);
      const config = withOverrides(fileConfig, {
        sanitize: {
          ...fileConfig.sanitize,
          ...definedOnly({ strategy: opts.strategy, removeSuspicious: opts.removeSuspicious }),
        },
      });

      const document = loadDocument(resolve(process.cwd(), file));
      const { analysis, sanitization } = cleanDocument(document, toAnalysisConfig(config), {
        strategy: opts.strategy !== undefined ? config.sanitize.strategy : undefined,
        defaultStrategy: config.sanitize.strategy,
        removeSuspicious: config.sanitize.removeSuspicious,
        flagPrefix: config.sanitize.flagPrefix,
      });

      console.error(`[hidden-text-audit] Risk: ${analysis.assessment.level}`);
      console.error(`  Strategy: ${sanitization.strategy}`);
      console.error(`  Original: ${sanitization.originalSpanCount} spans`);
      console.error(`  Removed: ${sanitization.removedCount} spans`);
      if (sanitization.flaggedCount > 0) {
        console.error(`  Flagged: ${sanitization.flaggedCount} spans`);
      }
      if (opts.verbose) {
        sanitization.removedTextSample.slice(0, 3).forEach((text, i) => {
          console.error(`    [${i + 1}] '${text.length > 40 ? `${text.slice(0, 40)}...` : text}'`);
        });
      }

      if (opts.output) {
        writeFileSync(resolve(process.cwd(), opts.output), sanitization.safeText, 'utf-8');
        console.error(`  Output: ${opts.output}`);
      } else {
        console.log(sanitization.safeText);
      }
      process.exit(0);
    } catch (err) {
      console.error(`[hidden-text-audit] Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(EXIT_CODES.ERROR);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`[hidden-text-audit] Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(EXIT_CODES.ERROR);
});

/**
 * Re-validates the config with CLI flags applied.
 * Flags that were not given leave the file value in place.
 */
function withOverrides(
  base: AuditConfigResolved,
  overrides: Record<string, unknown>,
): AuditConfigResolved {
  return auditConfigSchema.parse({ ...base, ...definedOnly(overrides) });
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}
