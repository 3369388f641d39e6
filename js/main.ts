#!/usr/bin/env node
/**
 * @fileoverview Main Entry Point / Command Line Driver
 * Reads the input files, runs the pipeline stages in order and writes the
 * invoice (plus optional CSV exports).
 *
 * ## Data Flow
 *
 * ```
 * template ──► withTemplate ─────────┐
 * production... ──► withProductionFiles ──► withTimesheet ──► previewCosts
 * timesheet ─────────────────────────┘            │
 *                                                 ▼
 *                                          generateInvoice ──► <code>_Invoice_<date>.<ext>
 * ```
 *
 * Usage:
 *   invoice-builder --template T.xlsm --production A.xlsx --production B.xlsx \
 *       [--timesheet hours.csv] [--event "Event 10 2025"] [--out dir] [--csv] [--verbose]
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { APP_ENV, APP_RELEASE, SENTRY_DSN } from './constants.js';
import { flushErrorReports, initErrorReporting, setEventContext } from './error-reporting.js';
import { ReadError, ValidationError } from './errors.js';
import { csvFileName, printTableToCsv, studioTableToCsv } from './export.js';
import { createLogger, LogLevel, setLogLevel } from './logger.js';
import {
    createPipelineContext,
    generateInvoice,
    previewCosts,
    readinessIssues,
    withEventName,
    withProductionFiles,
    withTemplate,
    withTimesheet,
    type PipelineContext,
} from './state.js';
import { loadTemplate, type ExcelStyle } from './template.js';
import type { CostPreview, PipelineIssue } from './types.js';
import { cellText, formatCurrency, formatHoursDecimal } from './utils.js';

const log = createLogger('Main');

/**
 * Parsed command line options.
 */
export interface CliOptions {
    template: string;
    production: string[];
    timesheet: string | null;
    /** Empty when not given; the event name of the production data is used instead */
    event: string;
    out: string;
    csv: boolean;
    /** Debug logging */
    verbose: boolean;
}

export const USAGE =
    'Usage: invoice-builder --template <file> --production <file>... ' +
    '[--timesheet <file>] [--event "Event 10 2025"] [--out <dir>] [--csv] [--verbose]';

function readArgs(argv: string[]) {
    return parseArgs({
        args: argv,
        options: {
            template: { type: 'string', short: 't' },
            production: { type: 'string', short: 'p', multiple: true },
            timesheet: { type: 'string', short: 's' },
            event: { type: 'string', short: 'e' },
            out: { type: 'string', short: 'o' },
            csv: { type: 'boolean' },
            verbose: { type: 'boolean', short: 'v' },
        },
        strict: true,
        allowPositionals: false,
    });
}

/**
 * Parses command line arguments.
 *
 * @throws ValidationError when a required option is missing or an option is unknown
 */
export function parseCliArgs(argv: string[]): CliOptions {
    let values: ReturnType<typeof readArgs>['values'];
    try {
        values = readArgs(argv).values;
    } catch (error) {
        throw new ValidationError(error instanceof Error ? error.message : String(error));
    }

    if (!values.template) {
        throw new ValidationError('--template is required');
    }
    if (!values.production || values.production.length === 0) {
        throw new ValidationError('At least one --production file is required');
    }

    return {
        template: values.template,
        production: values.production,
        timesheet: values.timesheet ?? null,
        event: values.event ?? '',
        out: values.out ?? '.',
        csv: values.csv ?? false,
        verbose: values.verbose ?? false,
    };
}

async function readInput(file: string): Promise<Uint8Array> {
    try {
        return await readFile(file);
    } catch (error) {
        throw new ReadError(path.basename(file), 'file could not be opened', { cause: error });
    }
}

// ==================== OUTPUT ====================

function print(line = ''): void {
    // eslint-disable-next-line no-console
    console.log(line);
}

/**
 * One line per recorded issue.
 */
export function formatIssues(issues: readonly PipelineIssue[]): string[] {
    return issues.map((issue) =>
        issue.kind === 'gap'
            ? `  [${issue.stage}] ${issue.message}`
            : `  [${issue.stage}] ${issue.error.title}: ${issue.error.detail}`
    );
}

/**
 * Human-readable summary of the tables and the cost preview.
 */
export function formatSummary<TStyle>(context: PipelineContext<TStyle>, preview: CostPreview): string[] {
    const lines: string[] = [
        `Event: ${context.eventName} (${context.eventCode})`,
        `Print lines: ${context.print.length}`,
        `Studio projects: ${context.studio.length}`,
    ];

    if (context.lastMerge) {
        const merge = context.lastMerge;
        lines.push(
            `Timesheet: ${merge.matched}/${merge.records.length} projects matched, ` +
                `${formatHoursDecimal(merge.totalHours)} hours`
        );
        if (merge.unmatched.length > 0) {
            lines.push(`Projects without hours (${merge.unmatched.length}):`);
            for (const record of merge.unmatched) {
                lines.push(`  ${record.projectRef} ${cellText(record.projectDescription) ?? ''}`.trimEnd());
            }
        }
    } else if (!preview.hasStudioHours) {
        lines.push('No studio hours: load a timesheet or edit the Studio sheet');
    }

    const { totals } = preview;
    lines.push(
        'Costs:',
        `  Studio  CORE ${formatCurrency(totals.studioCore)}  OAB ${formatCurrency(totals.studioOab)}`,
        `  Print   CORE ${formatCurrency(totals.printCore)}  OAB ${formatCurrency(totals.printOab)}`,
        `  Total   CORE ${formatCurrency(totals.core)}  OAB ${formatCurrency(totals.oab)}`,
        `  Grand total ${formatCurrency(totals.grand)}`
    );
    return lines;
}

// ==================== RUN ====================

/**
 * Runs the full pipeline for the given arguments.
 *
 * @returns Process exit code
 */
export async function run(argv: string[]): Promise<number> {
    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        print(error instanceof Error ? error.message : String(error));
        print(USAGE);
        return 1;
    }

    if (options.verbose) {
        setLogLevel(LogLevel.DEBUG);
    }
    await initErrorReporting({ dsn: SENTRY_DSN, environment: APP_ENV, release: APP_RELEASE });

    try {
        let context = createPipelineContext<ExcelStyle>(options.event);

        const templateBytes = await readInput(options.template);
        context = await withTemplate(context, () => loadTemplate(templateBytes, path.basename(options.template)));

        const productionFiles = await Promise.all(
            options.production.map(async (file) => ({ bytes: await readInput(file), source: path.basename(file) }))
        );
        context = withProductionFiles(context, productionFiles);

        if (options.timesheet) {
            context = withTimesheet(context, await readInput(options.timesheet), path.basename(options.timesheet));
        }

        if (context.eventName === '') {
            const fromData = cellText(context.print[0]?.eventName ?? null);
            if (fromData) context = withEventName(context, fromData);
        }
        setEventContext(context.eventCode);

        formatSummary(context, previewCosts(context)).forEach((line) => print(line));

        const blockers = readinessIssues(context);
        if (blockers.length > 0) {
            print('Cannot generate invoice:');
            blockers.forEach((reason) => print(`  ${reason}`));
            formatIssues(context.issues).forEach((line) => print(line));
            return 1;
        }

        context = await generateInvoice(context);
        if (context.issues.length > 0) {
            print('Issues:');
            formatIssues(context.issues).forEach((line) => print(line));
        }

        const invoice = context.generated;
        if (!invoice) {
            return 1;
        }

        await mkdir(options.out, { recursive: true });
        const invoicePath = path.join(options.out, invoice.fileName);
        await writeFile(invoicePath, invoice.buffer);
        print(`Invoice written to ${invoicePath}`);

        if (options.csv) {
            const studioPath = path.join(options.out, csvFileName('studio', context.eventCode));
            const printPath = path.join(options.out, csvFileName('print', context.eventCode));
            await writeFile(studioPath, studioTableToCsv(context.studio), 'utf-8');
            await writeFile(printPath, printTableToCsv(context.print), 'utf-8');
            print(`CSV exports written to ${studioPath} and ${printPath}`);
        }
        return 0;
    } catch (error) {
        log.error('Invoice run failed:', error);
        print(error instanceof Error ? error.message : String(error));
        return 1;
    } finally {
        await flushErrorReports();
    }
}

if (require.main === module) {
    run(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            log.error('Unhandled failure:', error);
            process.exitCode = 1;
        }
    );
}
