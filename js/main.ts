/**
 * @fileoverview Main Entry Point / Controller
 * Orchestrates one report run.
 *
 * ## Data Flow
 *
 * ```
 *  fetchEntries() ──► aggregate() ──► EmployeeSummary[] ──┬──► renderReportTable() ──► employee_table.html
 *                                                          └──► renderPieChart()    ──► employee_pie_chart.png
 * ```
 *
 * - An empty summary ends the run early with nothing written.
 * - A degenerate total (zero or negative hours) skips the chart with a warning;
 *   the HTML table is still written.
 * - Artifacts are staged as temp files and only renamed into place once both
 *   have been produced, so a failed run leaves no partial output.
 *
 * ## Key Functions
 * - `runReport()` - fetch → aggregate → render → write, with injected collaborators
 * - `main()` - CLI lifecycle: config, error reporting, client creation and disposal
 */

import * as path from 'node:path';
import { aggregate, findMalformedEntries, sumHours } from './aggregate.js';
import { createTimeEntriesClient, type ClientDependencies } from './api.js';
import { renderPieChart } from './chart.js';
import { loadConfig, type LoadConfigOptions } from './config.js';
import { APP_NAME, APP_VERSION } from './constants.js';
import { addBreadcrumb, flushErrorReports, initErrorReporting, reportError, reportMessage } from './error-reporting.js';
import { DegenerateAggregateError } from './errors.js';
import { configureLogging, createLogger } from './logger.js';
import { createFileArtifactWriter, type ArtifactWriter, type StagedArtifact } from './output.js';
import { renderReportTable } from './report.js';
import { createUserFriendlyError, formatHoursDecimal } from './utils.js';
import type { EmployeeSummary, TimeEntriesClient } from './types.js';

const logger = createLogger('Main');

// ==================== PIPELINE ====================

export interface ReportDependencies {
    client: TimeEntriesClient;
    writer: ArtifactWriter;
    outputDir: string;
    htmlFileName: string;
    chartFileName: string;
    /** Produces PNG bytes; defaults to the canvas renderer */
    renderChart?: (summary: readonly EmployeeSummary[]) => Promise<Buffer>;
}

export type RunOutcome =
    | { status: 'empty' }
    | { status: 'completed'; summary: EmployeeSummary[]; files: string[] }
    | { status: 'chart-skipped'; summary: EmployeeSummary[]; files: string[]; reason: DegenerateAggregateError };

/**
 * Commits every staged artifact, or none: a failed commit discards all of
 * them, including those already moved into place.
 */
async function commitAll(staged: StagedArtifact[]): Promise<string[]> {
    try {
        for (const artifact of staged) {
            await artifact.commit();
        }
    } catch (error) {
        await discardAll(staged);
        throw error;
    }
    return staged.map((artifact) => artifact.path);
}

async function discardAll(staged: StagedArtifact[]): Promise<void> {
    await Promise.all(staged.map((artifact) => artifact.discard()));
}

/**
 * Runs the report pipeline once.
 *
 * @throws FetchError when the entries cannot be fetched.
 * @throws RenderError when an artifact cannot be encoded or written.
 */
export async function runReport(deps: ReportDependencies): Promise<RunOutcome> {
    const renderChart = deps.renderChart ?? ((summary: readonly EmployeeSummary[]) => renderPieChart(summary));

    addBreadcrumb('pipeline', 'Fetching time entries');
    const entries = await deps.client.fetchEntries();

    const malformed = findMalformedEntries(entries);
    if (malformed.length > 0) {
        const names = Array.from(new Set(malformed.map((entry) => entry.employeeName)));
        logger.warn(
            `${malformed.length} time entries end before they start; their negative durations are included in the totals`,
            { employees: names }
        );
    }

    const summary = aggregate(entries);
    if (summary.length === 0) {
        logger.info('No non-deleted time entries; nothing to render');
        return { status: 'empty' };
    }
    logger.info(
        `Aggregated ${entries.length} entries into ${summary.length} employees, ${formatHoursDecimal(sumHours(summary), 2)} hours in total`
    );

    addBreadcrumb('pipeline', 'Rendering artifacts', { employees: summary.length });
    const html = renderReportTable(summary);

    let chart: Buffer | null = null;
    let skipReason: DegenerateAggregateError | null = null;
    logger.time('renderPieChart');
    try {
        chart = await renderChart(summary);
    } catch (error) {
        if (!(error instanceof DegenerateAggregateError)) throw error;
        skipReason = error;
        logger.warn(`Skipping pie chart: ${error.message}`);
        reportMessage('Pie chart skipped for a degenerate total', 'warning', {
            module: 'Main',
            operation: 'renderPieChart',
            metadata: { totalHours: error.totalHours },
        });
    } finally {
        logger.timeEnd('renderPieChart');
    }

    const staged: StagedArtifact[] = [];
    try {
        staged.push(await deps.writer.stage(path.join(deps.outputDir, deps.htmlFileName), html));
        if (chart) {
            staged.push(await deps.writer.stage(path.join(deps.outputDir, deps.chartFileName), chart));
        }
    } catch (error) {
        await discardAll(staged);
        throw error;
    }
    const files = await commitAll(staged);

    return skipReason
        ? { status: 'chart-skipped', summary, files, reason: skipReason }
        : { status: 'completed', summary, files };
}

// ==================== CLI LIFECYCLE ====================

export interface MainOptions extends LoadConfigOptions {
    /** Where user-facing lines go; defaults to console.log */
    print?: (line: string) => void;
    clientDependencies?: ClientDependencies;
    writer?: ArtifactWriter;
    renderChart?: ReportDependencies['renderChart'];
}

/**
 * Runs the command line tool once.
 *
 * @returns The process exit code: 0 on success or an empty dataset, 1 on failure.
 */
export async function main(options: MainOptions = {}): Promise<number> {
    // eslint-disable-next-line no-console
    const print = options.print ?? ((line: string) => console.log(line));
    let client: TimeEntriesClient | null = null;

    try {
        const config = await loadConfig(options);
        configureLogging(config);

        initErrorReporting({
            dsn: config.sentryDsn,
            environment: config.environment,
            release: `${APP_NAME}@${APP_VERSION}`,
            apiUrl: config.apiUrl,
        });

        print('Fetching data from API...');
        client = createTimeEntriesClient(config, options.clientDependencies);

        const outcome = await runReport({
            client,
            writer: options.writer ?? createFileArtifactWriter(),
            outputDir: config.outputDir,
            htmlFileName: config.htmlFileName,
            chartFileName: config.chartFileName,
            renderChart: options.renderChart,
        });

        if (outcome.status === 'empty') {
            print('No data retrieved from API.');
            return 0;
        }

        const [htmlFile, chartFile] = outcome.files.map((file) => path.basename(file));
        print(`HTML table generated: ${htmlFile}`);
        if (outcome.status === 'chart-skipped') {
            print(`Pie chart skipped: ${outcome.reason.message}`);
        } else {
            print(`Pie chart generated: ${chartFile}`);
        }

        print('Files generated successfully!');
        for (const file of outcome.files) {
            print(`- ${path.basename(file)}`);
        }
        return 0;
    } catch (error) {
        const friendly = createUserFriendlyError(error);
        logger.debug(`${friendly.title}: ${friendly.message}`, friendly.stack);
        reportError(friendly.originalError, { module: 'Main', operation: 'runReport', userMessage: friendly.message });
        print(`Error: ${friendly.detail}`);
        return 1;
    } finally {
        client?.dispose();
        await flushErrorReports();
    }
}
