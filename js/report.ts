/**
 * @fileoverview HTML Report Module
 * Formats the ranked summary as a self-contained HTML table.
 * Rows keep the order they are given in; no sorting happens here.
 */

import { LOW_HOURS_THRESHOLD } from './constants.js';
import { escapeHtml, formatHoursDecimal } from './utils.js';
import type { EmployeeSummary } from './types.js';

const DOCUMENT_TITLE = 'Employee Time Report';

const STYLES = [
    'body { font-family: Arial, sans-serif; margin: 20px; }',
    'table { border-collapse: collapse; width: 100%; max-width: 600px; }',
    'th, td { border: 1px solid #ddd; padding: 12px; text-align: left; }',
    'th { background-color: #f2f2f2; font-weight: bold; }',
    '.low-hours { background-color: #ffebee; }',
    '.hours-cell { text-align: right; }',
    'h1 { color: #333; }',
];

/**
 * Whether a row gets the "low-hours" flag.
 */
export function isLowHours(employee: EmployeeSummary): boolean {
    return employee.totalHours < LOW_HOURS_THRESHOLD;
}

function renderRow(employee: EmployeeSummary): string[] {
    const rowClass = isLowHours(employee) ? ' class="low-hours"' : '';
    return [
        `            <tr${rowClass}>`,
        `                <td>${escapeHtml(employee.name)}</td>`,
        `                <td class="hours-cell">${formatHoursDecimal(employee.totalHours, 2)}</td>`,
        '            </tr>',
    ];
}

/**
 * Renders the summary as a UTF-8 HTML document.
 *
 * @param summary - Ranked summary, highest total first.
 * @returns The complete document, each line terminated by `\n`.
 */
export function renderReportTable(summary: readonly EmployeeSummary[]): string {
    const lines = [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        '    <meta charset="utf-8">',
        `    <title>${DOCUMENT_TITLE}</title>`,
        '    <style>',
        ...STYLES.map((rule) => `        ${rule}`),
        '    </style>',
        '</head>',
        '<body>',
        `    <h1>${DOCUMENT_TITLE}</h1>`,
        '    <p>Employees ordered by total time worked (descending)</p>',
        '    <table>',
        '        <thead>',
        '            <tr>',
        '                <th>Employee Name</th>',
        '                <th>Total Hours Worked</th>',
        '            </tr>',
        '        </thead>',
        '        <tbody>',
        ...summary.flatMap(renderRow),
        '        </tbody>',
        '    </table>',
        '</body>',
        '</html>',
    ];

    return lines.map((line) => `${line}\n`).join('');
}
