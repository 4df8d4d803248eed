import { describe, it, expect } from '@jest/globals';
import { isLowHours, renderReportTable } from '../../js/report.js';

function bodyRows(html: string): string[] {
    const lines = html.split('\n');
    const start = lines.indexOf('        <tbody>');
    const end = lines.indexOf('        </tbody>');
    return lines.slice(start + 1, end);
}

describe('isLowHours', () => {
    it('flags totals under 100 hours', () => {
        expect(isLowHours({ name: 'A', totalHours: 99.999 })).toBe(true);
        expect(isLowHours({ name: 'A', totalHours: 0 })).toBe(true);
        expect(isLowHours({ name: 'A', totalHours: -3 })).toBe(true);
    });

    it('does not flag 100 hours or more', () => {
        expect(isLowHours({ name: 'A', totalHours: 100 })).toBe(false);
        expect(isLowHours({ name: 'A', totalHours: 150 })).toBe(false);
    });
});

describe('renderReportTable', () => {
    it('writes a complete document with every line terminated', () => {
        const html = renderReportTable([{ name: 'Ann', totalHours: 150 }]);

        expect(html.startsWith('<!DOCTYPE html>\n<html>\n<head>\n    <meta charset="utf-8">\n')).toBe(true);
        expect(html.endsWith('    </table>\n</body>\n</html>\n')).toBe(true);
        expect(html).toContain('    <title>Employee Time Report</title>\n');
        expect(html).toContain('    <h1>Employee Time Report</h1>\n');
        expect(html).toContain('    <p>Employees ordered by total time worked (descending)</p>\n');
        expect(html).toContain('        .low-hours { background-color: #ffebee; }\n');
    });

    it('renders one row per employee with two-decimal hours', () => {
        const html = renderReportTable([
            { name: 'Ann', totalHours: 150 },
            { name: 'Ben', totalHours: 12.5 },
        ]);

        expect(bodyRows(html)).toEqual([
            '            <tr>',
            '                <td>Ann</td>',
            '                <td class="hours-cell">150.00</td>',
            '            </tr>',
            '            <tr class="low-hours">',
            '                <td>Ben</td>',
            '                <td class="hours-cell">12.50</td>',
            '            </tr>',
        ]);
    });

    it('flags by the exact total, not the rounded one', () => {
        const rows = bodyRows(renderReportTable([{ name: 'Edge', totalHours: 99.999 }]));

        expect(rows[0]).toBe('            <tr class="low-hours">');
        expect(rows[2]).toBe('                <td class="hours-cell">100.00</td>');
    });

    it('escapes employee names', () => {
        const rows = bodyRows(renderReportTable([{ name: '<Eve & "Co">', totalHours: 120 }]));
        expect(rows[1]).toBe('                <td>&lt;Eve &amp; &quot;Co&quot;&gt;</td>');
    });

    it('keeps the given row order', () => {
        const rows = bodyRows(
            renderReportTable([
                { name: 'Low', totalHours: 1 },
                { name: 'High', totalHours: 500 },
            ])
        );
        expect(rows.filter((line) => line.includes('<td>'))).toEqual([
            '                <td>Low</td>',
            '                <td>High</td>',
        ]);
    });

    it('renders an empty body for an empty summary', () => {
        expect(bodyRows(renderReportTable([]))).toEqual([]);
    });
});
