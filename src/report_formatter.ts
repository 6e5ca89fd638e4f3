/**
 * Report Formatter - terminal and file renderings of analysis and search output
 */

import { SEARCH_PREVIEW_CHARS } from './config';
import { preview } from './analyzer';
import { AnalysisReport, SearchResult } from './prompt_types';

export type AnalysisFormat = 'json' | 'md' | 'txt';

export const ANALYSIS_FORMATS: readonly AnalysisFormat[] = ['json', 'md', 'txt'];

export function isAnalysisFormat(value: string): value is AnalysisFormat {
    return ANALYSIS_FORMATS.some(format => format === value);
}

/** Categories by count, descending; equal counts keep collection order. */
export function rankCategories(report: AnalysisReport): Array<[string, number]> {
    return Array.from(report.categories).sort((a, b) => b[1] - a[1]);
}

/**
 * Plain-text table: title line, header, dashed rule, rows. Columns are
 * separated by " | "; the last column is not padded.
 */
export function renderTable(title: string, headers: string[], rows: string[][]): string {
    const widths = headers.map((h, col) =>
        Math.max(h.length, ...rows.map(r => (r[col] ?? '').length))
    );
    const renderRow = (cells: string[]) =>
        cells.map((c, col) => (col === cells.length - 1 ? c : c.padEnd(widths[col]))).join(' | ');

    return [
        title,
        renderRow(headers),
        widths.map(w => '-'.repeat(w)).join('-+-'),
        ...rows.map(renderRow),
    ].join('\n');
}

export function formatStatsTable(report: AnalysisReport): string {
    const summary = renderTable('Prompt Analysis Statistics', ['Metric', 'Value'], [
        ['Total Categories', String(report.categoryCount)],
        ['Total Prompts', String(report.totalEntries)],
        ['Average Prompt Length', `${report.length.mean.toFixed(1)} chars`],
    ]);

    if (report.categories.size === 0) return summary;

    const breakdown = renderTable(
        'Categories Breakdown',
        ['Category', 'Count'],
        rankCategories(report).map(([name, count]) => [name, String(count)])
    );
    return `${summary}\n\n${breakdown}`;
}

export function formatSearchResults(result: SearchResult): string {
    if (result.matches.length === 0) return 'No results found.';

    const lines = [`Found ${result.matches.length} results:`];
    for (const match of result.matches) {
        lines.push(
            '',
            `Category: ${match.category}`,
            `Index: ${match.index}`,
            'Prompt:',
            preview(match.entry.text, SEARCH_PREVIEW_CHARS),
            '-'.repeat(80)
        );
    }
    return lines.join('\n');
}

export function renderAnalysis(report: AnalysisReport, format: AnalysisFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify({
                totalEntries: report.totalEntries,
                categoryCount: report.categoryCount,
                categories: Object.fromEntries(report.categories),
                length: report.length,
                longestPreview: report.longestPreview,
                shortestPreview: report.shortestPreview,
            }, null, 2);

        case 'md':
            return [
                '# Prompt Analysis Results',
                '',
                `- **Total Categories:** ${report.categoryCount}`,
                `- **Total Prompts:** ${report.totalEntries}`,
                `- **Average Prompt Length:** ${report.length.mean.toFixed(1)} characters`,
                `- **Shortest / Longest:** ${report.length.min} / ${report.length.max} characters`,
                '',
                '## Categories Breakdown',
                '',
                ...rankCategories(report).map(([name, count]) => `- **${name}:** ${count} prompts`),
            ].join('\n');

        case 'txt':
            return [
                'PROMPT ANALYSIS RESULTS',
                '='.repeat(25),
                '',
                `Total Categories: ${report.categoryCount}`,
                `Total Prompts: ${report.totalEntries}`,
                `Average Prompt Length: ${report.length.mean.toFixed(1)} characters`,
                `Shortest / Longest: ${report.length.min} / ${report.length.max} characters`,
                '',
                'CATEGORIES BREAKDOWN',
                '-'.repeat(20),
                ...rankCategories(report).map(([name, count]) => `${name}: ${count} prompts`),
            ].join('\n');
    }
}
