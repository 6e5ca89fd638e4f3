/**
 * Markdown Extractor
 *
 * Renders a collection (or a filtered search result) as one markdown document:
 * a "## <category>" heading per category followed by one fenced block per
 * entry. Fences are backtick runs longer than any run inside the text, so the
 * body is reproduced verbatim whatever markdown it contains.
 */

import { DEFAULT_DOCUMENT_INTRO, DEFAULT_DOCUMENT_TITLE, FsyncMode } from './config';
import { createLogger } from './logger';
import { writeTextFileSync } from './output_writer';
import { PromptCollection, PromptEntry, SearchResult, isSearchResult } from './prompt_types';

const log = createLogger('extract');

export interface ExtractOptions {
    title?: string;
    fsyncMode?: FsyncMode;
}

export type ExtractDestination =
    | { kind: 'stdout' }
    | { kind: 'file'; path: string };

export type ExtractOutcome =
    | { kind: 'stdout'; markdown: string }
    | { kind: 'file'; path: string; bytes: number; warnings: string[] };

export function fenceFor(text: string): string {
    let longest = 0;
    for (const run of text.match(/`+/g) ?? []) {
        longest = Math.max(longest, run.length);
    }
    return '`'.repeat(Math.max(3, longest + 1));
}

/** Headings are one line: any run of line breaks becomes a single space. */
export function headingText(name: string): string {
    return name.replace(/\s*[\r\n]+\s*/g, ' ');
}

function groupByCategory(source: PromptCollection | SearchResult): Map<string, PromptEntry[]> {
    const groups = new Map<string, PromptEntry[]>();
    if (isSearchResult(source)) {
        for (const match of source.matches) {
            const bucket = groups.get(match.category);
            if (bucket) bucket.push(match.entry);
            else groups.set(match.category, [match.entry]);
        }
    } else {
        for (const [name, entries] of source) {
            groups.set(name, [...entries]);
        }
    }
    return groups;
}

export function renderMarkdown(source: PromptCollection | SearchResult, options: ExtractOptions = {}): string {
    const lines: string[] = [
        `# ${headingText(options.title ?? DEFAULT_DOCUMENT_TITLE)}`,
        '',
        DEFAULT_DOCUMENT_INTRO,
    ];

    for (const [category, entries] of groupByCategory(source)) {
        lines.push('', `## ${headingText(category)}`);
        for (const entry of entries) {
            const fence = fenceFor(entry.text);
            lines.push('', fence);
            if (entry.text !== '') lines.push(entry.text);
            lines.push(fence);
        }
    }

    return lines.join('\n') + '\n';
}

export function extract(
    source: PromptCollection | SearchResult,
    destination: ExtractDestination,
    options: ExtractOptions = {}
): ExtractOutcome {
    const markdown = renderMarkdown(source, options);

    if (destination.kind === 'stdout') {
        return { kind: 'stdout', markdown };
    }

    const warnings: string[] = [];
    const { bytes } = writeTextFileSync({
        filePath: destination.path,
        content: markdown,
        fsyncMode: options.fsyncMode ?? 'BEST_EFFORT',
        warnings,
    });
    for (const w of warnings) log.warn(w, { path: destination.path });
    log.info('Markdown written', { path: destination.path, bytes });

    return { kind: 'file', path: destination.path, bytes, warnings };
}
