/**
 * promptscope - Data model types
 */

export interface PromptEntry {
    /** The prompt body; may be empty */
    readonly text: string;
    /** Name of the owning category */
    readonly category: string;
    /** Zero-based position within the category */
    readonly index: number;
    /** Source identifier, when the entry object carried one */
    readonly source?: string;
    /** Remaining fields of the source object */
    readonly metadata: Readonly<Record<string, unknown>>;
}

/** Category name -> entries, in source order. Frozen after load. */
export type PromptCollection = ReadonlyMap<string, readonly PromptEntry[]>;

export interface LengthStats {
    readonly min: number;
    readonly max: number;
    readonly mean: number;
}

export interface AnalysisReport {
    readonly totalEntries: number;
    readonly categoryCount: number;
    readonly categories: ReadonlyMap<string, number>;
    readonly length: LengthStats;
    readonly longestPreview: string;
    readonly shortestPreview: string;
}

export interface SearchCriteria {
    pattern?: string;
    category?: string;
    /** Treat `pattern` as a case-insensitive regular expression */
    regex?: boolean;
}

export interface SearchMatch {
    readonly category: string;
    readonly index: number;
    readonly entry: PromptEntry;
}

export interface SearchResult {
    readonly criteria: Readonly<SearchCriteria>;
    readonly matches: readonly SearchMatch[];
}

/**
 * The two accepted input layouts, resolved once right after parsing.
 * Nothing past the loader branches on shape.
 */
export type RawDocument =
    | { shape: 'mapping'; categories: Array<[string, unknown]> }
    | { shape: 'array'; items: unknown[] };

export function isSearchResult(source: PromptCollection | SearchResult): source is SearchResult {
    return 'matches' in source && Array.isArray(source.matches);
}
