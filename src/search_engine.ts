/**
 * Search Engine - filter a prompt collection by text pattern and/or category
 *
 * Both filters must match when both are given. Results keep collection order:
 * category first, then entry position.
 */

import { createLogger } from './logger';
import { PromptCollection, SearchCriteria, SearchMatch, SearchResult } from './prompt_types';
import { InvalidArgumentError } from './structured_error';

const log = createLogger('search');

type TextPredicate = (text: string) => boolean;

function buildTextPredicate(criteria: SearchCriteria): TextPredicate {
    const { pattern } = criteria;
    if (pattern === undefined || pattern === '') {
        return () => true;
    }

    if (criteria.regex) {
        let re: RegExp;
        try {
            re = new RegExp(pattern, 'i');
        } catch (err) {
            throw new InvalidArgumentError(
                `Invalid regular expression: ${pattern}`,
                'INVALID_PATTERN',
                { pattern },
                err
            );
        }
        return (text) => re.test(text);
    }

    const needle = pattern.toLowerCase();
    return (text) => text.toLowerCase().includes(needle);
}

export function search(collection: PromptCollection, criteria: SearchCriteria = {}): SearchResult {
    const matchesText = buildTextPredicate(criteria);
    const matches: SearchMatch[] = [];

    for (const [category, entries] of collection) {
        if (criteria.category !== undefined && category !== criteria.category) continue;
        for (const entry of entries) {
            if (matchesText(entry.text)) {
                matches.push(Object.freeze({ category, index: entry.index, entry }));
            }
        }
    }

    log.debug('Search complete', {
        pattern: criteria.pattern,
        category: criteria.category,
        regex: criteria.regex === true,
        matches: matches.length,
    });

    return Object.freeze({
        criteria: Object.freeze({ ...criteria }),
        matches: Object.freeze(matches),
    });
}
