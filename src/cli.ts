#!/usr/bin/env node
/**
 * CLI Entry Point for promptscope
 */

import { analyze } from './analyzer';
import { EXIT_CODES, RuntimeConfig, VERSION, loadRuntimeConfig } from './config';
import { beginRun, clearCorrelation, configureLogger, createLogger } from './logger';
import { extract } from './markdown_extractor';
import { writeTextFileSync } from './output_writer';
import { loadCollection } from './prompt_loader';
import { SearchCriteria } from './prompt_types';
import { AnalysisFormat, formatSearchResults, formatStatsTable, isAnalysisFormat, renderAnalysis } from './report_formatter';
import { search } from './search_engine';
import { InvalidArgumentError, exitCodeFor, formatStructuredError, toStructuredError } from './structured_error';

const log = createLogger('cli');

/** Output sinks. Text is written as given; callers add newlines. */
export interface CliIO {
    stdout: (text: string) => void;
    stderr: (text: string) => void;
}

export const processIO: CliIO = {
    stdout: (text) => { process.stdout.write(text); },
    stderr: (text) => { process.stderr.write(text); },
};

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                           */
/* -------------------------------------------------------------------------- */

interface OptionDef {
    name: string;
    takesValue: boolean;
}

interface ParsedArgs {
    positionals: string[];
    values: Map<string, string>;
    flags: Set<string>;
}

const COMMAND_OPTIONS: Record<string, Record<string, OptionDef>> = {
    analyze: {
        '-o': { name: 'output', takesValue: true },
        '--output': { name: 'output', takesValue: true },
        '-f': { name: 'format', takesValue: true },
        '--format': { name: 'format', takesValue: true },
    },
    search: {
        '-p': { name: 'pattern', takesValue: true },
        '--pattern': { name: 'pattern', takesValue: true },
        '-c': { name: 'category', takesValue: true },
        '--category': { name: 'category', takesValue: true },
        '--regex': { name: 'regex', takesValue: false },
    },
    extract: {
        '-o': { name: 'output', takesValue: true },
        '--output': { name: 'output', takesValue: true },
        '-t': { name: 'title', takesValue: true },
        '--title': { name: 'title', takesValue: true },
        '-p': { name: 'pattern', takesValue: true },
        '--pattern': { name: 'pattern', takesValue: true },
        '-c': { name: 'category', takesValue: true },
        '--category': { name: 'category', takesValue: true },
        '--regex': { name: 'regex', takesValue: false },
    },
};

export function parseArgs(command: string, args: string[]): ParsedArgs {
    const options = COMMAND_OPTIONS[command] ?? {};
    const parsed: ParsedArgs = { positionals: [], values: new Map(), flags: new Set() };

    for (let i = 0; i < args.length; i++) {
        const token = args[i];
        if (!token.startsWith('-') || token === '-') {
            parsed.positionals.push(token);
            continue;
        }

        const def = options[token];
        if (!def) {
            throw new InvalidArgumentError(`Unknown option for ${command}: ${token}`, 'UNKNOWN_OPTION', { command, option: token });
        }

        if (!def.takesValue) {
            parsed.flags.add(def.name);
            continue;
        }

        const value = args[i + 1];
        if (value === undefined) {
            throw new InvalidArgumentError(`Option ${token} requires a value`, 'MISSING_ARGUMENT', { command, option: token });
        }
        parsed.values.set(def.name, value);
        i++;
    }

    return parsed;
}

function requireInputPath(command: string, parsed: ParsedArgs): string {
    const [input, ...extra] = parsed.positionals;
    if (input === undefined) {
        throw new InvalidArgumentError(`${command} requires an input JSON file`, 'MISSING_ARGUMENT', { command });
    }
    if (extra.length > 0) {
        throw new InvalidArgumentError(`Unexpected argument: ${extra[0]}`, 'UNKNOWN_OPTION', { command, argument: extra[0] });
    }
    return input;
}

function criteriaFrom(parsed: ParsedArgs): SearchCriteria {
    const criteria: SearchCriteria = {};
    const pattern = parsed.values.get('pattern');
    const category = parsed.values.get('category');
    if (pattern !== undefined) criteria.pattern = pattern;
    if (category !== undefined) criteria.category = category;
    if (parsed.flags.has('regex')) criteria.regex = true;
    return criteria;
}

function hasCriteria(criteria: SearchCriteria): boolean {
    return criteria.pattern !== undefined || criteria.category !== undefined;
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

const USAGE = [
    'Usage: promptscope <command> <file.json> [options]',
    '',
    'Commands:',
    '  analyze <file>   Print statistics about a prompt collection',
    '      -o, --output <path>     Also save the analysis to a file',
    '      -f, --format <fmt>      json | md | txt (default: json when saving, table otherwise)',
    '  search <file>    Find prompts by text and/or category',
    '      -p, --pattern <text>    Case-insensitive substring',
    '      -c, --category <name>   Exact category name',
    '      --regex                 Treat the pattern as a regular expression',
    '  extract <file>   Convert prompts to a markdown document',
    '      -o, --output <path>     Write to a file instead of stdout',
    '      -t, --title <text>      Document title',
    '      -p, -c, --regex         Extract only matching prompts',
    '  help             Show this message',
    '',
    'Options:',
    '  -V, --version    Print the version',
].join('\n');

class PromptscopeCLI {
    constructor(
        private readonly io: CliIO = processIO,
        private readonly config: RuntimeConfig = loadRuntimeConfig()
    ) {
        configureLogger({ level: config.logLevel, json: config.logJson, file: config.logFile });
    }

    /** `argv` follows process.argv: the command is at index 2. Returns the exit code. */
    run(argv: string[]): number {
        const command = argv[2] ?? 'help';
        const rest = argv.slice(3);

        if (command === 'help' || command === '--help' || command === '-h') {
            this.io.stdout(USAGE + '\n');
            return EXIT_CODES.OK;
        }
        if (command === '--version' || command === '-V') {
            this.io.stdout(VERSION + '\n');
            return EXIT_CODES.OK;
        }

        beginRun(command);
        try {
            switch (command) {
                case 'analyze':
                    this.runAnalyze(parseArgs(command, rest));
                    break;
                case 'search':
                    this.runSearch(parseArgs(command, rest));
                    break;
                case 'extract':
                    this.runExtract(parseArgs(command, rest));
                    break;
                default:
                    throw new InvalidArgumentError(`Unknown command: ${command}`, 'UNKNOWN_COMMAND', { command });
            }
            return EXIT_CODES.OK;
        } catch (err) {
            const structured = toStructuredError(err);
            log.debug('Command failed', { code: structured.code, kind: structured.kind });
            this.io.stderr(formatStructuredError(structured) + '\n');
            if (structured.kind === 'unexpected' && err instanceof Error && err.stack) {
                log.error(err.stack);
            }
            return exitCodeFor(err);
        } finally {
            clearCorrelation();
        }
    }

    private runAnalyze(parsed: ParsedArgs): void {
        const input = requireInputPath('analyze', parsed);
        const output = parsed.values.get('output');
        const rawFormat = parsed.values.get('format');

        let format: AnalysisFormat | undefined;
        if (rawFormat !== undefined) {
            if (!isAnalysisFormat(rawFormat)) {
                throw new InvalidArgumentError(`Unsupported format: ${rawFormat}`, 'INVALID_OPTION', { option: '--format', value: rawFormat });
            }
            format = rawFormat;
        }

        log.info('Analyzing', { path: input });
        const report = analyze(loadCollection(input));

        if (output === undefined) {
            this.io.stdout((format ? renderAnalysis(report, format) : formatStatsTable(report)) + '\n');
            return;
        }

        this.io.stdout(formatStatsTable(report) + '\n');
        const warnings: string[] = [];
        writeTextFileSync({
            filePath: output,
            content: renderAnalysis(report, format ?? 'json') + '\n',
            fsyncMode: this.config.fsyncMode,
            warnings,
        });
        for (const w of warnings) log.warn(w, { path: output });
        this.io.stdout(`Analysis saved to ${output}\n`);
    }

    private runSearch(parsed: ParsedArgs): void {
        const input = requireInputPath('search', parsed);
        const criteria = criteriaFrom(parsed);

        log.info('Searching', { path: input, pattern: criteria.pattern, category: criteria.category });
        const result = search(loadCollection(input), criteria);
        this.io.stdout(formatSearchResults(result) + '\n');
    }

    private runExtract(parsed: ParsedArgs): void {
        const input = requireInputPath('extract', parsed);
        const output = parsed.values.get('output');
        const criteria = criteriaFrom(parsed);

        log.info('Extracting', { path: input });
        const collection = loadCollection(input);
        const source = hasCriteria(criteria) ? search(collection, criteria) : collection;

        const outcome = extract(
            source,
            output === undefined ? { kind: 'stdout' } : { kind: 'file', path: output },
            { title: parsed.values.get('title'), fsyncMode: this.config.fsyncMode }
        );

        if (outcome.kind === 'stdout') {
            this.io.stdout(outcome.markdown);
        } else {
            this.io.stdout(`Extracted to ${outcome.path}\n`);
        }
    }
}

// Run CLI
if (require.main === module) {
    process.exitCode = new PromptscopeCLI().run(process.argv);
}

export { PromptscopeCLI, USAGE };
