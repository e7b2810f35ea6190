import { Command, InvalidArgumentError, Option } from 'commander';
import { ScholarCache } from '../client/scholar-cache.js';
import { parseFilters } from '../filters/filters.js';
import type { BackendName, CacheConfig, LogLevel } from '../types/index.js';
import { isCacheError } from '../utils/errors.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { getLogger, initLogger } from '../utils/logger.js';

export const VERSION = '0.3.0';

export interface CliIo {
    out(text: string): void;
    err(text: string): void;
    setExitCode(code: number): void;
}

export type OpenClient = (config: CacheConfig) => ScholarCache;

interface GlobalOptions {
    cacheDir?: string;
    backend?: BackendName;
    corpusCacheDir?: string;
    config?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

const defaultIo: CliIo = {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    setExitCode: (code) => {
        process.exitCode = code;
    },
};

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Not a non-negative integer.');
    }
    return parsed;
}

function overridesFrom(options: GlobalOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (options.cacheDir) overrides.cacheDir = options.cacheDir;
    if (options.backend) overrides.backend = options.backend;
    if (options.corpusCacheDir) overrides.corpusCacheDir = options.corpusCacheDir;
    if (options.logLevel) overrides.logLevel = options.logLevel;
    if (options.jsonLogs) overrides.jsonLogs = true;
    return overrides;
}

/**
 * The `citecache` command line. Every command prints its result as JSON on
 * stdout; a `CacheError` result is printed on stderr with exit code 1.
 */
export function buildProgram(options: { open?: OpenClient; io?: CliIo } = {}): Command {
    const open = options.open ?? ((config: CacheConfig) => ScholarCache.open(config));
    const io = options.io ?? defaultIo;

    const program = new Command();

    program
        .name('citecache')
        .description('Query the Semantic Scholar Graph API through a local cache.')
        .version(VERSION)
        .option('-d, --cache-dir <dir>', 'Cache directory (must exist)')
        .addOption(new Option('-b, --backend <backend>', 'Storage backend').choices(['jsonl', 'sqlite']))
        .option('--corpus-cache-dir <dir>', 'Directory of the offline citation index')
        .option('-c, --config <file>', 'Config file to load instead of searching for one')
        .addOption(
            new Option('--log-level <level>', 'Log level').choices(['silent', 'error', 'warn', 'info', 'debug'])
        )
        .option('--json-logs', 'Output JSON logs');

    /**
     * Resolve config, open a client, run `action` and print its result.
     */
    const run = async (command: Command, action: (client: ScholarCache) => Promise<unknown> | unknown): Promise<void> => {
        const globals = command.optsWithGlobals<GlobalOptions>();
        const config = await resolveConfig(overridesFrom(globals), { configFile: globals.config });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

        const client = open(config);
        try {
            const result = await action(client);
            if (isCacheError(result)) {
                io.err(JSON.stringify({ error: result }, null, 2));
                io.setExitCode(1);
                return;
            }
            io.out(JSON.stringify(result, null, 2));
        } catch (error) {
            getLogger().error({ error }, 'Command failed');
            io.err(error instanceof Error ? error.message : String(error));
            io.setExitCode(1);
        } finally {
            client.close();
        }
    };

    program
        .command('paper')
        .description('Show a paper with its first citations and references')
        .argument('<id>', 'Paper id')
        .option('-k, --kind <kind>', 'Id kind: ss | doi | arxiv | mag | acl | pubmed | pmc | url | dblp | corpusid', 'ss')
        .option('-f, --force', 'Refetch even when cached', false)
        .option('--full', 'Print the whole stored record', false)
        .action(async (id: string, opts: { kind: string; force: boolean; full: boolean }, command: Command) => {
            await run(command, (client) =>
                opts.full
                    ? client.getDetailsForId(opts.kind, id, { force: opts.force, fullRecord: true })
                    : client.getDetailsForId(opts.kind, id, { force: opts.force })
            );
        });

    for (const edge of ['citations', 'references'] as const) {
        program
            .command(edge)
            .description(`List ${edge} of a paper, fetching missing pages`)
            .argument('<id>', 'Paper id')
            .option('-o, --offset <n>', 'Start offset', parseInteger, 0)
            .option('-l, --limit <n>', 'Number of entries', parseInteger, 100)
            .action(async (id: string, opts: { offset: number; limit: number }, command: Command) => {
                await run(command, (client) =>
                    edge === 'citations'
                        ? client.citations(id, opts.offset, opts.limit)
                        : client.references(id, opts.offset, opts.limit)
                );
            });
    }

    program
        .command('next-citations')
        .description('Fetch the next page of citations after those cached')
        .argument('<id>', 'Paper id')
        .option('-l, --limit <n>', 'Page size', parseInteger, 100)
        .action(async (id: string, opts: { limit: number }, command: Command) => {
            await run(command, async (client) => {
                const list = await client.nextCitations(id, opts.limit);
                return isCacheError(list) ? list : { count: list.data.length, next: list.next ?? null };
            });
        });

    for (const edge of ['citations', 'references'] as const) {
        program
            .command(`filter-${edge}`)
            .description(`Filter the ${edge} of a cached paper`)
            .argument('<id>', 'Paper id')
            .argument('<filters>', 'Filters as JSON, e.g. \'{"year": {"min": 2018}}\'')
            .option('-n, --num <n>', 'Stop after this many matches (0 for all)', parseInteger, 0)
            .action(async (id: string, rawFilters: string, opts: { num: number }, command: Command) => {
                await run(command, (client) => {
                    let raw: unknown;
                    try {
                        raw = JSON.parse(rawFilters);
                    } catch {
                        raw = rawFilters;
                    }
                    const filters = parseFilters(raw);
                    if (isCacheError(filters)) return filters;
                    return edge === 'citations'
                        ? client.filterCitations(id, filters, opts.num)
                        : client.filterReferences(id, filters, opts.num);
                });
            });
    }

    program
        .command('author')
        .description('Show an author, optionally with their papers')
        .argument('<id>', 'Author id')
        .option('-p, --papers', 'Include the author\'s papers', false)
        .action(async (id: string, opts: { papers: boolean }, command: Command) => {
            await run(command, (client) => (opts.papers ? client.authorPapers(id) : client.authorDetails(id)));
        });

    program
        .command('search')
        .description('Search papers by keywords')
        .argument('<query...>', 'Search terms')
        .option('-l, --limit <n>', 'Number of results', parseInteger)
        .option('-o, --offset <n>', 'Start offset', parseInteger)
        .action(async (query: string[], opts: { limit?: number; offset?: number }, command: Command) => {
            await run(command, (client) => client.search(query.join(' '), opts));
        });

    program
        .command('rebuild-metadata')
        .description('Rebuild the metadata index from the stored records')
        .action(async (_opts: object, command: Command) => {
            await run(command, (client) => ({ entries: client.rebuildMetadata() }));
        });

    program
        .command('remove')
        .description('Remove a paper from the cache')
        .argument('<id>', 'Paper id')
        .action(async (id: string, _opts: object, command: Command) => {
            await run(command, (client) => ({ removed: client.removePaper(id) }));
        });

    return program;
}
