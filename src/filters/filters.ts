import { z } from 'zod';
import type { PaperDetails } from '../types/index.js';
import { CacheError } from '../utils/errors.js';

/**
 * Lower bound inclusive, upper bound exclusive.
 */
export interface CountRange {
    min: number;
    max?: number;
}

/**
 * Filters applied to the counterpart papers of an edge list.
 * Every filter that is set must pass.
 */
export interface CitationFilters {
    /** Inclusive on both ends; an unset end is open */
    year?: { min?: number; max?: number };
    /** Ids take precedence over names when both are given */
    authors?: { ids?: string[]; names?: string[]; exact?: boolean };
    citationCount?: CountRange;
    influentialCount?: CountRange;
    /** Case-insensitive regexes anchored at the start of the venue */
    venues?: string[];
    /** Case-insensitive regex anchored at the start of the title */
    title?: { pattern: string; invert?: boolean };
}

export type PaperPredicate = (paper: PaperDetails) => boolean;

const FILTER_ALIASES: Record<string, keyof CitationFilters> = {
    year: 'year',
    author: 'authors',
    authors: 'authors',
    citationcount: 'citationCount',
    numciting: 'citationCount',
    influentialcount: 'influentialCount',
    influentialcitationcount: 'influentialCount',
    venue: 'venues',
    venues: 'venues',
    title: 'title',
};

const yearBound = z
    .union([z.number().int(), z.literal('any'), z.null()])
    .optional()
    .transform((v) => (typeof v === 'number' ? v : undefined));

const countRange = z
    .union([z.number(), z.object({ min: z.number().default(0), max: z.number().nullable().optional() })])
    .transform((v): CountRange => {
        if (typeof v === 'number') return { min: v };
        return v.max === null || v.max === undefined ? { min: v.min } : { min: v.min, max: v.max };
    });

const regexSource = z.string().refine(compiles, { message: 'Invalid regular expression' });

const filtersSchema: z.ZodType<CitationFilters, z.ZodTypeDef, unknown> = z
    .object({
        year: z.object({ min: yearBound, max: yearBound }).optional(),
        authors: z
            .object({
                ids: z.array(z.string()).optional(),
                author_ids: z.array(z.string()).optional(),
                names: z.array(z.string()).optional(),
                author_names: z.array(z.string()).optional(),
                exact: z.boolean().optional(),
            })
            .transform(({ ids, author_ids, names, author_names, exact }) => ({
                ids: ids ?? author_ids,
                names: names ?? author_names,
                exact,
            }))
            .optional(),
        citationCount: countRange.optional(),
        influentialCount: countRange.optional(),
        venues: z
            .union([regexSource, z.array(regexSource), z.object({ venues: z.array(regexSource) })])
            .transform((v) => (typeof v === 'string' ? [v] : Array.isArray(v) ? v : v.venues))
            .optional(),
        title: z
            .union([
                regexSource,
                z.object({
                    pattern: regexSource.optional(),
                    title_re: regexSource.optional(),
                    invert: z.boolean().optional(),
                }),
            ])
            .transform((v, ctx) => {
                if (typeof v === 'string') return { pattern: v };
                const pattern = v.pattern ?? v.title_re;
                if (pattern === undefined) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Title filter needs a pattern' });
                    return z.NEVER;
                }
                return v.invert === undefined ? { pattern } : { pattern, invert: v.invert };
            })
            .optional(),
    })
    .strict();

function compiles(source: string): boolean {
    try {
        new RegExp(source, 'i');
        return true;
    } catch {
        return false;
    }
}

/**
 * Validate a filter object from user input. Filter names are matched
 * case-insensitively with `_`, `-` and spaces ignored, so the older names
 * (`num_citing`, `influential_count`, ...) are accepted.
 */
export function parseFilters(raw: unknown): CitationFilters | CacheError {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        return new CacheError('InvalidFilter', 'Filters must be an object', raw);
    }

    const renamed: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(raw)) {
        const canonical = FILTER_ALIASES[name.toLowerCase().replace(/[_\-\s]/g, '')];
        if (canonical === undefined) {
            return new CacheError('InvalidFilter', `Unknown filter: ${name}`, raw);
        }
        renamed[canonical] = value;
    }

    const result = filtersSchema.safeParse(renamed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue?.path.join('.') ?? '';
        return new CacheError('InvalidFilter', `Invalid filter ${where}: ${issue?.message ?? 'unknown'}`, raw);
    }
    return result.data;
}

function inRange(value: number | null | undefined, range: CountRange): boolean {
    if (typeof value !== 'number') return false;
    return value >= range.min && (range.max === undefined || value < range.max);
}

function anchored(pattern: string): RegExp {
    return new RegExp(`^(?:${pattern})`, 'i');
}

/**
 * Compile filters into one predicate per filter that is set, in a fixed order.
 */
export function compileFilters(filters: CitationFilters): PaperPredicate[] {
    const predicates: PaperPredicate[] = [];

    const { year } = filters;
    if (year) {
        const min = year.min ?? Number.NEGATIVE_INFINITY;
        const max = year.max ?? Number.POSITIVE_INFINITY;
        predicates.push((paper) => typeof paper.year === 'number' && paper.year >= min && paper.year <= max);
    }

    const { authors } = filters;
    if (authors) {
        predicates.push((paper) => matchesAuthors(paper, authors));
    }

    const { citationCount, influentialCount } = filters;
    if (citationCount) {
        predicates.push((paper) => inRange(paper.citationCount, citationCount));
    }
    if (influentialCount) {
        predicates.push((paper) => inRange(paper.influentialCitationCount, influentialCount));
    }

    if (filters.venues) {
        const venues = filters.venues.map(anchored);
        predicates.push((paper) => venues.some((re) => re.test(paper.venue ?? '')));
    }

    const { title } = filters;
    if (title) {
        const re = anchored(title.pattern);
        const invert = title.invert ?? false;
        predicates.push((paper) => re.test(paper.title ?? '') !== invert);
    }

    return predicates;
}

function matchesAuthors(paper: PaperDetails, filter: NonNullable<CitationFilters['authors']>): boolean {
    const authors = paper.authors ?? [];
    if (filter.ids && filter.ids.length > 0) {
        const ids = new Set(filter.ids);
        return authors.some((author) => author.authorId !== null && ids.has(author.authorId));
    }
    if (!filter.names || filter.names.length === 0) return false;

    if (filter.exact) {
        const names = new Set(filter.names);
        return authors.some((author) => names.has(author.name));
    }
    // Fuzzy: any word of any author name, case-insensitive
    const words = new Set(authors.flatMap((author) => author.name.toLowerCase().split(/\s+/)));
    return filter.names.some((name) => words.has(name.toLowerCase()));
}

/**
 * Papers passing every filter, in order, stopping at `num` matches when non-zero.
 * A predicate that throws counts as a failed match.
 */
export function applyFilters(papers: PaperDetails[], filters: CitationFilters, num = 0): PaperDetails[] {
    const predicates = compileFilters(filters);
    const matched: PaperDetails[] = [];
    for (const paper of papers) {
        if (predicates.every((predicate) => safely(predicate, paper))) {
            matched.push(paper);
            if (num > 0 && matched.length >= num) break;
        }
    }
    return matched;
}

function safely(predicate: PaperPredicate, paper: PaperDetails): boolean {
    try {
        return predicate(paper);
    } catch {
        return false;
    }
}
