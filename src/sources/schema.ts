import { z } from 'zod';
import type {
    Author,
    AuthorDetails,
    AuthorPapers,
    Citation,
    Citations,
    EdgeList,
    PaperData,
    PaperDetails,
    Reference,
    References,
    SearchResult,
} from '../types/index.js';
import { CacheError } from '../utils/errors.js';

/**
 * Schemas for remote payloads and stored records.
 *
 * Everything entering the cache passes through here once. Payloads in the
 * older field layout are remapped onto the current names first.
 */

const nullableString = z.string().nullable().optional();
const nullableNumber = z.number().nullable().optional();
const stringList = z.array(z.string()).nullable().optional();

const authorSchema: z.ZodType<Author, z.ZodTypeDef, unknown> = z.object({
    authorId: z
        .union([z.string(), z.number()])
        .nullable()
        .optional()
        .transform((v) => (v === null || v === undefined ? null : String(v))),
    name: z
        .string()
        .nullable()
        .optional()
        .transform((v) => v ?? ''),
});

const currentDetailsSchema: z.ZodType<PaperDetails, z.ZodTypeDef, unknown> = z
    .object({
        paperId: z.string().min(1),
        corpusId: nullableNumber,
        externalIds: z.record(z.union([z.string(), z.number(), z.null()])).nullable().optional(),
        url: nullableString,
        title: nullableString,
        abstract: nullableString,
        venue: nullableString,
        publicationVenue: z.record(z.unknown()).nullable().optional(),
        year: nullableNumber,
        authors: z.array(authorSchema).nullable().optional(),
        referenceCount: nullableNumber,
        citationCount: nullableNumber,
        influentialCitationCount: nullableNumber,
        isOpenAccess: z.boolean().nullable().optional(),
        openAccessPdf: z
            .object({ url: z.string().nullable(), status: nullableString })
            .nullable()
            .optional(),
        fieldsOfStudy: stringList,
        s2FieldsOfStudy: z
            .array(z.object({ category: z.string(), source: nullableString }))
            .nullable()
            .optional(),
        publicationTypes: stringList,
        publicationDate: nullableString,
        journal: z.record(z.unknown()).nullable().optional(),
    })
    .transform((details) => {
        const mirrored = details.externalIds?.['CorpusId'];
        if ((details.corpusId === undefined || details.corpusId === null) && mirrored !== undefined && mirrored !== null) {
            const corpusId = Number(mirrored);
            if (Number.isInteger(corpusId)) return { ...details, corpusId };
        }
        return details;
    });

// Older payloads are remapped before validation
const paperDetailsSchema: z.ZodType<PaperDetails, z.ZodTypeDef, unknown> = z.preprocess(
    (raw) => (hasLegacyFields(raw) ? remapLegacy(raw) : raw),
    currentDetailsSchema
);

const edgeExtras = {
    contexts: stringList.transform((v) => v ?? []),
    intents: stringList.transform((v) => v ?? []),
    isInfluential: z.boolean().nullable().optional(),
};

const citationSchema: z.ZodType<Citation, z.ZodTypeDef, unknown> = z.object({
    citingPaper: paperDetailsSchema,
    ...edgeExtras,
});

const referenceSchema: z.ZodType<Reference, z.ZodTypeDef, unknown> = z.object({
    citedPaper: paperDetailsSchema,
    ...edgeExtras,
});

const pageSchema = z.object({
    offset: z.number().int().nonnegative().optional(),
    next: z.number().int().nullable().optional(),
    data: z.array(z.unknown()),
});

const authorDetailsSchema: z.ZodType<AuthorDetails, z.ZodTypeDef, unknown> = z.object({
    authorId: z.union([z.string(), z.number()]).transform((v) => String(v)),
    name: nullableString,
    url: nullableString,
    affiliations: stringList,
    homepage: nullableString,
    paperCount: nullableNumber,
    citationCount: nullableNumber,
    hIndex: nullableNumber,
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
}

const LEGACY_FIELDS = ['numCitedBy', 'numCiting', 'arxivId', 'doi', 'magId', 'pubmedId'];

function hasLegacyFields(raw: unknown): boolean {
    if (!isRecord(raw)) return false;
    if (LEGACY_FIELDS.some((field) => field in raw)) return true;
    const authors = raw['authors'];
    return Array.isArray(authors) && authors.some((author) => isRecord(author) && !('authorId' in author) && 'id' in author);
}

/**
 * Rewrite fields from the older API layout onto the current names.
 * Fields already present in the current layout win.
 */
export function remapLegacy(raw: unknown): unknown {
    if (!isRecord(raw)) return raw;

    const out: Record<string, unknown> = { ...raw };
    const externalIds: Record<string, unknown> = isRecord(raw['externalIds']) ? { ...raw['externalIds'] } : {};

    const moves: Array<[string, string]> = [
        ['numCitedBy', 'citationCount'],
        ['numCiting', 'referenceCount'],
    ];
    for (const [from, to] of moves) {
        if (from in raw && out[to] === undefined) out[to] = raw[from];
        delete out[from];
    }

    const idMoves: Array<[string, string]> = [
        ['arxivId', 'ArXiv'],
        ['doi', 'DOI'],
        ['magId', 'MAG'],
        ['pubmedId', 'PubMed'],
    ];
    for (const [from, to] of idMoves) {
        const value = raw[from];
        if (value !== undefined && value !== null && externalIds[to] === undefined) externalIds[to] = value;
        delete out[from];
    }

    const corpusId = raw['corpusId'];
    if (typeof corpusId === 'number' && externalIds['CorpusId'] === undefined) {
        externalIds['CorpusId'] = corpusId;
    }
    if (Object.keys(externalIds).length > 0) out['externalIds'] = externalIds;

    // Older author entries carried no id field name
    if (Array.isArray(raw['authors'])) {
        out['authors'] = raw['authors'].map((author) =>
            isRecord(author) && !('authorId' in author) && 'id' in author
                ? { authorId: author['id'], name: author['name'] }
                : author
        );
    }
    return out;
}

/**
 * Validate a paper payload in either field layout.
 */
export function parsePaperDetails(raw: unknown): PaperDetails | CacheError {
    const parsed = paperDetailsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    return new CacheError('ParseFailure', `Could not parse paper details: ${describeIssues(parsed.error)}`, raw);
}

/**
 * Error payloads the remote service returns with a 200.
 */
function remoteErrorOf(raw: unknown): CacheError | null {
    if (!isRecord(raw) || 'data' in raw) return null;
    const message = raw['error'] ?? raw['message'];
    return typeof message === 'string' ? new CacheError('NetworkError', message, raw) : null;
}

function parseEdgePage<E>(
    raw: unknown,
    itemSchema: z.ZodType<E, z.ZodTypeDef, unknown>,
    what: string
): EdgeList<E> | CacheError {
    const remoteError = remoteErrorOf(raw);
    if (remoteError) return remoteError;

    const page = pageSchema.safeParse(raw);
    if (!page.success) {
        return new CacheError('ParseFailure', `Could not parse ${what} page: ${describeIssues(page.error)}`, raw);
    }

    // Unresolvable counterparts (no paperId) are dropped item by item
    const data: E[] = [];
    for (const item of page.data.data) {
        const parsed = itemSchema.safeParse(item);
        if (parsed.success) data.push(parsed.data);
    }

    const list: EdgeList<E> = { offset: page.data.offset ?? 0, data };
    if (page.data.next !== undefined) list.next = page.data.next;
    return list;
}

export function parseCitationsPage(raw: unknown): Citations | CacheError {
    return parseEdgePage(raw, citationSchema, 'citations');
}

export function parseReferencesPage(raw: unknown): References | CacheError {
    return parseEdgePage(raw, referenceSchema, 'references');
}

/**
 * Assemble a record from the three payloads of a paper fetch.
 */
export function parseFetchedPaper(details: unknown, references: unknown, citations: unknown): PaperData | CacheError {
    const parsedDetails = parsePaperDetails(details);
    if (parsedDetails instanceof CacheError) return parsedDetails;

    const parsedReferences = parseReferencesPage(references);
    if (parsedReferences instanceof CacheError) return parsedReferences;

    const parsedCitations = parseCitationsPage(citations);
    if (parsedCitations instanceof CacheError) return parsedCitations;

    return { details: parsedDetails, references: parsedReferences, citations: parsedCitations };
}

/**
 * Legacy records embedded flat arrays of papers instead of edge lists.
 */
function legacyEdgeList(items: unknown[], side: 'citingPaper' | 'citedPaper'): Record<string, unknown> {
    return {
        offset: 0,
        data: items.map((item) => {
            const intent = isRecord(item) ? item['intent'] : undefined;
            return {
                [side]: item,
                contexts: [],
                intents: Array.isArray(intent) ? intent : [],
                isInfluential: isRecord(item) && typeof item['isInfluential'] === 'boolean' ? item['isInfluential'] : null,
            };
        }),
    };
}

/**
 * Parse a stored record. Returns null when it is not structurally valid;
 * the caller treats that as a cache miss.
 */
export function parseStoredRecord(raw: unknown): PaperData | null {
    if (!isRecord(raw)) return null;

    let { details, citations, references } = raw;
    if (details === undefined && typeof raw['paperId'] === 'string') {
        // Flat legacy layout: the record was the details object itself
        details = raw;
        citations = Array.isArray(raw['citations']) ? legacyEdgeList(raw['citations'], 'citingPaper') : undefined;
        references = Array.isArray(raw['references']) ? legacyEdgeList(raw['references'], 'citedPaper') : undefined;
    }
    if (citations === undefined || references === undefined) return null;

    const parsed = parseFetchedPaper(details, references, citations);
    return parsed instanceof CacheError ? null : parsed;
}

export function parseAuthorDetails(raw: unknown): AuthorDetails | CacheError {
    const remoteError = remoteErrorOf(raw);
    if (remoteError) return remoteError;

    const parsed = authorDetailsSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    return new CacheError('ParseFailure', `Could not parse author: ${describeIssues(parsed.error)}`, raw);
}

/**
 * Parse a list of papers, skipping entries that do not validate.
 */
export function parsePaperList(items: unknown[]): PaperDetails[] {
    const papers: PaperDetails[] = [];
    for (const item of items) {
        const parsed = parsePaperDetails(item);
        if (!(parsed instanceof CacheError)) papers.push(parsed);
    }
    return papers;
}

export function parseAuthorPapers(author: AuthorDetails, raw: unknown): AuthorPapers | CacheError {
    const remoteError = remoteErrorOf(raw);
    if (remoteError) return remoteError;

    const page = pageSchema.safeParse(raw);
    if (!page.success) {
        return new CacheError('ParseFailure', `Could not parse author papers: ${describeIssues(page.error)}`, raw);
    }
    return { author, papers: parsePaperList(page.data.data) };
}

const searchSchema = z.object({
    total: z.number().int().nonnegative(),
    offset: z.number().int().nonnegative().optional(),
    next: z.number().int().nullable().optional(),
    data: z.array(z.unknown()).optional(),
});

export function parseSearchResult(raw: unknown): SearchResult | CacheError {
    const remoteError = remoteErrorOf(raw);
    if (remoteError) return remoteError;

    const parsed = searchSchema.safeParse(raw);
    if (!parsed.success) {
        return new CacheError('ParseFailure', `Could not parse search result: ${describeIssues(parsed.error)}`, raw);
    }
    const result: SearchResult = {
        total: parsed.data.total,
        offset: parsed.data.offset ?? 0,
        data: parsePaperList(parsed.data.data ?? []),
    };
    if (parsed.data.next !== undefined) result.next = parsed.data.next;
    return result;
}

const recommendationsSchema = z.object({ recommendedPapers: z.array(z.unknown()) });

export function parseRecommendations(raw: unknown): PaperDetails[] | CacheError {
    const remoteError = remoteErrorOf(raw);
    if (remoteError) return remoteError;

    const parsed = recommendationsSchema.safeParse(raw);
    if (!parsed.success) {
        return new CacheError('ParseFailure', `Could not parse recommendations: ${describeIssues(parsed.error)}`, raw);
    }
    return parsePaperList(parsed.data.recommendedPapers);
}
