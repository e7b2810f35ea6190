/**
 * Paper data model — the typed shape of everything the cache stores and returns.
 * Remote payloads are validated into these types once, at ingestion (see `sources/schema.ts`).
 */

/** External identifiers as reported by the remote API (`DOI`, `ArXiv`, `CorpusId`, ...) */
export type ExternalIds = Record<string, string | number | null>;

/**
 * Author reference as it appears inside a paper's author list.
 */
export interface Author {
    /** May be null for authors the remote service could not disambiguate */
    authorId: string | null;
    name: string;
}

export interface OpenAccessPdf {
    url: string | null;
    status?: string | null;
}

export interface FieldOfStudy {
    category: string;
    source?: string | null;
}

/**
 * One logical paper.
 */
export interface PaperDetails {
    /** Canonical key (40-char hash) */
    paperId: string;

    /** Numeric corpus id. Not always assigned by the remote service. */
    corpusId?: number | null;

    externalIds?: ExternalIds | null;
    url?: string | null;
    title?: string | null;
    abstract?: string | null;
    venue?: string | null;
    publicationVenue?: Record<string, unknown> | null;
    year?: number | null;
    authors?: Author[] | null;
    referenceCount?: number | null;
    citationCount?: number | null;
    influentialCitationCount?: number | null;
    isOpenAccess?: boolean | null;
    openAccessPdf?: OpenAccessPdf | null;
    fieldsOfStudy?: string[] | null;
    s2FieldsOfStudy?: FieldOfStudy[] | null;
    publicationTypes?: string[] | null;
    publicationDate?: string | null;
    journal?: Record<string, unknown> | null;

    /**
     * The id that was requested when the lookup went through a duplicate link,
     * `null` otherwise. Only set on values handed back to callers; never persisted.
     */
    duplicateId?: string | null;
}

/**
 * A paper that cites the paper the edge list belongs to.
 */
export interface Citation {
    citingPaper: PaperDetails;
    contexts: string[];
    intents: string[];
    isInfluential?: boolean | null;
}

/**
 * A paper referenced by the paper the edge list belongs to.
 */
export interface Reference {
    citedPaper: PaperDetails;
    contexts: string[];
    intents: string[];
    isInfluential?: boolean | null;
}

/**
 * One page (or a merged run of pages) of citations or references.
 * `next` is the remote continuation cursor; absent or null means no more pages.
 */
export interface EdgeList<E> {
    offset: number;
    data: E[];
    next?: number | null;
}

export type Citations = EdgeList<Citation>;
export type References = EdgeList<Reference>;

/**
 * The full record unit stored and retrieved as one item.
 */
export interface PaperData {
    details: PaperDetails;
    citations: Citations;
    references: References;
}

/**
 * Caller-facing view: details with the counterpart papers of both edge lists
 * flattened in, truncated to the configured limits.
 */
export interface PaperView extends PaperDetails {
    citations: PaperDetails[];
    references: PaperDetails[];
}

/**
 * Author details returned by the author endpoints.
 */
export interface AuthorDetails {
    authorId: string;
    name?: string | null;
    url?: string | null;
    affiliations?: string[] | null;
    homepage?: string | null;
    paperCount?: number | null;
    citationCount?: number | null;
    hIndex?: number | null;
}

export interface AuthorPapers {
    author: AuthorDetails;
    papers: PaperDetails[];
}

export interface SearchResult {
    total: number;
    offset: number;
    next?: number | null;
    data: PaperDetails[];
}
