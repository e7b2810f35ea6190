import { CacheError } from '../utils/errors.js';

/**
 * Identifier kinds the cache can resolve.
 * `SS` is the native 40-character paper id; the rest are external ids.
 */
export type IdKind =
    | 'SS'
    | 'DOI'
    | 'MAG'
    | 'ARXIV'
    | 'ACL'
    | 'PUBMED'
    | 'PMC'
    | 'URL'
    | 'DBLP'
    | 'CORPUSID';

export type ExternalIdKind = Exclude<IdKind, 'SS'>;

/**
 * External kinds in the order they are written to a metadata entry.
 */
export const EXTERNAL_ID_KINDS: readonly ExternalIdKind[] = [
    'ACL',
    'ARXIV',
    'CORPUSID',
    'DOI',
    'MAG',
    'URL',
    'DBLP',
    'PUBMED',
    'PMC',
];

const KIND_ALIASES: Record<string, IdKind> = {
    ss: 'SS',
    paperid: 'SS',
    s2: 'SS',
    doi: 'DOI',
    mag: 'MAG',
    arxiv: 'ARXIV',
    arxivid: 'ARXIV',
    acl: 'ACL',
    aclid: 'ACL',
    pubmed: 'PUBMED',
    pubmedid: 'PUBMED',
    pmid: 'PUBMED',
    pmc: 'PMC',
    pmcid: 'PMC',
    pubmedcentral: 'PMC',
    url: 'URL',
    dblp: 'DBLP',
    corpus: 'CORPUSID',
    corpusid: 'CORPUSID',
};

const REMOTE_PREFIXES: Record<IdKind, string> = {
    SS: '',
    DOI: 'DOI:',
    MAG: 'MAG:',
    ARXIV: 'ARXIV:',
    ACL: 'ACL:',
    PUBMED: 'PMID:',
    PMC: 'PMCID:',
    URL: 'URL:',
    DBLP: '',
    CORPUSID: 'CorpusId:',
};

// Keys of the remote `externalIds` object
const EXTERNAL_ID_KEYS: Record<string, ExternalIdKind> = {
    DOI: 'DOI',
    MAG: 'MAG',
    ArXiv: 'ARXIV',
    ACL: 'ACL',
    PubMed: 'PUBMED',
    PubMedCentral: 'PMC',
    DBLP: 'DBLP',
    CorpusId: 'CORPUSID',
    URL: 'URL',
};

/**
 * Classify a user-supplied kind string.
 * Case-insensitive; `_`, `-` and spaces are ignored.
 */
export function classifyIdKind(kindString: string): IdKind | CacheError {
    const folded = kindString.toLowerCase().replace(/[_\-\s]/g, '');
    const kind = KIND_ALIASES[folded];
    if (!kind) {
        return new CacheError('InvalidIdKind', `Invalid id kind: ${kindString}`, kindString);
    }
    return kind;
}

export function prefixFor(kind: IdKind): string {
    return REMOTE_PREFIXES[kind];
}

/**
 * The remote service has no DBLP-keyed endpoint.
 */
export function isDirectlyFetchable(kind: IdKind): boolean {
    return kind !== 'DBLP';
}

/**
 * Map a key of the remote `externalIds` object onto a kind.
 */
export function externalIdKind(apiKey: string): ExternalIdKind | null {
    return EXTERNAL_ID_KEYS[apiKey] ?? null;
}

/**
 * Strip DOI URL prefixes ("https://doi.org/", "doi:").
 */
export function stripDoiPrefix(doi: string): string {
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:/i, '')
        .trim();
}

/**
 * Extract a bare arXiv id from a URL or prefixed string, dropping any version suffix.
 */
export function extractArxivId(value: string): string {
    const trimmed = value.trim();
    const match = trimmed.match(/arxiv\.org\/(?:abs|pdf)\/([^\s?#]+?)(?:\.pdf)?$/i);
    const bare = match?.[1] ?? trimmed.replace(/^arxiv:/i, '');
    return bare.replace(/v\d+$/, '');
}

/**
 * Normalise an id value so that lookups and the reverse index agree.
 */
export function normalizeIdValue(kind: IdKind, value: string | number): string {
    const str = String(value).trim();
    switch (kind) {
        case 'DOI':
            return stripDoiPrefix(str);
        case 'ARXIV':
            return extractArxivId(str);
        default:
            return str;
    }
}

/**
 * The id string sent to the remote service for a lookup.
 */
export function remoteId(kind: IdKind, value: string): string {
    return `${prefixFor(kind)}${value}`;
}
