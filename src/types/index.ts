/**
 * Registry entity as read from the `stg_abr_entities` staging table.
 * Every field is a string; missing values arrive as ''.
 */
export interface RegistryEntity {
    abn: string;
    entity_name_norm: string;
    entity_name_raw: string;
    entity_type: string;
    entity_status: string;
    address_full: string;
    suburb: string;
    postcode: string;
    state: string;
    start_date_raw: string;
}

/**
 * Company mention derived from crawled web content (`stg_commoncrawl_companies`).
 */
export interface WebMention {
    commoncrawl_id: string;
    crawl_id: string;
    url: string;
    domain: string;
    tld: string;
    html_title: string;
    company_name_raw: string;
    company_name_norm: string;
    industry: string;
    fetched_at: string;
}

export enum MatchMethod {
    FUZZY_NAME = 'fuzzy_name',
    HIGH_CONFIDENCE = 'fuzzy_name_high_confidence',
    AMBIGUOUS = 'fuzzy_name_ambiguous',
    LOW_SCORE = 'fuzzy_name_low_score',
    LLM_DISAMBIGUATION = 'llm_disambiguation',
}

export interface MatchCandidate {
    readonly cc: WebMention;
    readonly abr: RegistryEntity;
    /** Similarity in [0, 100]. */
    readonly score: number;
    readonly method: MatchMethod;
}

export interface MatchResult {
    candidates: MatchCandidate[];
    unmatched: WebMention[];
}

export type MatchingMode = 'thresholded' | 'blanket-adjudicate';

export interface MatchingPolicy {
    mode: MatchingMode;
    thresholds: {
        high: number;
        low: number;
    };
    /** What happens to candidates scoring below `thresholds.low` in thresholded mode. */
    belowLow: 'adjudicate' | 'discard';
}

export interface ClassifiedMatches {
    autoAccept: MatchCandidate[];
    needsAdjudication: MatchCandidate[];
    discarded: MatchCandidate[];
    unmatched: WebMention[];
}

export type VerdictConfidence = 'low' | 'medium' | 'high';

export interface Verdict {
    is_match: boolean;
    confidence: VerdictConfidence;
    reason: string;
}

export interface ReviewOutcome {
    approved: MatchCandidate[];
    stillAmbiguous: MatchCandidate[];
    reviewed: number;
    failures: number;
    skippedReason?: string;
}

/** Row of `company_unified`, minus the generated id and timestamps. */
export interface UnifiedCompany {
    abn: string;
    unified_name: string;
    unified_name_norm: string;
    website_domain: string;
    website_url_sample: string;
    industry: string;
    entity_type: string;
    entity_status: string;
    address_full: string;
    suburb: string;
    postcode: string;
    state: string;
    start_date: string | null;
    match_confidence: number;
    match_method: MatchMethod;
}

export type SourceSystem = 'ABR' | 'COMMONCRAWL';

export interface SourceLink {
    company_id: number;
    source_system: SourceSystem;
    source_key: string;
}

export interface WriteResult {
    unified: number;
    links: number;
}

export interface FeedSnapshot {
    registry: RegistryEntity[];
    web: WebMention[];
}

export interface SourceFeed {
    readonly name: string;
    load(): Promise<FeedSnapshot>;
}

export interface MatchWriter {
    write(matches: MatchCandidate[]): WriteResult;
}

export interface RunSummary {
    runId: string;
    registryCount: number;
    webCount: number;
    autoAccepted: number;
    oracleApproved: number;
    stillAmbiguous: number;
    discarded: number;
    unmatched: number;
    oracleFailures: number;
    totalWritten: number;
    durationMs: number;
}
