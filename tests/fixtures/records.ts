import { MatchCandidate, MatchMethod, RegistryEntity, WebMention } from '../../src/types';

export function makeRegistry(overrides: Partial<RegistryEntity> = {}): RegistryEntity {
    return {
        abn: '10000000000',
        entity_name_norm: 'acme plumbing',
        entity_name_raw: 'ACME PLUMBING PTY LTD',
        entity_type: 'Australian Private Company',
        entity_status: 'ACT',
        address_full: '1 Example St',
        suburb: 'Sydney',
        postcode: '2000',
        state: 'NSW',
        start_date_raw: '20100101',
        ...overrides,
    };
}

export function makeWeb(overrides: Partial<WebMention> = {}): WebMention {
    return {
        commoncrawl_id: '1',
        crawl_id: 'CC-MAIN-TEST',
        url: 'https://acmeplumbing.example/',
        domain: 'acmeplumbing.example',
        tld: 'example',
        html_title: 'Acme Plumbing',
        company_name_raw: 'Acme Plumbing',
        company_name_norm: 'acme plumbing',
        industry: 'Trades',
        fetched_at: '2024-01-01T00:00:00Z',
        ...overrides,
    };
}

export function makeCandidate(overrides: Partial<MatchCandidate> = {}): MatchCandidate {
    return {
        cc: makeWeb(),
        abr: makeRegistry(),
        score: 100,
        method: MatchMethod.FUZZY_NAME,
        ...overrides,
    };
}
