import type { DatabaseConnection } from '../../db';
import type { MatchCandidate, MatchWriter, SourceSystem, UnifiedCompany, WriteResult } from '../../types';
import { parseStartDate } from '../../utils/dates';
import { PersistenceError } from '../../utils/errors';
import { Logger } from '../../utils/logger';

/**
 * Registry attributes win for identity and address; the web side supplies the
 * domain, a sample URL and the inferred industry.
 */
export function buildUnifiedCompany(match: MatchCandidate): UnifiedCompany {
    const { cc, abr } = match;
    return {
        abn: abr.abn,
        unified_name: abr.entity_name_raw || abr.entity_name_norm,
        unified_name_norm: abr.entity_name_norm,
        website_domain: cc.domain,
        website_url_sample: cc.url,
        industry: cc.industry,
        entity_type: abr.entity_type,
        entity_status: abr.entity_status,
        address_full: abr.address_full,
        suburb: abr.suburb,
        postcode: abr.postcode,
        state: abr.state,
        start_date: parseStartDate(abr.start_date_raw),
        match_confidence: Math.round(match.score * 100) / 100,
        match_method: match.method,
    };
}

/**
 * Replaces the unified company set with the accepted matches of one run.
 * Truncate and inserts share a single transaction: on any error nothing of the
 * run is kept and the previous set is left as it was.
 */
export class UnificationWriter implements MatchWriter {
    constructor(private db: DatabaseConnection) {}

    write(matches: MatchCandidate[]): WriteResult {
        if (matches.length === 0) {
            Logger.warn('⚠️ No matches to write.');
            return { unified: 0, links: 0 };
        }

        try {
            const result = this.replaceAll(matches);
            Logger.info(`✅ Inserted ${result.unified} unified companies and ${result.links} source links.`);
            return result;
        } catch (error) {
            Logger.logError('❌ Error while writing matches to DB, transaction rolled back', error);
            const reason = error instanceof Error ? error.message : String(error);
            throw new PersistenceError(`Unified write failed: ${reason}`, error);
        }
    }

    private replaceAll(matches: MatchCandidate[]): WriteResult {
        const insertUnified = this.db.prepare<UnifiedCompany>(`
            INSERT INTO company_unified (
                abn, unified_name, unified_name_norm, website_domain, website_url_sample,
                industry, entity_type, entity_status, address_full, suburb, postcode, state,
                start_date, match_confidence, match_method
            ) VALUES (
                @abn, @unified_name, @unified_name_norm, @website_domain, @website_url_sample,
                @industry, @entity_type, @entity_status, @address_full, @suburb, @postcode, @state,
                @start_date, @match_confidence, @match_method
            )
        `);
        const insertLink = this.db.prepare<[number, SourceSystem, string]>(
            'INSERT INTO company_source_link (company_id, source_system, source_key) VALUES (?, ?, ?)'
        );

        const run = this.db.transaction((items: MatchCandidate[]): WriteResult => {
            Logger.info('🧹 Truncating existing unified company data...');
            this.db.exec(`
                DELETE FROM company_source_link;
                DELETE FROM company_unified;
                DELETE FROM sqlite_sequence WHERE name = 'company_unified';
            `);

            let unified = 0;
            let links = 0;
            for (const match of items) {
                const info = insertUnified.run(buildUnifiedCompany(match));
                const companyId = Number(info.lastInsertRowid);

                insertLink.run(companyId, 'ABR', match.abr.abn);
                insertLink.run(companyId, 'COMMONCRAWL', match.cc.commoncrawl_id);
                unified++;
                links += 2;
            }
            return { unified, links };
        });

        return run(matches);
    }

    countRows(): WriteResult {
        const count = (table: 'company_unified' | 'company_source_link'): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

        return { unified: count('company_unified'), links: count('company_source_link') };
    }
}
