import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from '../../src/config';
import { DatabaseConnection, initializeSchema, openDatabase } from '../../src/db';
import { StagingTableFeed } from '../../src/modules/feed';
import { AuditEntry, OracleHandle } from '../../src/modules/oracle';
import { UnificationWriter } from '../../src/modules/writer';
import { createPipelineContext, MatchingPipeline } from '../../src/pipeline';
import { MatchCandidate, SourceFeed, WriteResult } from '../../src/types';
import { PersistenceError } from '../../src/utils/errors';
import { makeRegistry, makeWeb } from '../fixtures/records';

const ACCEPT = '{"is_match": true, "confidence": "high", "reason": "same legal name"}';

describe('MatchingPipeline', () => {
    let db: DatabaseConnection;
    const judge = vi.fn<(systemPrompt: string, userPrompt: string) => Promise<string>>();
    const append = vi.fn<(entry: AuditEntry) => void>();
    const oracle: OracleHandle = { available: true, judge: { judge }, model: 'test-model' };

    const countRows = (table: 'company_unified' | 'company_source_link'): number =>
        db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

    beforeEach(() => {
        vi.clearAllMocks();
        db = openDatabase(':memory:');
        initializeSchema(db);
    });

    afterEach(() => {
        db.close();
    });

    it('adjudicates, approves and persists a single exact-name match', async () => {
        const registry = [makeRegistry({ abn: 'A1', entity_name_norm: 'ACME PTY LTD', entity_name_raw: 'ACME PTY LTD' })];
        const web = [
            makeWeb({ commoncrawl_id: 'W1', company_name_norm: 'ACME PTY LTD' }),
            makeWeb({ commoncrawl_id: 'W2', company_name_norm: '' }),
        ];
        const feed: SourceFeed = { name: 'in-memory', load: async () => ({ registry, web }) };
        judge.mockResolvedValue(ACCEPT);

        const context = createPipelineContext(loadConfig({}), {
            feed,
            writer: new UnificationWriter(db),
            oracle,
            auditLog: { append },
        });
        const summary = await MatchingPipeline.run(context);

        expect(summary.runId).toMatch(/^run-[0-9a-f-]{36}$/);
        expect(summary).toMatchObject({
            registryCount: 1,
            webCount: 2,
            autoAccepted: 0,
            oracleApproved: 1,
            stillAmbiguous: 0,
            discarded: 0,
            unmatched: 1,
            oracleFailures: 0,
            totalWritten: 1,
        });
        expect(judge).toHaveBeenCalledTimes(1);
        expect(append).toHaveBeenCalledTimes(1);
        expect(countRows('company_unified')).toBe(1);
        expect(countRows('company_source_link')).toBe(2);
        expect(
            db
                .prepare<[], { abn: string; match_confidence: number; match_method: string }>(
                    'SELECT abn, match_confidence, match_method FROM company_unified'
                )
                .get()
        ).toEqual({ abn: 'A1', match_confidence: 100, match_method: 'llm_disambiguation' });
    });

    it('runs the thresholded policy over the staging tables without an oracle', async () => {
        const insertEntity = db.prepare(
            'INSERT INTO stg_abr_entities (abn, entity_name_norm, entity_name_raw, entity_status, state) VALUES (?, ?, ?, ?, ?)'
        );
        insertEntity.run('10', 'acme plumbing', 'ACME PLUMBING PTY LTD', 'ACT', 'NSW');
        insertEntity.run('20', 'bakery zenith', 'ZENITH BAKERY PTY LTD', 'ACT', 'VIC');
        const insertMention = db.prepare('INSERT INTO stg_commoncrawl_companies (commoncrawl_id, company_name_norm) VALUES (?, ?)');
        insertMention.run(1, 'plumbing acme');
        insertMention.run(2, 'zenith bakeries');
        insertMention.run(3, 'qqq');

        const config = loadConfig({});
        const context = createPipelineContext(
            { ...config, matching: { mode: 'thresholded', thresholds: { high: 95, low: 50 }, belowLow: 'discard' } },
            {
                feed: new StagingTableFeed(db, { registryModulus: 1, webModulus: 1, registryStatus: 'ACT' }),
                writer: new UnificationWriter(db),
                oracle: { available: false, reason: 'OPENAI_API_KEY not set' },
                auditLog: { append },
            }
        );
        const summary = await MatchingPipeline.run(context);

        expect(summary).toMatchObject({
            registryCount: 2,
            webCount: 3,
            autoAccepted: 1,
            oracleApproved: 0,
            stillAmbiguous: 1,
            discarded: 1,
            unmatched: 0,
            totalWritten: 1,
        });
        expect(append).not.toHaveBeenCalled();
        expect(
            db.prepare<[], { abn: string; match_method: string }>('SELECT abn, match_method FROM company_unified').all()
        ).toEqual([{ abn: '10', match_method: 'fuzzy_name_high_confidence' }]);
    });

    it('skips the writer on a dry run', async () => {
        const write = vi.fn<(matches: MatchCandidate[]) => WriteResult>();
        const feed: SourceFeed = { name: 'in-memory', load: async () => ({ registry: [makeRegistry()], web: [makeWeb()] }) };
        judge.mockResolvedValue(ACCEPT);

        const summary = await MatchingPipeline.run(
            createPipelineContext(loadConfig({}), { feed, writer: { write }, oracle, auditLog: { append }, dryRun: true })
        );

        expect(summary.oracleApproved).toBe(1);
        expect(summary.totalWritten).toBe(0);
        expect(write).not.toHaveBeenCalled();
    });

    it('propagates a persistence failure', async () => {
        const write = vi.fn<(matches: MatchCandidate[]) => WriteResult>().mockImplementation(() => {
            throw new PersistenceError('Unified write failed: disk I/O error');
        });
        const feed: SourceFeed = { name: 'in-memory', load: async () => ({ registry: [makeRegistry()], web: [makeWeb()] }) };
        judge.mockResolvedValue(ACCEPT);

        const context = createPipelineContext(loadConfig({}), { feed, writer: { write }, oracle, auditLog: { append } });

        await expect(MatchingPipeline.run(context)).rejects.toThrow(PersistenceError);
        expect(write).toHaveBeenCalledTimes(1);
    });
});
