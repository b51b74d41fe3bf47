import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { DatabaseConnection } from '../../db';
import type { FeedSampling } from '../../config';
import type { FeedSnapshot, RegistryEntity, SourceFeed, WebMention } from '../../types';
import { Logger } from '../../utils/logger';

/** null / undefined → '', numbers → their decimal string. */
const text = z
    .union([z.string(), z.number(), z.bigint(), z.null(), z.undefined()])
    .transform((value) => (value === null || value === undefined ? '' : String(value)));

export const RegistryEntitySchema = z.object({
    abn: text.refine((value) => value.trim().length > 0, { message: 'abn is required' }),
    entity_name_norm: text,
    entity_name_raw: text,
    entity_type: text,
    entity_status: text,
    address_full: text,
    suburb: text,
    postcode: text,
    state: text,
    start_date_raw: text,
});

export const WebMentionSchema = z.object({
    commoncrawl_id: text,
    crawl_id: text,
    url: text,
    domain: text,
    tld: text,
    html_title: text,
    company_name_raw: text,
    company_name_norm: text,
    industry: text,
    fetched_at: text,
});

function parseRows<T>(rows: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T[] {
    const records: T[] = [];
    let rejected = 0;

    rows.forEach((row, index) => {
        const parsed = schema.safeParse(row);
        if (parsed.success) {
            records.push(parsed.data);
        } else {
            rejected++;
            Logger.warn(`[Feed] Skipping ${label} row ${index + 1}: ${parsed.error.issues[0]?.message ?? 'invalid row'}`);
        }
    });

    if (rejected > 0) {
        Logger.warn(`[Feed] ${rejected} ${label} rows rejected by schema`);
    }
    return records;
}

export function toRegistryEntities(rows: unknown[]): RegistryEntity[] {
    return parseRows(rows, RegistryEntitySchema, 'registry');
}

export function toWebMentions(rows: unknown[]): WebMention[] {
    return parseRows(rows, WebMentionSchema, 'web');
}

/**
 * Reads the staging tables of the store, sampled deterministically by natural key
 * (`abn % registryModulus = 0`, `commoncrawl_id % webModulus = 0`).
 */
export class StagingTableFeed implements SourceFeed {
    readonly name = 'staging-tables';

    constructor(private db: DatabaseConnection, private sampling: FeedSampling) {}

    async load(): Promise<FeedSnapshot> {
        const registryRows = this.db
            .prepare<[string, number]>(
                `
                SELECT abn, entity_name_norm, entity_name_raw, entity_type, entity_status,
                       address_full, suburb, postcode, state, start_date_raw
                FROM stg_abr_entities
                WHERE state IS NOT NULL AND state <> ''
                  AND entity_status = ?
                  AND (CAST(abn AS INTEGER) % ?) = 0
                ORDER BY abn
                `
            )
            .all(this.sampling.registryStatus, this.sampling.registryModulus);

        const webRows = this.db
            .prepare<[number]>(
                `
                SELECT commoncrawl_id, crawl_id, url, domain, tld, html_title,
                       company_name_raw, company_name_norm, industry, fetched_at
                FROM stg_commoncrawl_companies
                WHERE (commoncrawl_id % ?) = 0
                ORDER BY commoncrawl_id
                `
            )
            .all(this.sampling.webModulus);

        const snapshot = {
            registry: toRegistryEntities(registryRows),
            web: toWebMentions(webRows),
        };

        Logger.info(
            `📊 Loaded ${snapshot.registry.length} registry entities and ${snapshot.web.length} web mentions (sampled 1/${this.sampling.registryModulus}, 1/${this.sampling.webModulus}).`
        );
        return snapshot;
    }
}

/**
 * Reads header-first CSV exports of the two staging tables.
 */
export class CsvFeed implements SourceFeed {
    readonly name = 'csv';

    constructor(private registryPath: string, private webPath: string) {}

    async load(): Promise<FeedSnapshot> {
        const [registryRows, webRows] = await Promise.all([this.readCsv(this.registryPath), this.readCsv(this.webPath)]);

        const snapshot = {
            registry: toRegistryEntities(registryRows),
            web: toWebMentions(webRows),
        };

        Logger.info(`📊 Loaded ${snapshot.registry.length} registry entities and ${snapshot.web.length} web mentions from CSV.`);
        return snapshot;
    }

    private async readCsv(filePath: string): Promise<unknown[]> {
        const content = await fs.promises.readFile(filePath, 'utf8');
        const records: unknown = parse(content, {
            columns: true,
            bom: true,
            trim: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
        return Array.isArray(records) ? records : [];
    }
}
