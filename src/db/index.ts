/**
 * 🗄️ SQLITE DATABASE LAYER
 *
 * Tables:
 * - stg_abr_entities: cleaned registry entities (source feed)
 * - stg_commoncrawl_companies: cleaned web mentions (source feed)
 * - company_unified: one row per accepted match
 * - company_source_link: two rows per unified company (ABR + COMMONCRAWL)
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../utils/logger';

export type DatabaseConnection = Database.Database;

/**
 * Opens a connection. `:memory:` is accepted for tests; file databases get
 * their directory created and WAL mode enabled.
 */
export function openDatabase(sqlitePath: string): DatabaseConnection {
    const inMemory = sqlitePath === ':memory:';

    if (!inMemory) {
        const dataDir = path.dirname(sqlitePath);
        if (!fs.existsSync(dataDir)) {
            fs.mkdirSync(dataDir, { recursive: true });
        }
    }

    const db = new Database(sqlitePath);
    db.pragma('foreign_keys = ON');
    if (!inMemory) {
        db.pragma('journal_mode = WAL');
        db.pragma('synchronous = NORMAL');
        db.pragma('busy_timeout = 30000');
    }

    Logger.debug(`🗄️ SQLite connected: ${sqlitePath}`);
    return db;
}

/**
 * 📋 Create staging and unified tables if they do not exist yet.
 */
export function initializeSchema(db: DatabaseConnection): void {
    db.exec(`
        -- 📥 Cleaned registry entities
        CREATE TABLE IF NOT EXISTS stg_abr_entities (
            abn TEXT PRIMARY KEY NOT NULL,
            entity_name_norm TEXT,
            entity_name_raw TEXT,
            entity_type TEXT,
            entity_status TEXT,
            address_full TEXT,
            suburb TEXT,
            postcode TEXT,
            state TEXT,
            start_date_raw TEXT
        );

        -- 🌐 Cleaned web mentions
        CREATE TABLE IF NOT EXISTS stg_commoncrawl_companies (
            commoncrawl_id INTEGER PRIMARY KEY,
            crawl_id TEXT,
            url TEXT,
            domain TEXT,
            tld TEXT,
            html_title TEXT,
            company_name_raw TEXT,
            company_name_norm TEXT,
            industry TEXT,
            fetched_at TEXT
        );

        -- 🏢 Unified companies
        CREATE TABLE IF NOT EXISTS company_unified (
            company_id INTEGER PRIMARY KEY AUTOINCREMENT,
            abn TEXT,
            unified_name TEXT NOT NULL,
            unified_name_norm TEXT NOT NULL,
            website_domain TEXT,
            website_url_sample TEXT,
            industry TEXT,
            entity_type TEXT,
            entity_status TEXT,
            address_full TEXT,
            suburb TEXT,
            postcode TEXT,
            state TEXT,
            start_date TEXT,
            match_confidence REAL,
            match_method TEXT,
            created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
            updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
        );

        -- 🔗 Links back to the originating records
        CREATE TABLE IF NOT EXISTS company_source_link (
            company_id INTEGER NOT NULL REFERENCES company_unified(company_id) ON DELETE CASCADE,
            source_system TEXT NOT NULL,
            source_key TEXT NOT NULL,
            PRIMARY KEY (company_id, source_system, source_key)
        );

        -- 🏷️ Indexes for fast lookups
        CREATE INDEX IF NOT EXISTS idx_company_unified_abn ON company_unified(abn);
        CREATE INDEX IF NOT EXISTS idx_company_unified_domain ON company_unified(website_domain);
        CREATE INDEX IF NOT EXISTS idx_company_unified_state_postcode ON company_unified(state, postcode);
    `);

    Logger.debug('✅ Database schema initialized');
}
