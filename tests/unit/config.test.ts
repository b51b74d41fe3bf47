import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, loadMatchingFile } from '../../src/config';
import { ConfigurationError } from '../../src/utils/errors';

describe('loadConfig', () => {
    let tmpDir: string;

    const writeYaml = (name: string, content: string): string => {
        const filePath = path.join(tmpDir, name);
        fs.writeFileSync(filePath, content);
        return filePath;
    };

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matcher-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('applies defaults and the bundled matching policy', () => {
        const config = loadConfig({});

        expect(config.oracle).toEqual({
            apiKey: undefined,
            baseUrl: undefined,
            model: 'gpt-4.1-mini',
            temperature: 0.1,
            maxReviews: 10,
            logPath: 'data/llm_match_logs.jsonl',
        });
        expect(config.sqlitePath).toBe('./data/company_matching.db');
        expect(config.matching).toEqual({
            mode: 'blanket-adjudicate',
            thresholds: { high: 95, low: 0 },
            belowLow: 'discard',
        });
        expect(config.sampling).toEqual({ registryModulus: 5000, webModulus: 20, registryStatus: 'ACT' });
    });

    it('reads oracle settings from the environment', () => {
        const config = loadConfig({
            OPENAI_API_KEY: 'test-secret',
            OPENAI_MODEL: 'test-model',
            LLM_TEMPERATURE: '0',
            LLM_MAX_REVIEWS: '3',
            SQLITE_PATH: ':memory:',
        });

        expect(config.oracle.apiKey).toBe('test-secret');
        expect(config.oracle.model).toBe('test-model');
        expect(config.oracle.temperature).toBe(0);
        expect(config.oracle.maxReviews).toBe(3);
        expect(config.sqlitePath).toBe(':memory:');
    });

    it('treats an empty API key as missing', () => {
        expect(loadConfig({ OPENAI_API_KEY: '' }).oracle.apiKey).toBeUndefined();
    });

    it('falls back to the default paths when they are set but empty', () => {
        const config = loadConfig({ LLM_LOG_PATH: '', SQLITE_PATH: '' });

        expect(config.oracle.logPath).toBe('data/llm_match_logs.jsonl');
        expect(config.sqlitePath).toBe('./data/company_matching.db');
    });

    it('keeps explicit paths', () => {
        const config = loadConfig({ LLM_LOG_PATH: '/tmp/audit.jsonl', SQLITE_PATH: '/tmp/matcher.db' });

        expect(config.oracle.logPath).toBe('/tmp/audit.jsonl');
        expect(config.sqlitePath).toBe('/tmp/matcher.db');
    });

    it('rejects malformed numeric settings', () => {
        expect(() => loadConfig({ LLM_MAX_REVIEWS: 'ten' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ LLM_MAX_REVIEWS: '-1' })).toThrow(ConfigurationError);
        expect(() => loadConfig({ LLM_TEMPERATURE: '5' })).toThrow(ConfigurationError);
    });

    it('rejects an invalid base URL', () => {
        expect(() => loadConfig({ OPENAI_BASE_URL: 'not a url' })).toThrow(ConfigurationError);
    });

    it('loads a custom matching file', () => {
        const filePath = writeYaml(
            'matching.yaml',
            ['matching:', '  mode: thresholded', '  thresholds:', '    high: 90', '    low: 70', '  below_low: adjudicate', ''].join('\n')
        );

        const config = loadConfig({ MATCHING_CONFIG: filePath });

        expect(config.matching).toEqual({ mode: 'thresholded', thresholds: { high: 90, low: 70 }, belowLow: 'adjudicate' });
        expect(config.sampling).toEqual({ registryModulus: 1, webModulus: 1, registryStatus: 'ACT' });
    });
});

describe('loadMatchingFile', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'matcher-config-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('rejects thresholds where high is below low', () => {
        const filePath = path.join(tmpDir, 'bad.yaml');
        fs.writeFileSync(filePath, 'matching:\n  mode: thresholded\n  thresholds:\n    high: 50\n    low: 70\n');

        expect(() => loadMatchingFile(filePath)).toThrow(/thresholds.high must be >= thresholds.low/);
    });

    it('rejects an unknown mode', () => {
        const filePath = path.join(tmpDir, 'bad.yaml');
        fs.writeFileSync(filePath, 'matching:\n  mode: everything\n  thresholds:\n    high: 90\n    low: 70\n');

        expect(() => loadMatchingFile(filePath)).toThrow(ConfigurationError);
    });

    it('reports a missing file as a configuration error', () => {
        expect(() => loadMatchingFile(path.join(tmpDir, 'missing.yaml'))).toThrow(ConfigurationError);
    });
});
