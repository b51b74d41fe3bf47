/**
 * 🔒 CONFIGURATION
 *
 * Environment variables are validated with zod; the matching policy and the
 * staging-table sampling live in a YAML file (`default.yaml` unless
 * MATCHING_CONFIG points elsewhere).
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { MatchingPolicy } from '../types';

dotenv.config();

/** Unset and empty variables both fall back to the default. */
const pathWithDefault = (fallback: string) =>
    z.preprocess((value) => (value === '' ? undefined : value), z.string().default(fallback));

const EnvSchema = z.object({
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
    OPENAI_BASE_URL: z.string().url().optional(),
    LLM_TEMPERATURE: z.string().optional(),
    LLM_MAX_REVIEWS: z.string().optional(),
    LLM_LOG_PATH: pathWithDefault('data/llm_match_logs.jsonl'),

    SQLITE_PATH: pathWithDefault('./data/company_matching.db'),
    MATCHING_CONFIG: z.string().optional(),

    // Read directly by the Logger
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_DIR: z.string().optional(),
    SERVICE_NAME: z.string().default('company-matcher'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

const ThresholdSchema = z.number().min(0).max(100);

const MatchingFileSchema = z.object({
    matching: z
        .object({
            mode: z.enum(['thresholded', 'blanket-adjudicate']),
            thresholds: z.object({
                high: ThresholdSchema,
                low: ThresholdSchema,
            }),
            below_low: z.enum(['adjudicate', 'discard']).default('discard'),
        })
        .refine((m) => m.thresholds.high >= m.thresholds.low, {
            message: 'thresholds.high must be >= thresholds.low',
            path: ['thresholds'],
        }),
    feed: z
        .object({
            registry_sample_modulus: z.number().int().min(1).default(1),
            web_sample_modulus: z.number().int().min(1).default(1),
            registry_status: z.string().default('ACT'),
        })
        .default({}),
});

export interface FeedSampling {
    registryModulus: number;
    webModulus: number;
    registryStatus: string;
}

export interface AppConfig {
    oracle: {
        apiKey?: string;
        baseUrl?: string;
        model: string;
        temperature: number;
        maxReviews: number;
        logPath: string;
    };
    sqlitePath: string;
    matching: MatchingPolicy;
    sampling: FeedSampling;
}

export const DEFAULT_MATCHING_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

function parseInteger(
    value: string | undefined,
    fallback: number,
    name: string,
    opts?: { min?: number; max?: number }
): number {
    if (value === undefined || value === '') {
        return fallback;
    }

    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new ConfigurationError(`${name} must be an integer`);
    }
    if (opts?.min !== undefined && n < opts.min) {
        throw new ConfigurationError(`${name} must be >= ${opts.min}`);
    }
    if (opts?.max !== undefined && n > opts.max) {
        throw new ConfigurationError(`${name} must be <= ${opts.max}`);
    }
    return n;
}

function parseNumber(value: string | undefined, fallback: number, name: string, opts: { min: number; max: number }): number {
    if (value === undefined || value === '') {
        return fallback;
    }

    const n = Number(value);
    if (!Number.isFinite(n) || n < opts.min || n > opts.max) {
        throw new ConfigurationError(`${name} must be a number between ${opts.min} and ${opts.max}`);
    }
    return n;
}

function formatIssues(issues: z.ZodIssue[]): string {
    return issues.map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

/**
 * Reads and validates the matching/sampling YAML file.
 */
export function loadMatchingFile(filePath: string = DEFAULT_MATCHING_CONFIG_PATH): { matching: MatchingPolicy; sampling: FeedSampling } {
    let raw: unknown;
    try {
        raw = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Cannot read matching config ${filePath}: ${reason}`);
    }

    const parsed = MatchingFileSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid matching config ${filePath}:\n${formatIssues(parsed.error.issues)}`);
    }

    const { matching, feed } = parsed.data;
    return {
        matching: {
            mode: matching.mode,
            thresholds: { high: matching.thresholds.high, low: matching.thresholds.low },
            belowLow: matching.below_low,
        },
        sampling: {
            registryModulus: feed.registry_sample_modulus,
            webModulus: feed.web_sample_modulus,
            registryStatus: feed.registry_status,
        },
    };
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(source);

    if (!parsed.success) {
        throw new ConfigurationError(`Invalid environment configuration:\n${formatIssues(parsed.error.issues)}`);
    }

    const env = parsed.data;
    const { matching, sampling } = loadMatchingFile(env.MATCHING_CONFIG || DEFAULT_MATCHING_CONFIG_PATH);

    return {
        oracle: {
            apiKey: env.OPENAI_API_KEY || undefined,
            baseUrl: env.OPENAI_BASE_URL,
            model: env.OPENAI_MODEL,
            temperature: parseNumber(env.LLM_TEMPERATURE, 0.1, 'LLM_TEMPERATURE', { min: 0, max: 2 }),
            maxReviews: parseInteger(env.LLM_MAX_REVIEWS, 10, 'LLM_MAX_REVIEWS', { min: 0 }),
            logPath: env.LLM_LOG_PATH,
        },
        sqlitePath: env.SQLITE_PATH,
        matching,
        sampling,
    };
}

let configInstance: AppConfig | null = null;

export const getConfig = (): AppConfig => {
    if (!configInstance) {
        configInstance = loadConfig();
    }
    return configInstance;
};
