import OpenAI from 'openai';
import { Logger } from '../../utils/logger';
import { OracleUnavailableError } from '../../utils/errors';

/**
 * External judgment service. One call per candidate, answers with raw text.
 */
export interface JudgmentOracle {
    judge(systemPrompt: string, userPrompt: string): Promise<string>;
}

/** The slice of the OpenAI SDK the judge relies on. */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: {
                model: string;
                messages: OpenAI.Chat.ChatCompletionMessageParam[];
                temperature?: number;
            }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
        };
    };
}

export interface OracleSettings {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    temperature: number;
}

export type OracleHandle =
    | { available: true; judge: JudgmentOracle; model: string }
    | { available: false; reason: string };

export type ClientFactory = (settings: { apiKey: string; baseUrl?: string }) => ChatCompletionsClient;

export const openAIClientFactory: ClientFactory = ({ apiKey, baseUrl }) => new OpenAI({ apiKey, baseURL: baseUrl });

export class OpenAIJudge implements JudgmentOracle {
    constructor(private client: ChatCompletionsClient, private model: string, private temperature: number) {}

    async judge(systemPrompt: string, userPrompt: string): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages: [
                { role: 'system', content: systemPrompt },
                { role: 'user', content: userPrompt },
            ],
            temperature: this.temperature,
        });

        const content = response.choices[0]?.message?.content?.trim() ?? '';
        if (!content) {
            throw new Error('Oracle returned an empty response body');
        }
        return content;
    }
}

/**
 * Builds the oracle once per run. A missing key or a failing client constructor
 * yields an unavailable handle instead of an exception.
 */
export function createOracleHandle(settings: OracleSettings, factory: ClientFactory = openAIClientFactory): OracleHandle {
    if (!settings.apiKey) {
        return { available: false, reason: 'OPENAI_API_KEY not set' };
    }

    try {
        const client = factory({ apiKey: settings.apiKey, baseUrl: settings.baseUrl });
        Logger.info(`🧠 [Oracle] Client ready (${settings.model})`);
        return {
            available: true,
            judge: new OpenAIJudge(client, settings.model, settings.temperature),
            model: settings.model,
        };
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        Logger.warn(`[Oracle] Client construction failed: ${reason}`);
        return { available: false, reason: `client construction failed: ${reason}` };
    }
}

/** Narrows a handle for callers that cannot proceed without the oracle. */
export function requireOracle(handle: OracleHandle): JudgmentOracle {
    if (!handle.available) {
        throw new OracleUnavailableError(`Oracle unavailable: ${handle.reason}`);
    }
    return handle.judge;
}
