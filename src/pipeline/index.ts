import crypto from 'crypto';
import type { AppConfig } from '../config';
import { TierClassifier } from '../modules/classifier';
import { CandidateMatcher } from '../modules/matcher';
import { AuditSink, JsonlAuditLog, OracleHandle, createOracleHandle, reviewAmbiguous } from '../modules/oracle';
import type { MatchWriter, MatchingPolicy, RunSummary, SourceFeed } from '../types';
import { Logger } from '../utils/logger';

export interface PipelineContext {
    runId: string;
    matching: MatchingPolicy;
    maxReviews: number;
    oracle: OracleHandle;
    auditLog: AuditSink;
    feed: SourceFeed;
    writer: MatchWriter;
    /** Classify and review, but leave the unified tables alone. */
    dryRun?: boolean;
}

export interface PipelineDependencies {
    feed: SourceFeed;
    writer: MatchWriter;
    oracle?: OracleHandle;
    auditLog?: AuditSink;
    dryRun?: boolean;
}

/**
 * Wires a run from configuration. Oracle and audit log default to the
 * configured OpenAI client and JSONL file.
 */
export function createPipelineContext(config: AppConfig, deps: PipelineDependencies): PipelineContext {
    return {
        runId: `run-${crypto.randomUUID()}`,
        matching: config.matching,
        maxReviews: config.oracle.maxReviews,
        oracle: deps.oracle ?? createOracleHandle(config.oracle),
        auditLog: deps.auditLog ?? new JsonlAuditLog(config.oracle.logPath),
        feed: deps.feed,
        writer: deps.writer,
        dryRun: deps.dryRun,
    };
}

export class MatchingPipeline {

    static async run(context: PipelineContext): Promise<RunSummary> {
        const start = Date.now();
        const { runId } = context;
        Logger.info(`🚀 Matching run started: ${runId} (feed: ${context.feed.name})`, { run_id: runId });

        // 1. Load
        const { registry, web } = await context.feed.load();

        // 2. Match
        const matchResult = CandidateMatcher.match(registry, web);

        // 3. Classify
        const classified = TierClassifier.classify(matchResult, context.matching);

        // 4. Adjudicate
        const review = await reviewAmbiguous(context.oracle, classified.needsAdjudication, context.maxReviews, context.auditLog);

        // 5. Persist
        const accepted = [...classified.autoAccept, ...review.approved];
        let totalWritten = 0;
        if (context.dryRun) {
            Logger.info(`🧪 Dry run: ${accepted.length} accepted matches not written.`, { run_id: runId });
        } else {
            totalWritten = context.writer.write(accepted).unified;
        }

        const summary: RunSummary = {
            runId,
            registryCount: registry.length,
            webCount: web.length,
            autoAccepted: classified.autoAccept.length,
            oracleApproved: review.approved.length,
            stillAmbiguous: review.stillAmbiguous.length,
            discarded: classified.discarded.length,
            unmatched: classified.unmatched.length,
            oracleFailures: review.failures,
            totalWritten,
            durationMs: Date.now() - start,
        };

        Logger.info(
            `🏁 Run ${runId} finished. Auto-accepted: ${summary.autoAccepted}, LLM-approved: ${summary.oracleApproved}, ` +
                `Still ambiguous: ${summary.stillAmbiguous}, Discarded: ${summary.discarded}, Unmatched: ${summary.unmatched}, ` +
                `Written: ${summary.totalWritten}`,
            { run_id: runId, duration_ms: summary.durationMs }
        );
        return summary;
    }
}
