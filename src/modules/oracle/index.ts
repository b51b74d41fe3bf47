/**
 * 🤖 DISAMBIGUATION ORACLE CLIENT
 *
 * Sends a bounded slice of ambiguous candidates to the LLM judge, one at a time
 * and in input order. Everything past the first `maxToReview` items is deferred
 * untouched, so the cost of a run stays predictable.
 */

import { MatchCandidate, MatchMethod, ReviewOutcome } from '../../types';
import { Logger } from '../../utils/logger';
import type { AuditSink } from './audit_log';
import type { OracleHandle } from './client';
import { buildPrompt, SYSTEM_PROMPT } from './prompt';
import { isAccepted, parseVerdict } from './verdict';

export * from './audit_log';
export * from './client';
export * from './prompt';
export * from './verdict';

export async function reviewAmbiguous(
    oracle: OracleHandle,
    ambiguous: MatchCandidate[],
    maxToReview: number,
    auditLog: AuditSink
): Promise<ReviewOutcome> {
    if (!Number.isInteger(maxToReview) || maxToReview < 0) {
        throw new RangeError(`maxToReview must be a non-negative integer, got ${maxToReview}`);
    }

    if (ambiguous.length === 0) {
        Logger.info('ℹ️ No ambiguous matches to send to the oracle.');
        return { approved: [], stillAmbiguous: [], reviewed: 0, failures: 0 };
    }

    if (!oracle.available) {
        Logger.warn(`💡 Oracle unavailable (${oracle.reason}) – skipping LLM review.`);
        return { approved: [], stillAmbiguous: [...ambiguous], reviewed: 0, failures: 0, skippedReason: oracle.reason };
    }

    const toReview = ambiguous.slice(0, maxToReview);
    const deferred = ambiguous.slice(maxToReview);

    const approved: MatchCandidate[] = [];
    const rejected: MatchCandidate[] = [];
    let failures = 0;

    Logger.info(`🤖 Sending ${toReview.length} ambiguous matches to the oracle (${oracle.model}) for review...`);

    for (const candidate of toReview) {
        const prompt = buildPrompt(candidate);
        const context = { commoncrawl_id: candidate.cc.commoncrawl_id, abn: candidate.abr.abn };

        try {
            const response = await oracle.judge.judge(SYSTEM_PROMPT, prompt);
            auditLog.append({ prompt, response });

            const verdict = parseVerdict(response);
            if (isAccepted(verdict)) {
                approved.push({ ...candidate, method: MatchMethod.LLM_DISAMBIGUATION });
            } else {
                rejected.push(candidate);
            }
            Logger.debug(`[Oracle] ${verdict.is_match ? 'MATCH' : 'NO MATCH'} (${verdict.confidence}): ${verdict.reason}`, context);
        } catch (error) {
            failures++;
            rejected.push(candidate);
            Logger.logError('⚠️ Oracle review failed for one match', error, context);
        }
    }

    const stillAmbiguous = [...rejected, ...deferred];

    Logger.info(
        `🤖 Oracle review complete. Approved: ${approved.length}, Failed: ${failures}, Remaining ambiguous: ${stillAmbiguous.length}`
    );
    return { approved, stillAmbiguous, reviewed: toReview.length, failures };
}
