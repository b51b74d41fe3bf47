import { z } from 'zod';
import type { Verdict } from '../../types';
import { OracleResponseError } from '../../utils/errors';

/**
 * Strict verdict contract: exactly these three keys, no coercion, no prose
 * around the JSON object.
 */
export const VerdictSchema = z
    .object({
        is_match: z.boolean(),
        confidence: z.enum(['low', 'medium', 'high']),
        reason: z.string(),
    })
    .strict();

export function parseVerdict(response: string): Verdict {
    let payload: unknown;
    try {
        payload = JSON.parse(response.trim());
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new OracleResponseError(`Verdict is not valid JSON: ${reason}`, response);
    }

    const parsed = VerdictSchema.safeParse(payload);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new OracleResponseError(`Verdict failed validation: ${issues}`, response);
    }
    return parsed.data;
}

/** Fail closed: a positive verdict needs at least medium confidence. */
export function isAccepted(verdict: Verdict): boolean {
    return verdict.is_match && (verdict.confidence === 'medium' || verdict.confidence === 'high');
}
