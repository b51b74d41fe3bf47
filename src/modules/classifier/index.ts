import { ClassifiedMatches, MatchCandidate, MatchMethod, MatchResult, MatchingPolicy } from '../../types';
import { ConfigurationError } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export const BLANKET_ADJUDICATION: MatchingPolicy = {
    mode: 'blanket-adjudicate',
    thresholds: { high: 95, low: 0 },
    belowLow: 'adjudicate',
};

function retag(candidate: MatchCandidate, method: MatchMethod): MatchCandidate {
    return { ...candidate, method };
}

export class TierClassifier {

    static validatePolicy(policy: MatchingPolicy): void {
        const { high, low } = policy.thresholds;
        if (!Number.isFinite(high) || !Number.isFinite(low) || low < 0 || high > 100 || high < low) {
            throw new ConfigurationError(`Invalid thresholds: high=${high}, low=${low} (expected 0 <= low <= high <= 100)`);
        }
    }

    /**
     * Partitions matcher output into confidence tiers. Input order is kept inside
     * each bucket and every candidate lands in exactly one of them.
     */
    static classify(result: MatchResult, policy: MatchingPolicy): ClassifiedMatches {
        this.validatePolicy(policy);

        const classified: ClassifiedMatches = {
            autoAccept: [],
            needsAdjudication: [],
            discarded: [],
            unmatched: [...result.unmatched],
        };

        for (const candidate of result.candidates) {
            switch (this.tierOf(candidate.score, policy)) {
                case 'auto':
                    classified.autoAccept.push(retag(candidate, MatchMethod.HIGH_CONFIDENCE));
                    break;
                case 'adjudicate':
                    classified.needsAdjudication.push(retag(candidate, MatchMethod.AMBIGUOUS));
                    break;
                case 'discard':
                    classified.discarded.push(retag(candidate, MatchMethod.LOW_SCORE));
                    break;
            }
        }

        Logger.info(
            `🏷️ Classified (${policy.mode}). High-confidence: ${classified.autoAccept.length}, ` +
                `Ambiguous: ${classified.needsAdjudication.length}, Discarded: ${classified.discarded.length}, ` +
                `Unmatched: ${classified.unmatched.length}`
        );
        return classified;
    }

    static tierOf(score: number, policy: MatchingPolicy): 'auto' | 'adjudicate' | 'discard' {
        if (policy.mode === 'blanket-adjudicate') return 'adjudicate';

        if (score >= policy.thresholds.high) return 'auto';
        if (score >= policy.thresholds.low) return 'adjudicate';
        return policy.belowLow === 'adjudicate' ? 'adjudicate' : 'discard';
    }
}
