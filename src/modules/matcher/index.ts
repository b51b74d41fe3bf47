import { MatchCandidate, MatchMethod, MatchResult, RegistryEntity, WebMention } from '../../types';
import { StringUtils } from '../../utils/similarity';
import { Logger } from '../../utils/logger';

interface EligibleEntity {
    entity: RegistryEntity;
    name: string;
}

export class CandidateMatcher {

    /**
     * Picks the single best registry entity for every web mention.
     *
     * Exhaustive: every mention is scored against every registry entity with a
     * non-empty ABN and normalised name. The strictly highest score wins; on a tie the
     * entity seen first keeps its place.
     */
    static match(registry: RegistryEntity[], web: WebMention[]): MatchResult {
        const candidates: MatchCandidate[] = [];
        const unmatched: WebMention[] = [];

        if (registry.length === 0 || web.length === 0) {
            return { candidates, unmatched: [...web] };
        }

        const eligible: EligibleEntity[] = registry
            .filter((entity) => entity.abn.trim().length > 0)
            .map((entity) => ({ entity, name: entity.entity_name_norm.trim() }))
            .filter((e) => e.name.length > 0);

        Logger.info(`🔎 Starting fuzzy matching: ${web.length} mentions x ${eligible.length} registry entities...`);

        for (const mention of web) {
            const best = this.bestCandidate(mention, eligible);
            if (best) {
                candidates.push(best);
            } else {
                unmatched.push(mention);
            }
        }

        Logger.info(`✅ Fuzzy matching complete. Candidates: ${candidates.length}, Unmatched web mentions: ${unmatched.length}`);
        return { candidates, unmatched };
    }

    private static bestCandidate(mention: WebMention, eligible: EligibleEntity[]): MatchCandidate | null {
        const name = mention.company_name_norm.trim();
        if (!name) return null;

        let bestScore = -1;
        let bestEntity: RegistryEntity | null = null;

        for (const { entity, name: entityName } of eligible) {
            const score = StringUtils.tokenSortRatio(name, entityName);
            if (score > bestScore) {
                bestScore = score;
                bestEntity = entity;
            }
        }

        if (!bestEntity) return null;

        return {
            cc: mention,
            abr: bestEntity,
            score: bestScore,
            method: MatchMethod.FUZZY_NAME,
        };
    }
}
