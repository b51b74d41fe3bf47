export class StringUtils {

    /**
     * Normalised Indel similarity on a 0-100 scale: 200 * LCS / (|a| + |b|).
     * Lengths are counted in code points.
     */
    static ratio(s1: string, s2: string): number {
        const a = Array.from(s1);
        const b = Array.from(s2);
        const total = a.length + b.length;
        if (total === 0) return 100;

        return (200 * this.longestCommonSubsequence(a, b)) / total;
    }

    /**
     * Token-order-invariant similarity: whitespace tokens are sorted and
     * re-joined before comparing. No case folding is applied.
     */
    static tokenSortRatio(s1: string, s2: string): number {
        return this.ratio(this.sortTokens(s1), this.sortTokens(s2));
    }

    static sortTokens(text: string): string {
        return text
            .split(/\s+/)
            .filter(Boolean)
            .sort()
            .join(' ');
    }

    // Two-row dynamic programming table
    private static longestCommonSubsequence(a: string[], b: string[]): number {
        if (a.length === 0 || b.length === 0) return 0;

        let previous = new Array<number>(b.length + 1).fill(0);
        let current = new Array<number>(b.length + 1).fill(0);

        for (let i = 1; i <= a.length; i++) {
            for (let j = 1; j <= b.length; j++) {
                if (a[i - 1] === b[j - 1]) {
                    current[j] = previous[j - 1] + 1;
                } else {
                    current[j] = Math.max(previous[j], current[j - 1]);
                }
            }
            [previous, current] = [current, previous];
        }

        return previous[b.length];
    }
}
