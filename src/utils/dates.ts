/**
 * Registry start dates come un-parsed, either as `YYYYMMDD` or `YYYY-MM-DD`.
 * Returns an ISO date string, or null when the value is empty, in any other
 * shape, or not a real calendar date.
 */
export function parseStartDate(raw: string): string | null {
    const value = raw.trim();
    if (!value) return null;

    let match: RegExpMatchArray | null = null;
    if (value.length === 8 && /^\d{8}$/.test(value)) {
        match = value.match(/^(\d{4})(\d{2})(\d{2})$/);
    } else if (value.length === 10 && value.includes('-')) {
        match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    }
    if (!match) return null;

    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    if (year < 1) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }

    return `${match[1]}-${match[2]}-${match[3]}`;
}
