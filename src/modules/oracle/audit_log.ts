import fs from 'fs';
import path from 'path';

export interface AuditEntry {
    prompt: string;
    response: string;
}

export interface AuditSink {
    append(entry: AuditEntry): void;
}

/**
 * Append-only JSONL trail of every oracle interaction, in call order.
 * Each entry is appended synchronously before the next call starts.
 */
export class JsonlAuditLog implements AuditSink {
    constructor(public readonly filePath: string) {}

    append(entry: AuditEntry): void {
        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        const line = JSON.stringify({ prompt: entry.prompt, response: entry.response });
        fs.appendFileSync(this.filePath, `${line}\n`, 'utf8');
    }
}
