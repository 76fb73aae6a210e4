import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Where full texts come from. Returns null when a paper has none.
 */
export interface FulltextSource {
    load(paperId: string): Promise<string | null>;
}

/**
 * File name for a paper id: anything outside `[A-Za-z0-9._-]` becomes `_`.
 */
export function fulltextFileName(paperId: string): string {
    return `${paperId.replace(/[^A-Za-z0-9._-]/g, '_')}.txt`;
}

/**
 * Plain-text full texts in a directory, one `<sanitized id>.txt` per paper.
 */
export class DirectoryFulltextSource implements FulltextSource {
    constructor(private readonly directory: string) {}

    async load(paperId: string): Promise<string | null> {
        const path = join(this.directory, fulltextFileName(paperId));
        if (!existsSync(path)) return null;
        const text = readFileSync(path, 'utf-8');
        return text.trim() === '' ? null : text;
    }
}

/**
 * Used when no full-text directory is configured: every paper screens degraded.
 */
export class NoFulltextSource implements FulltextSource {
    async load(): Promise<string | null> {
        return null;
    }
}
