import type { z } from 'zod';
import { failure, ok, type ParseFailure, type Result } from './result.js';

/**
 * Remove ```json ... ``` fences some models wrap around JSON output.
 */
export function stripCodeFences(text: string): string {
    return text.replace(/^\s*```(?:json)?\s*/i, '').replace(/\s*```\s*$/, '').trim();
}

/**
 * Parse the JSON object in an LLM response. Falls back to the outermost
 * `{ ... }` span when the model added prose around it.
 */
export function extractJson(text: string): Result<unknown, ParseFailure> {
    const cleaned = stripCodeFences(text);
    if (cleaned === '') return failure('empty', 'Empty response');

    try {
        return ok(JSON.parse(cleaned));
    } catch {
        const start = cleaned.indexOf('{');
        const end = cleaned.lastIndexOf('}');
        if (start !== -1 && end > start) {
            try {
                return ok(JSON.parse(cleaned.slice(start, end + 1)));
            } catch (error) {
                return failure('malformed_json', error instanceof Error ? error.message : String(error));
            }
        }
        return failure('malformed_json', 'No JSON object found in response');
    }
}

/**
 * Parse and validate a response against a schema.
 */
export function parseStructured<T>(
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ParseFailure> {
    const json = extractJson(text);
    if (!json.ok) return json;

    const validated = schema.safeParse(json.value);
    if (!validated.success) {
        const message = validated.error.issues
            .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
            .join('; ');
        return failure('schema_violation', message);
    }
    return ok(validated.data);
}
