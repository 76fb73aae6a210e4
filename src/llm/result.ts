/**
 * Tagged outcome for expected failures. Exceptions are reserved for faults
 * and cancellation.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/**
 * Why an LLM attempt produced no usable value.
 */
export type ParseFailureKind =
    | 'empty'
    | 'malformed_json'
    | 'schema_violation'
    | 'unparseable_text'
    | 'timeout'
    | 'provider_error';

export interface ParseFailure {
    kind: ParseFailureKind;
    message: string;
}

export function failure(kind: ParseFailureKind, message: string): { ok: false; error: ParseFailure } {
    return err({ kind, message });
}
