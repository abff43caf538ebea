/**
 * @file result.ts
 * @module shared/result
 * @license MIT
 *
 * @fileoverview Success/failure values threaded through lookups and rendering.
 */

/**
 * Outcome of an operation that may fail without throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}
