/**
 * Fetch Outcomes
 *
 * Upstream calls never throw. They report one of three outcomes so callers
 * can tell "no data" apart from "failed to fetch".
 */

export type FetchOutcome<T> =
    | { status: 'ok'; value: T }
    | { status: 'empty' }
    | { status: 'upstream_failure'; reason: string };

export function ok<T>(value: T): FetchOutcome<T> {
    return { status: 'ok', value };
}

export function empty<T>(): FetchOutcome<T> {
    return { status: 'empty' };
}

export function upstreamFailure<T>(reason: string): FetchOutcome<T> {
    return { status: 'upstream_failure', reason };
}
