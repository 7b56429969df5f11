/**
 * JSON over HTTP
 *
 * Collapses transport errors, non-2xx statuses and unparseable bodies into
 * an upstream_failure outcome.
 */

import { ok, upstreamFailure, type FetchOutcome } from '@dugout/types';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export async function fetchJson(
    fetchFn: FetchFn,
    url: string,
    tag: string,
    init?: RequestInit
): Promise<FetchOutcome<unknown>> {
    let response: Response;
    try {
        response = await fetchFn(url, init);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[${tag}] Request failed: ${message}`);
        return upstreamFailure(`transport: ${message}`);
    }

    if (!response.ok) {
        console.warn(`[${tag}] API error: ${response.status}`);
        return upstreamFailure(`http ${response.status}`);
    }

    try {
        return ok(await response.json());
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[${tag}] Error decoding JSON: ${message}`);
        return upstreamFailure(`parse: ${message}`);
    }
}
