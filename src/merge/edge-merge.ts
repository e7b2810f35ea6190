import type { Citation, EdgeList, PaperDetails, Reference } from '../types/index.js';

/** Picks the counterpart paper out of an edge entry */
export type CounterpartOf<E> = (entry: E) => PaperDetails | null | undefined;

export interface BatchWindow {
    offset: number;
    limit: number;
}

/**
 * The remote service cannot enumerate an edge list past this depth.
 */
export const ENUMERATION_CEILING = 10000;

export const citingPaperOf: CounterpartOf<Citation> = (entry) => entry.citingPaper;
export const citedPaperOf: CounterpartOf<Reference> = (entry) => entry.citedPaper;

function counterpartKey<E>(entry: E, counterpartOf: CounterpartOf<E>): string | null {
    const paperId = counterpartOf(entry)?.paperId;
    return paperId ? paperId : null;
}

/**
 * Merge a previously held edge list into a newly fetched one.
 *
 * `incoming` is treated as the authoritative head: its entries keep their
 * order, and each `existing` entry whose counterpart is missing from it is
 * appended as a tail. When `incoming.next` is set it is advanced by one per
 * appended entry so the cursor still counts from the true list start.
 * Entries whose counterpart has no `paperId` are dropped from both sides.
 * An empty `incoming` yields `existing` with its sentinels and repeats dropped.
 */
export function mergeEdgeLists<E>(
    existing: EdgeList<E>,
    incoming: EdgeList<E>,
    counterpartOf: CounterpartOf<E>
): EdgeList<E> {
    const head = dedupe(incoming.data, counterpartOf);
    if (head.length === 0) {
        return copyList(existing, counterpartOf);
    }

    const seen = new Set<string>();
    for (const entry of head) {
        const key = counterpartKey(entry, counterpartOf);
        if (key !== null) seen.add(key);
    }

    const data = [...head];
    let appended = 0;
    for (const entry of existing.data) {
        const key = counterpartKey(entry, counterpartOf);
        if (key === null || seen.has(key)) continue;
        seen.add(key);
        data.push(entry);
        appended += 1;
    }

    const merged: EdgeList<E> = { offset: incoming.offset, data };
    if (incoming.next !== undefined && incoming.next !== null) {
        merged.next = incoming.next + appended;
    } else if (incoming.next === null) {
        merged.next = null;
    }
    return merged;
}

export function mergeCitations(existing: EdgeList<Citation>, incoming: EdgeList<Citation>): EdgeList<Citation> {
    return mergeEdgeLists(existing, incoming, citingPaperOf);
}

export function mergeReferences(existing: EdgeList<Reference>, incoming: EdgeList<Reference>): EdgeList<Reference> {
    return mergeEdgeLists(existing, incoming, citedPaperOf);
}

/**
 * Drop sentinel entries and repeated counterparts, keeping first occurrences.
 */
export function dedupe<E>(data: E[], counterpartOf: CounterpartOf<E>): E[] {
    const seen = new Set<string>();
    const result: E[] = [];
    for (const entry of data) {
        const key = counterpartKey(entry, counterpartOf);
        if (key === null || seen.has(key)) continue;
        seen.add(key);
        result.push(entry);
    }
    return result;
}

function copyList<E>(list: EdgeList<E>, counterpartOf: CounterpartOf<E>): EdgeList<E> {
    const copy: EdgeList<E> = { offset: list.offset, data: dedupe(list.data, counterpartOf) };
    if (list.next !== undefined) copy.next = list.next;
    return copy;
}

/**
 * Split `[0, count)` into request windows of at most `batchSize`.
 *
 * With a `ceiling`, no window may reach past `ceiling - 1`
 * (`offset + limit <= ceiling - 1`) and enumeration stops there.
 */
export function batchWindows(count: number, batchSize: number, ceiling?: number): BatchWindow[] {
    if (batchSize <= 0 || count <= 0) return [];

    const end = ceiling === undefined ? count : Math.min(count, ceiling - 1);
    const windows: BatchWindow[] = [];
    for (let offset = 0; offset < end; offset += batchSize) {
        windows.push({ offset, limit: Math.min(batchSize, end - offset) });
    }
    return windows;
}
