import { vi } from 'vitest';
import type { LatestMatchResult, MatchSource } from '../matchTrackerService';

type SourceReply = LatestMatchResult | Error;

export interface FakeMatchSource extends MatchSource {
    replies: Map<string, SourceReply>;
}

/**
 * Match source answering from a table keyed by lowercased "handle#tag".
 * Accounts without an entry have no matches.
 */
export function aFakeMatchSource(replies: Record<string, SourceReply> = {}): FakeMatchSource {
    const table = new Map(Object.entries(replies).map(([key, reply]) => [key.toLowerCase(), reply]));

    return {
        replies: table,
        fetchLatestMatch: vi.fn(async (handle: string, tag: string): Promise<LatestMatchResult> => {
            const reply = table.get(`${handle}#${tag}`.toLowerCase());
            if (reply instanceof Error) throw reply;
            return reply ?? { status: 'not_found', reason: `No competitive matches for ${handle}#${tag}` };
        })
    };
}
