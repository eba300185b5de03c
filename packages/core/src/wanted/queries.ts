/**
 * Read helpers over a CommonsStore, parameterized by an "as of" ref
 * (empty for main, or a branch name).
 */

import type { CommonsStore, SelectQuery } from '../commons_store/commons_store.types';
import type { BrowseFilter, CompletionRecord, Stamp, WantedItem, WantedSummary } from './wanted.types';

export const DEFAULT_BROWSE_LIMIT = 50;

export async function queryItem(store: CommonsStore, wantedId: string, ref: string = ''): Promise<WantedItem | null> {
  const rows = await store.query({ table: 'wanted', where: { match: { id: wantedId } }, limit: 1 }, ref);
  return rows[0] ?? null;
}

export async function queryCompletion(store: CommonsStore, wantedId: string, ref: string = ''): Promise<CompletionRecord | null> {
  const rows = await store.query({
    table: 'completions',
    where: { match: { wantedId } },
    orderBy: [{ field: 'completedAt', direction: 'desc' }],
    limit: 1,
  }, ref);
  return rows[0] ?? null;
}

export async function queryStamp(store: CommonsStore, stampId: string, ref: string = ''): Promise<Stamp | null> {
  const rows = await store.query({ table: 'stamps', where: { match: { id: stampId } }, limit: 1 }, ref);
  return rows[0] ?? null;
}

/** Stamp attached to the item's completion, if any. */
export async function queryItemStamp(store: CommonsStore, completion: CompletionRecord | null, ref: string = ''): Promise<Stamp | null> {
  if (!completion || completion.stampId === null) return null;
  return queryStamp(store, completion.stampId, ref);
}

/**
 * Builds the wanted query for a browse filter: priority ascending, newest
 * first within a priority.
 */
export function browseQuery(filter: BrowseFilter): SelectQuery<'wanted'> {
  const match: Partial<WantedItem> = {};
  if (filter.status) match.status = filter.status;
  if (filter.project) match.project = filter.project;
  if (filter.type) match.type = filter.type;
  if (filter.priority !== undefined && filter.priority >= 0) match.priority = filter.priority;
  if (filter.postedBy) match.postedBy = filter.postedBy;
  if (filter.claimedBy) match.claimedBy = filter.claimedBy;

  const query: SelectQuery<'wanted'> = {
    table: 'wanted',
    where: { match },
    orderBy: [
      { field: 'priority', direction: 'asc' },
      { field: 'createdAt', direction: 'desc' },
    ],
    limit: filter.limit !== undefined && filter.limit > 0 ? filter.limit : DEFAULT_BROWSE_LIMIT,
  };
  if (filter.search) {
    query.search = { field: 'title', term: filter.search };
  }
  return query;
}

/** True when an item passes the non-text parts of a browse filter. */
export function matchesBrowseFilter(item: WantedItem, filter: BrowseFilter): boolean {
  if (filter.status && item.status !== filter.status) return false;
  if (filter.project && item.project !== filter.project) return false;
  if (filter.type && item.type !== filter.type) return false;
  if (filter.priority !== undefined && filter.priority >= 0 && item.priority !== filter.priority) return false;
  if (filter.postedBy && item.postedBy !== filter.postedBy) return false;
  if (filter.claimedBy && item.claimedBy !== filter.claimedBy) return false;
  if (filter.search && !item.title.toLowerCase().includes(filter.search.toLowerCase())) return false;
  return true;
}

export function toSummary(item: WantedItem): WantedSummary {
  return {
    id: item.id,
    title: item.title,
    project: item.project,
    type: item.type,
    priority: item.priority,
    postedBy: item.postedBy,
    claimedBy: item.claimedBy,
    status: item.status,
    effortLevel: item.effortLevel,
  };
}
