/**
 * Guarded statement builders, one per mutation.
 *
 * Every statement carries its own precondition (id, current status and,
 * where relevant, poster or claimer) so the store re-validates it at commit
 * time instead of trusting an earlier read.
 */

import type { RowCondition, RowFilter, Statement } from '../commons_store/commons_store.types';
import type { CompletionRecord, Stamp, WantedItem, WantedStatus, WantedUpdate } from './wanted.types';
import { EmptyUpdateError } from './errors';
import { TRANSITION_RULES } from './transitions';

function wantedFilter(id: string, status: WantedStatus, extra: Partial<WantedItem> = {}): RowFilter<'wanted'> {
  return { match: { ...extra, id, status } };
}

function wantedExists(id: string, status: WantedStatus, extra: Partial<WantedItem> = {}): RowCondition {
  return { table: 'wanted', filter: wantedFilter(id, status, extra) };
}

export function claimStatements(wantedId: string, rigHandle: string, now: string): Statement[] {
  return [{
    op: 'update',
    table: 'wanted',
    set: { status: TRANSITION_RULES.claim.to, claimedBy: rigHandle, updatedAt: now },
    where: wantedFilter(wantedId, TRANSITION_RULES.claim.from),
    required: true,
  }];
}

/** The claimer or the poster may release a claim. */
export function unclaimStatements(wantedId: string, rigHandle: string, now: string): Statement[] {
  return [{
    op: 'update',
    table: 'wanted',
    set: { status: TRANSITION_RULES.unclaim.to, claimedBy: null, updatedAt: now },
    where: {
      match: { id: wantedId, status: TRANSITION_RULES.unclaim.from },
      anyOf: [{ claimedBy: rigHandle }, { postedBy: rigHandle }],
    },
    required: true,
  }];
}

/**
 * Moves the item to review and records the completion evidence. The
 * completion is inserted only once per item.
 */
export function doneStatements(
  wantedId: string,
  rigHandle: string,
  completion: Pick<CompletionRecord, 'id' | 'evidence'>,
  now: string
): Statement[] {
  return [
    {
      op: 'update',
      table: 'wanted',
      set: { status: TRANSITION_RULES.done.to, updatedAt: now },
      where: wantedFilter(wantedId, TRANSITION_RULES.done.from, { claimedBy: rigHandle }),
      required: true,
    },
    {
      op: 'insert',
      table: 'completions',
      row: {
        id: completion.id,
        wantedId,
        completedBy: rigHandle,
        evidence: completion.evidence,
        stampId: null,
        validatedBy: null,
        completedAt: now,
      },
      when: [wantedExists(wantedId, TRANSITION_RULES.done.to, { claimedBy: rigHandle })],
      unless: [{ table: 'completions', filter: { match: { wantedId } } }],
    },
  ];
}

/**
 * Stamps the completion and completes the item. Only the poster may accept.
 */
export function acceptStatements(
  wantedId: string,
  rigHandle: string,
  completionId: string,
  stamp: Stamp,
  now: string
): Statement[] {
  const underReview = wantedExists(wantedId, TRANSITION_RULES.accept.from, { postedBy: rigHandle });
  return [
    {
      op: 'insert',
      table: 'stamps',
      row: stamp,
      when: [underReview],
    },
    {
      op: 'update',
      table: 'completions',
      set: { stampId: stamp.id, validatedBy: rigHandle },
      where: { match: { id: completionId, wantedId } },
      when: [underReview],
    },
    {
      op: 'update',
      table: 'wanted',
      set: { status: TRANSITION_RULES.accept.to, updatedAt: now },
      where: wantedFilter(wantedId, TRANSITION_RULES.accept.from, { postedBy: rigHandle }),
      required: true,
    },
  ];
}

/** Sends the work back to the claimer and drops the completion. */
export function rejectStatements(wantedId: string, rigHandle: string, now: string): Statement[] {
  return [
    {
      op: 'delete',
      table: 'completions',
      where: { match: { wantedId } },
      when: [wantedExists(wantedId, TRANSITION_RULES.reject.from, { postedBy: rigHandle })],
    },
    {
      op: 'update',
      table: 'wanted',
      set: { status: TRANSITION_RULES.reject.to, updatedAt: now },
      where: wantedFilter(wantedId, TRANSITION_RULES.reject.from, { postedBy: rigHandle }),
      required: true,
    },
  ];
}

/** Completes without a stamp; the completion stays for the record. */
export function closeStatements(wantedId: string, rigHandle: string, now: string): Statement[] {
  return [{
    op: 'update',
    table: 'wanted',
    set: { status: TRANSITION_RULES.close.to, updatedAt: now },
    where: wantedFilter(wantedId, TRANSITION_RULES.close.from, { postedBy: rigHandle }),
    required: true,
  }];
}

export function deleteStatements(wantedId: string, rigHandle: string, now: string): Statement[] {
  return [{
    op: 'update',
    table: 'wanted',
    set: { status: TRANSITION_RULES.delete.to, updatedAt: now },
    where: wantedFilter(wantedId, TRANSITION_RULES.delete.from, { postedBy: rigHandle }),
    required: true,
  }];
}

export function insertWantedStatements(item: WantedItem): Statement[] {
  return [{ op: 'insert', table: 'wanted', row: item, required: true }];
}

/**
 * Updates content fields of an open item owned by `rigHandle`.
 * Undefined fields are left untouched.
 */
export function updateWantedStatements(
  wantedId: string,
  rigHandle: string,
  fields: WantedUpdate,
  now: string
): Statement[] {
  const set: Partial<WantedItem> = {};
  if (fields.title !== undefined) set.title = fields.title;
  if (fields.description !== undefined) set.description = fields.description;
  if (fields.project !== undefined) set.project = fields.project;
  if (fields.type !== undefined) set.type = fields.type;
  if (fields.priority !== undefined) set.priority = fields.priority;
  if (fields.tags !== undefined) set.tags = [...fields.tags];
  if (fields.effortLevel !== undefined) set.effortLevel = fields.effortLevel;

  if (Object.keys(set).length === 0) {
    throw new EmptyUpdateError();
  }

  return [{
    op: 'update',
    table: 'wanted',
    set: { ...set, updatedAt: now },
    where: wantedFilter(wantedId, TRANSITION_RULES.update.from, { postedBy: rigHandle }),
    required: true,
  }];
}
