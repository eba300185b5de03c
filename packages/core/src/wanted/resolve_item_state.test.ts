import { computeBranchActions, computeDelta, resolveItemState, sameContent } from './resolve_item_state';
import { claimStatements, doneStatements } from './statements';
import { MemoryCommonsStore } from '../commons_store/memory';
import type { WantedItem } from './wanted.types';

const item = (overrides: Partial<WantedItem> = {}): WantedItem => ({
  id: 'w-1',
  title: 'Fix the flaky sync test',
  description: '',
  project: 'gastown',
  type: 'bug',
  priority: 2,
  tags: ['ci'],
  postedBy: 'alice',
  claimedBy: null,
  status: 'open',
  effortLevel: 'small',
  createdAt: '2026-01-10T09:00:00.000Z',
  updatedAt: '2026-01-10T09:00:00.000Z',
  ...overrides,
});

describe('sameContent', () => {
  it('should ignore timestamps', () => {
    expect(sameContent(item(), item({ updatedAt: '2026-03-01T10:00:00.000Z' }))).toBe(true);
  });

  it('should treat an empty claimer as no claimer', () => {
    expect(sameContent(item(), item({ claimedBy: '' }))).toBe(true);
  });

  it('should compare tags by value', () => {
    expect(sameContent(item(), item({ tags: ['ci'] }))).toBe(true);
    expect(sameContent(item(), item({ tags: ['ci', 'infra'] }))).toBe(false);
  });
});

describe('computeDelta', () => {
  it('should be empty without a branch snapshot', () => {
    expect(computeDelta(item(), null, false)).toEqual({ delta: '', hops: [] });
  });

  it('should label an item missing from main as new', () => {
    expect(computeDelta(null, item(), false)).toEqual({ delta: 'new', hops: [] });
  });

  it('should be empty when only timestamps differ', () => {
    expect(computeDelta(item(), item({ updatedAt: '2026-03-01T10:00:00.000Z' }), false).delta).toBe('');
  });

  it('should label content edits as update', () => {
    expect(computeDelta(item(), item({ title: 'Fix the sync test' }), false).delta).toBe('update');
  });

  it('should name a single hop', () => {
    expect(computeDelta(item(), item({ status: 'claimed', claimedBy: 'bob' }), false).delta).toBe('claim');
    expect(computeDelta(item({ status: 'claimed', claimedBy: 'bob' }), item(), false).delta).toBe('unclaim');
    expect(computeDelta(item(), item({ status: 'withdrawn' }), false).delta).toBe('delete');
    expect(computeDelta(item({ status: 'in_review' }), item({ status: 'claimed' }), false).delta).toBe('reject');
  });

  it('should tell accept from close by the stamp', () => {
    const main = item({ status: 'in_review', claimedBy: 'bob' });
    const branch = item({ status: 'completed', claimedBy: 'bob' });

    expect(computeDelta(main, branch, true)).toEqual({ delta: 'accept', hops: ['accept'] });
    expect(computeDelta(main, branch, false)).toEqual({ delta: 'close', hops: ['close'] });
  });

  it('should label two or more hops as changes and keep their order', () => {
    const branch = item({ status: 'in_review', claimedBy: 'bob' });

    expect(computeDelta(item(), branch, false)).toEqual({ delta: 'changes', hops: ['claim', 'done'] });
  });
});

describe('computeBranchActions', () => {
  it('should offer nothing without a branch or a delta', () => {
    expect(computeBranchActions('pr', '', 'claim', '', false)).toEqual([]);
    expect(computeBranchActions('pr', 'wl/bob/w-1', '', '', false)).toEqual([]);
  });

  it('should offer submit_pr until a pull request exists', () => {
    expect(computeBranchActions('pr', 'wl/bob/w-1', 'claim', '', false)).toEqual(['submit_pr', 'discard']);
    expect(computeBranchActions('pr', 'wl/bob/w-1', 'claim', 'https://example.test/pulls/1', false)).toEqual(['discard']);
  });

  it('should offer apply in wild-west mode', () => {
    expect(computeBranchActions('wild-west', 'wl/bob/w-1', 'claim', '', false)).toEqual(['apply', 'discard']);
  });

  it('should drop discard when delete is available', () => {
    expect(computeBranchActions('pr', 'wl/alice/w-2', 'new', '', true)).toEqual(['submit_pr']);
  });
});

describe('resolveItemState', () => {
  const now = '2026-03-01T10:00:00.000Z';
  let store: MemoryCommonsStore;

  beforeEach(() => {
    store = new MemoryCommonsStore();
    store.seedItem(item());
  });

  it('should return main alone when the rig has no branch', async () => {
    const state = await resolveItemState(store, 'bob', 'w-1');

    expect(state).toMatchObject({ branch: null, branchName: '', delta: '', hops: [], completion: null, stamp: null });
    expect(state.effective).toEqual(item());
  });

  it('should prefer the branch snapshot and its completion', async () => {
    await store.exec('wl/bob/w-1', 'wl claim: w-1', false, claimStatements('w-1', 'bob', now));
    await store.exec('wl/bob/w-1', 'wl done: w-1', false,
      doneStatements('w-1', 'bob', { id: 'c-1', evidence: 'https://example.test/pulls/7' }, now));

    const state = await resolveItemState(store, 'bob', 'w-1');

    expect(state.branchName).toBe('wl/bob/w-1');
    expect(state.main?.status).toBe('open');
    expect(state.effective?.status).toBe('in_review');
    expect(state.completion?.id).toBe('c-1');
    expect(state.delta).toBe('changes');
    expect(state.hops).toEqual(['claim', 'done']);
  });

  it('should ignore other rigs branches', async () => {
    await store.exec('wl/carol/w-1', 'wl claim: w-1', false, claimStatements('w-1', 'carol', now));

    const state = await resolveItemState(store, 'bob', 'w-1');

    expect(state.branchName).toBe('');
    expect(state.effective?.status).toBe('open');
  });

  it('should resolve a branch-only item', async () => {
    const fresh = item({ id: 'w-2', postedBy: 'bob' });
    await store.exec('wl/bob/w-2', 'wl post: w-2', false, [{ op: 'insert', table: 'wanted', row: fresh, required: true }]);

    const state = await resolveItemState(store, 'bob', 'w-2');

    expect(state.main).toBeNull();
    expect(state.effective).toEqual(fresh);
    expect(state.delta).toBe('new');
  });
});
