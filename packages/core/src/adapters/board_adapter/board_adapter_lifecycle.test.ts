/**
 * Branch lifecycle: apply, discard, submit and diff of rig branches.
 */

import { BoardAdapter } from './index';
import { BranchLifecycleError, DiscardFailedError } from './errors';
import { MemoryCommonsStore } from '../../commons_store/memory';
import { MergeConflictError, PreconditionFailedError } from '../../commons_store/errors';
import { EventBus } from '../../event_bus';
import type { BoardEvent } from '../../event_bus';
import { CapabilityUnavailableError, InvalidBranchNameError } from '../../wanted/errors';
import { claimStatements } from '../../wanted/statements';
import type { WantedItem } from '../../wanted/wanted.types';

const NOW = new Date('2026-03-01T10:00:00.000Z');
const BRANCH = 'wl/bob/w-1';

function openItem(): WantedItem {
  return {
    id: 'w-1',
    title: 'Fix the flaky sync test',
    description: '',
    project: 'gastown',
    type: 'bug',
    priority: 2,
    tags: [],
    postedBy: 'alice',
    claimedBy: null,
    status: 'open',
    effortLevel: 'small',
    createdAt: '2026-01-10T09:00:00.000Z',
    updatedAt: '2026-01-10T09:00:00.000Z',
  };
}

describe('BoardAdapter branch lifecycle', () => {
  let store: MemoryCommonsStore;
  let eventBus: EventBus;
  let events: BoardEvent[];

  beforeEach(() => {
    store = new MemoryCommonsStore();
    store.seedItem(openItem());
    eventBus = new EventBus();
    events = [];
    eventBus.subscribeToAll(event => {
      events.push(event);
    });
  });

  describe('applyBranch', () => {
    it('should merge the branch into main and remove it', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW, eventBus });
      const claimed = await bob.claim('w-1');
      expect(claimed.detail).toMatchObject({ branch: BRANCH, delta: 'claim', mainStatus: 'open' });

      await bob.applyBranch(BRANCH);
      await eventBus.waitForIdle();

      expect(store.getItem('w-1')).toMatchObject({ status: 'claimed', claimedBy: 'bob' });
      expect(await store.branches('wl/bob/')).toEqual([]);
      expect(store.hasRemoteBranch(BRANCH)).toBe(false);
      expect(store.getCommits().map(commit => commit.message)).toEqual([
        'wl claim: w-1',
        `Merge branch '${BRANCH}'`,
      ]);
      expect(events.map(event => event.type)).toEqual(['wanted.mutated', 'branch.applied']);
      expect(events[1]?.payload).toEqual({ branch: BRANCH, wantedId: 'w-1', rigHandle: 'bob' });
    });

    it('should show the merged item without a delta afterwards', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });
      await bob.claim('w-1');
      await bob.applyBranch(BRANCH);

      const detail = await bob.detail('w-1');

      expect(detail.item.status).toBe('claimed');
      expect(detail.branch).toBe('');
      expect(detail.delta).toBe('');
      expect(detail.branchActions).toEqual([]);
    });

    it('should reject a malformed branch name', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr' });

      await expect(bob.applyBranch('feature/w-1')).rejects.toBeInstanceOf(InvalidBranchNameError);
      await expect(bob.applyBranch('wl/bob/w-1/extra')).rejects.toBeInstanceOf(InvalidBranchNameError);
    });

    it('should leave the branch in place on a merge conflict', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });
      await bob.claim('w-1');
      await store.exec('', 'wl claim: w-1', false, claimStatements('w-1', 'carol', NOW.toISOString()));

      await expect(bob.applyBranch(BRANCH)).rejects.toBeInstanceOf(MergeConflictError);
      expect(store.hasBranch(BRANCH)).toBe(true);
      expect(store.getItem('w-1')?.claimedBy).toBe('carol');
    });

    it('should name the failed step when the local branch cannot be deleted', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });
      await bob.claim('w-1');
      jest.spyOn(store, 'deleteBranch').mockRejectedValueOnce(new Error('branch is checked out'));

      const attempt = bob.applyBranch(BRANCH);

      await expect(attempt).rejects.toBeInstanceOf(BranchLifecycleError);
      await expect(attempt).rejects.toThrow('delete local branch: branch is checked out');
    });

    it('should name the failed step when main cannot be pushed', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });
      await bob.claim('w-1');
      store.failNextPush('main', 'denied');

      await expect(bob.applyBranch(BRANCH)).rejects.toThrow('push origin main: push main rejected: denied');
      expect(store.getItem('w-1')?.status).toBe('claimed');
    });
  });

  describe('discardBranch', () => {
    it('should close the pull request and delete the branch', async () => {
      const closePullRequest = jest.fn((_branch: string) => Promise.resolve());
      const bob = new BoardAdapter({
        store, rigHandle: 'bob', mode: 'pr', clock: () => NOW, eventBus,
        capabilities: { closePullRequest },
      });
      await bob.claim('w-1');

      await bob.discardBranch(BRANCH);
      await eventBus.waitForIdle();

      expect(closePullRequest).toHaveBeenCalledWith(BRANCH);
      expect(store.hasBranch(BRANCH)).toBe(false);
      expect(store.hasRemoteBranch(BRANCH)).toBe(false);
      expect(store.getItem('w-1')?.status).toBe('open');
      expect(store.getCommits().map(commit => commit.message)).toEqual(['wl claim: w-1', 'wl discard: w-1']);
      expect(events.map(event => event.type)).toEqual(['wanted.mutated', 'branch.discarded']);
    });

    it('should still discard when closing the pull request fails', async () => {
      const bob = new BoardAdapter({
        store, rigHandle: 'bob', mode: 'pr', clock: () => NOW,
        capabilities: { closePullRequest: () => Promise.reject(new Error('not found')) },
      });
      await bob.claim('w-1');

      await expect(bob.discardBranch(BRANCH)).resolves.toBeUndefined();
      expect(store.hasBranch(BRANCH)).toBe(false);
    });

    it('should accept a branch that is already gone', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });

      await expect(bob.discardBranch(BRANCH)).resolves.toBeUndefined();
      expect(store.getCommits()).toEqual([]);
    });

    it('should accept a branch whose rows are already clear', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW });
      await bob.claim('w-1');
      jest.spyOn(store, 'exec').mockRejectedValueOnce(new PreconditionFailedError('nothing to commit'));

      await expect(bob.discardBranch(BRANCH)).resolves.toBeUndefined();
      expect(store.hasBranch(BRANCH)).toBe(false);
    });

    it('should report a failed row clear after deleting the branch', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr', clock: () => NOW, eventBus });
      await bob.claim('w-1');
      jest.spyOn(store, 'exec').mockRejectedValueOnce(new Error('disk full'));

      const attempt = bob.discardBranch(BRANCH);

      await expect(attempt).rejects.toBeInstanceOf(DiscardFailedError);
      await expect(attempt).rejects.toThrow(`discard ${BRANCH}: clear branch rows: disk full`);
      expect(store.hasBranch(BRANCH)).toBe(false);
      await eventBus.waitForIdle();
      expect(events.map(event => event.type)).toEqual(['wanted.mutated']);
    });

    it('should reject a malformed branch name', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr' });

      await expect(bob.discardBranch('main')).rejects.toBeInstanceOf(InvalidBranchNameError);
    });
  });

  describe('submitPR and branchDiff', () => {
    it('should report missing capabilities', async () => {
      const bob = new BoardAdapter({ store, rigHandle: 'bob', mode: 'pr' });

      await expect(bob.submitPR(BRANCH)).rejects.toThrow(new CapabilityUnavailableError('createPullRequest', 'PR creation not available'));
      await expect(bob.branchDiff(BRANCH)).rejects.toThrow(new CapabilityUnavailableError('loadDiff', 'diff loading not available'));
    });

    it('should delegate to the hosting layer', async () => {
      const bob = new BoardAdapter({
        store, rigHandle: 'bob', mode: 'pr',
        capabilities: {
          createPullRequest: branch => Promise.resolve(`https://example.test/pulls/${branch}`),
          loadDiff: branch => Promise.resolve(`diff for ${branch}`),
        },
      });

      await expect(bob.submitPR(BRANCH)).resolves.toBe(`https://example.test/pulls/${BRANCH}`);
      await expect(bob.branchDiff(BRANCH)).resolves.toBe(`diff for ${BRANCH}`);
    });
  });
});
