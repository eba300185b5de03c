import { Workspace } from './workspace';
import { UpstreamNotFoundError } from './errors';
import type { UpstreamInfo } from './workspace.types';
import { BoardAdapter } from '../adapters/board_adapter';
import { MemoryCommonsStore } from '../commons_store/memory';

function upstream(name: string, mode: UpstreamInfo['mode'] = 'wild-west'): UpstreamInfo {
  return { upstream: name, forkOrg: 'alice', forkDb: name.split('/')[1] ?? name, mode };
}

function adapter(mode: UpstreamInfo['mode'] = 'wild-west'): BoardAdapter {
  return new BoardAdapter({ store: new MemoryCommonsStore(), rigHandle: 'alice', mode });
}

describe('Workspace', () => {
  let workspace: Workspace;

  beforeEach(() => {
    workspace = new Workspace('alice');
  });

  it('should return the client registered for an upstream', () => {
    const client = adapter();
    workspace.add(upstream('commons-org/wl-commons'), client);

    expect(workspace.client('commons-org/wl-commons')).toBe(client);
    expect(workspace.rigHandle()).toBe('alice');
  });

  it('should throw for an unknown upstream', () => {
    expect(() => workspace.client('other-org/board')).toThrow(UpstreamNotFoundError);
    expect(() => workspace.client('other-org/board')).toThrow('no client for upstream "other-org/board"');
  });

  it('should list upstreams sorted by name', () => {
    workspace.add(upstream('zeta/board'), adapter());
    workspace.add(upstream('alpha/board', 'pr'), adapter('pr'));
    workspace.add(upstream('mid/board'), adapter());

    expect(workspace.upstreams().map(info => info.upstream)).toEqual(['alpha/board', 'mid/board', 'zeta/board']);
    expect(workspace.upstreams()[0]).toEqual({ upstream: 'alpha/board', forkOrg: 'alice', forkDb: 'board', mode: 'pr' });
  });

  it('should replace a client registered twice', () => {
    const first = adapter();
    const second = adapter('pr');
    workspace.add(upstream('commons-org/wl-commons'), first);
    workspace.add(upstream('commons-org/wl-commons', 'pr'), second);

    expect(workspace.client('commons-org/wl-commons')).toBe(second);
    expect(workspace.upstreams()).toHaveLength(1);
    expect(workspace.upstreams()[0]?.mode).toBe('pr');
  });

  it('should forget a removed upstream', () => {
    workspace.add(upstream('commons-org/wl-commons'), adapter());

    workspace.remove('commons-org/wl-commons');
    workspace.remove('never-added/board');

    expect(workspace.upstreams()).toEqual([]);
    expect(() => workspace.client('commons-org/wl-commons')).toThrow(UpstreamNotFoundError);
  });

  it('should keep its own copy of the upstream info', () => {
    const info = upstream('commons-org/wl-commons');
    workspace.add(info, adapter());
    info.mode = 'pr';

    expect(workspace.upstreams()[0]?.mode).toBe('wild-west');
  });
});
