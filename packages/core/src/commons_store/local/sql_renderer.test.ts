import {
  commitSql,
  decodeRows,
  fromSqlTimestamp,
  parseJsonRows,
  renderBranchList,
  renderScript,
  renderSelect,
  renderStatement,
  toSqlTimestamp,
} from './sql_renderer';
import type { Statement } from '../commons_store.types';

const CLAIM: Statement = {
  op: 'update',
  table: 'wanted',
  set: { status: 'claimed', claimedBy: 'bob', updatedAt: '2026-03-01T10:00:00.000Z' },
  where: { match: { id: 'w-1', status: 'open' } },
  required: true,
};

describe('sql_renderer', () => {
  describe('timestamps', () => {
    it('should convert between ISO-8601 and SQL datetimes', () => {
      expect(toSqlTimestamp('2026-03-01T10:00:00.000Z')).toBe('2026-03-01 10:00:00');
      expect(fromSqlTimestamp('2026-03-01 10:00:00')).toBe('2026-03-01T10:00:00.000Z');
    });
  });

  describe('renderSelect', () => {
    it('should render filters, search, order and limit against a ref', () => {
      const sql = renderSelect({
        table: 'wanted',
        where: { match: { status: 'open', postedBy: "o'neil" } },
        search: { field: 'title', term: '50%_Done' },
        orderBy: [{ field: 'priority', direction: 'asc' }, { field: 'createdAt', direction: 'desc' }],
        limit: 10,
      }, 'wl/bob/w-1');

      expect(sql).toBe(
        String.raw`SELECT * FROM wanted AS OF 'wl/bob/w-1' WHERE status = 'open' AND posted_by = 'o''neil' AND LOWER(title) LIKE '%50\\%\\_done%' ORDER BY priority ASC, created_at DESC LIMIT 10`
      );
    });

    it('should read main without AS OF', () => {
      expect(renderSelect({ table: 'stamps' }, 'main')).toBe('SELECT * FROM stamps WHERE 1 = 1');
    });

    it('should render alternatives and null matches', () => {
      expect(renderSelect({
        table: 'wanted',
        where: { match: { claimedBy: null }, anyOf: [{ postedBy: 'bob' }, { status: 'open' }] },
      })).toBe("SELECT * FROM wanted WHERE claimed_by IS NULL AND ((posted_by = 'bob') OR (status = 'open'))");
    });

    it('should read stamp scores from the valence column', () => {
      expect(renderSelect({ table: 'stamps', where: { match: { quality: 5 } } })).toBe(
        "SELECT * FROM stamps WHERE JSON_EXTRACT(valence, '$.quality') = 5"
      );
    });
  });

  describe('renderStatement', () => {
    it('should follow a required statement with its row-count check', () => {
      expect(renderStatement(CLAIM, 0)).toEqual([
        "UPDATE wanted SET status = 'claimed', claimed_by = 'bob', updated_at = '2026-03-01 10:00:00' WHERE id = 'w-1' AND status = 'open';",
        'INSERT INTO wl_required (statement_index, changed) VALUES (0, ROW_COUNT());',
      ]);
    });

    it('should render a when guard as a derived-table existence check', () => {
      const statement: Statement = {
        op: 'update',
        table: 'completions',
        set: { stampId: 's-1', validatedBy: 'alice' },
        where: { match: { wantedId: 'w-1' } },
        when: [{ table: 'wanted', filter: { match: { id: 'w-1', status: 'completed' } } }],
      };

      expect(renderStatement(statement, 2)).toEqual([
        "UPDATE completions SET stamp_id = 's-1', validated_by = 'alice' WHERE wanted_id = 'w-1' AND " +
        "EXISTS (SELECT 1 FROM (SELECT id FROM wanted WHERE id = 'w-1' AND status = 'completed') AS g2_0);",
      ]);
    });

    it('should store stamp scores as valence JSON', () => {
      const statement: Statement = {
        op: 'insert',
        table: 'stamps',
        row: {
          id: 's-1',
          author: 'alice',
          subject: 'bob',
          quality: 4,
          reliability: 3,
          severity: 'leaf',
          contextId: 'c-1',
          contextType: 'completion',
          skillTags: ['go'],
          message: '',
          createdAt: '2026-03-01T10:00:00.000Z',
        },
      };

      expect(renderStatement(statement, 1)).toEqual([
        'INSERT INTO stamps (id, author, subject, severity, context_id, context_type, skill_tags, message, created_at, valence) ' +
        `VALUES ('s-1', 'alice', 'bob', 'leaf', 'c-1', 'completion', '["go"]', '', '2026-03-01 10:00:00', '{"quality":4,"reliability":3}');`,
      ]);
    });

    it('should select a guarded insert from DUAL', () => {
      const statement: Statement = {
        op: 'insert',
        table: 'completions',
        row: {
          id: 'c-1',
          wantedId: 'w-1',
          completedBy: 'bob',
          evidence: 'https://example.test/pr/1',
          stampId: null,
          validatedBy: null,
          completedAt: '2026-03-01T10:00:00.000Z',
        },
        unless: [{ table: 'completions', filter: { match: { wantedId: 'w-1' } } }],
        onConflict: 'ignore',
      };

      expect(renderStatement(statement, 0)).toEqual([
        'INSERT IGNORE INTO completions (id, wanted_id, completed_by, evidence, stamp_id, validated_by, completed_at) ' +
        "SELECT 'c-1', 'w-1', 'bob', 'https://example.test/pr/1', NULL, NULL, '2026-03-01 10:00:00' FROM DUAL " +
        "WHERE NOT EXISTS (SELECT 1 FROM (SELECT id FROM completions WHERE wanted_id = 'w-1') AS u0_0);",
      ]);
    });

    it('should update stamp scores inside the valence document', () => {
      expect(renderStatement({ op: 'update', table: 'stamps', set: { quality: 5 }, where: { match: { id: 's-1' } } }, 0)).toEqual([
        "UPDATE stamps SET valence = JSON_SET(valence, '$.quality', 5) WHERE id = 's-1';",
      ]);
    });

    it('should render deletes', () => {
      expect(renderStatement({ op: 'delete', table: 'completions', where: { match: { wantedId: 'w-1' } } }, 3)).toEqual([
        "DELETE FROM completions WHERE wanted_id = 'w-1';",
      ]);
    });

    it('should reject a field the table does not have', () => {
      const statement: Statement = { op: 'delete', table: 'wanted', where: { match: { id: 'w-1' } } };
      const unknownField = { ...statement, where: { match: { id: 'w-1', bogus: 'x' } } };

      expect(() => renderStatement(unknownField, 0)).toThrow('unknown field "bogus" on table wanted');
    });
  });

  describe('renderScript', () => {
    it('should create the guard table, stage everything and sign the commit', () => {
      expect(renderScript('wl claim: w-1', true, [CLAIM])).toBe([
        'CREATE TEMPORARY TABLE wl_required (statement_index INT, changed INT, CONSTRAINT wl_required_changed CHECK (changed > 0));',
        "UPDATE wanted SET status = 'claimed', claimed_by = 'bob', updated_at = '2026-03-01 10:00:00' WHERE id = 'w-1' AND status = 'open';",
        'INSERT INTO wl_required (statement_index, changed) VALUES (0, ROW_COUNT());',
        "CALL DOLT_ADD('-A');",
        "CALL DOLT_COMMIT('-S', '-m', 'wl claim: w-1');",
        '',
      ].join('\n'));
    });

    it('should omit the guard table when nothing is required', () => {
      const script = renderScript('wl discard: w-1', false, [
        { op: 'delete', table: 'wanted', where: { match: { id: 'w-1' } } },
      ]);

      expect(script).toBe("DELETE FROM wanted WHERE id = 'w-1';\nCALL DOLT_ADD('-A');\nCALL DOLT_COMMIT('-m', 'wl discard: w-1');\n");
    });

    it('should quote the commit message', () => {
      expect(commitSql("wl reject: w-1 — it's wrong", false)).toBe("CALL DOLT_COMMIT('-m', 'wl reject: w-1 — it''s wrong');");
    });
  });

  describe('renderBranchList', () => {
    it('should match the prefix literally', () => {
      expect(renderBranchList('wl/bob_1/')).toBe(
        String.raw`SELECT name FROM dolt_branches WHERE name LIKE 'wl/bob\\_1/%' ORDER BY name`
      );
    });
  });

  describe('parseJsonRows', () => {
    it('should read the rows array and skip non-objects', () => {
      expect(parseJsonRows('{"rows":[{"id":"w-1"},3]}\n')).toEqual([{ id: 'w-1' }]);
    });

    it('should treat empty output as no rows', () => {
      expect(parseJsonRows('')).toEqual([]);
      expect(parseJsonRows('{}')).toEqual([]);
    });

    it('should reject output that is not an object', () => {
      expect(() => parseJsonRows('[1]')).toThrow('unexpected dolt json output');
    });
  });

  describe('decodeRows', () => {
    it('should decode wanted rows', () => {
      const [item] = decodeRows('wanted', [{
        id: 'w-1',
        title: 'Fix the flaky sync test',
        description: null,
        project: 'gastown',
        type: 'bug',
        priority: '1',
        tags: '["ci","sync"]',
        posted_by: 'alice',
        claimed_by: null,
        status: 'claimed',
        effort_level: 'small',
        created_at: '2026-01-10 09:00:00',
        updated_at: '2026-01-11 09:30:00',
      }]);

      expect(item).toEqual({
        id: 'w-1',
        title: 'Fix the flaky sync test',
        description: '',
        project: 'gastown',
        type: 'bug',
        priority: 1,
        tags: ['ci', 'sync'],
        postedBy: 'alice',
        claimedBy: null,
        status: 'claimed',
        effortLevel: 'small',
        createdAt: '2026-01-10T09:00:00.000Z',
        updatedAt: '2026-01-11T09:30:00.000Z',
      });
    });

    it('should fall back to defaults for unknown enum values', () => {
      const [item] = decodeRows('wanted', [{ id: 'w-2', status: 'bogus', effort_level: null, type: 'chore' }]);

      expect(item?.status).toBe('open');
      expect(item?.effortLevel).toBe('medium');
      expect(item?.type).toBe('');
      expect(item?.priority).toBe(2);
    });

    it('should read stamp scores from valence', () => {
      const [stamp] = decodeRows('stamps', [{
        id: 's-1',
        author: 'alice',
        subject: 'bob',
        valence: '{"quality":4}',
        severity: null,
        context_id: 'c-1',
        context_type: 'completion',
        skill_tags: null,
        message: 'solid',
        created_at: '2026-03-01 10:00:00',
      }]);

      expect(stamp).toEqual({
        id: 's-1',
        author: 'alice',
        subject: 'bob',
        quality: 4,
        reliability: 4,
        severity: 'leaf',
        contextId: 'c-1',
        contextType: 'completion',
        skillTags: [],
        message: 'solid',
        createdAt: '2026-03-01T10:00:00.000Z',
      });
    });
  });
});
