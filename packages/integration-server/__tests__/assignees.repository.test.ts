import { beforeEach, describe, expect, it, vi } from 'vitest';

const pg = vi.hoisted(() => ({
  queries: [] as Array<{ sql: string; params?: unknown[] }>,
  results: [] as unknown[][],
}));

vi.mock('pg', () => {
  class Pool {
    on() {
      return this;
    }
    async query(sql: string, params?: unknown[]) {
      pg.queries.push({ sql, params });
      return { rows: pg.results.shift() ?? [] };
    }
    async end() {}
  }
  return { Pool };
});

import { DatabaseService } from '../src/core/services/database.service';
import { formatActorOption, parseActorIdentifier } from '../src/slack/attachments/actors';
import { AssigneesRepository } from '../src/slack/attachments/assignees.repository';
import { createTestConfig } from './helpers/config';

const createRepository = () => new AssigneesRepository(new DatabaseService(createTestConfig()));

describe('actors', () => {
  it('parses user and team identifiers', () => {
    expect(parseActorIdentifier('user:5')).toEqual({ type: 'user', id: '5' });
    expect(parseActorIdentifier('team:3')).toEqual({ type: 'team', id: '3' });
    expect(parseActorIdentifier('org:1')).toBeNull();
    expect(parseActorIdentifier('user:')).toBeNull();
  });

  it('formats picker options', () => {
    expect(formatActorOption({ type: 'team', id: '3', slug: 'ops' })).toEqual({ text: '#ops', value: 'team:3' });
    expect(formatActorOption({ type: 'user', id: '5', displayName: 'Jane Doe' })).toEqual({
      text: 'Jane Doe',
      value: 'user:5',
    });
  });
});

describe('AssigneesRepository', () => {
  beforeEach(() => {
    pg.queries.length = 0;
    pg.results.length = 0;
  });

  it('maps project teams and members', async () => {
    const repository = createRepository();
    pg.results.push([{ id: '3', slug: 'ops' }], [{ id: '5', display_name: 'Jane Doe' }]);

    await expect(repository.findProjectTeams('7')).resolves.toEqual([{ type: 'team', id: '3', slug: 'ops' }]);
    await expect(repository.findProjectMembers('7')).resolves.toEqual([{ type: 'user', id: '5', displayName: 'Jane Doe' }]);
    expect(pg.queries.map((q) => q.params)).toEqual([['7'], ['7']]);
  });

  it('reads the current assignee as a user or a team', async () => {
    const repository = createRepository();
    pg.results.push(
      [{ user_id: '5', display_name: 'Jane Doe', team_id: null, slug: null }],
      [{ user_id: null, display_name: null, team_id: '3', slug: 'ops' }],
      [],
    );

    await expect(repository.findGroupAssignee('42')).resolves.toEqual({ type: 'user', id: '5', displayName: 'Jane Doe' });
    await expect(repository.findGroupAssignee('42')).resolves.toEqual({ type: 'team', id: '3', slug: 'ops' });
    await expect(repository.findGroupAssignee('43')).resolves.toBeNull();
  });

  it('resolves identifiers by type and leaves unknown ones out', async () => {
    const repository = createRepository();
    pg.results.push([{ id: '5', display_name: 'Jane Doe' }], [{ id: '3', slug: 'ops' }]);

    const actors = await repository.findActors(['user:5', 'user:404', 'team:3', 'bogus']);

    expect(pg.queries.map((q) => q.params)).toEqual([[['5', '404']], [['3']]]);
    expect([...actors]).toEqual([
      ['user:5', { type: 'user', id: '5', displayName: 'Jane Doe' }],
      ['team:3', { type: 'team', id: '3', slug: 'ops' }],
    ]);
  });

  it('does not query for an empty list', async () => {
    await expect(createRepository().findActors([])).resolves.toEqual(new Map());
    expect(pg.queries).toHaveLength(0);
  });
});
