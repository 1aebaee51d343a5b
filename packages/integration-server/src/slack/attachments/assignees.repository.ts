import { Inject, Injectable } from '@nestjs/common';
import { DatabaseService } from '../../core/services/database.service';
import { actorIdentifier, parseActorIdentifier, type ActorRef } from './actors';

type UserRow = { id: string; display_name: string };
type TeamRow = { id: string; slug: string };

const toUser = (row: UserRow): ActorRef => ({ type: 'user', id: row.id, displayName: row.display_name });
const toTeam = (row: TeamRow): ActorRef => ({ type: 'team', id: row.id, slug: row.slug });

// Users without a name are shown by email
const USER_DISPLAY_NAME = `COALESCE(NULLIF(u.name, ''), u.email)`;

@Injectable()
export class AssigneesRepository {
  constructor(@Inject(DatabaseService) private readonly db: DatabaseService) {}

  async findProjectTeams(projectId: string): Promise<ActorRef[]> {
    const { rows } = await this.db.getPool().query<TeamRow>(
      `SELECT t.id, t.slug
         FROM team t
         JOIN project_team pt ON pt.team_id = t.id
        WHERE pt.project_id = $1
        ORDER BY t.slug`,
      [projectId],
    );
    return rows.map(toTeam);
  }

  /** Active members of any team the project belongs to. */
  async findProjectMembers(projectId: string): Promise<ActorRef[]> {
    const { rows } = await this.db.getPool().query<UserRow>(
      `SELECT DISTINCT u.id, ${USER_DISPLAY_NAME} AS display_name
         FROM auth_user u
         JOIN team_member tm ON tm.user_id = u.id
         JOIN project_team pt ON pt.team_id = tm.team_id
        WHERE pt.project_id = $1 AND u.is_active
        ORDER BY display_name`,
      [projectId],
    );
    return rows.map(toUser);
  }

  async findGroupAssignee(groupId: string): Promise<ActorRef | null> {
    const { rows } = await this.db.getPool().query<{
      user_id: string | null;
      display_name: string | null;
      team_id: string | null;
      slug: string | null;
    }>(
      `SELECT ga.user_id, ${USER_DISPLAY_NAME} AS display_name, ga.team_id, t.slug
         FROM group_assignee ga
         LEFT JOIN auth_user u ON u.id = ga.user_id
         LEFT JOIN team t ON t.id = ga.team_id
        WHERE ga.group_id = $1
        LIMIT 1`,
      [groupId],
    );
    const [row] = rows;
    if (!row) return null;
    if (row.user_id !== null && row.display_name !== null) return toUser({ id: row.user_id, display_name: row.display_name });
    if (row.team_id !== null && row.slug !== null) return toTeam({ id: row.team_id, slug: row.slug });
    return null;
  }

  /**
   * Resolves `user:<id>` / `team:<id>` identifiers. The result is keyed by
   * identifier; malformed or unknown ones are left out.
   */
  async findActors(identifiers: readonly string[]): Promise<Map<string, ActorRef>> {
    const userIds: string[] = [];
    const teamIds: string[] = [];
    for (const identifier of identifiers) {
      const parsed = parseActorIdentifier(identifier);
      if (parsed?.type === 'user') userIds.push(parsed.id);
      if (parsed?.type === 'team') teamIds.push(parsed.id);
    }

    const pool = this.db.getPool();
    const actors: ActorRef[] = [];
    if (userIds.length) {
      const { rows } = await pool.query<UserRow>(
        `SELECT u.id, ${USER_DISPLAY_NAME} AS display_name FROM auth_user u WHERE u.id = ANY($1::text[])`,
        [userIds],
      );
      actors.push(...rows.map(toUser));
    }
    if (teamIds.length) {
      const { rows } = await pool.query<TeamRow>(`SELECT t.id, t.slug FROM team t WHERE t.id = ANY($1::text[])`, [teamIds]);
      actors.push(...rows.map(toTeam));
    }
    return new Map(actors.map((actor) => [actorIdentifier(actor), actor]));
  }
}
