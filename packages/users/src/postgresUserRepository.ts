import type { Pool } from "pg";
import type { User, UserId } from "../../shared/src";
import { UserNotFoundError, type UserRepository } from "./userRepository";

type PgDeps = {
  pool: Pool;
};

type UserRow = {
  id: string | number;
  reputation: number;
};

const rowToUser = (row: UserRow): User => ({ id: Number(row.id), reputation: row.reputation });

export class PostgresUserRepository implements UserRepository {
  private pool: Pool;
  constructor({ pool }: PgDeps) {
    this.pool = pool;
  }

  async loadById(id: UserId): Promise<User> {
    const res = await this.pool.query<UserRow>(`SELECT id, reputation FROM users WHERE id = $1`, [id]);
    const row = res.rows[0];
    if (!row) throw new UserNotFoundError(id);
    return rowToUser(row);
  }

  async addReputation(id: UserId, delta: number): Promise<User> {
    const res = await this.pool.query<UserRow>(
      `UPDATE users SET reputation = reputation + $2 WHERE id = $1 RETURNING id, reputation`,
      [id, delta]
    );
    const row = res.rows[0];
    if (!row) throw new UserNotFoundError(id);
    return rowToUser(row);
  }
}
