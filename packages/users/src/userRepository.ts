import type { User, UserId } from "../../shared/src";

export class UserNotFoundError extends Error {
  readonly userId: UserId;

  constructor(userId: UserId) {
    super(`user ${userId} not found`);
    this.name = "UserNotFoundError";
    this.userId = userId;
  }
}

export interface UserLoader {
  /** Rejects with `UserNotFoundError` when no such user exists. */
  loadById(id: UserId): Promise<User>;
}

export interface UserRepository extends UserLoader {
  addReputation(id: UserId, delta: number): Promise<User>;
}

export class InMemoryUserRepository implements UserRepository {
  private users: Map<UserId, User>;

  constructor(initialUsers?: User[]) {
    this.users = new Map((initialUsers ?? []).map((user) => [user.id, { ...user }]));
  }

  save(user: User): void {
    this.users.set(user.id, { ...user });
  }

  async loadById(id: UserId): Promise<User> {
    const user = this.users.get(id);
    if (!user) throw new UserNotFoundError(id);
    return { ...user };
  }

  async addReputation(id: UserId, delta: number): Promise<User> {
    const user = this.users.get(id);
    if (!user) throw new UserNotFoundError(id);
    user.reputation += delta;
    return { ...user };
  }
}
