import { InMemoryEventStore } from "../../../packages/event-store/src";
import { InMemoryUserRepository } from "../../../packages/users/src";
import type { AppConfigOverrides } from "./config";
import { buildServer, type ServerDeps } from "./server";

export const seedUsers = () => [
  { id: 1, reputation: 42 },
  { id: 2, reputation: -42 },
  { id: 3, reputation: 100 },
  { id: 4, reputation: 20 },
];

export const setupServer = (envOverrides: AppConfigOverrides = {}, deps: ServerDeps = {}) => {
  const users = new InMemoryUserRepository(seedUsers());
  const store = new InMemoryEventStore();
  const server = buildServer({
    users,
    eventStore: store,
    rateLimiter: null,
    ...deps,
    envOverrides: { API_AUTH_BYPASS: "true", ...envOverrides },
  });
  return { users, store, server };
};
