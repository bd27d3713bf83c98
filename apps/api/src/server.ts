import fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "crypto";
import Redis from "ioredis";
import { Pool } from "pg";
import { z, ZodError } from "zod";
import { ActivityLog, AuditLogger } from "../../../packages/audit/src";
import { type EventStore, InMemoryEventStore, PostgresEventStore } from "../../../packages/event-store/src";
import {
  MAX_LIMIT,
  QuotaAuthority,
  isActionKind,
  isPermissionsError,
  type ActionKind,
} from "../../../packages/permissions/src";
import {
  ReputationService,
  getVoteDirection,
  getVoteType,
  loadReputationChanges,
  voteEntity,
  type ReputationActionType,
} from "../../../packages/reputation/src";
import { SYSTEM_USER_ID, type UserId } from "../../../packages/shared/src";
import {
  InMemoryUserRepository,
  PostgresUserRepository,
  UserNotFoundError,
  type UserRepository,
} from "../../../packages/users/src";
import { type AppConfigOverrides, loadConfig, splitCsv, toBool } from "./config";
import { InMemoryRateLimiter, type RateLimiter, RedisRateLimiter } from "./rateLimit";

const version = process.env.APP_VERSION ?? "0.1.0";

type Role = "service" | "admin";

type RequestContext = {
  caller: string;
  roles: Role[];
};

declare module "fastify" {
  interface FastifyRequest {
    ctx: RequestContext | null;
  }
  interface FastifyInstance {
    quotas: QuotaAuthority;
  }
}

const userParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const actionParamsSchema = userParamsSchema.extend({
  action: z.string().min(1),
});

const actionBodySchema = z
  .object({
    entity: z.string().min(1).optional(),
    entityId: z.number().int().positive().optional(),
    targetUserId: z.number().int().positive().optional(),
    data: z.record(z.unknown()).optional(),
  })
  .default({});

const pageQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().positive().default(10),
});

const voteValueSchema = z.number().int().min(-1).max(1);

const voteBodySchema = z.object({
  userId: z.number().int().positive(),
  commentId: z.number().int().positive(),
  commentAuthorId: z.number().int().positive(),
  sourceId: z.number().int().positive().nullable().optional(),
  previousValue: voteValueSchema.nullable().default(null),
  value: voteValueSchema,
});

export type ServerDeps = {
  users?: UserRepository;
  eventStore?: EventStore;
  quotaAuthority?: QuotaAuthority;
  reputation?: ReputationService;
  rateLimiter?: RateLimiter | null;
  envOverrides?: AppConfigOverrides;
};

const PUBLIC_ROUTES = new Set(["/health"]);

export const buildServer = (deps: ServerDeps = {}): FastifyInstance => {
  const env = loadConfig(deps.envOverrides);
  const pool = env.DATABASE_URL && (!deps.users || !deps.eventStore) ? new Pool({ connectionString: env.DATABASE_URL }) : null;
  const users: UserRepository = deps.users ?? (pool ? new PostgresUserRepository({ pool }) : new InMemoryUserRepository());
  const eventStore: EventStore = deps.eventStore ?? (pool ? new PostgresEventStore({ pool }) : new InMemoryEventStore());
  const audit = new AuditLogger(eventStore);
  const activity = new ActivityLog(eventStore);
  const reputation =
    deps.reputation ?? new ReputationService({ users, eventStore, table: loadReputationChanges(env.REPUTATION_CONFIG_PATH) });

  const redisClient = deps.rateLimiter === undefined && env.REDIS_URL ? new Redis(env.REDIS_URL) : null;
  const rateLimiter: RateLimiter | null =
    deps.rateLimiter !== undefined
      ? deps.rateLimiter
      : redisClient
        ? new RedisRateLimiter(redisClient, env.RATE_LIMIT, env.RATE_WINDOW_MS)
        : new InMemoryRateLimiter(env.RATE_LIMIT, env.RATE_WINDOW_MS);

  const serviceTokens = new Set(splitCsv(env.API_TOKENS));
  const adminTokens = new Set(splitCsv(env.API_ADMIN_TOKENS));
  const authBypass = toBool(env.API_AUTH_BYPASS);

  const app = fastify({
    logger: { level: env.LOG_LEVEL },
    disableRequestLogging: false,
    genReqId: () => randomUUID(),
  });

  const quotas = deps.quotaAuthority ?? new QuotaAuthority({ users, logger: app.log });
  app.decorate("quotas", quotas);
  app.decorateRequest("ctx", null);

  app.register(cors, {
    origin: env.ALLOWED_ORIGINS === "*" ? true : splitCsv(env.ALLOWED_ORIGINS),
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Authorization"],
    maxAge: 86400,
  });

  app.addHook("onClose", async () => {
    await Promise.all([pool?.end(), redisClient?.quit()]);
  });

  const sendError = (
    request: FastifyRequest,
    reply: FastifyReply,
    statusCode: number,
    code: string,
    message: string,
    details?: unknown
  ) => {
    const error: { code: string; message: string; requestId: string; details?: unknown } = {
      code,
      message,
      requestId: request.id,
    };
    if (details !== undefined) error.details = details;
    return reply.status(statusCode).send({ error });
  };

  const ensureRole = (request: FastifyRequest, reply: FastifyReply, role: Role) => {
    if (!request.ctx) return sendError(request, reply, 401, "unauthorized", "Missing auth context");
    if (!request.ctx.roles.includes(role)) {
      return sendError(request, reply, 403, "forbidden", "Insufficient role");
    }
    return null;
  };

  const deny = async (request: FastifyRequest, reply: FastifyReply, userId: UserId, action: string, reason: string) => {
    await audit.record({
      userId,
      action: `quota:${action}`,
      target: `user:${userId}`,
      status: "denied",
      reason,
      requestId: request.id,
      tags: ["permission"],
    });
    return sendError(request, reply, 403, "forbidden", reason);
  };

  app.addHook("onRequest", async (request, reply) => {
    reply.header("X-Request-ID", request.id);
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");

    const routeUrl = request.routeOptions?.url ?? request.url.split("?")[0];
    if (rateLimiter) {
      const res = await rateLimiter.hit(`rl:${request.ip}:${routeUrl}`).catch((err: unknown) => {
        request.log.warn({ err }, "rate limiter unavailable, letting request through");
        return { allowed: true, retryAfter: undefined };
      });
      if (!res.allowed) {
        reply.header("Retry-After", res.retryAfter ?? Math.ceil(env.RATE_WINDOW_MS / 1000));
        return sendError(request, reply, 429, "rate_limited", "Too many requests");
      }
    }

    if (PUBLIC_ROUTES.has(routeUrl)) return;
    if (authBypass) {
      request.ctx = { caller: "dev", roles: ["service", "admin"] };
      return;
    }
    const auth = request.headers.authorization;
    if (!auth || !auth.startsWith("Bearer ")) {
      return sendError(request, reply, 401, "unauthorized", "Missing bearer token");
    }
    const token = auth.slice("Bearer ".length).trim();
    const roles: Role[] = [];
    if (serviceTokens.has(token) || adminTokens.has(token)) roles.push("service");
    if (adminTokens.has(token)) roles.push("admin");
    if (roles.length === 0) {
      return sendError(request, reply, 401, "unauthorized", "Invalid token");
    }
    request.ctx = { caller: `token:${token.slice(0, 4)}`, roles };
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return sendError(request, reply, 400, "invalid_request", "Invalid request", error.issues);
    }
    if (error instanceof UserNotFoundError) {
      return sendError(request, reply, 404, "user_not_found", error.message);
    }
    if (isPermissionsError(error)) {
      return sendError(request, reply, 403, "forbidden", error.message);
    }
    const status = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    request.log.error({ err: error, requestId: request.id }, "request failed");
    return sendError(
      request,
      reply,
      status,
      error.code ?? "internal_error",
      status === 500 ? "Internal server error" : error.message
    );
  });

  app.setNotFoundHandler((request, reply) => {
    return sendError(request, reply, 404, "not_found", "Route not found");
  });

  app.get("/health", async (request, reply) => {
    return reply.send({
      status: "ok",
      uptime: process.uptime(),
      version,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/permissions/limitations", async (request, reply) => {
    return reply.send({
      confirmedUserThreshold: quotas.policy.confirmedUserThreshold,
      maxLimit: MAX_LIMIT,
      limitations: quotas.policy.limitations(),
      minReputations: quotas.policy.minReputations(),
    });
  });

  app.get("/users/:id/permissions/:action", async (request, reply) => {
    const { id, action } = actionParamsSchema.parse(request.params);
    const user = await users.loadById(id);
    const verdict = await quotas.check(user, action);
    const known = isActionKind(action);
    return reply.send({
      userId: user.id,
      action,
      allowed: verdict.ok,
      reason: verdict.ok ? undefined : verdict.reason,
      occurrences: quotas.occurrences(user, action),
      limit: known ? quotas.policy.limit(user, action) : null,
      remaining: await quotas.remaining(user, action),
    });
  });

  app.get("/users/:id/usage", async (request, reply) => {
    const { id } = userParamsSchema.parse(request.params);
    const user = await users.loadById(id);
    return reply.send({ userId: user.id, reputation: user.reputation, usage: quotas.usage(user.id) });
  });

  app.post("/users/:id/actions/:action", async (request, reply) => {
    const { id, action } = actionParamsSchema.parse(request.params);
    const body = actionBodySchema.parse(request.body ?? undefined);
    const result = await quotas.checkAndExecute(id, action, (user) =>
      activity.record({ userId: user.id, action, ...body, requestId: request.id })
    );
    if (result.ok) {
      return reply.status(201).send({ event: result.value, remaining: await quotas.remaining(id, action) });
    }
    if (result.error === "effect_failed") throw result.cause;
    return deny(request, reply, id, action, result.reason);
  });

  app.get("/users/:id/actions", async (request, reply) => {
    const { id } = userParamsSchema.parse(request.params);
    const page = pageQuerySchema.parse(request.query);
    await users.loadById(id);
    return reply.send(await activity.list(id, page));
  });

  app.post("/votes", async (request, reply) => {
    const vote = voteBodySchema.parse(request.body);
    const comment = { sourceId: vote.sourceId };
    const voteType = getVoteType(comment, vote.previousValue, vote.value);
    if (!voteType) {
      return reply.send({ voteType: null, changes: { self: 0, target: 0 } });
    }

    const direction = getVoteDirection(vote.previousValue, vote.value);
    const action: ActionKind = direction === "up" || direction === "down_to_up" ? "vote_up" : "vote_down";
    const reputationType: ReputationActionType = `vote_${direction}`;
    const entity = voteEntity(comment);

    try {
      const outcome = await quotas.lock(vote.userId, action, async (user) => {
        const applied = await reputation.apply({
          actorId: user.id,
          targetId: vote.commentAuthorId,
          type: reputationType,
          entity,
          requestId: request.id,
        });
        await activity.record({
          userId: user.id,
          action,
          entity: "comment",
          entityId: vote.commentId,
          targetUserId: vote.commentAuthorId,
          changes: applied.changes,
          data: { voteType, value: vote.value },
          requestId: request.id,
        });
        return applied;
      });
      return reply.send({ voteType, changes: outcome.changes });
    } catch (err) {
      if (isPermissionsError(err)) return deny(request, reply, vote.userId, action, err.message);
      throw err;
    }
  });

  app.get("/reputation/changes", async (request, reply) => {
    return reply.send({ changes: reputation.getTable() });
  });

  app.post("/permissions/reset", async (request, reply) => {
    const guard = ensureRole(request, reply, "admin");
    if (guard) return guard;
    await quotas.reset();
    await audit.record({
      userId: SYSTEM_USER_ID,
      action: "quota:reset",
      target: "quotas",
      status: "success",
      source: "admin",
      requestId: request.id,
      data: { caller: request.ctx?.caller },
    });
    return reply.send({ reset: true, timestamp: new Date().toISOString() });
  });

  return app;
};
