import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import {
  REPUTATION_ACTION_TYPES,
  type ReputationActionType,
  type ReputationChange,
  type ReputationChangeEntry,
  type ReputationChangeTable,
  VOTE_ENTITIES,
  type VoteEntity,
} from "./types";

export const DEFAULT_REPUTATION_CONFIG_PATH = join(process.cwd(), "packages", "reputation", "config", "reputation_changes.json");

export class ReputationConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReputationConfigError";
  }
}

const changeSchema = z.tuple([z.number().int(), z.number().int()]);
const rawSchema = z.record(z.string(), z.union([changeSchema, z.record(z.string(), changeSchema)]));

const isActionType = (value: string): value is ReputationActionType =>
  REPUTATION_ACTION_TYPES.some((type) => type === value);
const isEntity = (value: string): value is VoteEntity => VOTE_ENTITIES.some((entity) => entity === value);

const toChange = ([self, target]: [number, number]): ReputationChange => ({ self, target });

/**
 * Turns the raw `{ type: [self, target] }` or `{ type: { entity: [self, target] } }` document
 * into a change table. Unknown action types or entities are configuration mistakes and fail
 * the whole load.
 */
export const convertReputationChanges = (raw: unknown): ReputationChangeTable => {
  const parsed = rawSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReputationConfigError(`Invalid reputation changes config: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }

  const table: ReputationChangeTable = {};
  for (const [type, value] of Object.entries(parsed.data)) {
    if (!isActionType(type)) {
      throw new ReputationConfigError(`Unknown action type in reputation changes config: ${type}`);
    }
    if (Array.isArray(value)) {
      table[type] = toChange(value);
      continue;
    }
    const byEntity: Partial<Record<VoteEntity, ReputationChange>> = {};
    for (const [entity, change] of Object.entries(value)) {
      if (!isEntity(entity)) {
        throw new ReputationConfigError(`Unknown entity "${entity}" for ${type} in reputation changes config`);
      }
      byEntity[entity] = toChange(change);
    }
    table[type] = byEntity satisfies ReputationChangeEntry;
  }
  return table;
};

export const loadReputationChanges = (filePath: string = DEFAULT_REPUTATION_CONFIG_PATH): ReputationChangeTable => {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReputationConfigError(`Cannot read reputation changes config ${filePath}: ${detail}`, { cause: error });
  }
  return convertReputationChanges(raw);
};
