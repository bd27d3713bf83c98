export type UserId = number;

export type User = {
  id: UserId;
  reputation: number;
};

/** Author of events no user caused, such as scheduled or administrative resets. */
export const SYSTEM_USER_ID: UserId = 0;

export type EventSource = "system" | "user" | "admin";

export type EventMeta = {
  source: EventSource;
  requestId?: string;
  correlationId?: string;
  description?: string;
};

export type DomainEvent<TPayload = unknown> = {
  id: string;
  userId: UserId;
  type: string;
  timestamp: string;
  payload: TPayload;
  meta: EventMeta;
  tags?: string[];
};

export type EventFilter = {
  userId?: UserId;
  types?: string[];
  since?: string;
  until?: string;
  correlationId?: string;
  offset?: number;
  limit?: number;
  order?: "asc" | "desc";
};

export type Page<T> = {
  entries: T[];
  total: number;
  offset: number;
  limit: number;
};

export * from "./logger";
