export * from "./eventStore";
export { PostgresEventStore } from "./postgresEventStore";
