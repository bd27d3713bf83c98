export * from "./userRepository";
export { PostgresUserRepository } from "./postgresUserRepository";
