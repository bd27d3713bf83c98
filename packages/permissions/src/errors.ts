export type QuotaErrorCode = "unknown_action" | "insufficient_reputation" | "limit_reached";

export const QUOTA_ERROR_MESSAGES: Record<QuotaErrorCode, string> = {
  unknown_action: "unknown action",
  insufficient_reputation: "not enough reputation",
  limit_reached: "limit reached",
};

/**
 * Raised when a user is not allowed to perform an action. Request handlers turn it into a
 * single "forbidden" response carrying `message` as the reason.
 */
export class PermissionsError extends Error {
  readonly code: QuotaErrorCode;

  constructor(code: QuotaErrorCode) {
    super(QUOTA_ERROR_MESSAGES[code]);
    this.name = "PermissionsError";
    this.code = code;
  }
}

export const isPermissionsError = (err: unknown): err is PermissionsError => err instanceof PermissionsError;
