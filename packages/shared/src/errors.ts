export type LedgerErrorCode =
  | "not_found"
  | "duplicate_id"
  | "unauthenticated"
  | "unauthorized"
  | "invalid_input"
  | "invalid_batch"
  | "batch_too_large"
  | "product_inactive"
  | "conflict";

export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  not_found: 404,
  duplicate_id: 409,
  unauthenticated: 401,
  unauthorized: 403,
  invalid_input: 400,
  invalid_batch: 400,
  batch_too_large: 413,
  product_inactive: 409,
  conflict: 409,
};

export interface ValidationIssue {
  index?: number;
  field: string;
  message: string;
}

/**
 * Terminal failure of a ledger operation. Whatever the operation wrote before
 * raising it is rolled back with the surrounding transaction.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly issues: ValidationIssue[];

  constructor(code: LedgerErrorCode, message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.issues = issues;
  }

  get statusCode(): number {
    return LEDGER_ERROR_STATUS[this.code];
  }
}

export function isLedgerErrorCode(value: unknown): value is LedgerErrorCode {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(LEDGER_ERROR_STATUS, value);
}
