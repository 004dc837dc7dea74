import {
  isGovernanceEventType,
  isSha256Hex,
  type RegisterProductInput,
  type TrackingEventInput,
  type ValidationIssue,
} from "@provenance/shared";

export const LIMITS = {
  productId: 64,
  name: 128,
  origin: 256,
  description: 2048,
  category: 64,
  tag: 64,
  tags: 20,
  certifications: 50,
  mediaHashes: 50,
  customFields: 20,
  customValue: 512,
  identity: 128,
  location: 256,
  note: 512,
  eventTypeLabel: 128,
} as const;

const EVENT_TYPE_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;

function requireText(
  issues: ValidationIssue[],
  field: string,
  value: string,
  maxLength: number,
  index?: number,
): void {
  if (value.trim().length === 0) {
    issues.push({ index, field, message: "must not be empty" });
  } else if (value.length > maxLength) {
    issues.push({ index, field, message: `must be at most ${maxLength} characters` });
  }
}

function limitText(
  issues: ValidationIssue[],
  field: string,
  value: string,
  maxLength: number,
  index?: number,
): void {
  if (value.length > maxLength) {
    issues.push({ index, field, message: `must be at most ${maxLength} characters` });
  }
}

function checkDigests(issues: ValidationIssue[], field: string, values: string[], max: number): void {
  if (values.length > max) {
    issues.push({ field, message: `at most ${max} entries allowed` });
  }
  values.forEach((value, i) => {
    if (!isSha256Hex(value)) {
      issues.push({ field: `${field}[${i}]`, message: "must be a lowercase sha256 hex digest" });
    }
  });
}

export function validateIdentity(value: string, field: string): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  requireText(issues, field, value, LIMITS.identity);
  return issues;
}

export function validateRegistration(input: RegisterProductInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  requireText(issues, "id", input.id, LIMITS.productId);
  requireText(issues, "name", input.name, LIMITS.name);
  requireText(issues, "origin", input.origin, LIMITS.origin);
  requireText(issues, "owner", input.owner, LIMITS.identity);
  limitText(issues, "description", input.description ?? "", LIMITS.description);
  limitText(issues, "category", input.category ?? "", LIMITS.category);

  const tags = input.tags ?? [];
  if (tags.length > LIMITS.tags) {
    issues.push({ field: "tags", message: `at most ${LIMITS.tags} entries allowed` });
  }
  tags.forEach((tag, i) => requireText(issues, `tags[${i}]`, tag, LIMITS.tag));

  checkDigests(issues, "certifications", input.certifications ?? [], LIMITS.certifications);
  checkDigests(issues, "mediaHashes", input.mediaHashes ?? [], LIMITS.mediaHashes);

  const custom = Object.entries(input.custom ?? {});
  if (custom.length > LIMITS.customFields) {
    issues.push({ field: "custom", message: `at most ${LIMITS.customFields} entries allowed` });
  }
  for (const [key, value] of custom) {
    limitText(issues, `custom.${key}`, value, LIMITS.customValue);
  }
  return issues;
}

export function isValidEventType(value: string): boolean {
  return EVENT_TYPE_PATTERN.test(value);
}

/**
 * Structural checks for a caller-supplied event. Reserved governance types
 * are refused: only the ledger writes those.
 */
export function validateEventInput(
  input: TrackingEventInput,
  maxMetadataBytes: number,
  index?: number,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  if (!isValidEventType(input.eventType)) {
    issues.push({ index, field: "eventType", message: "must match [A-Za-z0-9_-]{1,32}" });
  } else if (isGovernanceEventType(input.eventType)) {
    issues.push({ index, field: "eventType", message: `'${input.eventType}' is reserved` });
  }
  limitText(issues, "location", input.location, LIMITS.location, index);
  limitText(issues, "note", input.note ?? "", LIMITS.note, index);

  const metadataBytes = Buffer.byteLength(input.metadata ?? "", "utf8");
  if (metadataBytes > maxMetadataBytes) {
    issues.push({ index, field: "metadata", message: `must be at most ${maxMetadataBytes} bytes` });
  }
  if (input.dataHash !== undefined && !isSha256Hex(input.dataHash)) {
    issues.push({ index, field: "dataHash", message: "must be a lowercase sha256 hex digest" });
  }
  return issues;
}
