import { NOT_AVAILABLE } from "../types.js";
import type { HostRecord } from "../types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function field(value: unknown): string {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return NOT_AVAILABLE;
}

/**
 * Shodan sends `vulns` as an object keyed by CVE id; older payloads and
 * other indexes send a plain list.
 */
function vulnerabilityList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  if (isRecord(value)) {
    return Object.keys(value);
  }
  return [];
}

/**
 * Normalize one raw search match into a HostRecord. Missing or malformed
 * fields become the "N/A" sentinel; a match that is not an object at all
 * yields an all-sentinel record.
 */
export function normalizeHostRecord(raw: unknown): HostRecord {
  const match = isRecord(raw) ? raw : {};
  const location = isRecord(match.location) ? match.location : {};

  return {
    address: field(match.ip_str),
    port: field(match.port),
    organization: field(match.org),
    location: `${field(location.country_name)}, ${field(location.city)}`,
    timestamp: field(match.timestamp),
    product: field(match.product),
    version: field(match.version),
    vulnerabilities: vulnerabilityList(match.vulns),
  };
}
