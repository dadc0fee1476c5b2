import { z } from "zod";

/**
 * Home Assistant state object returned by /api/states
 */
export const entityStateSchema = z.object({
  entity_id: z.string().min(1),
  state: z.string(),
  attributes: z.record(z.unknown()),
  last_changed: z.string().optional(),
  last_updated: z.string().optional()
});

export type EntityAttributes = Record<string, unknown>;

export type EntityState = z.infer<typeof entityStateSchema>;

/**
 * A state record that carries a display name. Only these take part in
 * resolution and attribute reads.
 */
export type NamedEntityState = EntityState & { friendlyName: string };

/**
 * Best fuzzy match for a spoken name
 */
export interface ResolvedEntity {
  id: string;
  devName: string;
  state: string;
  score: number;
  attributes: EntityAttributes;
}

/**
 * Entity projection used in spoken responses
 */
export interface AttributeSummary {
  name: string;
  state: string;
  unitMeasure: string;
}

export type RecordParseResult =
  | { ok: true; value: NamedEntityState }
  | { ok: false; reason: string };

/**
 * Get domain from entity_id
 */
export function getDomainFromEntityId(entityId: string): string | null {
  const parts = entityId.split(".");
  return parts.length >= 2 && parts[0] ? parts[0] : null;
}

/**
 * Read an attribute, `undefined` when absent.
 */
export function getAttribute(attributes: EntityAttributes, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(attributes, key) ? attributes[key] : undefined;
}

export function getStringAttribute(attributes: EntityAttributes, key: string): string | undefined {
  const value = getAttribute(attributes, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Validate one raw catalog record. Records without a string `friendly_name`
 * are rejected.
 */
export function parseEntityRecord(raw: unknown): RecordParseResult {
  const parsed = entityStateSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join(", ");
    return { ok: false, reason };
  }

  const friendlyName = getStringAttribute(parsed.data.attributes, "friendly_name");
  if (friendlyName === undefined) {
    return { ok: false, reason: "attributes.friendly_name: Required" };
  }

  return { ok: true, value: { ...parsed.data, friendlyName } };
}

function formatUnit(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/**
 * Lights report their brightness where other entities report a unit.
 */
export function summarizeEntity(entity: NamedEntityState): AttributeSummary {
  const unitKey = getDomainFromEntityId(entity.entity_id) === "light" ? "brightness" : "unit_of_measurement";

  return {
    name: entity.friendlyName,
    state: entity.state,
    unitMeasure: formatUnit(getAttribute(entity.attributes, unitKey))
  };
}
