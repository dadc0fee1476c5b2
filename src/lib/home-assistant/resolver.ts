import type { Logger } from "pino";

import { logger as rootLogger } from "@/lib/logging";
import { tokenSortRatio } from "@/lib/string";
import {
  getDomainFromEntityId,
  parseEntityRecord,
  type NamedEntityState,
  type ResolvedEntity
} from "./entities";

/**
 * A match has to score above this to be accepted.
 */
export const MIN_MATCH_SCORE = 50;

function toResolvedEntity(entity: NamedEntityState, score: number): ResolvedEntity {
  return {
    id: entity.entity_id,
    devName: entity.friendlyName,
    state: entity.state,
    score,
    attributes: entity.attributes
  };
}

/**
 * Fuzzy-match a spoken name against a state catalog.
 *
 * Each entity in an allowed domain is scored twice, on its friendly name and
 * on its raw entity id. A score must beat the best so far (starting at
 * {@link MIN_MATCH_SCORE}) to replace it, so the first entity to reach a score
 * keeps it. Records that fail validation are skipped.
 */
export function resolveEntity(
  records: readonly unknown[],
  utterance: string,
  allowedDomains: Iterable<string>,
  log: Logger = rootLogger
): ResolvedEntity | null {
  const domains = new Set(allowedDomains);
  if (domains.size === 0) return null;

  const spoken = utterance.toLowerCase();
  let bestScore = MIN_MATCH_SCORE;
  let best: ResolvedEntity | null = null;

  for (const raw of records) {
    const parsed = parseEntityRecord(raw);
    if (!parsed.ok) {
      log.debug({ reason: parsed.reason }, "Skipping malformed state record");
      continue;
    }

    const entity = parsed.value;
    const domain = getDomainFromEntityId(entity.entity_id) ?? entity.entity_id;
    if (!domains.has(domain)) continue;

    const nameScore = tokenSortRatio(spoken, entity.friendlyName.toLowerCase());
    if (nameScore > bestScore) {
      bestScore = nameScore;
      best = toResolvedEntity(entity, nameScore);
    }

    const idScore = tokenSortRatio(spoken, entity.entity_id.toLowerCase());
    if (idScore > bestScore) {
      bestScore = idScore;
      best = toResolvedEntity(entity, idScore);
    }
  }

  return best;
}

/**
 * First valid record whose entity id is exactly `entityId`.
 */
export function findEntityRecord(
  records: readonly unknown[],
  entityId: string,
  log: Logger = rootLogger
): NamedEntityState | null {
  for (const raw of records) {
    const parsed = parseEntityRecord(raw);
    if (!parsed.ok) {
      log.debug({ reason: parsed.reason }, "Skipping malformed state record");
      continue;
    }
    if (parsed.value.entity_id === entityId) {
      return parsed.value;
    }
  }
  return null;
}
