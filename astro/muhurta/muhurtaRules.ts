import { InvalidRequestError } from "../errors.js";
import {
  MUHURTA_EVENT_TYPES,
  MUHURTA_RULES_V1,
  type MuhurtaEventType,
  type MuhurtaRule,
} from "./policy/muhurtaRules.v1.js";

export function isMuhurtaEventType(tag: string): tag is MuhurtaEventType {
  return MUHURTA_EVENT_TYPES.some((eventType) => eventType === tag);
}

export function parseMuhurtaEventType(tag: string): MuhurtaEventType {
  const normalized = tag.trim().toLowerCase();
  if (isMuhurtaEventType(normalized)) {
    return normalized;
  }
  throw new InvalidRequestError(
    `Unknown muhurta event type "${tag}"; expected one of ${MUHURTA_EVENT_TYPES.join(", ")}`,
    { event_type: tag }
  );
}

export function getMuhurtaRule(eventType: MuhurtaEventType): MuhurtaRule {
  return MUHURTA_RULES_V1[eventType];
}
