/**
 * Event matching: which hooks run for an event.
 *
 * Every enabled hook is tested in declaration order; all matches are
 * returned (no first-match-wins).
 */
import type { ContextValue, HookEvent } from "../shared/types.js";
import type { EventMatcher, FilterCondition, FilterScalar, HookDefinition, HookFilter, HooksConfig } from "./types.js";

const SEGMENT = "[a-z][a-z0-9_]*";
const EXACT = new RegExp(`^${SEGMENT}(?:\\.${SEGMENT})+$`);
const PREFIX_WILDCARD = new RegExp(`^${SEGMENT}(?:\\.${SEGMENT})*\\.\\*$`);
const SUFFIX_WILDCARD = new RegExp(`^\\*\\.${SEGMENT}$`);

/** Whether `pattern` uses one of the supported matcher forms. */
export function isValidMatcherPattern(pattern: string): boolean {
  return (
    pattern === "*" ||
    EXACT.test(pattern) ||
    PREFIX_WILDCARD.test(pattern) ||
    SUFFIX_WILDCARD.test(pattern)
  );
}

export function matchesEventType(pattern: string, eventType: string): boolean {
  if (pattern === "*") return true;
  if (pattern.endsWith(".*")) {
    const prefix = pattern.slice(0, -1);
    return eventType.startsWith(prefix) && !eventType.slice(prefix.length).includes(".");
  }
  if (pattern.startsWith("*.")) {
    const suffix = pattern.slice(1);
    return eventType.endsWith(suffix) && eventType.length > suffix.length;
  }
  return pattern === eventType;
}

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

function sameScalar(actual: ContextValue | undefined, expected: FilterScalar): boolean {
  return actual === expected;
}

function contains(actual: ContextValue | undefined, expected: FilterScalar): boolean {
  if (Array.isArray(actual)) return actual.some((item) => sameScalar(item, expected));
  return sameScalar(actual, expected);
}

function matchesCondition(actual: ContextValue | undefined, condition: FilterCondition): boolean {
  switch (condition.op) {
    case "equals":
      return sameScalar(actual, condition.value);
    case "any":
      return condition.values.some((value) => contains(actual, value));
    case "all":
      return condition.values.every((value) => contains(actual, value));
  }
}

/** Every filter key must be satisfied by the event context. */
export function matchesFilter(filter: HookFilter | undefined, context: Readonly<Record<string, ContextValue>>): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, condition]) => matchesCondition(context[key], condition));
}

// ---------------------------------------------------------------------------
// Hooks
// ---------------------------------------------------------------------------

function matcherApplies(matcher: EventMatcher, event: HookEvent): boolean {
  return matchesEventType(matcher.pattern, event.event_type) && matchesFilter(matcher.filter, event.context);
}

export function hookMatches(hook: HookDefinition, event: HookEvent): boolean {
  if (!hook.enabled) return false;
  if (!hook.matchers.some((matcher) => matcherApplies(matcher, event))) return false;
  return matchesFilter(hook.filter, event.context);
}

/** Enabled hooks matching the event, in declaration order. */
export function getMatchingHooks(config: HooksConfig, event: HookEvent): HookDefinition[] {
  return config.hooks.filter((hook) => hookMatches(hook, event));
}
