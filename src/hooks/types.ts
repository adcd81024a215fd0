/**
 * Hook registry types.
 *
 * YAML keys are snake_case (`fail_mode`, `working_directory`); the loaded
 * definitions are camelCase.
 */

export const FAIL_MODES = ["continue", "stop"] as const;
export type FailMode = (typeof FAIL_MODES)[number];

export type FilterScalar = string | number | boolean;

/**
 * One filter key. A YAML scalar is `equals`, a YAML list is `any`, and
 * `{ any: [...] }` / `{ all: [...] }` are explicit.
 */
export type FilterCondition =
  | { op: "equals"; value: FilterScalar }
  | { op: "any"; values: FilterScalar[] }
  | { op: "all"; values: FilterScalar[] };

export type HookFilter = Readonly<Record<string, FilterCondition>>;

export interface EventMatcher {
  /** Exact type, `prefix.*`, `*.suffix` or `*`. */
  pattern: string;
  filter?: HookFilter;
}

export type HookAction =
  | { kind: "script"; script: string; args: string[] }
  | { kind: "command"; command: string };

export interface HookDefinition {
  name: string;
  description?: string;
  /** The hook runs when any matcher matches (and the hook filter, if any). */
  matchers: EventMatcher[];
  filter?: HookFilter;
  action: HookAction;
  timeoutSeconds: number;
  /** Relative to the project root. */
  workingDirectory: string;
  shell: string;
  env: Readonly<Record<string, string>>;
  failMode: FailMode;
  enabled: boolean;
}

export interface HooksDefaults {
  timeoutSeconds: number;
  shell: string;
  failMode: FailMode;
  /** Parent environment keys passed through to every hook. */
  envPassthrough: string[];
}

export interface HooksConfig {
  version: string;
  /** File the registry was loaded from; undefined when none exists. */
  source?: string;
  defaults: HooksDefaults;
  hooks: HookDefinition[];
}

export const MIN_TIMEOUT_SECONDS = 1;
export const MAX_TIMEOUT_SECONDS = 600;

export const DEFAULT_HOOKS_DEFAULTS: HooksDefaults = {
  timeoutSeconds: 30,
  shell: "/bin/sh",
  failMode: "continue",
  envPassthrough: ["PATH"],
};
