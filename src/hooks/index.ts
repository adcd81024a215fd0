export { HooksConfigError, loadHooksConfig, parseHooksConfig, findHooksConfig, emptyHooksConfig } from "./config.js";
export { getMatchingHooks, hookMatches, matchesEventType, matchesFilter, isValidMatcherPattern } from "./matcher.js";
export { validateHooksConfigFile, type ValidationReport } from "./validate.js";
export { scaffoldHooksConfig, type ScaffoldOptions, type ScaffoldResult } from "./scaffold.js";
export { installGitHook, type GitHookInstallResult } from "./git-hook.js";
export * from "./types.js";
