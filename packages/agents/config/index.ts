export { DOMAIN_TOOLS, DOMAIN_DESCRIPTIONS, TOOL_SERVERS, TOOL_SERVERS_LIST, toolsForServer } from './domain-tools.js';
export type { ToolServer } from './domain-tools.js';
export {
  AuthorityWeightTable, loadAuthorityWeights, defaultAuthorityWeights,
  DEFAULT_AUTHORITY_RULES, DEFAULT_CATEGORY, UNLISTED_DOMAIN_WEIGHT,
} from './authority-weights.js';
export type { AuthorityRule, AuthorityTableConfig } from './authority-weights.js';
export { loadSettings } from './settings.js';
export type { Settings } from './settings.js';
