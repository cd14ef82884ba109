// Authorization Engine
// Rules, predicates over them, and computed holdings views.

export {
  // Main class
  AccessChecker,
  createAccessChecker,
} from './checker.js';

export { Holdings, createHoldings } from './holdings.js';

export { ALLOW, deny, type AccessDecision, type DenialReason } from './decision.js';

// Rule functions, for callers that want the denial reason rather than a boolean
export * as rules from './rules.js';
