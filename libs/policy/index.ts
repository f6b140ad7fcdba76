/**
 * ICCP Policy Library
 * Public exports for policy model, loading and evaluation.
 */

// Types
export type { IccpPolicy, InstitutionPolicy, RolePolicy, ProhibitedCombination, LoadedPolicy } from './policyProfile.js';
export type { AuthorizationResult, DenialReason, PolicyDecision } from './policyEngine.js';

// Loading
export { IccpPolicySchema } from './policyProfile.js';
export { loadPolicyFile, parsePolicy, assertPolicyMatchesRegistry, DEFAULT_POLICY_PATH } from './policyLoader.js';

// Evaluation
export { PolicyEngine, decide } from './policyEngine.js';
