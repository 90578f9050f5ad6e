export { FirewallClient, DEFAULT_TIMEOUT_MS } from './client';
export type { FirewallClientOptions, HttpOutcome } from './client';
export { BlockedInfoResolver, parseBlockedResponse, WILDCARD_VERSION } from './blocked-info';
export { FirewallValidator, PASSED_REASON, NOT_FOUND_REASON, POLICY_BLOCK_REASON } from './validator';
export { ConnectivityProbe, CONNECTIVITY_TIMEOUT_MS } from './connectivity';
