export { CredentialResolver } from './credential-resolver.js';
export type { AccessAttempt, AuthMode, ResolvedAccess } from './credential-resolver.js';
