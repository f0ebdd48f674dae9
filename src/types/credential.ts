import type { OneTimeSecret } from '../core/one-time-secret.js';

export type CredentialKind = 'administrator' | 'user';

/**
 * A credential as it can be referred to after issuance. Never carries the
 * plaintext key.
 */
export interface CredentialRef {
  kind: CredentialKind;
  principalId: string;
  principalEmail: string;
  label: string;
  prefix: string | null;
}

export interface IssuedCredential {
  ref: CredentialRef;
  secret: OneTimeSecret;
}

export interface ProvisionedAssistant {
  assistantId: string;
  assistantName: string;
  userId: string;
  reused: boolean;
  toolIds: string[];
}
