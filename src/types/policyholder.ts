/**
 * Registered policyholders.
 *
 * Only senders found in the policyholder directory may file claims.
 */

export interface Policyholder {
  /** Lower-cased email address */
  email: string;

  policyType: string;

  /** Issue date as YYYY-MM-DD */
  policyIssuedDate: string;
}

export type CreatePolicyholderInput = Policyholder;

/**
 * Directory of registered policyholders.
 * Resolves null when the address is not registered.
 */
export interface PolicyholderDirectory {
  lookup(email: string): Promise<Policyholder | null>;
}
