/**
 * Identity validation.
 *
 * The default validator accepts bech32-shaped addresses: a lowercase
 * human-readable prefix, the separator "1", then lowercase alphanumerics.
 * It checks shape only, not the checksum.
 */

import type { IdentityValidator } from "./types.js";

export const DEFAULT_IDENTITY_PATTERN = /^[a-z]{1,16}1[a-z0-9]{6,64}$/;

export class AddressShapeValidator implements IdentityValidator {
  private readonly prefixes: ReadonlySet<string> | undefined;

  /**
   * @param prefixes - When given, only these human-readable prefixes are accepted.
   */
  constructor(prefixes?: readonly string[]) {
    this.prefixes = prefixes ? new Set(prefixes) : undefined;
  }

  validate(identity: string): boolean {
    if (!DEFAULT_IDENTITY_PATTERN.test(identity)) return false;
    if (!this.prefixes) return true;
    const prefix = identity.slice(0, identity.indexOf("1"));
    return this.prefixes.has(prefix);
  }
}
