/**
 * @scoregov/governance — Caller classification.
 *
 * Genesis is a distinct kind of caller, not a member of the auditor list.
 * Authorization pattern-matches on the kind.
 */

import type { EoaAddress } from "@scoregov/types";

export type Caller =
  | { readonly kind: "genesis"; readonly address: EoaAddress }
  | { readonly kind: "auditor"; readonly address: EoaAddress }
  | { readonly kind: "other"; readonly address: EoaAddress };

export function classifyCaller(
  address: EoaAddress,
  genesisAddress: EoaAddress,
  isMember: (address: EoaAddress) => boolean,
): Caller {
  if (address === genesisAddress) {
    return { kind: "genesis", address };
  }
  if (isMember(address)) {
    return { kind: "auditor", address };
  }
  return { kind: "other", address };
}

/** True for genesis and auditors. */
export function isAuthorizedCaller(caller: Caller): boolean {
  switch (caller.kind) {
    case "genesis":
    case "auditor":
      return true;
    case "other":
      return false;
  }
}
