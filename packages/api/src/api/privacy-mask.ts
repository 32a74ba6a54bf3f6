import { maskDid, type Identity, type MaskConfig } from "@didscan/shared";

export interface DidField {
  role: string;
  /** Decoded DID text (or memo text) */
  value: string;
  /** Participants decide visibility; non-participant fields (memo) only follow it */
  participant: boolean;
}

/** True iff the caller is authenticated as one of the participants */
export function canReveal(fields: readonly DidField[], identity: Identity): boolean {
  if (identity.kind !== "authenticated") return false;
  return fields.some((f) => f.participant && f.value === identity.did);
}

/**
 * All-or-nothing masking for the DID fields of one record: every field is
 * revealed when the caller is a participant, otherwise every field is masked.
 */
export function maskFields(fields: readonly DidField[], identity: Identity, mask: MaskConfig): DidField[] {
  if (canReveal(fields, identity)) return fields.map((f) => ({ ...f }));
  return fields.map((f) => ({ ...f, value: maskDid(f.value, mask) }));
}

/** maskFields keyed by role, for callers that pick fields back out by name */
export function maskByRole(
  fields: readonly DidField[],
  identity: Identity,
  mask: MaskConfig,
): Map<string, string> {
  return new Map(maskFields(fields, identity, mask).map((f) => [f.role, f.value]));
}
