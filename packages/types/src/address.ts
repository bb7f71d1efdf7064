/**
 * Address and Hash Encodings
 *
 * Textual encodings used on the wire and in chain state:
 * - EOA address:       "hx" + 40 lowercase hex characters
 * - Contract address:  "cx" + 40 lowercase hex characters
 * - Transaction hash:  "0x" + 64 lowercase hex characters
 * - Integer:           "0x" + lowercase hex, no leading zeros ("0x0" for zero)
 *
 * Rules:
 * - Addresses are immutable strings compared by equality only
 * - EOA and contract addresses are disjoint by prefix
 * - Uppercase hex is rejected; there is one encoding per value
 */

// =============================================================================
// Types
// =============================================================================

/** Externally-owned account address. */
export type EoaAddress = `hx${string}`;

/** Contract (SCORE) address. */
export type ContractAddress = `cx${string}`;

/** Either address subtype. The prefix is the tag. */
export type Address = EoaAddress | ContractAddress;

/** Transaction hash. */
export type TxHash = `0x${string}`;

/** Hex-encoded integer. */
export type HexInt = `0x${string}`;

// =============================================================================
// Constants
// =============================================================================

export const ADDRESS_BODY_LENGTH = 40;
export const HASH_BODY_LENGTH = 64;

/** Install target: a deploy sent here creates a new SCORE. */
export const ZERO_SCORE_ADDRESS: ContractAddress = `cx${"0".repeat(ADDRESS_BODY_LENGTH)}`;

/** The built-in governance SCORE. */
export const GOVERNANCE_SCORE_ADDRESS: ContractAddress = `cx${"0".repeat(ADDRESS_BODY_LENGTH - 1)}1`;

/** Deploy tx hash recorded for code loaded at genesis rather than by a transaction. */
export const ZERO_TX_HASH: TxHash = `0x${"0".repeat(HASH_BODY_LENGTH)}`;

const EOA_PATTERN = new RegExp(`^hx[0-9a-f]{${ADDRESS_BODY_LENGTH}}$`);
const CONTRACT_PATTERN = new RegExp(`^cx[0-9a-f]{${ADDRESS_BODY_LENGTH}}$`);
const TX_HASH_PATTERN = new RegExp(`^0x[0-9a-f]{${HASH_BODY_LENGTH}}$`);
const HEX_INT_PATTERN = /^0x(0|[1-9a-f][0-9a-f]*)$/;

// =============================================================================
// Guards
// =============================================================================

export function isEoaAddress(value: unknown): value is EoaAddress {
  return typeof value === "string" && EOA_PATTERN.test(value);
}

export function isContractAddress(value: unknown): value is ContractAddress {
  return typeof value === "string" && CONTRACT_PATTERN.test(value);
}

export function isAddress(value: unknown): value is Address {
  return isEoaAddress(value) || isContractAddress(value);
}

export function isTxHash(value: unknown): value is TxHash {
  return typeof value === "string" && TX_HASH_PATTERN.test(value);
}

export function isHexInt(value: unknown): value is HexInt {
  return typeof value === "string" && HEX_INT_PATTERN.test(value);
}

// =============================================================================
// Codecs
// =============================================================================

/**
 * Encode a non-negative integer as lowercase hex text.
 *
 * @throws RangeError for negative or non-integer input
 */
export function encodeHexInt(value: number | bigint): HexInt {
  const big = typeof value === "bigint" ? value : toBigInt(value);
  if (big < 0n) {
    throw new RangeError(`Cannot encode negative integer: ${value}`);
  }
  return `0x${big.toString(16)}`;
}

/**
 * Decode hex integer text.
 *
 * @throws RangeError when the text is not a canonical hex integer
 */
export function decodeHexInt(value: string): bigint {
  if (!isHexInt(value)) {
    throw new RangeError(`Invalid hex integer: "${value}"`);
  }
  return BigInt(value);
}

/**
 * Build a contract address from 40 hex characters.
 */
export function toContractAddress(body: string): ContractAddress {
  const address = `cx${body.toLowerCase()}`;
  if (!isContractAddress(address)) {
    throw new RangeError(`Invalid contract address body: "${body}"`);
  }
  return address;
}

function toBigInt(value: number): bigint {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot encode non-integer: ${value}`);
  }
  return BigInt(value);
}
