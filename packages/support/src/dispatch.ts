/**
 * @minichain/support — Call dispatch contract and block structure.
 *
 * Each pallet exposes a closed set of calls and implements `Dispatch` to
 * execute one of them on behalf of a caller. A runtime implements the same
 * contract over the union of all pallet calls and forwards each call to
 * the pallet that owns it.
 */

import type { Result } from "./result.js";

// ─── Dispatch ────────────────────────────────────────────────────────────

/**
 * A failed dispatch.
 *
 * `reason` is the static, human-readable text for the failure; `error`
 * keeps the pallet's structured error so nothing is lost at the boundary.
 */
export interface DispatchError<P extends string = string, E extends Error = Error> {
  readonly pallet: P;
  readonly reason: string;
  readonly error: E;
}

export type DispatchResult<T = void, P extends string = string, E extends Error = Error> = Result<
  T,
  DispatchError<P, E>
>;

export interface Dispatch<Caller, Call, Output = void, P extends string = string, E extends Error = Error> {
  dispatch(caller: Caller, call: Call): DispatchResult<Output, P, E>;
}

/**
 * Build a DispatchError for a pallet failure.
 */
export function dispatchError<P extends string, E extends Error>(
  pallet: P,
  reason: string,
  error: E,
): DispatchError<P, E> {
  return { pallet, reason, error };
}

/**
 * Textual fallback for a dispatch failure: "<reason>: <error message>".
 */
export function describeDispatchError(error: DispatchError): string {
  return `${error.reason}: ${error.error.message}`;
}

// ─── Blocks ──────────────────────────────────────────────────────────────

export interface Header<BlockNumber> {
  readonly blockNumber: BlockNumber;
}

/** One submitted transaction: who is calling and what they call. */
export interface Extrinsic<Caller, Call> {
  readonly caller: Caller;
  readonly call: Call;
}

export interface Block<BlockNumber, Ext> {
  readonly header: Header<BlockNumber>;
  readonly extrinsics: readonly Ext[];
}
