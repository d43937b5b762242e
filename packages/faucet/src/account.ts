// SPDX-License-Identifier: Apache-2.0
import { type Address, type Hex, keccak256 } from "viem";
import { type PrivateKeyAccount, privateKeyToAccount } from "viem/accounts";
import { ConfigurationError } from "./errors.ts";

const PRIVATE_KEY_RE = /^(?:0x)?([0-9a-fA-F]{64})$/;

/**
 * Derives the faucet's signing account from a hex private key.
 * The key may carry a 0x prefix or not. A key that is not 32 bytes of hex, or is not a
 * valid secp256k1 scalar (zero, or at/above the curve order), is a ConfigurationError.
 * The error never echoes the key.
 */
export function createFaucetAccount(privateKeyHex: string): PrivateKeyAccount {
  const match = PRIVATE_KEY_RE.exec(privateKeyHex.trim());
  if (!match?.[1]) {
    throw new ConfigurationError("invalid private key: expected 64 hex characters");
  }
  const key: Hex = `0x${match[1].toLowerCase()}`;
  try {
    return privateKeyToAccount(key);
  } catch {
    // The library's message quotes the scalar, so it is not kept as the cause.
    throw new ConfigurationError("invalid private key: not a valid secp256k1 scalar");
  }
}

/** Unsigned legacy transfer, bound to a chain through EIP-155. */
export interface PendingTransfer {
  nonce: number;
  to: Address;
  value: bigint;
  gas: bigint;
  gasPrice: bigint;
  chainId: number;
}

export async function signTransfer(account: PrivateKeyAccount, tx: PendingTransfer): Promise<Hex> {
  return account.signTransaction({
    type: "legacy",
    chainId: tx.chainId,
    nonce: tx.nonce,
    to: tx.to,
    value: tx.value,
    gas: tx.gas,
    gasPrice: tx.gasPrice,
  });
}

/** The transaction hash is keccak256 over the signed RLP payload. */
export function transactionHash(signedTx: Hex): Hex {
  return keccak256(signedTx);
}
