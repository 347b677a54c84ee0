import { Address, StrKey, hash, xdr } from '@stellar/stellar-sdk';
import { ErrorCode, ValidationError } from '../errors';

/**
 * Address utilities: identity validation, canonical asset ordering and
 * deterministic derivation of pair and authority addresses.
 */

/**
 * True for an account address (G...). Owners, traders and share holders
 * use these.
 */
export function isValidPublicKey(address: string): boolean {
  try {
    return StrKey.isValidEd25519PublicKey(address);
  } catch {
    return false;
  }
}

/**
 * Validate a contract address (C... address).
 */
export function isValidContractId(address: string): boolean {
  try {
    return StrKey.isValidContract(address);
  } catch {
    return false;
  }
}

/**
 * Validate any identity the exchange accepts (public key or contract).
 */
export function isValidAddress(address: string): boolean {
  return isValidPublicKey(address) || isValidContractId(address);
}

/**
 * Return `address` unchanged, or throw INVALID_ADDRESS naming the field.
 */
export function requireAddress(address: string, field: string): string {
  if (!isValidAddress(address)) {
    throw new ValidationError(ErrorCode.INVALID_ADDRESS, `${field} is not a valid address: ${address}`, {
      field,
      address,
    });
  }
  return address;
}

/**
 * Sort two asset identifiers into canonical order: the lexicographically
 * smaller one first, whatever the argument order.
 *
 * @throws {ValidationError} IDENTICAL_ASSETS if both are the same
 *
 * @example
 * ```ts
 * sortTokens('CDEF...', 'CABC...'); // ['CABC...', 'CDEF...']
 * sortTokens('CABC...', 'CABC...'); // throws IDENTICAL_ASSETS
 * ```
 */
export function sortTokens(tokenX: string, tokenY: string): [string, string] {
  if (tokenX === tokenY) {
    throw new ValidationError(ErrorCode.IDENTICAL_ASSETS, undefined, { token: tokenX });
  }
  return tokenX < tokenY ? [tokenX, tokenY] : [tokenY, tokenX];
}

/**
 * Truncate an address for log output ("GABC...WXYZ").
 */
export function truncateAddress(address: string, chars: number = 4): string {
  if (address.length <= chars * 2 + 3) return address;
  return `${address.slice(0, chars)}...${address.slice(-chars)}`;
}

/**
 * Derive the pair address for an unordered asset pair.
 *
 * 1. Sort assets (tokenA < tokenB)
 * 2. salt = sha256(tokenA_bytes || tokenB_bytes)
 * 3. address = sha256(HashIdPreimage(networkId, registry, salt))
 *
 * Both argument orders give the same address, so each unordered pair has
 * exactly one record.
 *
 * @throws {ValidationError} IDENTICAL_ASSETS if both assets are the same
 */
export function derivePairAddress(
  registryAddress: string,
  tokenX: string,
  tokenY: string,
  networkPassphrase: string,
): string {
  const [tokenA, tokenB] = sortTokens(tokenX, tokenY);

  const salt = hash(
    Buffer.concat([
      Address.fromString(tokenA).toBuffer(),
      Address.fromString(tokenB).toBuffer(),
    ]),
  );

  const networkId = hash(Buffer.from(networkPassphrase));

  const preimage = xdr.HashIdPreimage.envelopeTypeContractId(
    new xdr.HashIdPreimageContractId({
      networkId,
      contractIdPreimage: xdr.ContractIdPreimage.contractIdPreimageFromAddress(
        new xdr.ContractIdPreimageFromAddress({
          address: Address.fromString(registryAddress).toScAddress(),
          salt,
        }),
      ),
    }),
  );

  return StrKey.encodeContract(hash(preimage.toXDR()));
}

/**
 * Derive the address of a pair's authority: sha256("authority" || pair).
 */
export function deriveAuthorityAddress(pairAddress: string): string {
  return StrKey.encodeContract(
    hash(Buffer.concat([Buffer.from('authority'), Address.fromString(pairAddress).toBuffer()])),
  );
}
