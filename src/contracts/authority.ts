import { deriveAuthorityAddress } from '../utils/addresses';

const issued = new WeakSet<PairAuthority>();

/**
 * Capability to move a pair's reserves and mint its shares.
 *
 * Only the exchange issues instances; custody and share-token
 * collaborators accept one in place of an owner signature and should
 * check it with {@link PairAuthority.verify}.
 */
export class PairAuthority {
  /** Pair this capability controls */
  readonly pair: string;
  /** Derived authority address that owns the reserve custody and share mint */
  readonly address: string;

  private constructor(pair: string) {
    this.pair = pair;
    this.address = deriveAuthorityAddress(pair);
    Object.freeze(this);
  }

  /** @internal */
  static issue(pair: string): PairAuthority {
    const authority = new PairAuthority(pair);
    issued.add(authority);
    return authority;
  }

  /**
   * True when `candidate` was issued by the exchange and controls `owner`.
   */
  static verify(candidate: unknown, owner: string): boolean {
    return candidate instanceof PairAuthority && issued.has(candidate) && candidate.address === owner;
  }
}
