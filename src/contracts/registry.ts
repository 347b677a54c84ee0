import { AuthorizationError } from '../errors';
import { RegistryRecord } from '../types/pair';
import { U64_MAX, checkedAdd } from '../utils/math';

/**
 * Registry (factory) record transitions.
 *
 * Instances are immutable: every transition returns a new record that the
 * caller persists.
 */
export class RegistryContract {
  readonly record: RegistryRecord;

  constructor(record: RegistryRecord) {
    this.record = record;
  }

  /**
   * Fresh registry with no pairs and the fee switch off.
   */
  static initialize(address: string, owner: string): RegistryContract {
    return new RegistryContract({
      address,
      owner,
      pairCount: 0n,
      feeCollector: null,
      feeEnabled: false,
      lastPair: null,
    });
  }

  /**
   * Fail with UNAUTHORIZED unless `caller` is the registry owner.
   */
  authorize(caller: string): void {
    if (caller !== this.record.owner) {
      throw new AuthorizationError(caller, this.record.owner);
    }
  }

  /**
   * Count a newly configured pair and remember it as the latest.
   */
  recordPair(pairAddress: string): RegistryContract {
    return new RegistryContract({
      ...this.record,
      pairCount: checkedAdd(this.record.pairCount, 1n, U64_MAX),
      lastPair: pairAddress,
    });
  }

  /**
   * Replace the stored protocol fee settings. Nothing reads them yet.
   */
  withProtocolFee(feeCollector: string | null, feeEnabled: boolean): RegistryContract {
    return new RegistryContract({ ...this.record, feeCollector, feeEnabled });
  }
}
