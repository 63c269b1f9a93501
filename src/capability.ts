import type { Network } from './types';

/** Platform wallet capability query. Both calls answer without throwing. */
export interface WalletCapabilityQuery {
  canMakePayments(): boolean;
  canMakePaymentsWithNetworks(networks: readonly Network[]): boolean;
}

export function canAuthorize(query: WalletCapabilityQuery, acceptedNetworks?: ReadonlySet<Network>): boolean {
  if (!query.canMakePayments()) {
    return false;
  }
  if (acceptedNetworks === undefined) {
    return true;
  }
  if (acceptedNetworks.size === 0) {
    return false;
  }
  return query.canMakePaymentsWithNetworks([...acceptedNetworks]);
}
