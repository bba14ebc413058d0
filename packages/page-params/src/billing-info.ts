/**
 * Billing visibility
 *
 * Decides whether the gear menu links to the billing page and to the
 * plans page. Only hosted (corporate) deployments have billing at all.
 */

import { hasBillingAccess, isGuest, type Realm, type UserProfile } from '@homeview/realm-core';
import type { BillingInfo, HomeDataStore } from './types';

export type BillingLookup = Pick<HomeDataStore, 'getCustomerByRealm' | 'customerHasPlan'>;

export async function getBillingInfo(
  user: UserProfile | null,
  realm: Realm,
  corporateEnabled: boolean,
  billing: BillingLookup
): Promise<BillingInfo> {
  let showBilling = false;
  let showPlans = false;

  if (corporateEnabled && user !== null) {
    if (hasBillingAccess(user)) {
      const customer = await billing.getCustomerByRealm(realm.realmId);
      if (customer !== null) {
        showBilling = customer.sponsorshipPending || (await billing.customerHasPlan(customer.customerId));
      }
    }

    if (!isGuest(user) && realm.planType === 'limited') {
      showPlans = true;
    }
  }

  return { showBilling, showPlans };
}
