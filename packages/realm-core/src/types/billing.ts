/**
 * Billing Types
 *
 * Read-only view of the billing backend records; a realm without a
 * Customer has never interacted with billing.
 */

export interface Customer {
  customerId: string;
  realmId: string;
  /** A sponsorship request is waiting for review */
  sponsorshipPending: boolean;
  createdAt: string;
}
