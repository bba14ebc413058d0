/**
 * Realm Entity Types
 *
 * A realm is the tenant boundary: every user, stream and billing record
 * belongs to exactly one realm.
 */

/**
 * Plan the realm is on
 */
export type PlanType = 'self_hosted' | 'limited' | 'standard' | 'standard_free';

/**
 * Who may create generic bots in the realm
 */
export type BotCreationPolicy = 'everyone' | 'limit_generic_bots' | 'admins_only';

/**
 * Realm entity
 */
export interface Realm {
  /** Primary key, realm unique identifier */
  realmId: string;
  /** Display name */
  name: string;
  /** Subdomain the realm is served on ('' for the root domain) */
  subdomain: string;
  /** Current plan */
  planType: PlanType;
  /** Whether Webathena (Kerberos credential forwarding) is offered */
  webathenaEnabled: boolean;
  /** Generic bot creation policy */
  botCreationPolicy: BotCreationPolicy;
  /** Creation timestamp (ISO8601) */
  createdAt: string;
}

/**
 * Plans that do not pay for hosting
 */
export const NON_PAYING_PLAN_TYPES: readonly PlanType[] = ['standard_free', 'self_hosted'];
