/**
 * Stream Types
 */

/**
 * Stream entity
 */
export interface Stream {
  /** Stream ID */
  streamId: number;
  /** Owning realm */
  realmId: string;
  /** Stream name, unique per realm ignoring case */
  name: string;
  /** Recipient that messages sent to this stream are addressed to */
  recipientId: number;
  /** Creation timestamp (ISO8601) */
  createdAt: string;
}
