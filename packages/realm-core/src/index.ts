/**
 * @homeview/realm-core
 *
 * Core types and data access for the home view
 * - Realm, user, stream, billing and device types
 * - DynamoDB read operations
 */

// Re-export all types
export * from './types';

// Re-export database operations
export * from './db';
