/**
 * Caller Types
 *
 * A caller is the authenticated actor on whose behalf a transfer or import
 * runs. Identities are integers assigned by the upstream transport.
 */

/**
 * Opaque caller identifier
 */
export type CallerIdentity = number;

/**
 * Caller Context - who is performing the action
 * Every service method receives this context
 */
export interface CallerContext {
  callerId: CallerIdentity;
  requestId: string;
  ip?: string;
  userAgent?: string;
}
