/**
 * Transfer Domain Types
 *
 * SCOPE: validating and persisting one inbound file transfer
 */

/**
 * One inbound file event. Consumed once; never retried at this layer.
 */
export interface TransferRequest {
  sourceLocation: string;
  declaredName: string;
  declaredSize?: number;
}

/**
 * A file persisted under the storage root
 */
export interface StoredArtifact {
  path: string;
  fileName: string;
  bytesWritten: number;
}

/**
 * Type and size policy applied to every transfer
 */
export interface TransferPolicy {
  /** Lower-cased extensions including the dot; empty means unrestricted */
  allowedFileTypes: string[];
  maxFileSizeMB: number;
}
