import type { Logger } from "../logger";
import type { DestinationRef, DestinationResolver } from "../destinations";
import type { DuplicateResolver } from "../duplicate_resolver";
import type { MembershipSource } from "../source_adapter";

/**
 * MembershipSyncModule Dependencies
 */
export interface MembershipSyncModuleDependencies {
  /** Resolves `{ service, listName }` references (default: resolver with no services) */
  resolver?: DestinationResolver;
  /** Duplicate cleanup run after every copy and sync */
  duplicates?: DuplicateResolver;
  logger?: Logger;
}

/**
 * A source is a list of identifiers, a fetched collection, or another
 * destination whose current membership is read.
 */
export type SourceInput = MembershipSource | DestinationRef;

export type SyncOperation = "copy" | "remove" | "sync" | "transfer" | "dedupe";

export type SkipReason =
  /** Already a member before the operation, or the service answered 409 */
  | "already_present"
  /** Requested for removal but not a member */
  | "not_a_member"
  /** The service answered 404 on delete */
  | "not_found";

export interface SkippedIdentifier {
  identifier: string;
  reason: SkipReason;
}

/**
 * Result of one operation against one destination
 */
export interface OperationReport {
  operation: SyncOperation;
  /** `service:name` of the destination */
  destination: string;
  added: string[];
  removed: string[];
  skipped: SkippedIdentifier[];
  duplicatesRemoved: number;
}

/**
 * Result of a transfer: one report per destination copied to, then one per
 * source removed from
 */
export interface TransferReport {
  copies: OperationReport[];
  removals: OperationReport[];
}

/**
 * Phase names used when a sync fails part-way
 */
export type SyncPhase = "refresh" | "removal" | "addition" | "deduplication";
