// Main module
export { MembershipSyncModule } from "./sync_module";

// Types
export type {
  MembershipSyncModuleDependencies,
  OperationReport,
  SkipReason,
  SkippedIdentifier,
  SourceInput,
  SyncOperation,
  SyncPhase,
  TransferReport,
} from "./types";
