export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Logger from "./logger";
export * as Errors from "./errors";
export * as Http from "./http";
export * as Schemas from "./schemas";

// Reconciliation engine
export * as Pagination from "./pagination";
export * as SourceAdapter from "./source_adapter";
export * as Reconciler from "./reconciler";
export * as DuplicateResolver from "./duplicate_resolver";
export * as RequestExecutor from "./request_executor";
export * as Destinations from "./destinations";
export * as Sync from "./sync";

// Service clients
export * as ExportPoller from "./export_poller";
export * as Surveys from "./surveys";
export * as ProfileLookup from "./profile_lookup";
