import type { Logger } from "../logger";
import { createLogger } from "../logger";
import { DestinationResolver, isDestination, isDestinationAddress } from "../destinations";
import type { Destination, DestinationRef, MembershipCollection } from "../destinations";
import { DuplicateResolver } from "../duplicate_resolver";
import { adaptSource } from "../source_adapter";
import { diff, planCopy, planRemoval } from "../reconciler";
import type {
  MembershipSyncModuleDependencies,
  OperationReport,
  SourceInput,
  SyncOperation,
  SyncPhase,
  TransferReport,
} from "./types";

/**
 * MembershipSyncModule - Reconciles membership between sources and destinations
 *
 * Every operation checks an identifier source before any remote call and
 * resolves its destination before the first mutation. Remote calls run one at
 * a time and each operation returns an OperationReport. Remote errors
 * propagate unchanged; completed mutations are not rolled back.
 */
export class MembershipSyncModule {
  private readonly resolver: DestinationResolver;
  private readonly duplicates: DuplicateResolver;
  private readonly logger: Logger;

  constructor(dependencies: MembershipSyncModuleDependencies = {}) {
    this.logger = dependencies.logger ?? createLogger("[MembershipSync] ");
    this.resolver = dependencies.resolver ?? new DestinationResolver({ logger: this.logger });
    this.duplicates = dependencies.duplicates ?? new DuplicateResolver({ logger: this.logger });
  }

  /**
   * Adds every source identifier missing from the destination, then removes
   * any duplicates the additions produced.
   */
  async copy(source: SourceInput, destinationRef: DestinationRef): Promise<OperationReport> {
    const checked = this.checkSource(source);
    const destination = await this.resolver.resolve(destinationRef);
    const identifiers = await this.loadSource(checked);
    const report = this.newReport("copy", destination);

    const current = adaptSource(await destination.refresh(), this.logger);
    const toAdd = planCopy(identifiers, current);
    for (const identifier of identifiers) {
      if (!toAdd.has(identifier)) {
        report.skipped.push({ identifier, reason: "already_present" });
      }
    }

    await this.addAll(destination, toAdd, report);
    const refreshed = await destination.refresh();
    await this.deduplicate(destination, report, refreshed);

    this.logSummary(report);
    return report;
  }

  /**
   * Removes every record carrying one of `identifiers`. Identifiers that are
   * not members are reported as skipped and cause no remote call.
   */
  async remove(identifiers: SourceInput, destinationRef: DestinationRef): Promise<OperationReport> {
    const checked = this.checkSource(identifiers);
    const destination = await this.resolver.resolve(destinationRef);
    const requested = await this.loadSource(checked);
    const report = this.newReport("remove", destination);

    const collection = await destination.refresh();
    const targets = planRemoval(requested, adaptSource(collection, this.logger));
    for (const identifier of requested) {
      if (!targets.has(identifier)) {
        report.skipped.push({ identifier, reason: "not_a_member" });
      }
    }

    await this.removeAll(destination, collection, targets, report);
    await destination.refresh();

    this.logSummary(report);
    return report;
  }

  /**
   * Makes the destination's membership equal to the source: removals first,
   * then additions, then duplicate cleanup.
   */
  async sync(source: SourceInput, destinationRef: DestinationRef): Promise<OperationReport> {
    const checked = this.checkSource(source);
    const destination = await this.resolver.resolve(destinationRef);
    const identifiers = await this.loadSource(checked);
    const report = this.newReport("sync", destination);

    let phase: SyncPhase = "refresh";
    try {
      const collection = await destination.refresh();
      const { toAdd, toRemove } = diff(identifiers, adaptSource(collection, this.logger));
      this.logger.info(
        `Syncing ${destination.describe()}: ${toRemove.size} to remove, ${toAdd.size} to add`,
      );

      phase = "removal";
      await this.removeAll(destination, collection, toRemove, report);
      await destination.refresh();

      phase = "addition";
      await this.addAll(destination, toAdd, report);
      const refreshed = await destination.refresh();

      phase = "deduplication";
      await this.deduplicate(destination, report, refreshed);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Sync of ${destination.describe()} failed during the ${phase} phase ` +
        `(added ${report.added.length}, removed ${report.removed.length}): ${message}`,
      );
      throw error;
    }

    this.logSummary(report);
    return report;
  }

  /**
   * Copies `identifiers` into every destination, then removes them from
   * every source.
   */
  async transfer(
    identifiers: SourceInput,
    sources: DestinationRef[],
    destinations: DestinationRef[],
  ): Promise<TransferReport> {
    const checked = this.checkSource(identifiers);
    const resolvedSources: Destination[] = [];
    for (const ref of sources) {
      resolvedSources.push(await this.resolver.resolve(ref));
    }
    const resolvedDestinations: Destination[] = [];
    for (const ref of destinations) {
      resolvedDestinations.push(await this.resolver.resolve(ref));
    }
    const requested = await this.loadSource(checked);

    const copies: OperationReport[] = [];
    for (const destination of resolvedDestinations) {
      copies.push(await this.copy(requested, destination));
    }

    const removals: OperationReport[] = [];
    for (const source of resolvedSources) {
      removals.push(await this.remove(requested, source));
    }

    return { copies, removals };
  }

  /**
   * Deletes duplicate records from a destination.
   */
  async dedupe(destinationRef: DestinationRef): Promise<OperationReport> {
    const destination = await this.resolver.resolve(destinationRef);
    const report = this.newReport("dedupe", destination);

    await this.deduplicate(destination, report);

    this.logSummary(report);
    return report;
  }

  // ==================== Private helpers ====================

  /**
   * Validates identifier sources up front so bad input fails before any
   * remote call. Destination sources are read later by `loadSource`.
   */
  private checkSource(source: SourceInput): ReadonlySet<string> | DestinationRef {
    if (isDestination(source) || isDestinationAddress(source)) {
      return source;
    }
    return adaptSource(source, this.logger);
  }

  private async loadSource(source: ReadonlySet<string> | DestinationRef): Promise<ReadonlySet<string>> {
    if (isDestination(source) || isDestinationAddress(source)) {
      const destination = await this.resolver.resolve(source);
      return adaptSource(await destination.refresh(), this.logger);
    }
    return source;
  }

  private async addAll(
    destination: Destination,
    identifiers: ReadonlySet<string>,
    report: OperationReport,
  ): Promise<void> {
    for (const identifier of identifiers) {
      const outcome = await destination.addMember(identifier);
      if (outcome === "already_present") {
        report.skipped.push({ identifier, reason: "already_present" });
      } else {
        report.added.push(identifier);
      }
    }
  }

  private async removeAll(
    destination: Destination,
    collection: MembershipCollection,
    identifiers: ReadonlySet<string>,
    report: OperationReport,
  ): Promise<void> {
    const outcomes = new Map<string, boolean>();

    for (const record of collection.records) {
      if (record.identifier === null || !identifiers.has(record.identifier)) {
        continue;
      }
      const applied = (await destination.removeMember(record)) === "applied";
      outcomes.set(record.identifier, (outcomes.get(record.identifier) ?? false) || applied);
    }

    for (const [identifier, applied] of outcomes) {
      if (applied) {
        report.removed.push(identifier);
      } else {
        report.skipped.push({ identifier, reason: "not_found" });
      }
    }
  }

  private async deduplicate(
    destination: Destination,
    report: OperationReport,
    fresh?: MembershipCollection,
  ): Promise<void> {
    const { removed } = await this.duplicates.resolve(destination, fresh);
    report.duplicatesRemoved = removed.length;
  }

  private newReport(operation: SyncOperation, destination: Destination): OperationReport {
    return {
      operation,
      destination: destination.describe(),
      added: [],
      removed: [],
      skipped: [],
      duplicatesRemoved: 0,
    };
  }

  private logSummary(report: OperationReport): void {
    this.logger.info(
      `${report.operation} ${report.destination}: added ${report.added.length}, ` +
      `removed ${report.removed.length}, skipped ${report.skipped.length}, ` +
      `duplicates removed ${report.duplicatesRemoved}`,
    );
  }
}
