import { dependencyId, type Ecosystem, type PackageMetadata, type ReleaseRecord } from "@depintel/core";
import type { MetadataProvider } from "../domain/types.js";
import type { PackageRecord } from "./package-record-schema.js";

/**
 * Serves package metadata from records captured ahead of time, such as the
 * package section of a project snapshot.
 */
export class StaticMetadataProvider implements MetadataProvider {
  private readonly recordsById = new Map<string, PackageRecord>();

  constructor(records: readonly PackageRecord[]) {
    for (const record of records) {
      this.recordsById.set(dependencyId(record.ecosystem, record.name), record);
    }
  }

  async lookup(name: string, ecosystem: Ecosystem): Promise<PackageMetadata | null> {
    const record = this.recordsById.get(dependencyId(ecosystem, name));
    if (record === undefined) {
      return null;
    }

    const { releases: _releases, ...metadata } = record;
    return metadata;
  }

  async versionHistory(name: string, ecosystem: Ecosystem): Promise<readonly ReleaseRecord[]> {
    return this.recordsById.get(dependencyId(ecosystem, name))?.releases ?? [];
  }
}
