import type { Ecosystem, PackageMetadata, ReleaseRecord } from "@depintel/core";
import type { MetadataProvider } from "../domain/types.js";

export class NoopMetadataProvider implements MetadataProvider {
  async lookup(_name: string, _ecosystem: Ecosystem): Promise<PackageMetadata | null> {
    return null;
  }

  async versionHistory(_name: string, _ecosystem: Ecosystem): Promise<readonly ReleaseRecord[]> {
    return [];
  }
}
