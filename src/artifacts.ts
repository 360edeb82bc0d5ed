import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { ArtifactStore, ImageArtifact, Logger } from "./types.js";

/**
 * Writes rendered PNGs to uniquely named files so that overlapping runs
 * never share a path.
 */
export class TempFileArtifactStore implements ArtifactStore {
  constructor(
    private readonly directory: string = os.tmpdir(),
    private readonly logger: Logger = console
  ) {}

  async save(bytes: Buffer): Promise<ImageArtifact> {
    const filePath = path.join(this.directory, `weather-widget-${randomUUID()}.png`);
    await fs.writeFile(filePath, bytes);
    this.logger.log(`Weather widget image written to ${filePath}`);
    return { path: filePath, bytes };
  }

  async remove(artifact: ImageArtifact): Promise<void> {
    await fs.rm(artifact.path, { force: true });
    this.logger.log(`Cleaned up temporary image file: ${artifact.path}`);
  }
}
