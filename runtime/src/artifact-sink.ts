import { mkdir, writeFile } from "fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "path";
import { pathToFileURL } from "url";
import { SinkUnavailableError, errorMessage } from "./errors.js";

export interface ArtifactReceipt {
  status: "success";
  uri: string;
  size: number;
  timestamp: string;
}

/**
 * Durable write of text blobs.
 */
export interface ArtifactSink {
  writeText(path: string, content: string): Promise<ArtifactReceipt>;
}

/**
 * ArtifactSink that writes below a root directory on the local disk.
 */
export class FileArtifactSink implements ArtifactSink {
  private readonly root: string;

  constructor(
    root: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.root = resolve(root);
  }

  async writeText(path: string, content: string): Promise<ArtifactReceipt> {
    const target = this.resolveTarget(path);
    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf-8");
    } catch (error) {
      throw new SinkUnavailableError(
        "artifact",
        `Failed to write artifact ${path}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    return {
      status: "success",
      uri: pathToFileURL(target).href,
      size: Buffer.byteLength(content, "utf-8"),
      timestamp: this.now().toISOString(),
    };
  }

  private resolveTarget(path: string): string {
    const trimmed = path.trim();
    if (!trimmed) {
      throw new Error("Artifact path must not be empty");
    }
    if (isAbsolute(trimmed)) {
      throw new Error(`Artifact path must be relative: ${path}`);
    }

    const target = resolve(this.root, trimmed);
    const rel = relative(this.root, target);
    if (!rel || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new Error(`Artifact path escapes the artifact root: ${path}`);
    }
    return target;
  }
}
