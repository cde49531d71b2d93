/**
 * Local directory tree document source.
 *
 * @module ingestion/file-system-source
 */

import { globIterate } from "glob";
import { readFile, stat } from "node:fs/promises";
import { basename, isAbsolute, resolve } from "node:path";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import type { Document } from "../documents/types.js";
import { channelStream, type ChannelStream } from "../streams/channel-stream.js";
import type { DocumentSource } from "./types.js";
import { PathFilter } from "./path-filter.js";
import { FileReadError, FileScanError, ValidationError, asError, errnoCode } from "./errors.js";

export interface FileSystemSourceOptions {
  /** Source identifier stamped on every document */
  sourceId: string;

  /** Root directories, walked in the given order */
  paths: readonly string[];

  /** Defaults to accepting every file */
  filter?: PathFilter;

  /** Reads an accepted file as text; defaults to UTF-8 `readFile` */
  readText?: (path: string) => Promise<string>;

  logger?: pino.Logger;
}

/**
 * Walks one or more directory trees and emits every accepted file as a document.
 *
 * - `id` and `link` are the file's absolute path, `title` its base name
 * - content is read as UTF-8 text
 * - dot files are included
 * - symlinks are not descended into; a link is read only when it resolves to a
 *   regular file, so directory links and dangling links are skipped
 * - files are emitted as the walk reaches them, in no particular order
 *
 * Any walk or read failure ends the sequence with an error; the walk does not
 * skip past an unreadable file.
 *
 * @example
 * ```typescript
 * const source = new FileSystemSource({
 *   sourceId: "notes",
 *   paths: ["/home/me/notes"],
 *   filter: PathFilter.compile({ include: ["\\.md$"] }),
 * });
 * for await (const doc of source.fetch()) console.log(doc.title);
 * ```
 */
export class FileSystemSource implements DocumentSource {
  readonly id: string;
  private readonly roots: readonly string[];
  private readonly filter: PathFilter;
  private readonly readText: (path: string) => Promise<string>;
  private _logger: pino.Logger | null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("sources:fs");
    }
    return this._logger;
  }

  constructor(options: FileSystemSourceOptions) {
    if (!options.sourceId || options.sourceId.trim() === "") {
      throw new ValidationError("Source id cannot be empty", "sourceId");
    }
    if (options.paths.length === 0) {
      throw new ValidationError(`Source '${options.sourceId}' needs at least one path`, "paths");
    }
    this.id = options.sourceId;
    this.roots = options.paths.map((root) => resolve(root));
    this.filter = options.filter ?? PathFilter.acceptAll();
    this.readText = options.readText ?? ((path) => readFile(path, "utf8"));
    this._logger = options.logger ?? null;
  }

  fetch(): ChannelStream<Document> {
    return channelStream<Document>(
      async (tx) => {
        for (const root of this.roots) {
          const startTime = Date.now();
          let accepted = 0;

          for await (const { path, symlink } of this.walk(root)) {
            if (!this.filter.matches(path)) {
              continue;
            }
            if (symlink && !(await this.resolvesToFile(path))) {
              continue;
            }
            await tx.send(await this.readDocument(path, root));
            accepted++;
          }

          this.logger.info(
            { metric: "fs_walk.duration_ms", value: Date.now() - startTime, root, files: accepted },
            "Directory walk complete"
          );
        }
      },
      { name: `fs:${this.id}`, logger: this.logger }
    );
  }

  /**
   * Walk `root` lazily, yielding absolute paths of files and of symlinks.
   * Directories (and anything behind a directory link) are never yielded.
   *
   * @throws {FileScanError} If the root is missing, not a directory or unreadable
   */
  private async *walk(root: string): AsyncGenerator<{ path: string; symlink: boolean }> {
    await this.validateRoot(root);

    const entries = globIterate("**/*", {
      cwd: root,
      withFileTypes: true,
      nodir: true,
      dot: true,
      follow: false,
    });

    try {
      for await (const entry of entries) {
        if (entry.isFile()) {
          yield { path: entry.fullpath(), symlink: false };
        } else if (entry.isSymbolicLink()) {
          yield { path: entry.fullpath(), symlink: true };
        }
      }
    } catch (error) {
      const cause = asError(error);
      throw new FileScanError(`Failed to walk directory '${root}': ${cause.message}`, root, cause);
    }
  }

  /**
   * Whether a symlink points at a regular file. Dangling and looping links are not files.
   *
   * @throws {FileReadError} If the target exists but cannot be inspected
   */
  private async resolvesToFile(path: string): Promise<boolean> {
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        this.logger.debug({ path }, "Skipping link to non-file");
      }
      return stats.isFile();
    } catch (error) {
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ELOOP") {
        this.logger.debug({ path, code }, "Skipping broken link");
        return false;
      }
      throw new FileReadError(path, asError(error));
    }
  }

  private async validateRoot(root: string): Promise<void> {
    if (!isAbsolute(root)) {
      throw new FileScanError(`Root path must be absolute, got: ${root}`, root);
    }

    try {
      const stats = await stat(root);
      if (!stats.isDirectory()) {
        throw new FileScanError(`Path is not a directory: ${root}`, root);
      }
    } catch (error) {
      if (error instanceof FileScanError) {
        throw error;
      }
      const code = errnoCode(error);
      if (code === "ENOENT") {
        throw new FileScanError(`Directory does not exist: ${root}`, root, asError(error));
      }
      if (code === "EACCES") {
        throw new FileScanError(`Permission denied accessing directory: ${root}`, root, asError(error));
      }
      throw new FileScanError(`Cannot access directory '${root}'`, root, asError(error));
    }
  }

  private async readDocument(path: string, root: string): Promise<Document> {
    let content: string;
    try {
      content = await this.readText(path);
    } catch (error) {
      throw new FileReadError(path, asError(error));
    }

    return {
      id: path,
      source: this.id,
      title: basename(path),
      link: path,
      content,
      metadata: { root },
    };
  }
}
