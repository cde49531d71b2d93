/**
 * Git-backed document source: clone each listed repository and walk it.
 *
 * @module ingestion/git-repository-source
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative, sep, posix } from "node:path";
import type pino from "pino";
import { getComponentLogger } from "../logging/index.js";
import type { Document } from "../documents/types.js";
import type { RepositoryDescriptor, RepositoryLister } from "../repositories/types.js";
import { channelStream, type ChannelStream } from "../streams/channel-stream.js";
import type { Cloner, DocumentSource } from "./types.js";
import { FileSystemSource } from "./file-system-source.js";
import { PathFilter } from "./path-filter.js";
import { RepositoryCloneError, ValidationError, asError } from "./errors.js";

export interface GitRepositorySourceOptions {
  sourceId: string;
  lister: RepositoryLister;
  cloner: Cloner;

  /** Applied to absolute paths inside each clone */
  filter?: PathFilter;

  /**
   * Parent directory for per-repository temp directories
   * @default os.tmpdir()
   */
  tempRoot?: string;

  logger?: pino.Logger;
}

/**
 * Clones every repository a lister yields and emits the files of each clone.
 *
 * Repositories are processed one at a time, in lister order:
 * 1. clone into a fresh temp directory (working tree only)
 * 2. walk it with a FileSystemSource using this source's filter
 * 3. re-emit its documents, keyed by repository
 * 4. delete the temp directory, whatever the outcome
 *
 * A clone failure ends the whole source with {@link RepositoryCloneError}; clones
 * are not retried. Documents are re-keyed so their identity outlives the temp
 * directory: `id` and `link` become `<repository name>/<relative path>`.
 */
export class GitRepositorySource implements DocumentSource {
  readonly id: string;
  private readonly lister: RepositoryLister;
  private readonly cloner: Cloner;
  private readonly filter: PathFilter;
  private readonly tempRoot: string;
  private _logger: pino.Logger | null;

  private get logger(): pino.Logger {
    if (!this._logger) {
      this._logger = getComponentLogger("sources:git");
    }
    return this._logger;
  }

  constructor(options: GitRepositorySourceOptions) {
    if (!options.sourceId || options.sourceId.trim() === "") {
      throw new ValidationError("Source id cannot be empty", "sourceId");
    }
    this.id = options.sourceId;
    this.lister = options.lister;
    this.cloner = options.cloner;
    this.filter = options.filter ?? PathFilter.acceptAll();
    this.tempRoot = options.tempRoot ?? tmpdir();
    this._logger = options.logger ?? null;
  }

  fetch(): ChannelStream<Document> {
    return channelStream<Document>(
      async (tx) => {
        let repositories = 0;
        for await (const repository of this.lister.list()) {
          await this.processRepository(repository, (doc) => tx.send(doc));
          repositories++;
        }
        this.logger.info({ source: this.id, repositories }, "All repositories processed");
      },
      { name: `git:${this.id}`, logger: this.logger }
    );
  }

  private async processRepository(
    repository: RepositoryDescriptor,
    emit: (doc: Document) => Promise<void>
  ): Promise<void> {
    const startTime = Date.now();
    const workDir = await mkdtemp(join(this.tempRoot, "docstream-"));
    this.logger.debug({ repository: repository.name, workDir }, "Cloning repository");

    try {
      try {
        await this.cloner.clone(repository.cloneUrl, workDir, {
          ...(repository.branch !== undefined && { branch: repository.branch }),
        });
      } catch (error) {
        throw new RepositoryCloneError(repository.name, asError(error));
      }

      const walker = new FileSystemSource({
        sourceId: this.id,
        paths: [workDir],
        filter: this.filter,
        logger: this.logger,
      });

      let documents = 0;
      for await (const doc of walker.fetch()) {
        await emit(this.rekey(doc, repository, workDir));
        documents++;
      }

      this.logger.info(
        {
          metric: "git_source.repository_duration_ms",
          value: Date.now() - startTime,
          repository: repository.name,
          documents,
        },
        "Repository processed"
      );
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }

  private rekey(doc: Document, repository: RepositoryDescriptor, workDir: string): Document {
    const path = relative(workDir, doc.link).split(sep).join(posix.sep);
    const key = `${repository.name}/${path}`;
    return {
      ...doc,
      id: key,
      link: key,
      metadata: { repository: repository.name, cloneUrl: repository.cloneUrl, path },
    };
  }
}
